import { cString } from "../../core/format.ts";
import { defineDotCommand } from "./define-dot-command.ts";

const onOff = (flag: boolean) => (flag ? "on" : "off");

export const showCommand = defineDotCommand({
  name: "show",
  args: { max: 0 },
  usage: ".show",
  describe: "Show the current values for various settings",
  handler: async (_args, { session }) => {
    const widths: number[] = [];
    for (const width of session.colWidth) {
      if (width === 0) break;
      widths.push(width);
    }
    const settings: Array<[string, string]> = [
      ["echo", onOff(session.echo)],
      ["explain", onOff(session.explainPrev !== null)],
      ["headers", onOff(session.showHeader)],
      ["mode", session.mode],
      ["nullvalue", cString(session.nullValue)],
      ["output", session.out.name],
      ["separator", cString(session.separator)],
      ["stats", onOff(session.stats)],
      ["width", widths.map((width) => `${width} `).join("")],
    ];
    for (const [name, value] of settings) {
      session.out.write(`${name.padStart(9)}: ${value}\n`);
    }
  },
});
