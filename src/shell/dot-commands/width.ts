import { MAX_COLUMN_WIDTHS } from "../session.ts";
import { atoi } from "../tokenize.ts";
import { defineDotCommand } from "./define-dot-command.ts";

export const widthCommand = defineDotCommand({
  name: "width",
  args: { min: 1 },
  usage: ".width NUM1 NUM2 ...",
  describe: 'Set column widths for "column" mode',
  handler: async (widths, { session }) => {
    widths.slice(0, MAX_COLUMN_WIDTHS).forEach((width, i) => {
      session.colWidth[i] = atoi(width);
    });
  },
});
