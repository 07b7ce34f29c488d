import { booleanValue } from "../tokenize.ts";
import { defineDotCommand } from "./define-dot-command.ts";

/** addr, opcode, p1, p2, p3, p4, p5, comment */
const EXPLAIN_WIDTHS = [4, 13, 4, 4, 4, 13, 2, 13];

export const explainCommand = defineDotCommand({
  name: "explain",
  args: { max: 1 },
  usage: ".explain ?ON|OFF?",
  describe: "Turn output mode suitable for EXPLAIN on or off.  With no args, it turns EXPLAIN on.",
  handler: async ([flag], { session }) => {
    const on = flag === undefined ? true : booleanValue(flag);
    if (on) {
      session.explainPrev ??= {
        mode: session.mode,
        showHeader: session.showHeader,
        colWidth: [...session.colWidth],
      };
      // Re-applied even when already on, to undo a later .width, .mode or .header.
      session.mode = "explain";
      session.showHeader = true;
      session.colWidth = [...EXPLAIN_WIDTHS];
    } else if (session.explainPrev) {
      session.mode = session.explainPrev.mode;
      session.showHeader = session.explainPrev.showHeader;
      session.colWidth = session.explainPrev.colWidth;
      session.explainPrev = null;
    }
  },
});
