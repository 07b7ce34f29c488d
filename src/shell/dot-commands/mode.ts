import { UserError } from "../../core/errors.ts";
import type { OutputMode, Session } from "../session.ts";
import { defineDotCommand } from "./define-dot-command.ts";

interface ModeSetting {
  mode: OutputMode;
  separator?: string;
}

export const MODE_NAMES = [
  "line",
  "lines",
  "column",
  "columns",
  "list",
  "html",
  "tcl",
  "csv",
  "tabs",
  "insert",
] as const;

export type ModeName = (typeof MODE_NAMES)[number];

const MODES: Record<ModeName, ModeSetting> = {
  line: { mode: "line" },
  lines: { mode: "line" },
  column: { mode: "column" },
  columns: { mode: "column" },
  list: { mode: "list" },
  html: { mode: "html" },
  tcl: { mode: "tcl", separator: " " },
  csv: { mode: "csv", separator: "," },
  tabs: { mode: "list", separator: "\t" },
  insert: { mode: "insert" },
};

function isModeName(name: string): name is ModeName {
  return MODE_NAMES.some((mode) => mode === name);
}

/** Switch `session` to the output mode called `name`, as `.mode NAME` does. */
export function applyMode(session: Session, name: string): void {
  if (!isModeName(name)) {
    throw new UserError("mode should be one of: column csv html insert line list tabs tcl");
  }
  const setting = MODES[name];
  session.mode = setting.mode;
  if (setting.separator !== undefined) session.separator = setting.separator;
  if (name === "insert") session.destTable = "table";
}

export const modeCommand = defineDotCommand({
  name: "mode",
  args: { min: 1, max: 2 },
  usage: ".mode MODE ?TABLE?",
  describe: "Set output mode where MODE is one of: csv column html insert line list tabs tcl",
  handler: async ([name, table], { session }) => {
    if (table === undefined) {
      applyMode(session, name);
      return;
    }
    if (name !== "insert") {
      throw new UserError(`invalid arguments:  "${table}". Enter ".help" for help`);
    }
    session.mode = "insert";
    session.destTable = table;
  },
});
