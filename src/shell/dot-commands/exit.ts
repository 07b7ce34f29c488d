import { atoi } from "../tokenize.ts";
import { defineDotCommand } from "./define-dot-command.ts";

export const exitCommand = defineDotCommand({
  name: "exit",
  usage: ".exit ?CODE?",
  describe: "Exit this program, with status CODE if given",
  handler: async ([code], { session }) => {
    if (code !== undefined && atoi(code) !== 0) session.exitCode = atoi(code);
    return "exit";
  },
});
