import { formatTable } from "../../core/format.ts";
import { logger } from "../../core/logger.ts";
import { defineDotCommand, type DotCommand } from "./define-dot-command.ts";

/** `.help` lists `commands()`, resolved at call time. */
export function createHelpCommand(commands: () => readonly DotCommand[]): DotCommand {
  return defineDotCommand({
    name: "help",
    usage: ".help",
    describe: "Show this message",
    handler: async () => {
      const rows = commands().map((command) => [command.usage, command.describe]);
      logger.log(formatTable(["Command", "Description"], rows));
    },
  });
}
