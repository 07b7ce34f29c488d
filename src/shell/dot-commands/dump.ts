import { dumpDatabase } from "../dump.ts";
import { defineDotCommand } from "./define-dot-command.ts";

export const dumpCommand = defineDotCommand({
  name: "dump",
  usage: ".dump ?TABLE? ...",
  describe: "Dump the database in an SQL text format",
  handler: async (patterns, { session }) => {
    await dumpDatabase(session, patterns);
  },
});
