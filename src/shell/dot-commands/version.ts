import { openDb } from "../session.ts";
import { defineDotCommand } from "./define-dot-command.ts";

export const versionCommand = defineDotCommand({
  name: "version",
  usage: ".version",
  describe: "Show source, library and compiler versions",
  handler: async (_args, { session }) => {
    const db = await openDb(session);
    const { version, sourceId } = await db.version();
    session.out.write(`SQLite ${version} ${sourceId}\n`);
  },
});
