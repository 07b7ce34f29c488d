import { parseRestoreArgs, restoreDatabase } from "../backup.ts";
import { defineDotCommand } from "./define-dot-command.ts";

export const restoreCommand = defineDotCommand({
  name: "restore",
  minPrefix: 3,
  args: { min: 1, max: 2 },
  usage: ".restore ?DB? FILE",
  describe: 'Restore content of DB (default "main") from FILE',
  handler: async (args, { session }) => {
    await restoreDatabase(session, parseRestoreArgs(args));
  },
});
