import { backupDatabase, parseBackupArgs } from "../backup.ts";
import { defineDotCommand } from "./define-dot-command.ts";

export const backupCommand = defineDotCommand({
  name: "backup",
  minPrefix: 3,
  usage: ".backup ?DB? FILE",
  describe: 'Backup DB (default "main") to FILE',
  handler: async (args, { session }) => {
    await backupDatabase(session, parseBackupArgs(args));
  },
});
