import { openDb } from "../session.ts";
import { atoi } from "../tokenize.ts";
import { defineDotCommand } from "./define-dot-command.ts";

export const timeoutCommand = defineDotCommand({
  name: "timeout",
  minPrefix: 5,
  args: { min: 1, max: 1 },
  usage: ".timeout MS",
  describe: "Try opening locked tables for MS milliseconds",
  handler: async ([ms], { session }) => {
    const db = await openDb(session);
    await db.setBusyTimeout(atoi(ms));
  },
});
