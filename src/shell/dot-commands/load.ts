import { openDb } from "../session.ts";
import { defineDotCommand } from "./define-dot-command.ts";

export const loadCommand = defineDotCommand({
  name: "load",
  args: { min: 1, max: 2 },
  usage: ".load FILE ?ENTRY?",
  describe: "Load an extension library",
  handler: async ([file, entryPoint], { session }) => {
    const db = await openDb(session);
    await db.loadExtension(file, entryPoint);
  },
});
