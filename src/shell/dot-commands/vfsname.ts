import { defineDotCommand } from "./define-dot-command.ts";

export const vfsnameCommand = defineDotCommand({
  name: "vfsname",
  args: { max: 1 },
  usage: ".vfsname ?AUX?",
  describe: "Print the name of the VFS stack",
  handler: async ([schema = "main"], { session }) => {
    if (!session.db) return;
    const name = await session.db.vfsName(schema);
    if (name) session.out.write(`${name}\n`);
  },
});
