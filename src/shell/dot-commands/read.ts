import { defineDotCommand } from "./define-dot-command.ts";

export const readCommand = defineDotCommand({
  name: "read",
  minPrefix: 3,
  args: { min: 1, max: 1 },
  usage: ".read FILENAME",
  describe: "Execute SQL in FILENAME",
  handler: async ([file], ctx) => {
    const { errors, exit } = await ctx.runScript(file);
    if (exit) return "exit";
    return errors > 0 ? "error" : "ok";
  },
});
