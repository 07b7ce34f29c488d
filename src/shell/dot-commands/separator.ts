import { defineDotCommand } from "./define-dot-command.ts";

export const separatorCommand = defineDotCommand({
  name: "separator",
  args: { min: 1, max: 1 },
  usage: ".separator STRING",
  describe: "Change separator used by output mode and .import",
  handler: async ([separator], { session }) => {
    session.separator = separator;
  },
});
