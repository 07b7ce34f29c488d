import { defineDotCommand } from "./define-dot-command.ts";

export const nullvalueCommand = defineDotCommand({
  name: "nullvalue",
  args: { min: 1, max: 1 },
  usage: ".nullvalue STRING",
  describe: "Use STRING in place of NULL values",
  handler: async ([text], { session }) => {
    session.nullValue = text;
  },
});
