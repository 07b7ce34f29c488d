import { booleanValue } from "../tokenize.ts";
import { defineDotCommand } from "./define-dot-command.ts";

export const statsCommand = defineDotCommand({
  name: "stats",
  args: { min: 1, max: 1 },
  usage: ".stats ON|OFF",
  describe: "Turn stats on or off",
  handler: async ([flag], { session }) => {
    session.stats = booleanValue(flag);
  },
});
