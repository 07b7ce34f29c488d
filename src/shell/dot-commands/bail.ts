import { booleanValue } from "../tokenize.ts";
import { defineDotCommand } from "./define-dot-command.ts";

export const bailCommand = defineDotCommand({
  name: "bail",
  minPrefix: 3,
  args: { min: 1, max: 1 },
  usage: ".bail ON|OFF",
  describe: "Stop after hitting an error.  Default OFF",
  handler: async ([flag], { session }) => {
    session.bail = booleanValue(flag);
  },
});
