import { booleanValue } from "../tokenize.ts";
import { defineDotCommand } from "./define-dot-command.ts";

export const echoCommand = defineDotCommand({
  name: "echo",
  args: { min: 1, max: 1 },
  usage: ".echo ON|OFF",
  describe: "Turn command echo on or off",
  handler: async ([flag], { session }) => {
    session.echo = booleanValue(flag);
  },
});
