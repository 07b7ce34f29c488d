import { booleanValue } from "../tokenize.ts";
import { defineDotCommand } from "./define-dot-command.ts";

export const timerCommand = defineDotCommand({
  name: "timer",
  minPrefix: 5,
  args: { min: 1, max: 1 },
  usage: ".timer ON|OFF",
  describe: "Turn the CPU timer measurement on or off",
  handler: async ([flag], { session }) => {
    session.timer = booleanValue(flag);
  },
});
