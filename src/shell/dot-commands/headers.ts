import { booleanValue } from "../tokenize.ts";
import { defineDotCommand } from "./define-dot-command.ts";

/** Also answers to `.header`, which abbreviates the name. */
export const headersCommand = defineDotCommand({
  name: "headers",
  args: { min: 1, max: 1 },
  usage: ".header(s) ON|OFF",
  describe: "Turn display of headers on or off",
  handler: async ([flag], { session }) => {
    session.showHeader = booleanValue(flag);
  },
});
