import { defineDotCommand } from "./define-dot-command.ts";

export const quitCommand = defineDotCommand({
  name: "quit",
  args: { max: 0 },
  usage: ".quit",
  describe: "Exit this program",
  handler: async () => "exit",
});
