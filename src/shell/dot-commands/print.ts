import { defineDotCommand } from "./define-dot-command.ts";

export const printCommand = defineDotCommand({
  name: "print",
  minPrefix: 3,
  usage: ".print STRING...",
  describe: "Print literal STRING",
  handler: async (args, { session }) => {
    session.out.write(`${args.join(" ")}\n`);
  },
});
