import { defineDotCommand } from "./define-dot-command.ts";

export const promptCommand = defineDotCommand({
  name: "prompt",
  args: { min: 1, max: 2 },
  usage: ".prompt MAIN CONTINUE",
  describe: "Replace the standard prompts",
  handler: async ([main, continuation], { session }) => {
    session.prompts.main = main;
    if (continuation !== undefined) session.prompts.continuation = continuation;
  },
});
