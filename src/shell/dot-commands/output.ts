import { openSink, stdoutSink } from "../output.ts";
import { closeSink } from "../session.ts";
import { defineDotCommand } from "./define-dot-command.ts";

export const outputCommand = defineDotCommand({
  name: "output",
  args: { min: 1, max: 1 },
  usage: ".output FILENAME",
  describe: 'Send output to FILENAME, "stdout", "off", or a "|command" pipe',
  handler: async ([target], { session }) => {
    await closeSink(session.out);
    session.out = stdoutSink;
    session.out = openSink(target);
  },
});
