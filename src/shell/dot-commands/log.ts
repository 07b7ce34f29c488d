import { openSink } from "../output.ts";
import { closeSink } from "../session.ts";
import { defineDotCommand } from "./define-dot-command.ts";

export const logCommand = defineDotCommand({
  name: "log",
  args: { min: 1 },
  usage: ".log FILE|off",
  describe: 'Turn logging on or off.  FILE can be stderr or stdout',
  handler: async ([target], { session }) => {
    await closeSink(session.logOut);
    session.logOut = null;
    if (target !== "off") session.logOut = openSink(target);
  },
});
