import { openSink } from "../output.ts";
import { closeSink, installTrace } from "../session.ts";
import { defineDotCommand } from "./define-dot-command.ts";

export const traceCommand = defineDotCommand({
  name: "trace",
  args: { min: 1 },
  usage: ".trace FILE|off",
  describe: "Output each SQL statement as it is run",
  handler: async ([target], { session }) => {
    await closeSink(session.traceOut);
    session.traceOut = null;
    try {
      if (target !== "off") session.traceOut = openSink(target);
    } finally {
      installTrace(session);
    }
  },
});
