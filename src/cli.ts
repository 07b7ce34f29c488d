import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { shellCommand } from "./commands/shell.ts";
import { logger } from "./core/logger.ts";

export const cli = yargs(hideBin(process.argv))
  .scriptName("sqlsh")
  // `-header`, `-csv`, `-cmd`: single-dash long flags.
  .parserConfiguration({ "short-option-groups": false })
  .usage("$0 [database] [sql] [options]")

  .option("verbose", {
    alias: "v",
    type: "boolean",
    default: false,
    describe: "Enable verbose output",
    global: true,
  })

  .command(shellCommand)

  .version(false)
  .strict()
  .fail((msg, err, yargs) => {
    if (err) {
      logger.error(err.message);
    } else if (msg) {
      logger.error(msg);
      console.log();
      yargs.showHelp();
    }
    process.exit(1);
  })
  .help()
  .wrap(Math.min(120, process.stdout.columns ?? 80));
