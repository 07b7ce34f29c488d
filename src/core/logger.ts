import chalk from "chalk";

/**
 * Diagnostics for the person at the terminal. Query results never go through
 * here; they are written to the session's output sink.
 */
export const logger = {
  log: (msg = "") => console.log(msg),
  info: (msg: string) => console.log(chalk.blue("ℹ"), msg),
  success: (msg: string) => console.log(chalk.green("✓"), msg),
  warn: (msg: string) => console.error(chalk.yellow("⚠"), msg),
  error: (msg: string) => console.error(chalk.red("✖"), msg),
  dim: (msg: string) => console.log(chalk.dim(msg)),
  debug: (msg: string, verbose: boolean) => {
    if (verbose) console.error(chalk.gray("[debug]"), msg);
  },
};
