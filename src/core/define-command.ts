import type { ArgumentsCamelCase, Argv, CommandModule } from "yargs";
import type { GlobalArgs } from "./types.ts";
import { isEngineError, isUserError } from "./errors.ts";
import { logger } from "./logger.ts";

type CommandArgs<A> = ArgumentsCamelCase<A & GlobalArgs>;

interface CommandDef<A> {
  command: string | readonly string[];
  describe: string;
  /** Define command-specific flags and positional arguments. */
  builder: (yargs: Argv<GlobalArgs>) => Argv<A & GlobalArgs>;
  /**
   * Main command handler. The global `verbose` flag is always available on `args`.
   * Throw {@link UserError} to abort with a clean message.
   */
  handler: (args: CommandArgs<A>) => Promise<void>;
}

/**
 * Command factory. Wraps the handler with consistent error handling.
 *
 * Exit codes: `1` for user and engine errors, `2` for unexpected errors. A handler that
 * finishes normally reports its status through `process.exitCode`.
 *
 * @example
 * ```ts
 * export const shellCommand = defineCommand<{ database?: string }>({
 *   command: "$0 [database]",
 *   describe: "Open a database.",
 *   builder: (yargs) => yargs.positional("database", { type: "string" }),
 *   handler: async ({ database }) => {
 *     // ...
 *   },
 * });
 * ```
 */
export function defineCommand<A>(
  def: CommandDef<A>,
): CommandModule<GlobalArgs, A & GlobalArgs> {
  return {
    command: def.command,
    describe: def.describe,
    builder: def.builder,
    handler: async (args) => {
      try {
        await def.handler(args);
      } catch (err: unknown) {
        if (isUserError(err)) {
          logger.error(err.message);
          if (err.hint) logger.dim(err.hint);
          process.exit(1);
        }
        if (isEngineError(err)) {
          logger.error(err.message);
          process.exit(1);
        }

        logger.error("An unexpected error occurred.");
        if (args.verbose) console.error(err);
        process.exit(2);
      }
    },
  };
}
