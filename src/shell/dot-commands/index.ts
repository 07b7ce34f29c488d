import { isEngineError, isUserError } from "../../core/errors.ts";
import { logger } from "../../core/logger.ts";
import { tokenizeMetaLine } from "../tokenize.ts";
import { backupCommand } from "./backup.ts";
import { bailCommand } from "./bail.ts";
import { databasesCommand } from "./databases.ts";
import type { DotCommand, DotStatus, ShellContext } from "./define-dot-command.ts";
import { dumpCommand } from "./dump.ts";
import { echoCommand } from "./echo.ts";
import { exitCommand } from "./exit.ts";
import { explainCommand } from "./explain.ts";
import { headersCommand } from "./headers.ts";
import { createHelpCommand } from "./help.ts";
import { importCommand } from "./import.ts";
import { indexesCommand, indicesCommand } from "./indices.ts";
import { loadCommand } from "./load.ts";
import { logCommand } from "./log.ts";
import { modeCommand } from "./mode.ts";
import { nullvalueCommand } from "./nullvalue.ts";
import { outputCommand } from "./output.ts";
import { printCommand } from "./print.ts";
import { promptCommand } from "./prompt.ts";
import { quitCommand } from "./quit.ts";
import { readCommand } from "./read.ts";
import { restoreCommand } from "./restore.ts";
import { schemaCommand } from "./schema.ts";
import { separatorCommand } from "./separator.ts";
import { showCommand } from "./show.ts";
import { statsCommand } from "./stats.ts";
import { tablesCommand } from "./tables.ts";
import { testctrlCommand } from "./testctrl.ts";
import { timeoutCommand } from "./timeout.ts";
import { timerCommand } from "./timer.ts";
import { traceCommand } from "./trace.ts";
import { versionCommand } from "./version.ts";
import { vfsnameCommand } from "./vfsname.ts";
import { widthCommand } from "./width.ts";

export type { DotStatus, ShellContext, ScriptResult } from "./define-dot-command.ts";

/** Every dot command, in matching order: the first entry that matches wins. */
export const DOT_COMMANDS: readonly DotCommand[] = [
  backupCommand,
  bailCommand,
  databasesCommand,
  dumpCommand,
  echoCommand,
  exitCommand,
  explainCommand,
  headersCommand,
  createHelpCommand(() => DOT_COMMANDS),
  importCommand,
  indicesCommand,
  indexesCommand,
  loadCommand,
  logCommand,
  modeCommand,
  nullvalueCommand,
  outputCommand,
  printCommand,
  promptCommand,
  quitCommand,
  readCommand,
  restoreCommand,
  schemaCommand,
  separatorCommand,
  showCommand,
  statsCommand,
  tablesCommand,
  testctrlCommand,
  timeoutCommand,
  timerCommand,
  traceCommand,
  versionCommand,
  vfsnameCommand,
  widthCommand,
];

export function findDotCommand(token: string, argc: number): DotCommand | undefined {
  return DOT_COMMANDS.find((command) => command.matches(token, argc));
}

/**
 * Tokenize and run one dot-command line. Failures are reported here and
 * come back as status `error`; the session is left as the command left it.
 */
export async function runDotCommand(line: string, ctx: ShellContext): Promise<DotStatus> {
  const tokens = tokenizeMetaLine(line);
  if (tokens.length === 0) return "ok";
  const [name = "", ...args] = tokens;

  const command = findDotCommand(name, args.length);
  if (!command) {
    logger.error(`unknown command or invalid arguments:  "${name}". Enter ".help" for help`);
    return "error";
  }

  try {
    return (await command.handler(args, ctx)) ?? "ok";
  } catch (err) {
    if (isUserError(err)) {
      logger.error(err.message);
      if (err.hint) logger.dim(err.hint);
      return "error";
    }
    if (isEngineError(err)) {
      logger.error(err.message);
      return "error";
    }
    throw err;
  }
}
