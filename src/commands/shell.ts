import { existsSync } from "node:fs";
import { applyConfig, loadConfigFile } from "../config/index.ts";
import { getStartupScriptPath } from "../config/paths.ts";
import { defineCommand } from "../core/define-command.ts";
import { logger } from "../core/logger.ts";
import { VERSION } from "../core/version.ts";
import { isRemoteLocation, openEngine, type Engine } from "../engine/index.ts";
import type { ShellContext } from "../shell/dot-commands/index.ts";
import { MODE_NAMES, applyMode, type ModeName } from "../shell/dot-commands/mode.ts";
import { createShellContext, processInput, runCommandText } from "../shell/input.ts";
import { StreamLineSource, TerminalLineSource, type LineSource } from "../shell/line-reader.ts";
import { closeSession, createSession, openDb, type Session } from "../shell/session.ts";
import { integerValue } from "../shell/tokenize.ts";
import { envValue } from "../utils/env-file.ts";
import { ARG_DATABASE, ARG_SQL, ENV_AUTH_TOKEN, ENV_DATABASE_URL } from "./constants.ts";

const COMMAND = `$0 [${ARG_DATABASE}] [${ARG_SQL}]`;
const DESCRIPTION = "Open an interactive SQL shell on a SQLite file or a libSQL database.";

const ARG_AUTH_TOKEN = "auth-token";

/** Mode flags, applied in this order; `--mode` comes after them. */
const MODE_FLAGS = ["list", "line", "column", "html", "csv"] as const;

interface ConnectOptions {
  location: string;
  authToken?: string;
  busyTimeout?: number;
  mmapSize?: number;
}

async function connect({ location, authToken, busyTimeout, mmapSize }: ConnectOptions): Promise<Engine> {
  const engine = await openEngine({ location, authToken });
  if (!isRemoteLocation(location)) {
    if (busyTimeout !== undefined) await engine.setBusyTimeout(busyTimeout);
    if (mmapSize !== undefined) await engine.exec(`PRAGMA mmap_size=${mmapSize}`);
  }
  return engine;
}

interface ShellFlags {
  bail: boolean;
  column: boolean;
  csv: boolean;
  echo: boolean;
  header: boolean;
  html: boolean;
  line: boolean;
  list: boolean;
  mode?: ModeName;
  noheader: boolean;
  nullvalue?: string;
  separator?: string;
  stats: boolean;
}

/** Command-line settings, applied after the startup script so they override it. */
function applyFlags(session: Session, flags: ShellFlags): void {
  for (const flag of MODE_FLAGS) {
    if (flags[flag]) applyMode(session, flag);
  }
  if (flags.mode) applyMode(session, flags.mode);
  if (flags.separator !== undefined) session.separator = flags.separator;
  if (flags.nullvalue !== undefined) session.nullValue = flags.nullvalue;
  if (flags.header) session.showHeader = true;
  if (flags.noheader) session.showHeader = false;
  if (flags.echo) session.echo = true;
  if (flags.stats) session.stats = true;
  if (flags.bail) session.bail = true;
}

function printBanner(): void {
  logger.log(`sqlsh ${VERSION}`);
  logger.dim('Enter ".help" for usage hints.');
  logger.dim('Enter SQL statements terminated with a ";"');
}

interface RunOptions {
  flags: ShellFlags;
  init?: string;
  commands: string[];
  sql?: string;
  historySize?: number;
}

/** Startup script, flags, `-cmd` commands, then the SQL argument or standard input. */
async function runShell(ctx: ShellContext, options: RunOptions): Promise<number> {
  const { session } = ctx;

  const startupScript = options.init ?? getStartupScriptPath();
  if (existsSync(startupScript)) {
    if (session.interactive) logger.dim(`-- Loading resources from ${startupScript}`);
    const { errors, exit } = await ctx.runScript(startupScript);
    if (errors > 0) return 1;
    if (exit) return session.exitCode;
  }

  applyFlags(session, options.flags);

  for (const command of options.commands) {
    const status = await runCommandText(ctx, command);
    if (status === "exit") return session.exitCode;
    if (status === "error" && session.bail) return 1;
  }

  if (options.sql !== undefined) {
    const status = await runCommandText(ctx, options.sql);
    return status === "error" ? 1 : session.exitCode;
  }

  const source: LineSource = session.interactive
    ? new TerminalLineSource(session, options.historySize)
    : new StreamLineSource(process.stdin);
  if (session.interactive) printBanner();
  try {
    const { errors } = await processInput(ctx, source);
    if (session.exitCode !== 0) return session.exitCode;
    return errors > 0 && !session.interactive ? 1 : 0;
  } finally {
    await source.close();
  }
}

/**
 * Interactive SQL shell for SQLite database files and libSQL servers.
 *
 * Reads SQL statements and dot commands (`.tables`, `.schema`, `.dump`,
 * `.mode`, ...) from the terminal, a pipe or a script, and renders result
 * rows in one of nine output modes.
 *
 * @example
 * ```bash
 * # Interactive shell on a database file
 * sqlsh app.db
 *
 * # One-off query in CSV with a header row
 * sqlsh -csv -header app.db "SELECT * FROM users;"
 *
 * # Run a script
 * sqlsh app.db < seed.sql
 *
 * # Remote libSQL database
 * sqlsh libsql://db.example.com --auth-token test-secret
 * ```
 */
export const shellCommand = defineCommand<{
  [ARG_DATABASE]?: string;
  [ARG_SQL]?: string;
  bail: boolean;
  batch: boolean;
  cmd?: string[];
  column: boolean;
  csv: boolean;
  echo: boolean;
  header: boolean;
  html: boolean;
  init?: string;
  interactive: boolean;
  line: boolean;
  list: boolean;
  mmap?: string;
  mode?: ModeName;
  noheader: boolean;
  nullvalue?: string;
  separator?: string;
  stats: boolean;
  version: boolean;
  [ARG_AUTH_TOKEN]?: string;
}>({
  command: COMMAND,
  describe: DESCRIPTION,

  builder: (yargs) =>
    yargs
      .positional(ARG_DATABASE, {
        type: "string",
        describe: `Database file or libSQL URL. Defaults to ${ENV_DATABASE_URL} from the environment or .env, then :memory:`,
      })
      .positional(ARG_SQL, {
        type: "string",
        describe: "SQL or dot command to run before exiting",
      })
      .option("bail", { type: "boolean", default: false, describe: "Stop after hitting an error" })
      .option("batch", { type: "boolean", default: false, describe: "Force batch I/O" })
      .option("cmd", {
        type: "string",
        array: true,
        describe: "Run COMMAND before reading stdin",
      })
      .option("column", { type: "boolean", default: false, describe: "Set output mode to 'column'" })
      .option("csv", { type: "boolean", default: false, describe: "Set output mode to 'csv'" })
      .option("echo", { type: "boolean", default: false, describe: "Print commands before execution" })
      .option("header", { type: "boolean", default: false, describe: "Turn headers on" })
      .option("html", { type: "boolean", default: false, describe: "Set output mode to HTML" })
      .option("init", { type: "string", describe: "Read and process the named file first" })
      .option("interactive", { type: "boolean", default: false, describe: "Force interactive I/O" })
      .option("line", { type: "boolean", default: false, describe: "Set output mode to 'line'" })
      .option("list", { type: "boolean", default: false, describe: "Set output mode to 'list'" })
      .option("mmap", { type: "string", describe: "Default mmap size, e.g. 64MiB" })
      .option("mode", {
        type: "string",
        choices: MODE_NAMES,
        describe: "Initial output mode",
      })
      .option("noheader", { type: "boolean", default: false, describe: "Turn headers off" })
      .option("nullvalue", { type: "string", describe: "Text string for NULL values" })
      .option("separator", { type: "string", describe: "Field separator for list and .import" })
      .option("stats", { type: "boolean", default: false, describe: "Print memory stats before each finalize" })
      .option("version", { type: "boolean", default: false, describe: "Show the engine version" })
      .option(ARG_AUTH_TOKEN, {
        type: "string",
        describe: `Auth token for remote databases. Defaults to ${ENV_AUTH_TOKEN}`,
      }),

  handler: async (args) => {
    const { verbose } = args;

    if (args.version) {
      const engine = await openEngine({ location: ":memory:" });
      try {
        const { version, sourceId } = await engine.version();
        logger.log(`${version} ${sourceId}`);
      } finally {
        await engine.close();
      }
      return;
    }

    const location = args[ARG_DATABASE] ?? envValue(ENV_DATABASE_URL) ?? ":memory:";
    const authToken = args[ARG_AUTH_TOKEN] ?? envValue(ENV_AUTH_TOKEN);
    const config = loadConfigFile(verbose);
    const mmapSize = args.mmap === undefined ? undefined : integerValue(args.mmap);

    const session = createSession({
      connect: () => connect({ location, authToken, busyTimeout: config?.timeout, mmapSize }),
      interactive: args.batch ? false : args.interactive || process.stdin.isTTY === true,
      verbose,
    });
    applyConfig(session, config);

    // A file that does not exist yet is only created once something uses it.
    if (isRemoteLocation(location) || existsSync(location)) await openDb(session);

    const onInterrupt = () => {
      session.seenInterrupt = true;
      session.db?.interrupt();
    };
    if (!session.interactive) process.on("SIGINT", onInterrupt);

    try {
      process.exitCode = await runShell(createShellContext(session), {
        flags: args,
        init: args.init,
        commands: args.cmd ?? [],
        sql: args[ARG_SQL],
        historySize: config?.history_size,
      });
    } finally {
      process.off("SIGINT", onInterrupt);
      await closeSession(session);
    }
  },
});
