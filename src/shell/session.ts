import chalk from "chalk";
import type { Engine, PreparedStatement } from "../engine/types.ts";
import { stdoutSink, type OutputSink } from "./output.ts";

export type OutputMode =
  | "line"
  | "column"
  | "list"
  | "semi"
  | "html"
  | "insert"
  | "tcl"
  | "csv"
  | "explain";

/** Capacity of the column-width table. Columns past it render 10 wide. */
export const MAX_COLUMN_WIDTHS = 100;

export const DEFAULT_PROMPT = chalk.blue.bold("sqlsh> ");
export const DEFAULT_CONTINUATION_PROMPT = chalk.blue.bold("   ...> ");

export interface Prompts {
  main: string;
  continuation: string;
}

/** Mode, header flag and widths saved by `.explain on`. */
export interface ExplainSnapshot {
  mode: OutputMode;
  showHeader: boolean;
  colWidth: number[];
}

/**
 * Everything the shell remembers between input lines. One per process run,
 * passed explicitly to the assembler, dot commands, pipeline and renderer.
 */
export interface Session {
  mode: OutputMode;
  /** Requested widths; 0 means automatic, a negative width right-justifies. */
  colWidth: number[];
  /** Widths resolved on the first row of the current result set. */
  actualWidth: number[];
  separator: string;
  nullValue: string;
  showHeader: boolean;
  echo: boolean;
  stats: boolean;
  timer: boolean;
  bail: boolean;
  /** Table named in insert-mode output. */
  destTable: string;
  out: OutputSink;
  traceOut: OutputSink | null;
  logOut: OutputSink | null;
  explainPrev: ExplainSnapshot | null;
  /** Statement being stepped, for stats reporting. */
  statement: PreparedStatement | null;
  /** Rows rendered so far in the current result set. */
  cnt: number;
  /** Set by the dump engine once it has printed `PRAGMA writable_schema=ON;`. */
  writableSchema: boolean;
  /** Errors met by the dump engine in the current `.dump`. */
  dumpErrors: number;
  prompts: Prompts;
  interactive: boolean;
  seenInterrupt: boolean;
  /** Process exit status requested by `.exit N`. */
  exitCode: number;
  verbose: boolean;
  db: Engine | null;
  connect: () => Promise<Engine>;
}

export interface SessionOptions {
  connect: () => Promise<Engine>;
  interactive?: boolean;
  out?: OutputSink;
  verbose?: boolean;
}

export function createSession({
  connect,
  interactive = false,
  out = stdoutSink,
  verbose = false,
}: SessionOptions): Session {
  return {
    mode: "list",
    colWidth: [],
    actualWidth: [],
    separator: "|",
    nullValue: "",
    showHeader: false,
    echo: false,
    stats: false,
    timer: false,
    bail: false,
    destTable: "table",
    out,
    traceOut: null,
    logOut: null,
    explainPrev: null,
    statement: null,
    cnt: 0,
    writableSchema: false,
    dumpErrors: 0,
    prompts: { main: DEFAULT_PROMPT, continuation: DEFAULT_CONTINUATION_PROMPT },
    interactive,
    seenInterrupt: false,
    exitCode: 0,
    verbose,
    db: null,
    connect,
  };
}

/** Render settings a command can override for its own output. */
export type ViewSettings = Partial<Pick<Session, "mode" | "showHeader" | "colWidth" | "separator">>;

/**
 * Shallow copy of `session` with `view` applied and a fresh result set.
 * Sinks and the engine are shared, so open the engine before copying.
 */
export function withView(session: Session, view: ViewSettings): Session {
  return { ...session, ...view, cnt: 0, actualWidth: [] };
}

/** The session's engine, connecting on first use. */
export async function openDb(session: Session): Promise<Engine> {
  if (!session.db) {
    session.db = await session.connect();
    installTrace(session);
  }
  return session.db;
}

/** Point the engine's trace callback at the session's trace sink, if any. */
export function installTrace(session: Session): void {
  if (!session.db) return;
  session.db.setTrace(
    session.traceOut ? (sql) => session.traceOut?.write(`${sql}\n`) : null,
  );
}

/** Write an engine error to the `.log` sink. */
export function logEngineError(session: Session, code: string, message: string): void {
  session.logOut?.write(`(${code}) ${message}\n`);
}

export async function closeSink(sink: OutputSink | null): Promise<void> {
  if (sink) await sink.close();
}

export async function closeSession(session: Session): Promise<void> {
  await closeSink(session.out);
  await closeSink(session.traceOut);
  await closeSink(session.logOut);
  session.out = stdoutSink;
  session.traceOut = null;
  session.logOut = null;
  if (session.db) {
    await session.db.close();
    session.db = null;
  }
}
