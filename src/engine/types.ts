/** Value as it comes back from the engine: integers are `bigint`, reals `number`. */
export type SqlValue = null | bigint | number | string | Uint8Array;

export type StorageClass = "null" | "integer" | "real" | "text" | "blob";

export interface ColumnInfo {
  name: string;
  /** Declared type of the source column, when the result column is one. */
  declaredType: string | null;
}

/** A single prepared statement, stepped row by row. */
export interface PreparedStatement {
  /** Text of this statement only, as it was handed to `prepare`. */
  readonly sql: string;
  /** Result columns. Remote statements know them only after the first step. */
  columns(): ColumnInfo[];
  /** Next row, or `undefined` once the statement is done. Throws {@link EngineError}. */
  step(): Promise<SqlValue[] | undefined>;
  /** Release the statement. Throws the deferred error of an interrupted run. */
  finalize(): Promise<void>;
  /** Counters for the last run of this statement. */
  counters(): StatusCounter[];
}

export interface PrepareResult {
  /** `null` when the text held only whitespace and comments. */
  statement: PreparedStatement | null;
  /** Unconsumed remainder of the input text. */
  tail: string;
}

export interface QueryResult {
  columns: string[];
  rows: SqlValue[][];
}

export interface StatusCounter {
  label: string;
  current: number | bigint;
  highWater?: number | bigint;
  unit?: string;
}

export interface EngineVersion {
  version: string;
  sourceId: string;
}

export interface BackupOptions {
  /** Schema name, `main` unless given. */
  schema: string;
  file: string;
  /** Pages copied per step. */
  pagesPerStep: number;
  onProgress?: (remaining: number, total: number) => void;
}

/**
 * Narrow port onto the database engine. Every failure surfaces as an
 * {@link EngineError}; unsupported capabilities as a {@link UserError}.
 */
export interface Engine {
  /** What the engine was opened on: a path, `:memory:` or a URL. */
  readonly location: string;
  /** Prepare the first statement of `sql`. */
  prepare(sql: string): Promise<PrepareResult>;
  /** Run `sql` to completion, collecting every row. */
  query(sql: string, params?: SqlValue[]): Promise<QueryResult>;
  /**
   * Stream the rows of `sql`. Other statements must not run on the same
   * connection until the iteration is finished.
   */
  iterate(sql: string, params?: SqlValue[]): AsyncIterable<SqlValue[]>;
  /** Run one or more statements, discarding rows. */
  exec(sql: string): Promise<void>;
  /** Run `sql` once per parameter row, all or nothing. */
  insertAll(sql: string, rows: SqlValue[][]): Promise<void>;
  backup(options: BackupOptions): Promise<void>;
  restore(options: BackupOptions): Promise<void>;
  loadExtension(file: string, entryPoint?: string): Promise<void>;
  /** Install or remove the callback receiving the text of every statement run. */
  setTrace(trace: ((sql: string) => void) | null): void;
  setBusyTimeout(ms: number): Promise<void>;
  /** Connection-wide counters followed by those of `statement`. */
  statusCounters(statement: PreparedStatement | null): Promise<StatusCounter[]>;
  /** Human-readable query plan lines for `sql`. */
  queryPlan(sql: string): Promise<string[]>;
  vfsName(schema: string): Promise<string | null>;
  /** Library version and source id of the engine. */
  version(): Promise<EngineVersion>;
  testControl(op: number, args: number[]): Promise<number>;
  /** Ask the running statement to stop at its next step. */
  interrupt(): void;
  close(): Promise<void>;
}
