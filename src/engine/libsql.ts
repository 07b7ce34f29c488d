import { LibsqlError, type Client, type ResultSet } from "@libsql/client";
import { EngineError, UserError } from "../core/errors.ts";
import { nextStatement } from "./complete.ts";
import { toSqlValue } from "./values.ts";
import type {
  ColumnInfo,
  Engine,
  EngineVersion,
  PreparedStatement,
  PrepareResult,
  QueryResult,
  SqlValue,
  StatusCounter,
} from "./types.ts";

/** The part of the libSQL client the shell drives. */
export type LibsqlClient = Pick<Client, "execute" | "executeMultiple" | "batch" | "close">;

function toEngineError(err: unknown): unknown {
  if (err instanceof LibsqlError) return new EngineError(err.message, err.code);
  return err;
}

function rowsOf(result: ResultSet): SqlValue[][] {
  return result.rows.map((row) =>
    result.columns.map((_, i) => toSqlValue(row[i])),
  );
}

function unsupported(what: string): UserError {
  return new UserError(
    `${what} is not available for remote databases`,
    "Open a local database file to use this command.",
  );
}

/**
 * Remote statements run on the server in one round trip, on the first
 * step; later steps hand out the buffered rows.
 */
class LibsqlStatement implements PreparedStatement {
  private result: ResultSet | undefined;
  private rows: SqlValue[][] = [];
  private next = 0;
  private finalized = false;

  constructor(
    private engine: LibsqlEngine,
    readonly sql: string,
  ) {}

  columns(): ColumnInfo[] {
    if (!this.result) return [];
    const types = this.result.columnTypes;
    return this.result.columns.map((name, i) => ({
      name,
      declaredType: types[i] || null,
    }));
  }

  async step(): Promise<SqlValue[] | undefined> {
    this.engine.checkInterrupt();
    if (!this.result) {
      this.result = await this.engine.execute(this.sql);
      this.rows = rowsOf(this.result);
    }
    return this.rows[this.next++];
  }

  async finalize(): Promise<void> {
    if (this.finalized) return;
    this.finalized = true;
    this.engine.endStatement();
  }

  counters(): StatusCounter[] {
    return [
      { label: "Rows Returned", current: this.rows.length },
      { label: "Rows Affected", current: this.result?.rowsAffected ?? 0 },
    ];
  }
}

/** libSQL database reached through `@libsql/client` (remote URL or local file). */
export class LibsqlEngine implements Engine {
  private trace: ((sql: string) => void) | null = null;
  private interrupted = false;
  private active = 0;

  constructor(
    private client: LibsqlClient,
    readonly location: string,
  ) {}

  /** @internal */
  checkInterrupt(): void {
    if (this.interrupted) throw new EngineError("interrupted", "SQLITE_INTERRUPT");
  }

  /** @internal */
  beginStatement(): void {
    this.active++;
  }

  /** @internal Once nothing is running, a pending interrupt is dropped. */
  endStatement(): void {
    this.active = Math.max(0, this.active - 1);
    if (this.active === 0) this.interrupted = false;
  }

  /** @internal */
  async execute(sql: string, params: SqlValue[] = []): Promise<ResultSet> {
    this.trace?.(sql);
    try {
      return await this.client.execute({ sql, args: params });
    } catch (err) {
      throw toEngineError(err);
    }
  }

  async prepare(sql: string): Promise<PrepareResult> {
    const split = nextStatement(sql);
    if (!split) return { statement: null, tail: "" };
    this.beginStatement();
    return { statement: new LibsqlStatement(this, split.statement), tail: split.tail };
  }

  async query(sql: string, params: SqlValue[] = []): Promise<QueryResult> {
    const result = await this.execute(sql, params);
    return { columns: result.columns, rows: rowsOf(result) };
  }

  async *iterate(sql: string, params: SqlValue[] = []): AsyncGenerator<SqlValue[]> {
    const { rows } = await this.query(sql, params);
    this.beginStatement();
    try {
      for (const row of rows) {
        this.checkInterrupt();
        yield row;
      }
    } finally {
      this.endStatement();
    }
  }

  async exec(sql: string): Promise<void> {
    this.trace?.(sql);
    try {
      await this.client.executeMultiple(sql);
    } catch (err) {
      throw toEngineError(err);
    }
  }

  async insertAll(sql: string, rows: SqlValue[][]): Promise<void> {
    if (rows.length === 0) return;
    this.trace?.(sql);
    try {
      await this.client.batch(
        rows.map((args) => ({ sql, args })),
        "write",
      );
    } catch (err) {
      throw toEngineError(err);
    }
  }

  async backup(): Promise<void> {
    throw unsupported("Backup");
  }

  async restore(): Promise<void> {
    throw unsupported("Restore");
  }

  async loadExtension(): Promise<void> {
    throw unsupported("Extension loading");
  }

  setTrace(trace: ((sql: string) => void) | null): void {
    this.trace = trace;
  }

  async setBusyTimeout(): Promise<void> {
    throw unsupported("A busy timeout");
  }

  async statusCounters(statement: PreparedStatement | null): Promise<StatusCounter[]> {
    return statement ? statement.counters() : [];
  }

  async queryPlan(sql: string): Promise<string[]> {
    const { rows } = await this.query(`EXPLAIN QUERY PLAN ${sql}`);
    return rows.map((row) => String(row[3] ?? ""));
  }

  async vfsName(): Promise<string | null> {
    return null;
  }

  async version(): Promise<EngineVersion> {
    const { rows } = await this.query("SELECT sqlite_version(), sqlite_source_id()");
    const [version, sourceId] = rows[0] ?? [];
    return { version: String(version ?? ""), sourceId: String(sourceId ?? "") };
  }

  async testControl(): Promise<number> {
    throw unsupported("Test control");
  }

  /** Stop the running statements; with none running this does nothing. */
  interrupt(): void {
    if (this.active > 0) this.interrupted = true;
  }

  async close(): Promise<void> {
    this.client.close();
  }
}
