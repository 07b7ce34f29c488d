import Database from "better-sqlite3";
import { existsSync } from "node:fs";
import { EngineError, UserError } from "../core/errors.ts";
import { nextStatement } from "./complete.ts";
import { toSqlValue } from "./values.ts";
import type {
  BackupOptions,
  ColumnInfo,
  Engine,
  EngineVersion,
  PreparedStatement,
  PrepareResult,
  QueryResult,
  SqlValue,
  StatusCounter,
} from "./types.ts";

/** Rows stepped between two looks at the event loop (and so at SIGINT). */
const INTERRUPT_POLL_ROWS = 1000;

/** Backup steps without progress before the source counts as busy. */
const BUSY_STALL_STEPS = 100;

interface BackupProgress {
  totalPages: number;
  remainingPages: number;
}

const yieldToEventLoop = () => new Promise<void>((resolve) => setImmediate(resolve));

function toEngineError(err: unknown): unknown {
  if (err instanceof EngineError || err instanceof UserError) return err;
  if (err instanceof Database.SqliteError) return new EngineError(err.message, err.code);
  if (err instanceof Error) return new EngineError(err.message, "SQLITE_ERROR");
  return err;
}

function toRow(raw: unknown): SqlValue[] {
  if (!Array.isArray(raw)) {
    throw new EngineError("row is not an array", "SQLITE_MISUSE");
  }
  return raw.map(toSqlValue);
}

function toCount(raw: unknown): number | bigint {
  return typeof raw === "number" || typeof raw === "bigint" ? raw : 0;
}

class SqliteStatement implements PreparedStatement {
  private rows: IterableIterator<unknown> | undefined;
  private done = false;
  private finalized = false;
  private stepped = 0;
  private changed = 0;

  constructor(
    private engine: SqliteEngine,
    private stmt: Database.Statement,
    readonly sql: string,
  ) {}

  columns(): ColumnInfo[] {
    if (!this.stmt.reader) return [];
    return this.stmt.columns().map((c) => ({ name: c.name, declaredType: c.type }));
  }

  async step(): Promise<SqlValue[] | undefined> {
    if (this.done) return undefined;
    if (this.stepped > 0 && this.stepped % INTERRUPT_POLL_ROWS === 0) {
      await yieldToEventLoop();
    }
    try {
      this.engine.checkInterrupt();
      if (!this.stmt.reader) {
        this.changed = this.stmt.run().changes;
        this.done = true;
        return undefined;
      }
      this.rows ??= this.stmt.raw(true).safeIntegers(true).iterate();
      const next = this.rows.next();
      if (next.done) {
        this.done = true;
        return undefined;
      }
      this.stepped++;
      return toRow(next.value);
    } catch (err) {
      this.done = true;
      throw toEngineError(err);
    }
  }

  async finalize(): Promise<void> {
    this.rows?.return?.();
    this.rows = undefined;
    this.done = true;
    if (this.finalized) return;
    this.finalized = true;
    this.engine.endStatement();
  }

  counters(): StatusCounter[] {
    return [
      { label: "Rows Returned", current: this.stepped },
      { label: "Rows Changed", current: this.changed },
    ];
  }
}

/** Local SQLite file or `:memory:` database over better-sqlite3. */
export class SqliteEngine implements Engine {
  private db: Database.Database;
  private trace: ((sql: string) => void) | null = null;
  private interrupted = false;
  private active = 0;

  constructor(readonly location: string) {
    this.db = this.connect(location);
  }

  private connect(source: string | Buffer): Database.Database {
    try {
      const db = new Database(source, {
        verbose: (message) => this.trace?.(String(message)),
      });
      // writable_schema during dumps; catalog reads while a statement is open
      db.unsafeMode(true);
      return db;
    } catch (err) {
      throw toEngineError(err);
    }
  }

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

  private prepareOne(sql: string): Database.Statement {
    try {
      return this.db.prepare(sql);
    } catch (err) {
      throw toEngineError(err);
    }
  }

  async prepare(sql: string): Promise<PrepareResult> {
    const split = nextStatement(sql);
    if (!split) return { statement: null, tail: "" };
    const stmt = this.prepareOne(split.statement);
    this.beginStatement();
    return { statement: new SqliteStatement(this, stmt, split.statement), tail: split.tail };
  }

  async query(sql: string, params: SqlValue[] = []): Promise<QueryResult> {
    const stmt = this.prepareOne(sql);
    try {
      if (!stmt.reader) {
        stmt.run(...params);
        return { columns: [], rows: [] };
      }
      const columns = stmt.columns().map((c) => c.name);
      const rows = stmt.raw(true).safeIntegers(true).all(...params).map(toRow);
      return { columns, rows };
    } catch (err) {
      throw toEngineError(err);
    }
  }

  async *iterate(sql: string, params: SqlValue[] = []): AsyncGenerator<SqlValue[]> {
    const stmt = this.prepareOne(sql);
    this.beginStatement();
    try {
      if (!stmt.reader) {
        stmt.run(...params);
        return;
      }
      let count = 0;
      for (const row of stmt.raw(true).safeIntegers(true).iterate(...params)) {
        yield toRow(row);
        if (++count % INTERRUPT_POLL_ROWS === 0) {
          await yieldToEventLoop();
          this.checkInterrupt();
        }
      }
    } catch (err) {
      throw toEngineError(err);
    } finally {
      this.endStatement();
    }
  }

  async exec(sql: string): Promise<void> {
    try {
      this.db.exec(sql);
    } catch (err) {
      throw toEngineError(err);
    }
  }

  async insertAll(sql: string, rows: SqlValue[][]): Promise<void> {
    const stmt = this.prepareOne(sql);
    const insert = this.db.transaction((batch: SqlValue[][]) => {
      for (const row of batch) stmt.run(...row);
    });
    try {
      insert(rows);
    } catch (err) {
      throw toEngineError(err);
    }
  }

  async backup(options: BackupOptions): Promise<void> {
    await this.copy(this.db, options.file, options);
  }

  async restore(options: BackupOptions): Promise<void> {
    if (!existsSync(options.file)) {
      throw new EngineError(`cannot open "${options.file}"`, "SQLITE_CANTOPEN");
    }
    const source = this.connect(options.file);
    try {
      const target = await this.schemaFile(options.schema);
      if (target) {
        await this.copy(source, target, { ...options, schema: "main" });
      } else if (options.schema === "main") {
        // In-memory main database: reopen it from the source's image.
        const image = source.serialize();
        this.db.close();
        this.db = this.connect(image);
      } else {
        throw new EngineError(
          `cannot restore into in-memory database "${options.schema}"`,
          "SQLITE_ERROR",
        );
      }
    } finally {
      source.close();
    }
  }

  private async copy(
    from: Database.Database,
    file: string,
    { schema, pagesPerStep, onProgress }: BackupOptions,
  ): Promise<void> {
    let lastRemaining = -1;
    let stalls = 0;
    const progress = ({ totalPages, remainingPages }: BackupProgress): number => {
      if (remainingPages === lastRemaining) {
        if (++stalls > BUSY_STALL_STEPS) {
          throw new EngineError("source database is busy", "SQLITE_BUSY");
        }
      } else {
        stalls = 0;
        lastRemaining = remainingPages;
      }
      onProgress?.(remainingPages, totalPages);
      return pagesPerStep;
    };
    const backupOptions = { attached: schema, progress };
    try {
      await from.backup(file, backupOptions);
    } catch (err) {
      if (err instanceof TypeError) {
        throw new EngineError(`cannot open "${file}"`, "SQLITE_CANTOPEN");
      }
      throw toEngineError(err);
    }
  }

  /** File behind an attached schema; `null` for in-memory and temp schemas. */
  private async schemaFile(schema: string): Promise<string | null> {
    const { rows } = await this.query("PRAGMA database_list");
    const entry = rows.find((row) => row[1] === schema);
    if (!entry) throw new EngineError(`unknown database ${schema}`, "SQLITE_ERROR");
    const file = entry[2];
    return typeof file === "string" && file.length > 0 ? file : null;
  }

  async loadExtension(file: string, entryPoint?: string): Promise<void> {
    try {
      this.db.loadExtension(file, entryPoint);
    } catch (err) {
      throw toEngineError(err);
    }
  }

  setTrace(trace: ((sql: string) => void) | null): void {
    this.trace = trace;
  }

  async setBusyTimeout(ms: number): Promise<void> {
    await this.exec(`PRAGMA busy_timeout = ${Math.max(0, Math.trunc(ms))}`);
  }

  async statusCounters(statement: PreparedStatement | null): Promise<StatusCounter[]> {
    const pragma = (name: string) => toCount(this.db.pragma(name, { simple: true }));
    const [[totalChanges] = []] = (await this.query("SELECT total_changes()")).rows;
    const counters: StatusCounter[] = [
      { label: "Page Size", current: pragma("page_size"), unit: "bytes" },
      { label: "Page Count", current: pragma("page_count"), unit: "pages" },
      { label: "Freelist Pages", current: pragma("freelist_count"), unit: "pages" },
      { label: "Page Cache Size", current: pragma("cache_size") },
      { label: "Total Changes", current: toCount(totalChanges) },
    ];
    return statement ? [...counters, ...statement.counters()] : counters;
  }

  async queryPlan(sql: string): Promise<string[]> {
    const { rows } = await this.query(`EXPLAIN QUERY PLAN ${sql}`);
    return rows.map((row) => String(row[3] ?? ""));
  }

  async vfsName(schema: string): Promise<string | null> {
    const { rows } = await this.query("PRAGMA database_list");
    if (!rows.some((row) => row[1] === schema)) return null;
    return process.platform === "win32" ? "win32" : "unix";
  }

  async version(): Promise<EngineVersion> {
    const { rows } = await this.query("SELECT sqlite_version(), sqlite_source_id()");
    const [version, sourceId] = rows[0] ?? [];
    return { version: String(version ?? ""), sourceId: String(sourceId ?? "") };
  }

  async testControl(): Promise<number> {
    throw new UserError("test controls are not exposed by the SQLite driver");
  }

  /** Stop the running statements; with none running this does nothing. */
  interrupt(): void {
    if (this.active > 0) this.interrupted = true;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
