import { isCorruption, isEngineError } from "../core/errors.ts";
import { sqlIdent, sqlQuote } from "../core/format.ts";
import type { Engine } from "../engine/types.ts";
import { valueText } from "../engine/values.ts";
import { logEngineError, openDb, type Session } from "./session.ts";

const TABLES =
  "SELECT name, type, sql FROM sqlite_master " +
  "WHERE sql NOT NULL AND type=='table' AND name!='sqlite_sequence'";
const SEQUENCE = "SELECT name, type, sql FROM sqlite_master WHERE name=='sqlite_sequence'";
const OTHER_OBJECTS =
  "SELECT sql FROM sqlite_master WHERE sql NOT NULL AND type IN ('index','trigger','view')";

const tablesLike = (pattern: string) =>
  "SELECT name, type, sql FROM sqlite_master " +
  `WHERE tbl_name LIKE ${sqlQuote(pattern)} AND type=='table' AND sql NOT NULL`;
const otherObjectsLike = (pattern: string) =>
  "SELECT sql FROM sqlite_master WHERE sql NOT NULL " +
  `AND type IN ('index','trigger','view') AND tbl_name LIKE ${sqlQuote(pattern)}`;

const BY_ROWID_DESC = " ORDER BY rowid DESC";

interface DumpContext {
  session: Session;
  db: Engine;
  write: (text: string) => void;
}

/** Run statements whose failure does not stop the dump; failures go to the log sink. */
async function execLogged({ session, db }: DumpContext, sql: string): Promise<void> {
  try {
    await db.exec(sql);
  } catch (err) {
    if (!isEngineError(err)) throw err;
    logEngineError(session, err.code, err.message);
  }
}

/**
 * Print one statement per result row: the row's columns joined by commas,
 * then `;`. When the joined text holds `--` anywhere, the `;` goes on a
 * line of its own.
 */
async function runTableDumpQuery(
  ctx: DumpContext,
  select: string,
  firstRow: string | null = null,
): Promise<"ok" | "corrupt" | "error"> {
  let pending = firstRow;
  try {
    for await (const row of ctx.db.iterate(select)) {
      if (pending !== null) {
        ctx.write(pending);
        pending = null;
      }
      const text = row.map((value) => valueText(value) ?? "").join(",");
      ctx.write(text.includes("--") ? `${text}\n;\n` : `${text};\n`);
    }
    return "ok";
  } catch (err) {
    if (!isEngineError(err)) throw err;
    ctx.write(`/**** ERROR: (${err.code}) ${err.message} *****/\n`);
    ctx.session.dumpErrors++;
    return isCorruption(err) ? "corrupt" : "error";
  }
}

/** Names of the columns of `table`, in order. */
async function tableColumns(db: Engine, table: string): Promise<string[]> {
  const { rows } = await db.query(`PRAGMA table_info(${sqlIdent(table)})`);
  return rows.map((row) => valueText(row[1] ?? null) ?? "");
}

/**
 * SELECT that renders each row of `table` as the text of an INSERT
 * statement, split across one result column per table column.
 */
export function insertSelect(table: string, columns: string[]): string {
  const values = columns.map((name) => `quote(${sqlIdent(name)})`).join(", ");
  return (
    `SELECT 'INSERT INTO ' || ${sqlQuote(sqlIdent(table))} || ' VALUES(' || ${values} ` +
    `|| ')' FROM ${sqlIdent(table)}`
  );
}

async function dumpCatalogRow(ctx: DumpContext, row: (string | null)[]): Promise<void> {
  const [name = "", type = "", sql = ""] = row.map((value) => value ?? "");
  let firstRow: string | null = null;

  if (name === "sqlite_sequence") {
    firstRow = "DELETE FROM sqlite_sequence;\n";
  } else if (name === "sqlite_stat1") {
    ctx.write("ANALYZE sqlite_master;\n");
  } else if (name.startsWith("sqlite_")) {
    return;
  } else if (sql.startsWith("CREATE VIRTUAL TABLE")) {
    if (!ctx.session.writableSchema) {
      ctx.write("PRAGMA writable_schema=ON;\n");
      ctx.session.writableSchema = true;
    }
    ctx.write(
      "INSERT INTO sqlite_master(type, name, tbl_name, rootpage, sql) " +
        `VALUES('table', ${sqlQuote(name)}, ${sqlQuote(name)}, 0, ${sqlQuote(sql)});\n`,
    );
    return;
  } else {
    ctx.write(`${sql};\n`);
  }

  if (type !== "table") return;
  const columns = await tableColumns(ctx.db, name);
  if (columns.length === 0) return;

  const select = insertSelect(name, columns);
  if ((await runTableDumpQuery(ctx, select, firstRow)) === "corrupt") {
    await runTableDumpQuery(ctx, select + BY_ROWID_DESC);
  }
}

async function catalogRows(ctx: DumpContext, query: string): Promise<(string | null)[][] | null> {
  const read = async (sql: string) =>
    (await ctx.db.query(sql)).rows.map((row) => row.map(valueText));
  try {
    return await read(query);
  } catch (err) {
    if (!isEngineError(err)) throw err;
    if (!isCorruption(err)) {
      ctx.write(`/****** ERROR: ${err.message} ******/\n`);
      ctx.session.dumpErrors++;
      return null;
    }
    ctx.write("/****** CORRUPTION ERROR *******/\n");
    ctx.write(`/****** ${err.message} ******/\n`);
  }
  try {
    return await read(query + BY_ROWID_DESC);
  } catch (err) {
    if (!isEngineError(err)) throw err;
    ctx.write(`/****** ERROR: ${err.message} ******/\n`);
    ctx.session.dumpErrors++;
    return null;
  }
}

/** Print SQL that recreates every catalog row `query` selects. */
async function runSchemaDumpQuery(ctx: DumpContext, query: string): Promise<void> {
  const rows = await catalogRows(ctx, query);
  for (const row of rows ?? []) await dumpCatalogRow(ctx, row);
}

/**
 * Write an SQL script recreating the database, or only the tables whose
 * names match one of the LIKE `patterns`, to the session's output. The
 * script ends in `COMMIT;`, or in a `ROLLBACK` when anything failed.
 */
export async function dumpDatabase(session: Session, patterns: string[] = []): Promise<void> {
  const db = await openDb(session);
  const ctx: DumpContext = { session, db, write: (text) => session.out.write(text) };

  ctx.write("PRAGMA foreign_keys=OFF;\n");
  ctx.write("BEGIN TRANSACTION;\n");
  session.writableSchema = false;
  session.dumpErrors = 0;
  await execLogged(ctx, "SAVEPOINT dump; PRAGMA writable_schema=ON");

  if (patterns.length === 0) {
    await runSchemaDumpQuery(ctx, TABLES);
    await runSchemaDumpQuery(ctx, SEQUENCE);
    await runTableDumpQuery(ctx, OTHER_OBJECTS);
  } else {
    for (const pattern of patterns) {
      await runSchemaDumpQuery(ctx, tablesLike(pattern));
      await runTableDumpQuery(ctx, otherObjectsLike(pattern));
    }
  }

  if (session.writableSchema) {
    ctx.write("PRAGMA writable_schema=OFF;\n");
    session.writableSchema = false;
  }
  await execLogged(ctx, "PRAGMA writable_schema=OFF;");
  await execLogged(ctx, "RELEASE dump;");
  ctx.write(session.dumpErrors > 0 ? "ROLLBACK; -- due to errors\n" : "COMMIT;\n");
}
