import { isEngineError } from "../core/errors.ts";
import type { Engine, PreparedStatement, SqlValue, StatusCounter } from "../engine/types.ts";
import { cellOf, renderRow, type Cell } from "./render.ts";
import { logEngineError, openDb, type Session } from "./session.ts";

/** Receives each row; returning `true` stops the statement early, without error. */
export type RowCallback = (columns: string[], row: Cell[]) => boolean | void;

export type ExecResult =
  | { ok: true }
  | { ok: false; code: string; message: string };

const STATS_LABEL_WIDTH = 37;

export function formatCounter({ label, current, highWater, unit }: StatusCounter): string {
  let line = `${label}:`.padEnd(STATS_LABEL_WIDTH) + String(current);
  if (highWater !== undefined) line += ` (max ${highWater})`;
  if (unit) line += ` ${unit}`;
  return `${line}\n`;
}

async function displayStats(session: Session, db: Engine, statement: PreparedStatement) {
  for (const counter of await db.statusCounters(statement)) {
    session.out.write(formatCounter(counter));
  }
}

function failed(session: Session, err: unknown): ExecResult {
  if (!isEngineError(err)) throw err;
  logEngineError(session, err.code, err.message);
  return { ok: false, code: err.code, message: err.message };
}

/**
 * Execute every statement in `sql`, in order, feeding result rows to
 * `callback` (the session renderer unless given; `null` discards rows).
 * The first engine error stops the remaining text and is returned; other
 * failures propagate.
 */
export async function shellExec(
  session: Session,
  sql: string,
  callback: RowCallback | null = (columns, row) => renderRow(session, columns, row),
): Promise<ExecResult> {
  const db = await openDb(session);
  let rest = sql;

  while (rest.length > 0) {
    let statement: PreparedStatement | null = null;
    try {
      ({ statement, tail: rest } = await db.prepare(rest));
    } catch (err) {
      return failed(session, err);
    }
    if (!statement) break;

    session.statement = statement;
    session.cnt = 0;
    if (session.echo) session.out.write(`${statement.sql}\n`);

    let error: unknown = null;
    try {
      if (session.mode === "explain" && !/^\s*explain\b/i.test(statement.sql)) {
        for (const line of await db.queryPlan(statement.sql)) {
          session.out.write(`-- ${line}\n`);
        }
      }
      let row = await statement.step();
      if (row && callback) {
        const columns = statement.columns().map((c) => c.name);
        while (row) {
          if (callback(columns, row.map(cellOf))) break;
          row = await statement.step();
        }
      } else {
        while (row) row = await statement.step();
      }
      if (session.stats) await displayStats(session, db, statement);
    } catch (err) {
      error = err;
    }

    try {
      await statement.finalize();
    } catch (err) {
      error ??= err;
    }
    session.statement = null;
    if (error) return failed(session, error);
  }

  return { ok: true };
}

/** Run `sql` with `params` to completion and render every row through `session`. */
export async function renderQuery(
  session: Session,
  sql: string,
  params: SqlValue[] = [],
): Promise<void> {
  const db = await openDb(session);
  const { columns, rows } = await db.query(sql, params);
  for (const row of rows) renderRow(session, columns, row.map(cellOf));
}
