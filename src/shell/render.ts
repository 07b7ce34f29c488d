import {
  cString,
  csvEscape,
  hexBlob,
  htmlEscape,
  isNumber,
  quoteTableName,
  sqlQuote,
} from "../core/format.ts";
import type { SqlValue, StorageClass } from "../engine/types.ts";
import { storageClass, valueText } from "../engine/values.ts";
import { MAX_COLUMN_WIDTHS, type Session } from "./session.ts";

/** One value of a row tuple. Catalog helper rows carry no storage class. */
export interface Cell {
  text: string | null;
  type?: StorageClass;
  blob?: Uint8Array;
}

export function cellOf(value: SqlValue): Cell {
  const cell: Cell = { text: valueText(value), type: storageClass(value) };
  if (value instanceof Uint8Array) cell.blob = value;
  return cell;
}

/** Cell for text produced by the shell itself. */
export function textCell(text: string | null): Cell {
  return { text };
}

const FALLBACK_WIDTH = 10;

const charCount = (value: string) => Array.from(value).length;

/** Pad or truncate to `width` characters; a negative width right-justifies. */
function fit(value: string, width: number): string {
  const size = Math.abs(width);
  const clipped = charCount(value) > size ? Array.from(value).slice(0, size).join("") : value;
  return width < 0 ? clipped.padStart(size) : clipped.padEnd(size);
}

function renderLine(session: Session, columns: string[], row: Cell[]): string {
  const width = Math.max(5, ...columns.map(charCount));
  let text = session.cnt++ > 0 ? "\n" : "";
  columns.forEach((name, i) => {
    text += `${" ".repeat(width - charCount(name))}${name} = ${row[i]?.text ?? session.nullValue}\n`;
  });
  return text;
}

function renderColumns(session: Session, columns: string[], row: Cell[]): string {
  const last = columns.length - 1;
  let text = "";

  if (session.cnt++ === 0) {
    session.actualWidth = [];
    columns.forEach((name, i) => {
      let width = i < MAX_COLUMN_WIDTHS ? session.colWidth[i] ?? 0 : 0;
      if (width === 0) {
        width = Math.max(charCount(name), FALLBACK_WIDTH);
        width = Math.max(width, charCount(row[i]?.text ?? session.nullValue));
      }
      if (i < MAX_COLUMN_WIDTHS) session.actualWidth[i] = width;
      if (session.showHeader) text += fit(name, width) + (i === last ? "\n" : "  ");
    });
    if (session.showHeader) {
      columns.forEach((_, i) => {
        const width = Math.abs(session.actualWidth[i] ?? FALLBACK_WIDTH);
        text += "-".repeat(width) + (i === last ? "\n" : "  ");
      });
    }
  }

  columns.forEach((_, i) => {
    const value = row[i]?.text ?? null;
    let width = i < MAX_COLUMN_WIDTHS ? session.actualWidth[i] ?? FALLBACK_WIDTH : FALLBACK_WIDTH;
    if (session.mode === "explain" && value !== null && charCount(value) > width) {
      width = charCount(value);
    }
    text += fit(value ?? session.nullValue, width) + (i === last ? "\n" : "  ");
  });
  return text;
}

function renderList(session: Session, columns: string[], row: Cell[]): string {
  const { separator } = session;
  let text = "";
  if (session.cnt++ === 0 && session.showHeader) {
    text += columns.join(separator) + "\n";
  }
  text += row.map((cell) => cell.text ?? session.nullValue).join(separator);
  return text + (session.mode === "semi" ? ";\n" : "\n");
}

function renderHtml(session: Session, columns: string[], row: Cell[]): string {
  let text = "";
  if (session.cnt++ === 0 && session.showHeader) {
    text += "<TR>";
    for (const name of columns) text += `<TH>${htmlEscape(name)}</TH>\n`;
    text += "</TR>\n";
  }
  text += "<TR>";
  for (const cell of row) text += `<TD>${htmlEscape(cell.text ?? session.nullValue)}</TD>\n`;
  return text + "</TR>\n";
}

function renderTcl(session: Session, columns: string[], row: Cell[]): string {
  const { separator } = session;
  let text = "";
  if (session.cnt++ === 0 && session.showHeader) {
    text += columns.map(cString).join(separator) + "\n";
  }
  text += row.map((cell) => cString(cell.text ?? session.nullValue)).join(separator);
  return text + "\n";
}

function renderCsv(session: Session, columns: string[], row: Cell[]): string {
  const { separator } = session;
  let text = "";
  if (session.cnt++ === 0 && session.showHeader) {
    text += columns.map((name) => csvEscape(name, separator)).join(separator) + "\n";
  }
  text += row
    .map((cell) => (cell.text === null ? session.nullValue : csvEscape(cell.text, separator)))
    .join(separator);
  return text + "\n";
}

function insertValue(cell: Cell): string {
  if (cell.text === null) return "NULL";
  switch (cell.type) {
    case "text":
      return sqlQuote(cell.text);
    case "integer":
    case "real":
      return cell.text;
    case "blob":
      return hexBlob(cell.blob ?? Buffer.from(cell.text, "utf-8"));
    default:
      return isNumber(cell.text) ? cell.text : sqlQuote(cell.text);
  }
}

function renderInsert(session: Session, row: Cell[]): string {
  session.cnt++;
  const values = row.map(insertValue).join(",");
  return `INSERT INTO ${quoteTableName(session.destTable)} VALUES(${values});\n`;
}

function formatRow(session: Session, columns: string[], row: Cell[]): string {
  switch (session.mode) {
    case "line":
      return renderLine(session, columns, row);
    case "column":
    case "explain":
      return renderColumns(session, columns, row);
    case "list":
    case "semi":
      return renderList(session, columns, row);
    case "html":
      return renderHtml(session, columns, row);
    case "tcl":
      return renderTcl(session, columns, row);
    case "csv":
      return renderCsv(session, columns, row);
    case "insert":
      return renderInsert(session, row);
  }
}

/**
 * Write one row of the current result set to the session's output in its
 * current mode. The first row of a result set (the record counter is 0)
 * also carries the header, when headers are on, and fixes column widths.
 */
export function renderRow(session: Session, columns: string[], row: Cell[]): void {
  session.out.write(formatRow(session, columns, row));
}
