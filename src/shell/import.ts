import { readFileSync } from "node:fs";
import { UserError } from "../core/errors.ts";
import { openDb, type Session } from "./session.ts";

export interface ImportOptions {
  file: string;
  /** Table name, written into the SQL as given. */
  table: string;
}

/** One logical input record and the physical line it ends on. */
export interface ImportRecord {
  line: number;
  text: string;
}

/**
 * Split file content into records. A record ends at a newline outside
 * double quotes, so a quoted field may span lines. `\r\n` counts as a newline.
 */
export function readRecords(content: string): ImportRecord[] {
  const lines = content.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();

  const records: ImportRecord[] = [];
  let text: string | null = null;
  let inQuote = false;
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i] ?? "";
    const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
    text = text === null ? line : `${text}\n${line}`;
    for (const ch of line) if (ch === '"') inQuote = !inQuote;
    if (!inQuote) {
      records.push({ line: i + 1, text });
      text = null;
    }
  }
  if (text !== null) records.push({ line: lines.length, text });
  return records;
}

/** Split a record on `separator`, ignoring separators between double quotes. */
export function splitFields(record: string, separator: string): string[] {
  const fields: string[] = [];
  let inQuote = false;
  let start = 0;
  let i = 0;
  while (i < record.length) {
    if (record[i] === '"') inQuote = !inQuote;
    if (!inQuote && record.startsWith(separator, i)) {
      fields.push(record.slice(start, i));
      i += separator.length;
      start = i;
    } else {
      i++;
    }
  }
  fields.push(record.slice(start));
  return fields;
}

/**
 * Strip the quotes of a field that starts with `"`: each `""` becomes `"`
 * and a lone quote is dropped. Other fields are returned as they are.
 */
export function unquoteField(field: string): string {
  if (!field.startsWith('"')) return field;
  let out = "";
  for (let j = 1; j < field.length; j++) {
    if (field[j] === '"') {
      j++;
      if (j >= field.length) break;
    }
    out += field[j];
  }
  return out;
}

/**
 * Load `file` into `table`, one row per record, split on the session's
 * separator. Every record must supply exactly the table's column count;
 * the rows go in as a single all-or-nothing batch.
 */
export async function importFile(session: Session, { file, table }: ImportOptions): Promise<void> {
  const { separator } = session;
  if (separator.length === 0) throw new UserError("non-null separator required for import");

  const db = await openDb(session);
  const { columns } = await db.query(`SELECT * FROM ${table} LIMIT 0`);
  if (columns.length === 0) return;

  let content: string;
  try {
    content = readFileSync(file, "utf-8");
  } catch {
    throw new UserError(`cannot open "${file}"`);
  }

  const rows = readRecords(content).map(({ line, text }) => {
    const fields = splitFields(text, separator);
    if (fields.length !== columns.length) {
      throw new UserError(
        `${file} line ${line}: expected ${columns.length} columns of data but found ${fields.length}`,
      );
    }
    return fields.map(unquoteField);
  });

  const placeholders = columns.map(() => "?").join(",");
  await db.insertAll(`INSERT INTO ${table} VALUES(${placeholders})`, rows);
}
