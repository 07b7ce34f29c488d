import { sqlIdent, sqlQuote } from "../../core/format.ts";
import { valueText } from "../../engine/values.ts";
import { openDb } from "../session.ts";
import { defineDotCommand } from "./define-dot-command.ts";

const LINE_WIDTH = 80;

const namesIn = (source: string, prefix: string) =>
  `SELECT ${prefix}name FROM ${source}` +
  " WHERE type IN ('table','view') AND name NOT LIKE 'sqlite_%' AND name LIKE ?";

/** Arrange `names` down then across, in as many columns as fit 80 characters. */
export function formatNameColumns(names: string[]): string {
  if (names.length === 0) return "";
  const width = Math.max(...names.map((name) => name.length));
  const columns = Math.max(1, Math.floor(LINE_WIDTH / (width + 2)));
  const rows = Math.ceil(names.length / columns);
  let text = "";
  for (let i = 0; i < rows; i++) {
    for (let j = i; j < names.length; j += rows) {
      text += (j < rows ? "" : "  ") + (names[j] ?? "").padEnd(width);
    }
    text += "\n";
  }
  return text;
}

export const tablesCommand = defineDotCommand({
  name: "tables",
  minPrefix: 2,
  args: { max: 1 },
  usage: ".tables ?TABLE?",
  describe: "List names of tables. If TABLE specified, only list tables matching LIKE pattern TABLE.",
  handler: async ([pattern = "%"], { session }) => {
    const db = await openDb(session);
    const { rows: databases } = await db.query("PRAGMA database_list");

    let sql = namesIn("sqlite_master", "");
    let sources = 1;
    for (const [, value] of databases) {
      const schema = valueText(value) ?? "";
      if (schema === "" || schema === "main") continue;
      sql +=
        " UNION ALL " +
        (schema === "temp"
          ? namesIn("sqlite_temp_master", "'temp.' || ")
          : namesIn(`${sqlIdent(schema)}.sqlite_master`, `${sqlQuote(`${schema}.`)} || `));
      sources++;
    }

    const { rows } = await db.query(`${sql} ORDER BY 1`, new Array<string>(sources).fill(pattern));
    const names = rows.map(([name]) => valueText(name) ?? "");
    session.out.write(formatNameColumns(names));
  },
});
