import { renderRow, textCell } from "../render.ts";
import { renderQuery } from "../exec.ts";
import { openDb, withView } from "../session.ts";
import { defineDotCommand } from "./define-dot-command.ts";

const MASTER_SQL =
  "CREATE TABLE sqlite_master (type text, name text, tbl_name text, rootpage integer, sql text)";
const TEMP_MASTER_SQL =
  "CREATE TEMP TABLE sqlite_temp_master (type text, name text, tbl_name text, rootpage integer, sql text)";

const CATALOG =
  "SELECT sql FROM " +
  "  (SELECT sql sql, type type, tbl_name tbl_name, name name, rowid x" +
  "     FROM sqlite_master UNION ALL" +
  "   SELECT sql, type, tbl_name, name, rowid FROM sqlite_temp_master) ";

export const schemaCommand = defineDotCommand({
  name: "schema",
  args: { max: 1 },
  usage: ".schema ?TABLE?",
  describe: "Show the CREATE statements. If TABLE specified, only show tables matching LIKE pattern TABLE.",
  handler: async ([pattern], { session }) => {
    await openDb(session);
    const view = withView(session, { mode: "semi", showHeader: false });

    if (pattern === undefined) {
      await renderQuery(
        view,
        `${CATALOG}WHERE type!='meta' AND sql NOTNULL AND name NOT LIKE 'sqlite_%' ORDER BY x`,
      );
      return;
    }

    const table = pattern.toLowerCase();
    if (table === "sqlite_master") {
      renderRow(view, ["sql"], [textCell(MASTER_SQL)]);
    } else if (table === "sqlite_temp_master") {
      renderRow(view, ["sql"], [textCell(TEMP_MASTER_SQL)]);
    } else {
      await renderQuery(
        view,
        `${CATALOG}WHERE lower(tbl_name) LIKE ? AND type!='meta' AND sql NOTNULL ORDER BY x`,
        [table],
      );
    }
  },
});
