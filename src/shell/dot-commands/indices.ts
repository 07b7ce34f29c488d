import { renderQuery } from "../exec.ts";
import { openDb, withView } from "../session.ts";
import { defineDotCommand, type DotCommand } from "./define-dot-command.ts";

const ALL_INDICES =
  "SELECT name FROM sqlite_master WHERE type='index' AND name NOT LIKE 'sqlite_%' " +
  "UNION ALL SELECT name FROM sqlite_temp_master WHERE type='index' ORDER BY 1";

const TABLE_INDICES =
  "SELECT name FROM sqlite_master WHERE type='index' AND tbl_name LIKE ? " +
  "UNION ALL SELECT name FROM sqlite_temp_master WHERE type='index' AND tbl_name LIKE ? " +
  "ORDER BY 1";

const listIndices: DotCommand["handler"] = async ([pattern], { session }) => {
  await openDb(session);
  const view = withView(session, { mode: "list", showHeader: false });
  if (pattern === undefined) await renderQuery(view, ALL_INDICES);
  else await renderQuery(view, TABLE_INDICES, [pattern, pattern]);
};

export const indicesCommand = defineDotCommand({
  name: "indices",
  args: { max: 1 },
  usage: ".indices ?TABLE?",
  describe: "Show names of all indices. If TABLE specified, only show indices for tables matching LIKE pattern TABLE.",
  handler: listIndices,
});

export const indexesCommand = defineDotCommand({
  name: "indexes",
  args: { max: 1 },
  usage: ".indexes ?TABLE?",
  describe: "Same as .indices",
  handler: listIndices,
});
