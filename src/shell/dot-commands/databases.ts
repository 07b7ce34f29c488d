import { renderQuery } from "../exec.ts";
import { openDb, withView } from "../session.ts";
import { defineDotCommand } from "./define-dot-command.ts";

export const databasesCommand = defineDotCommand({
  name: "databases",
  minPrefix: 2,
  args: { max: 0 },
  usage: ".databases",
  describe: "List names and files of attached databases",
  handler: async (_args, { session }) => {
    await openDb(session);
    const view = withView(session, { mode: "column", showHeader: true, colWidth: [3, 15, 58] });
    await renderQuery(view, "PRAGMA database_list");
  },
});
