import { importFile } from "../import.ts";
import { defineDotCommand } from "./define-dot-command.ts";

export const importCommand = defineDotCommand({
  name: "import",
  args: { min: 2, max: 2 },
  usage: ".import FILE TABLE",
  describe: "Import data from FILE into TABLE",
  handler: async ([file, table], { session }) => {
    await importFile(session, { file, table });
  },
});
