import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";

export const HISTORY_MAX = 1000;

/** @internal */
export function getHistoryPath(): string {
  const configDir = process.env.XDG_CONFIG_HOME ?? join(homedir(), ".config");
  return join(configDir, "sqlsh", "history");
}

/** Saved history, most recent entry first. */
export function loadHistory(): string[] {
  const path = getHistoryPath();
  if (!existsSync(path)) return [];
  return readFileSync(path, "utf-8")
    .split("\n")
    .filter((line) => line.length > 0);
}

/** Keep the `max` most recent entries of `lines` (most recent first). */
export function saveHistory(lines: string[], max = HISTORY_MAX): void {
  const path = getHistoryPath();
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(path, lines.slice(0, max).join("\n") + "\n", "utf-8");
}
