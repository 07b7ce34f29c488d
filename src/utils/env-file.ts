import { existsSync, readFileSync } from "fs";
import { join, dirname, resolve } from "path";

/**
 * Read a specific key from the nearest `.env` file, walking up from cwd.
 * Returns the value and the path to the `.env` file, or `undefined` if not found.
 */
export function readEnvValue(
  key: string,
  from = process.cwd(),
): { value: string; envPath: string } | undefined {
  let dir = resolve(from);

  while (true) {
    const envPath = join(dir, ".env");
    if (existsSync(envPath)) {
      const content = readFileSync(envPath, "utf-8");
      const regex = new RegExp(
        `^${escapeRegExp(key)}\\s*=\\s*["']?(.+?)["']?\\s*$`,
        "m",
      );
      const match = content.match(regex);
      if (match?.[1] !== undefined) return { value: match[1], envPath };
    }

    const parent = dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

/** `key` from the environment, else from the nearest `.env` file. */
export function envValue(key: string): string | undefined {
  return process.env[key] || readEnvValue(key)?.value;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
