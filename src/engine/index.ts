import { createClient } from "@libsql/client";
import { UserError, errorMessage } from "../core/errors.ts";
import { spinner } from "../core/ui.ts";
import { LibsqlEngine } from "./libsql.ts";
import { SqliteEngine } from "./sqlite.ts";
import type { Engine } from "./types.ts";

export type { Engine } from "./types.ts";

const REMOTE_URL = /^(libsql|https?|wss?):\/\//i;

export interface OpenOptions {
  /** File path, `:memory:` or a libSQL URL. */
  location: string;
  authToken?: string;
}

export function isRemoteLocation(location: string): boolean {
  return REMOTE_URL.test(location);
}

/**
 * Open the engine behind `location`: a libSQL server for remote URLs,
 * better-sqlite3 for everything else. Failures become a {@link UserError}.
 */
export async function openEngine({ location, authToken }: OpenOptions): Promise<Engine> {
  if (!isRemoteLocation(location)) {
    try {
      return new SqliteEngine(location);
    } catch (err) {
      throw new UserError(`unable to open database "${location}": ${errorMessage(err)}`);
    }
  }

  const spin = spinner("Connecting...");
  spin.start();
  const engine = new LibsqlEngine(
    createClient({ url: location, authToken, intMode: "bigint" }),
    location,
  );
  try {
    await engine.query("SELECT 1");
    spin.stop();
    return engine;
  } catch (err) {
    spin.fail();
    await engine.close();
    throw new UserError(
      `unable to open database "${location}": ${errorMessage(err)}`,
      "Check the database URL and the SQLSH_AUTH_TOKEN value.",
    );
  }
}
