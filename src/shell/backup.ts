import { setTimeout as sleep } from "node:timers/promises";
import { EngineError, UserError, isBusy } from "../core/errors.ts";
import { spinner } from "../core/ui.ts";
import type { BackupOptions } from "../engine/types.ts";
import { openDb, type Session } from "./session.ts";

export const PAGES_PER_STEP = 100;
const BUSY_RETRIES = 3;
const BUSY_RETRY_DELAY_MS = 100;

export interface CopyTarget {
  /** Schema of the open database: the source of a backup, the target of a restore. */
  schema: string;
  file: string;
}

/** `?DB? FILE` for `.backup`. Options are not accepted. */
export function parseBackupArgs(args: string[]): CopyTarget {
  let schema: string | undefined;
  let file: string | undefined;
  for (const arg of args) {
    if (arg.startsWith("-")) throw new UserError(`unknown option: ${arg}`);
    if (file === undefined) {
      file = arg;
    } else if (schema === undefined) {
      schema = file;
      file = arg;
    } else {
      throw new UserError("too many arguments to .backup");
    }
  }
  if (file === undefined) throw new UserError("missing FILENAME argument on .backup");
  return { schema: schema ?? "main", file };
}

/** `?DB? FILE` for `.restore`. */
export function parseRestoreArgs(args: string[]): CopyTarget {
  const [first = "", second] = args;
  return second === undefined ? { schema: "main", file: first } : { schema: first, file: second };
}

/** @internal */
export async function retryWhileBusy(copy: () => Promise<void>): Promise<void> {
  for (let attempt = 0; ; attempt++) {
    try {
      await copy();
      return;
    } catch (err) {
      if (!isBusy(err)) throw err;
      if (attempt >= BUSY_RETRIES) {
        throw new EngineError("source database is busy", "SQLITE_BUSY");
      }
      await sleep(BUSY_RETRY_DELAY_MS);
    }
  }
}

async function copyWithProgress(
  label: string,
  target: CopyTarget,
  copy: (options: BackupOptions) => Promise<void>,
): Promise<void> {
  const spin = spinner(`${label}...`);
  spin.start();
  const options: BackupOptions = {
    ...target,
    pagesPerStep: PAGES_PER_STEP,
    onProgress: (remaining, total) => {
      if (total > 0) spin.text = `${label}... ${Math.round(((total - remaining) / total) * 100)}%`;
    },
  };
  try {
    await retryWhileBusy(() => copy(options));
    spin.stop();
  } catch (err) {
    spin.fail();
    throw err;
  }
}

/** Copy the session's `target.schema` database into `target.file`. */
export async function backupDatabase(session: Session, target: CopyTarget): Promise<void> {
  const db = await openDb(session);
  await copyWithProgress(`Backing up ${target.schema} to ${target.file}`, target, (options) =>
    db.backup(options),
  );
}

/** Replace the content of the session's `target.schema` database with `target.file`. */
export async function restoreDatabase(session: Session, target: CopyTarget): Promise<void> {
  const db = await openDb(session);
  await copyWithProgress(`Restoring ${target.schema} from ${target.file}`, target, (options) =>
    db.restore(options),
  );
}
