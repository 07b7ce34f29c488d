/**
 * Expected error caused by user input or missing configuration.
 * Displayed as a clean message with an optional hint. Exit code 1.
 *
 * Throw this from command handlers or dot-command handlers
 * for any failure the user can fix (bad arguments, missing files,
 * features the connected engine does not offer).
 */
export class UserError extends Error {
  isUserError = true;
  constructor(message: string, public hint?: string) {
    super(message);
    this.name = "UserError";
  }
}

/**
 * Failure reported by the database engine. `code` is the SQLite result code
 * name (`SQLITE_ERROR`, `SQLITE_CORRUPT`, `SQLITE_BUSY`, ...), or the remote
 * client's error code for libSQL connections.
 */
export class EngineError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "EngineError";
  }
}

export function isUserError(err: unknown): err is UserError {
  return err instanceof UserError;
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

/** Result codes in the corruption family (`SQLITE_CORRUPT`, `SQLITE_CORRUPT_VTAB`, ...). */
export function isCorruption(err: unknown): boolean {
  return isEngineError(err) && err.code.startsWith("SQLITE_CORRUPT");
}

export function isBusy(err: unknown): boolean {
  return (
    isEngineError(err) &&
    (err.code.startsWith("SQLITE_BUSY") || err.code.startsWith("SQLITE_LOCKED"))
  );
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
