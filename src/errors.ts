export type ErrorKind =
  | "conflict"
  | "forbidden"
  | "transient_storage"
  | "invalid_input";

export abstract class ClubBotError extends Error {
  abstract readonly kind: ErrorKind;
  /** Name of the service or query operation that raised the error. */
  readonly operation?: string;

  constructor(message: string, options?: { operation?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.operation = options?.operation;
  }
}

/** A uniqueness constraint rejected the write. */
export class ConflictError extends ClubBotError {
  readonly kind = "conflict";
}

export class ForbiddenError extends ClubBotError {
  readonly kind = "forbidden";
}

/** The database was busy or locked. Safe to retry. */
export class TransientStorageError extends ClubBotError {
  readonly kind = "transient_storage";
}

export class InvalidInputError extends ClubBotError {
  readonly kind = "invalid_input";
}

export function isClubBotError(err: unknown): err is ClubBotError {
  return err instanceof ClubBotError;
}

/**
 * SQLite result code of an error thrown by better-sqlite3, following
 * `cause` links in case a wrapper re-threw it.
 */
export function sqliteCode(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if ("code" in current && typeof current.code === "string" && current.code.startsWith("SQLITE_")) {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}

const UNIQUE_CODES = new Set(["SQLITE_CONSTRAINT_UNIQUE", "SQLITE_CONSTRAINT_PRIMARYKEY"]);

export function isUniqueViolation(err: unknown): boolean {
  const code = sqliteCode(err);
  return code !== undefined && UNIQUE_CODES.has(code);
}
