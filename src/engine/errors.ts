/**
 * Domain errors for the world store and the socket protocol.
 * Each carries the HTTP status and the error kind reported to clients.
 */

export type WorldErrorKind = 'NotFound' | 'Conflict' | 'ValidationError' | 'TransientStorageBusy';

export abstract class WorldError extends Error {
  abstract readonly kind: WorldErrorKind;

  constructor(
    message: string,
    public readonly status: 400 | 404 | 409 | 503,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Object or player absent (404). */
export class NotFoundError extends WorldError {
  readonly kind = 'NotFound' as const;

  constructor(
    message: string,
    public readonly resourceId?: string,
  ) {
    super(message, 404);
  }
}

/** Duplicate id on create (409). Never retried. */
export class ConflictError extends WorldError {
  readonly kind = 'Conflict' as const;

  constructor(
    message: string,
    public readonly resourceId?: string,
  ) {
    super(message, 409);
  }
}

/** Missing or empty required field (400). */
export class ValidationError extends WorldError {
  readonly kind = 'ValidationError' as const;

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message, 400);
  }
}

/**
 * Writer contention that outlasted the retry budget, or a write that waited
 * in the queue past its deadline (503).
 */
export class TransientStorageBusyError extends WorldError {
  readonly kind = 'TransientStorageBusy' as const;

  constructor(
    message: string,
    public readonly attempts: number,
  ) {
    super(message, 503);
  }
}

export function isWorldError(err: unknown): err is WorldError {
  return err instanceof WorldError;
}

/** SQLite result code of a better-sqlite3 error, if it is one. */
export function sqliteCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function isBusyError(err: unknown): boolean {
  const code = sqliteCode(err);
  return code !== undefined && (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED'));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
