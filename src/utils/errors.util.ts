/**
 * Store Error Types
 *
 * Every failure the store reports to its callers is one of these classes.
 * The `code` is stable and is what the HTTP layer maps to a status.
 */

export type StoreErrorCode =
  | 'NOT_FOUND'
  | 'DUPLICATE_KEY'
  | 'INVALID_ARGUMENT'
  | 'INVALID_STATE'
  | 'CONSTRAINT_VIOLATION';

export type StoreErrorContext = Record<string, unknown>;

export class StoreError extends Error {
  readonly code: StoreErrorCode;
  readonly context: StoreErrorContext;

  constructor(code: StoreErrorCode, message: string, context: StoreErrorContext = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

/** Referenced conversation, script or other row is absent */
export class NotFoundError extends StoreError {
  constructor(message: string, context: StoreErrorContext = {}) {
    super('NOT_FOUND', message, context);
  }
}

/** call_sid collision */
export class DuplicateKeyError extends StoreError {
  constructor(message: string, context: StoreErrorContext = {}, cause?: unknown) {
    super('DUPLICATE_KEY', message, context, cause);
  }
}

/** Enumeration, range or format violation on input */
export class InvalidArgumentError extends StoreError {
  constructor(message: string, context: StoreErrorContext = {}) {
    super('INVALID_ARGUMENT', message, context);
  }
}

/** Operation not allowed in the row's current state (e.g. re-sending a script) */
export class InvalidStateError extends StoreError {
  constructor(message: string, context: StoreErrorContext = {}) {
    super('INVALID_STATE', message, context);
  }
}

/** Referential integrity failure reported by SQLite */
export class ConstraintViolationError extends StoreError {
  constructor(message: string, context: StoreErrorContext = {}, cause?: unknown) {
    super('CONSTRAINT_VIOLATION', message, context, cause);
  }
}

export const isStoreError = (error: unknown): error is StoreError => error instanceof StoreError;
