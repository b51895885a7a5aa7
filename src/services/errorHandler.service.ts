import logger from '../config/logger';
import { ERROR_MESSAGES } from '../config/constants';
import {
  ConstraintViolationError,
  DuplicateKeyError,
  StoreError,
  StoreErrorContext,
  isStoreError,
} from '../utils/errors.util';

export type ErrorType = 'validation' | 'business_logic' | 'database';
export type ErrorCategory = 'conversation' | 'message' | 'analysis' | 'script' | 'reporting' | 'api';
export type ErrorSeverity = 'warning' | 'error' | 'critical';

export interface ErrorContext extends StoreErrorContext {
  operation?: string;
  conversationId?: number;
  callSid?: string;
  scriptId?: number;
}

// better-sqlite3 extended result codes
const UNIQUE_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);

/**
 * Extract the SQLite result code from a better-sqlite3 SqliteError
 */
export const sqliteErrorCode = (error: unknown): string | undefined => {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code.startsWith('SQLITE_') ? error.code : undefined;
  }
  return undefined;
};

class ErrorHandlerService {
  private log = logger.child({ service: 'error-handler' });

  // Nesting level of guard(); only the outermost one logs
  private guardDepth = 0;

  /**
   * Convert a driver error into the store taxonomy.
   * Store errors pass through unchanged; unknown errors are returned as-is.
   */
  translateDatabaseError(error: unknown, context: ErrorContext = {}): unknown {
    if (isStoreError(error)) {
      return error;
    }

    const code = sqliteErrorCode(error);
    if (!code) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);

    if (UNIQUE_CODES.has(code)) {
      return new DuplicateKeyError(ERROR_MESSAGES.DUPLICATE_CALL_SID, { ...context, sqliteCode: code }, error);
    }

    if (code.startsWith('SQLITE_CONSTRAINT')) {
      return new ConstraintViolationError(
        `${ERROR_MESSAGES.CONSTRAINT_VIOLATION}: ${message}`,
        { ...context, sqliteCode: code },
        error
      );
    }

    return error;
  }

  /**
   * Run a store operation, translating and logging anything it throws.
   * Operations composed of other guarded operations log each failure once.
   */
  guard<T>(category: ErrorCategory, context: ErrorContext, fn: () => T): T {
    this.guardDepth++;
    try {
      return fn();
    } catch (error) {
      const translated = this.translateDatabaseError(error, context);
      if (this.guardDepth === 1) {
        this.logError(translated, category, context);
      }
      throw translated;
    } finally {
      this.guardDepth--;
    }
  }

  /**
   * Log error with type and severity
   */
  logError(error: unknown, category: ErrorCategory, context: ErrorContext = {}): void {
    const type = this.categorizeError(error);
    const severity = this.determineSeverity(error);
    const payload = {
      type,
      category,
      severity,
      code: isStoreError(error) ? error.code : sqliteErrorCode(error),
      message: error instanceof Error ? error.message : String(error),
      ...context,
    };

    if (severity === 'warning') {
      this.log.warn(payload, 'Store operation rejected');
    } else {
      this.log.error({ ...payload, stack: error instanceof Error ? error.stack : undefined }, 'Store operation failed');
    }
  }

  private categorizeError(error: unknown): ErrorType {
    if (error instanceof StoreError) {
      if (error.code === 'INVALID_ARGUMENT') return 'validation';
      if (error.code === 'CONSTRAINT_VIOLATION') return 'database';
      return 'business_logic';
    }
    return 'database';
  }

  private determineSeverity(error: unknown): ErrorSeverity {
    if (error instanceof StoreError) {
      return error.code === 'CONSTRAINT_VIOLATION' ? 'error' : 'warning';
    }
    // Anything the driver threw that is not a constraint (I/O, corruption, locked)
    return sqliteErrorCode(error) ? 'critical' : 'error';
  }
}

const errorHandler = new ErrorHandlerService();

export default errorHandler;
