import { fail, type StoreErrorCode, type StoreFailure } from '../models';
import { FileConnectionError } from '../services/file-connection.service';
import { errorCode } from '../../shared/utils/error.utils';
import { RecordFormatError } from '../../shared/utils/interchange.utils';

/**
 * Error context for logging store failures.
 */
export interface ErrorContext {
  message: string;
  stack?: string;
  /** ISO timestamp */
  timestamp: string;
  category: 'file' | 'database' | 'data' | 'unknown';
  /** Store operation that failed, e.g. "save" */
  operation: string;
  recordId?: string;
  code?: string;
}

export interface ToFailureOptions {
  recordId?: string;
  /** Code used when the error carries no more specific one. Defaults to IO_ERROR. */
  fallback?: StoreErrorCode;
}

const FILE_ERROR_CODES: Record<FileConnectionError['code'], StoreErrorCode> = {
  READ_ERROR: 'STORE_UNAVAILABLE',
  FILE_NOT_FOUND: 'STORE_UNAVAILABLE',
  WRITE_ERROR: 'IO_ERROR',
  PERMISSION_DENIED: 'PERMISSION_ERROR',
};

const PERMISSION_CODES = new Set(['EACCES', 'EPERM', 'EROFS']);

/**
 * Turns anything thrown below the store boundary into a StoreFailure and logs it.
 * Stores call this from their outermost catch so no exception reaches callers.
 */
export class StoreErrorHandler {
  toFailure(error: unknown, operation: string, options: ToFailureOptions = {}): StoreFailure {
    const context = this.buildErrorContext(error, operation, options.recordId);
    this.logError(context);
    return fail(this.classify(error, options.fallback ?? 'IO_ERROR'), context.message);
  }

  classify(error: unknown, fallback: StoreErrorCode): StoreErrorCode {
    if (error instanceof FileConnectionError) {
      return FILE_ERROR_CODES[error.code];
    }
    if (error instanceof RecordFormatError) {
      return 'INVALID_DATA';
    }

    const code = errorCode(error);
    if (code === undefined) {
      return fallback;
    }
    if (code.startsWith('SQLITE_CONSTRAINT')) {
      return 'CONFLICT';
    }
    if (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED') || code.startsWith('SQLITE_IOERR')) {
      return 'IO_ERROR';
    }
    if (code.startsWith('SQLITE_CANTOPEN') || code.startsWith('SQLITE_NOTADB') || code.startsWith('SQLITE_CORRUPT')) {
      return 'STORE_UNAVAILABLE';
    }
    if (PERMISSION_CODES.has(code)) {
      return 'PERMISSION_ERROR';
    }
    return fallback;
  }

  private buildErrorContext(error: unknown, operation: string, recordId?: string): ErrorContext {
    const code = error instanceof FileConnectionError ? error.code : errorCode(error);
    const base = {
      timestamp: new Date().toISOString(),
      operation,
      ...(recordId !== undefined && { recordId }),
      ...(code !== undefined && { code }),
    };

    if (error instanceof FileConnectionError) {
      return { ...base, message: `${operation} failed: ${error.userMessage}`, stack: error.stack, category: 'file' };
    }
    if (error instanceof RecordFormatError) {
      return { ...base, message: `${operation} failed: ${error.message}`, stack: error.stack, category: 'data' };
    }
    if (error instanceof Error) {
      return {
        ...base,
        message: `${operation} failed: ${error.message}`,
        stack: error.stack,
        category: code?.startsWith('SQLITE_') ? 'database' : code !== undefined ? 'file' : 'unknown',
      };
    }
    return { ...base, message: `${operation} failed: ${String(error)}`, category: 'unknown' };
  }

  private logError(context: ErrorContext): void {
    console.error(`[${context.category.toUpperCase()}] ${context.message}`, {
      operation: context.operation,
      timestamp: context.timestamp,
      ...(context.recordId !== undefined && { recordId: context.recordId }),
      ...(context.code !== undefined && { code: context.code }),
      ...(context.stack && { stack: context.stack }),
    });
  }
}
