/**
 * Custom Error Classes for sf-dataops
 *
 * Every failure the core can raise extends DataOpsError, so commands and
 * callers can catch one type and branch on `code`.
 */

/**
 * Base error class for sf-dataops errors.
 * Includes error code and optional cause for error chaining.
 */
export class DataOpsError extends Error {
  readonly code: string;
  readonly cause?: Error;

  constructor(message: string, code = 'DATA_OPS_ERROR', cause?: Error) {
    super(message);
    this.name = 'DataOpsError';
    this.code = code;
    this.cause = cause;

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get the full error chain message including cause
   */
  getFullMessage(): string {
    let msg = `[${this.code}] ${this.message}`;
    if (this.cause) {
      msg += `\n  Caused by: ${this.cause.message}`;
    }
    return msg;
  }
}

/**
 * Invalid combination of inputs, e.g. upsert without an external id field.
 * Raised before any call reaches the org.
 */
export class ConfigError extends DataOpsError {
  readonly configKey?: string;

  constructor(message: string, configKey?: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
    this.configKey = configKey;
  }
}

/**
 * A valid session could not be obtained or refreshed.
 */
export class AuthError extends DataOpsError {
  readonly username?: string;

  constructor(message: string, username?: string, cause?: Error) {
    super(message, 'AUTH_ERROR', cause);
    this.name = 'AuthError';
    this.username = username;
  }
}

/**
 * Field mapping could not be built (duplicate or unknown target field).
 */
export class MappingError extends DataOpsError {
  readonly column: string;
  readonly targetField: string;

  constructor(message: string, column: string, targetField: string) {
    super(message, 'MAPPING_ERROR');
    this.name = 'MappingError';
    this.column = column;
    this.targetField = targetField;
  }
}

/**
 * Timeout, rate limit or server-side hiccup. Safe to retry.
 */
export class TransientAPIError extends DataOpsError {
  readonly statusCode?: string;

  constructor(message: string, statusCode?: string, cause?: Error) {
    super(message, 'TRANSIENT_API_ERROR', cause);
    this.name = 'TransientAPIError';
    this.statusCode = statusCode;
  }
}

/**
 * Validation, permission or duplicate failure. Retrying will not help.
 */
export class PermanentAPIError extends DataOpsError {
  readonly statusCode?: string;

  constructor(message: string, statusCode?: string, cause?: Error) {
    super(message, 'PERMANENT_API_ERROR', cause);
    this.name = 'PermanentAPIError';
    this.statusCode = statusCode;
  }
}

/**
 * The org rejected a SOQL query, or a page of results could not be fetched.
 */
export class QueryError extends DataOpsError {
  readonly query: string;

  constructor(message: string, query: string, cause?: Error) {
    super(message, 'QUERY_ERROR', cause);
    this.name = 'QueryError';
    this.query = query;
  }
}

/**
 * The web scraper produced nothing usable for a record.
 */
export class ScrapeError extends DataOpsError {
  readonly searchKey: string;

  constructor(message: string, searchKey: string, cause?: Error) {
    super(message, 'SCRAPE_ERROR', cause);
    this.name = 'ScrapeError';
    this.searchKey = searchKey;
  }
}

/**
 * Error thrown when a requested record does not exist.
 */
export class NotFoundError extends DataOpsError {
  readonly objectType: string;
  readonly recordId: string;

  constructor(objectType: string, recordId: string) {
    super(`${objectType} record '${recordId}' not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
    this.objectType = objectType;
    this.recordId = recordId;
  }
}

/**
 * A failure record could not be written. Always fatal for the run.
 */
export class ErrorSinkError extends DataOpsError {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause?: Error) {
    super(message, 'ERROR_SINK_ERROR', cause);
    this.name = 'ErrorSinkError';
    this.filePath = filePath;
  }
}

/**
 * The source file could not be read or parsed.
 */
export class CsvError extends DataOpsError {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause?: Error) {
    super(message, 'CSV_ERROR', cause);
    this.name = 'CsvError';
    this.filePath = filePath;
  }
}

/**
 * Type guard to check if an error is a DataOpsError
 */
export function isDataOpsError(error: unknown): error is DataOpsError {
  return error instanceof DataOpsError;
}

/**
 * Normalize anything thrown into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
