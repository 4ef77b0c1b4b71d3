/**
 * Typed exception classes for tabq
 *
 * Error hierarchy:
 * - TabqError: Base error class for all tabq errors
 *   - ValidationError: Bad user input (malformed expression, unknown column,
 *     unknown aggregation, invalid sort direction, headerless or empty file)
 *   - NotFoundError: The input source does not exist
 *   - DecodingError: The input source is not valid UTF-8 text
 *
 * The `code` property is the error kind; branch on it rather than on the
 * message text. Structured context (such as the list of available columns)
 * travels in `details`.
 *
 * @example
 * ```typescript
 * import { ValidationError, ErrorCode } from '@tabq/core';
 *
 * try {
 *   dataset.validateColumn('cost');
 * } catch (error) {
 *   if (error instanceof ValidationError && error.code === ErrorCode.COLUMN_NOT_FOUND) {
 *     logger.warn(error.message, { available: error.details?.available ?? null });
 *   }
 * }
 * ```
 */

import { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error kinds for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Validation errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_EXPRESSION = 'INVALID_EXPRESSION',
  INVALID_OPERATOR = 'INVALID_OPERATOR',
  COLUMN_NOT_FOUND = 'COLUMN_NOT_FOUND',
  UNSUPPORTED_AGGREGATION = 'UNSUPPORTED_AGGREGATION',
  INVALID_SORT_DIRECTION = 'INVALID_SORT_DIRECTION',
  EMPTY_DATASET = 'EMPTY_DATASET',
  MISSING_HEADER = 'MISSING_HEADER',
  INVALID_FORMAT = 'INVALID_FORMAT',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Source errors
  NOT_FOUND = 'NOT_FOUND',
  DECODING_ERROR = 'DECODING_ERROR',
}

const ERROR_CODES: ReadonlySet<string> = new Set<string>(Object.values(ErrorCode));

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return ERROR_CODES.has(code);
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all tabq errors.
 *
 * Catching `TabqError` catches every user-facing failure the library raises.
 * Anything else escaping a core operation is an internal fault.
 */
export class TabqError extends Error {
  /** Error kind */
  public readonly code: ErrorCode;

  /** Structured details for diagnostics (column, available headers, path, ...) */
  public readonly details?: Record<string, unknown>;

  /** Hint for resolving the error, when there is an obvious one */
  public readonly suggestion?: string;

  /** Milliseconds since epoch at construction */
  public readonly timestamp: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'TabqError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();

    captureStackTrace(this, TabqError);
  }

  /**
   * Structured form of the error, suitable for JSON logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  /**
   * Multi-line rendering with code, details and suggestion.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

/**
 * Type guard for any tabq error.
 */
export function isTabqError(value: unknown): value is TabqError {
  return value instanceof TabqError;
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when user input is rejected.
 *
 * @example
 * ```typescript
 * throw new ValidationError('Column name cannot be empty', ErrorCode.INVALID_EXPRESSION);
 * throw ValidationError.columnNotFound('cost', ['name', 'price']);
 * ```
 */
export class ValidationError extends TabqError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'ValidationError';
    captureStackTrace(this, ValidationError);
  }

  /**
   * Unknown column, with the dataset's headers listed in the message.
   */
  static columnNotFound(column: string, available: readonly string[]): ValidationError {
    return new ValidationError(
      `Column '${column}' not found. Available columns: ${available.join(', ')}`,
      ErrorCode.COLUMN_NOT_FOUND,
      { column, available: [...available] }
    );
  }

  /**
   * Unknown column where only the column name is known (record-level check).
   */
  static columnNotInData(column: string): ValidationError {
    return new ValidationError(
      `Column '${column}' not found in data`,
      ErrorCode.COLUMN_NOT_FOUND,
      { column }
    );
  }

  /**
   * Expression that could not be parsed.
   */
  static invalidExpression(message: string, expression: string, example?: string): ValidationError {
    return new ValidationError(
      message,
      ErrorCode.INVALID_EXPRESSION,
      { expression },
      example ? `Example: '${example}'` : undefined
    );
  }

  /**
   * Header row missing or not recognisable as headers.
   */
  static missingHeader(source?: string): ValidationError {
    return new ValidationError(
      'CSV file has no header row',
      ErrorCode.MISSING_HEADER,
      source === undefined ? undefined : { source },
      'The first line must name the columns, e.g. name,brand,price'
    );
  }

  /**
   * Nothing to process: empty first line or a header row with no data rows.
   */
  static emptyDataset(source?: string): ValidationError {
    return new ValidationError(
      'CSV file is empty or contains no data',
      ErrorCode.EMPTY_DATASET,
      source === undefined ? undefined : { source }
    );
  }
}

// =============================================================================
// Source Errors
// =============================================================================

/**
 * Error thrown when the input source does not exist.
 */
export class NotFoundError extends TabqError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, ErrorCode.NOT_FOUND, details, suggestion);
    this.name = 'NotFoundError';
    captureStackTrace(this, NotFoundError);
  }

  static file(path: string): NotFoundError {
    return new NotFoundError(
      `File not found: ${path}`,
      { operation: 'read', target: path },
      'Verify the path exists and check for typos'
    );
  }
}

/**
 * Error thrown when the input source is not in the expected text encoding.
 */
export class DecodingError extends TabqError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, ErrorCode.DECODING_ERROR, details, suggestion);
    this.name = 'DecodingError';
    captureStackTrace(this, DecodingError);
  }

  static notUtf8(path: string): DecodingError {
    return new DecodingError(
      `Encoding error in file ${path}. Make sure the file is UTF-8`,
      { operation: 'decode', target: path, encoding: 'utf-8' },
      'Re-save the file with UTF-8 encoding'
    );
  }
}
