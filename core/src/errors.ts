/**
 * Typed exception classes for quarry
 *
 * Error hierarchy:
 * - QuarryError: Base error class for all quarry errors
 *   - QueryError: Invalid query arguments, join row limits
 *   - ValidationError: Configuration and JSON validation failures
 *
 * Lock failures (LockUnavailableError, PoisonedLockError) extend QuarryError
 * from @quarry/locks.
 *
 * Exceptions thrown by caller-supplied predicates, accessors and combiners are
 * never wrapped: they propagate unchanged and abort the pass.
 *
 * @example
 * ```typescript
 * import { QueryError, ErrorCode } from '@quarry/core';
 *
 * try {
 *   join(orders, users, { maxOutputRows: 10_000 }).crossJoin((o, u) => [o, u]);
 * } catch (error) {
 *   if (error instanceof QueryError && error.code === ErrorCode.JOIN_ROW_LIMIT_EXCEEDED) {
 *     logger.warn('Join too large', { errorCode: error.code });
 *   }
 * }
 * ```
 */

import { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',

  // Query errors
  QUERY_ERROR = 'QUERY_ERROR',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  JOIN_ROW_LIMIT_EXCEEDED = 'JOIN_ROW_LIMIT_EXCEEDED',

  // Validation errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_VALIDATION_ERROR = 'CONFIG_VALIDATION_ERROR',
  JSON_PARSE_ERROR = 'JSON_PARSE_ERROR',

  // Lock errors (@quarry/locks)
  LOCK_ERROR = 'LOCK_ERROR',
  LOCK_UNAVAILABLE = 'LOCK_UNAVAILABLE',
  LOCK_POISONED = 'LOCK_POISONED',
  GUARD_RELEASED = 'GUARD_RELEASED',
}

const ERROR_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCode));

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
 * Base error class for all quarry errors
 *
 * @example
 * ```typescript
 * try {
 *   lockQuery(inventory).count();
 * } catch (error) {
 *   if (error instanceof QuarryError) {
 *     logger.error(error.message, error, { errorCode: error.code });
 *   }
 * }
 * ```
 */
export class QuarryError extends Error {
  /**
   * Error code for programmatic identification.
   * Use ErrorCode enum values for consistency.
   */
  public readonly code: string;

  /**
   * Structured details for debugging (operation, arguments, element index, etc.)
   */
  public readonly details?: Record<string, unknown>;

  /**
   * Helpful suggestion for resolving the error (when applicable)
   */
  public readonly suggestion?: string;

  /**
   * Timestamp when the error was created (milliseconds since epoch)
   */
  public readonly timestamp: number;

  constructor(
    message: string,
    code: string = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'QuarryError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();

    captureStackTrace(this, QuarryError);
  }

  /**
   * Format error for logging with all context.
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
   * Format error as a detailed string for debugging.
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

// =============================================================================
// Query Errors
// =============================================================================

/**
 * Error thrown when a query is built or evaluated with invalid input
 *
 * @example
 * ```typescript
 * throw QueryError.invalidArgument('take', 'count', -1);
 * throw QueryError.joinRowLimitExceeded('innerJoin', 1000);
 * ```
 */
export class QueryError extends QuarryError {
  constructor(
    message: string,
    code: string = ErrorCode.QUERY_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'QueryError';
    captureStackTrace(this, QueryError);
  }

  /**
   * Create an error for a count/offset argument that is not a non-negative integer
   */
  static invalidArgument(operation: string, argument: string, value: unknown): QueryError {
    return new QueryError(
      `Invalid ${argument} for ${operation}: ${String(value)}`,
      ErrorCode.INVALID_ARGUMENT,
      { operation, argument, value: String(value) },
      `${argument} must be a non-negative integer`
    );
  }

  /**
   * Create an error for a join whose output would exceed the configured limit
   */
  static joinRowLimitExceeded(operation: string, maxOutputRows: number): QueryError {
    return new QueryError(
      `${operation} produced more than ${maxOutputRows} rows`,
      ErrorCode.JOIN_ROW_LIMIT_EXCEEDED,
      { operation, maxOutputRows },
      'Filter both sides before joining, or raise query.maxJoinRows'
    );
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when configuration or JSON input fails validation
 *
 * @example
 * ```typescript
 * throw new ValidationError('query.maxJoinRows must be >= 0', ErrorCode.CONFIG_VALIDATION_ERROR, {
 *   path: 'query.maxJoinRows',
 * });
 * ```
 */
export class ValidationError extends QuarryError {
  constructor(
    message: string,
    code: string = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'ValidationError';
    captureStackTrace(this, ValidationError);
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
