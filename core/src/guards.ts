/**
 * Type guards and argument assertions for quarry
 *
 * @example
 * ```typescript
 * import { assertCount, isNullish } from './guards.js';
 *
 * assertCount('take', 'count', n);   // throws QueryError for -1, 1.5, NaN
 * isNullish(record.discount);        // true for null and undefined
 * ```
 */

import { QueryError } from './errors.js';

/**
 * Type guard: check if value is null or undefined
 */
export function isNullish(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Assert that a count or offset argument is a non-negative safe integer.
 *
 * @throws {QueryError} INVALID_ARGUMENT otherwise
 */
export function assertCount(operation: string, argument: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw QueryError.invalidArgument(operation, argument, value);
  }
}
