/**
 * Result<T, E> - explicit per-element outcomes
 *
 * Query terminals throw on failure. Result is for the places where a caller
 * asked to see each element's outcome instead, e.g. `LockQuery.allSettled()`,
 * where one poisoned lock should not hide the rest of the pass.
 *
 * @module result
 *
 * @example
 * ```typescript
 * import { isOk, partition } from '@quarry/core';
 *
 * const settled = lockQuery(inventory).filter(stock, s => s > 0).allSettled();
 * const { values, errors } = partition(settled);
 * ```
 */

// =============================================================================
// Core Types
// =============================================================================

export interface Ok<T> {
  readonly _tag: 'Ok';
  readonly value: T;
}

export interface Err<E> {
  readonly _tag: 'Err';
  readonly error: E;
}

/**
 * Either an Ok carrying a value or an Err carrying an error.
 */
export type Result<T, E> = Ok<T> | Err<E>;

// =============================================================================
// Constructors and Guards
// =============================================================================

export function ok<T>(value: T): Ok<T> {
  return { _tag: 'Ok', value };
}

export function err<E>(error: E): Err<E> {
  return { _tag: 'Err', error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result._tag === 'Ok';
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result._tag === 'Err';
}

/**
 * Split Results into their values and errors, each in input order.
 */
export function partition<T, E>(
  results: readonly Result<T, E>[]
): { values: T[]; errors: E[] } {
  const values: T[] = [];
  const errors: E[] = [];

  for (const result of results) {
    if (isOk(result)) {
      values.push(result.value);
    } else {
      errors.push(result.error);
    }
  }

  return { values, errors };
}
