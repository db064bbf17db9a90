/**
 * @quarry/core - Field accessors
 *
 * A FieldAccessor is the only way operations address record data: a pure
 * function from a record to one of its field values. Accessors are built once
 * per field and passed explicitly; nothing is looked up by name at evaluation
 * time.
 *
 * @example
 * ```typescript
 * interface Product { name: string; price: number; supplier?: { country: string } }
 *
 * const price = field<Product>()('price');                 // FieldAccessor<Product, number>
 * const country = (p: Product) => p.supplier?.country;     // any pure function works
 * ```
 */

import { isNullish } from './guards.js';

/**
 * Pure extraction function for one field of a record type.
 * Must not throw for well-formed records and must not mutate them.
 */
export type FieldAccessor<T, F> = (record: T) => F;

/**
 * Accessor for numeric fields; absent values are skipped by aggregates.
 */
export type NumericAccessor<T> = FieldAccessor<T, number | null | undefined>;

/**
 * Accessor for Date fields; absent values never match date filters.
 */
export type DateAccessor<T> = FieldAccessor<T, Date | null | undefined>;

/**
 * Predicate over a single field value.
 */
export type FieldPredicate<F> = (value: F) => boolean;

/**
 * Predicate over a whole record.
 */
export type RecordPredicate<T> = (record: T) => boolean;

/**
 * Duplicates a record for operations that must return owned results.
 */
export type Cloner<T> = (record: T) => T;

/**
 * Build a typed accessor for a top-level property.
 *
 * Curried so the record type is given explicitly and the key is inferred.
 */
export function field<T>(): <K extends keyof T>(key: K) => FieldAccessor<T, T[K]> {
  return <K extends keyof T>(key: K): FieldAccessor<T, T[K]> =>
    (record: T) => record[key];
}

/**
 * Compose two accessors: `path(address, city)` reads `record.address.city`.
 */
export function path<T, M, F>(
  outer: FieldAccessor<T, M>,
  inner: FieldAccessor<M, F>
): FieldAccessor<T, F> {
  return (record: T) => inner(outer(record));
}

/**
 * Default cloner: `structuredClone`. Class instances lose their prototype;
 * pass a custom cloner in query options for those.
 */
export function defaultCloner<T>(record: T): T {
  return structuredClone(record);
}

/**
 * True for values other than `null` and `undefined`.
 */
export function isPresent<F>(value: F): value is NonNullable<F> {
  return !isNullish(value);
}
