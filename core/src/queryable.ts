/**
 * @quarry/core - Queryable capability
 *
 * Anything that can hand out a sequence of element references can be queried
 * without being converted first. Built-in iterables (arrays, Sets, generators,
 * `map.values()`) qualify directly; custom containers implement `Queryable`.
 */

/**
 * A container that can produce its elements in iteration order.
 */
export interface Queryable<T> {
  queryIter(): Iterable<T>;
}

/**
 * Anything EagerQuery, LazyPipeline and JoinEngine accept as a dataset.
 */
export type QuerySource<T> = Queryable<T> | Iterable<T>;

export function isQueryable<T>(source: QuerySource<T>): source is Queryable<T> {
  return typeof source === 'object' &&
    'queryIter' in source &&
    typeof source.queryIter === 'function';
}

/**
 * Resolve a source to an iterable without copying it.
 */
export function toIterable<T>(source: QuerySource<T>): Iterable<T> {
  return isQueryable(source) ? source.queryIter() : source;
}

/**
 * Resolve a source to an array. Arrays are returned as-is (borrowed, not copied).
 */
export function toArray<T>(source: QuerySource<T>): readonly T[] {
  const iterable = toIterable(source);
  return Array.isArray(iterable) ? iterable : Array.from(iterable);
}

/**
 * Query a Map by its values, in insertion order.
 */
export function fromMapValues<K, V>(map: ReadonlyMap<K, V>): Queryable<V> {
  return {
    queryIter: () => map.values(),
  };
}
