/**
 * @quarry/core - Ordering
 *
 * Comparators shared by sorting and min/max aggregates.
 *
 * Ordering policy:
 * - `null`/`undefined` keys sort before every present key (ascending)
 * - numbers follow a total order: NaN is greater than every other number,
 *   +Infinity included, and all NaNs are equal; -0 equals +0
 * - strings compare by UTF-16 code units, booleans false < true,
 *   bigints natively, Dates by epoch milliseconds (an invalid Date is NaN)
 * - keys of different kinds rank boolean < number/bigint < string < Date
 */

export type Comparable = number | string | bigint | boolean | Date;

/**
 * Key as produced by an accessor; absent values are allowed.
 */
export type SortKey = Comparable | null | undefined;

export type Comparator<V> = (a: V, b: V) => number;

/**
 * Total order over numbers with NaN greatest.
 */
export function compareFloat(a: number, b: number): number {
  const aNaN = Number.isNaN(a);
  const bNaN = Number.isNaN(b);
  if (aNaN || bNaN) {
    if (aNaN && bNaN) return 0;
    return aNaN ? 1 : -1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

function kindRank(value: Comparable): number {
  if (typeof value === 'boolean') return 0;
  if (typeof value === 'number' || typeof value === 'bigint') return 1;
  if (typeof value === 'string') return 2;
  return 3;
}

function comparePresent(a: Comparable, b: Comparable): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return compareFloat(a, b);
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return a === b ? 0 : a ? 1 : -1;
  }
  if (a instanceof Date && b instanceof Date) {
    return compareFloat(a.getTime(), b.getTime());
  }
  if (
    (typeof a === 'bigint' || typeof a === 'number') &&
    (typeof b === 'bigint' || typeof b === 'number')
  ) {
    if (typeof a === 'number' && Number.isNaN(a)) return 1;
    if (typeof b === 'number' && Number.isNaN(b)) return -1;
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return kindRank(a) - kindRank(b);
}

/**
 * Compare two sort keys under the ordering policy above.
 */
export function compareKeys(a: SortKey, b: SortKey): number {
  const aAbsent = a === null || a === undefined;
  const bAbsent = b === null || b === undefined;
  if (aAbsent || bAbsent) {
    if (aAbsent && bAbsent) return 0;
    return aAbsent ? -1 : 1;
  }
  return comparePresent(a, b);
}

/**
 * Reverse a comparator. Used for descending sorts so that a stable sort keeps
 * equal keys in their input order.
 */
export function reversed<V>(compare: Comparator<V>): Comparator<V> {
  return (a, b) => compare(b, a);
}

/**
 * Stable sort by an extracted key; returns a new array.
 */
export function sortByKey<T, K>(
  items: readonly T[],
  key: (item: T) => K,
  compare: Comparator<K>
): T[] {
  // Extract keys once so the accessor runs n times, not n log n.
  const keyed = items.map((item, index) => ({ item, key: key(item), index }));
  keyed.sort((a, b) => compare(a.key, b.key) || a.index - b.index);
  return keyed.map(entry => entry.item);
}

/**
 * Running extremum used by min/max terminals.
 */
export class Extremum<V> {
  private best: { value: V } | undefined;

  constructor(
    private readonly compare: Comparator<V>,
    private readonly direction: 'min' | 'max'
  ) {}

  offer(value: V): void {
    if (this.best === undefined) {
      this.best = { value };
      return;
    }
    const cmp = this.compare(value, this.best.value);
    if (this.direction === 'min' ? cmp < 0 : cmp > 0) {
      this.best = { value };
    }
  }

  result(): V | undefined {
    return this.best?.value;
  }
}
