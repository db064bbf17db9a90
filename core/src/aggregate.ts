/**
 * @quarry/core - Aggregators
 *
 * Single-pass accumulators shared by EagerQuery, LazyPipeline and the lock
 * adapters. Each aggregator sees one field value per matching record via
 * `update` and produces its answer from `finalize`.
 *
 * Absent values (`null`/`undefined`) are skipped by every aggregator, so
 * `avg` over a field that is never present is `undefined`, not 0.
 */

import { isPresent } from './field.js';
import { compareFloat, compareKeys, Extremum, type SortKey } from './ordering.js';

export interface Aggregator<V, R> {
  update(value: V): void;
  finalize(): R;
}

export type NumericValue = number | null | undefined;

/**
 * Sum of present values; 0 when there are none.
 */
export function sumAggregator(): Aggregator<NumericValue, number> {
  let sum = 0;
  return {
    update(value) {
      if (isPresent(value)) sum += value;
    },
    finalize: () => sum,
  };
}

/**
 * Arithmetic mean of present values; undefined when there are none.
 */
export function avgAggregator(): Aggregator<NumericValue, number | undefined> {
  let sum = 0;
  let count = 0;
  return {
    update(value) {
      if (isPresent(value)) {
        sum += value;
        count++;
      }
    },
    finalize: () => (count === 0 ? undefined : sum / count),
  };
}

/**
 * Number of present values.
 */
export function countAggregator<V>(): Aggregator<V, number> {
  let count = 0;
  return {
    update(value) {
      if (isPresent(value)) count++;
    },
    finalize: () => count,
  };
}

/**
 * Smallest or largest present key under the SortKey ordering.
 */
export function extremumAggregator<F extends SortKey>(
  direction: 'min' | 'max'
): Aggregator<F, NonNullable<F> | undefined> {
  const best = new Extremum<NonNullable<F>>(compareKeys, direction);
  return {
    update(value) {
      if (isPresent(value)) best.offer(value);
    },
    finalize: () => best.result(),
  };
}

/**
 * Smallest or largest number under the float total order (NaN greatest).
 */
export function floatExtremumAggregator(
  direction: 'min' | 'max'
): Aggregator<NumericValue, number | undefined> {
  const best = new Extremum<number>(compareFloat, direction);
  return {
    update(value) {
      if (isPresent(value)) best.offer(value);
    },
    finalize: () => best.result(),
  };
}

/**
 * Integer mean of epoch-millisecond timestamps, truncated toward zero.
 */
export function avgTimestampAggregator(): Aggregator<NumericValue, number | undefined> {
  const avg = avgAggregator();
  return {
    update: value => avg.update(value),
    finalize() {
      const mean = avg.finalize();
      return mean === undefined ? undefined : Math.trunc(mean);
    },
  };
}
