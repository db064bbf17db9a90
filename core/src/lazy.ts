/**
 * @quarry/core - LazyPipeline
 *
 * Deferred query pipeline built from synchronous generator stages. Adding a
 * stage touches no record; each terminal opens a fresh pass over the source
 * and pulls elements one at a time through every stage, so short-circuit
 * terminals (`first`, `any`, `find`, `allMatch`) and `take` stop reading the
 * source as soon as the answer is known.
 *
 * @example
 * ```typescript
 * import { field, lazy } from '@quarry/core';
 *
 * const f = field<Order>();
 *
 * // Reads orders only until the fifth large one is found
 * const firstLarge = lazy(orders)
 *   .filter(f('total'), t => t > 1000)
 *   .take(5)
 *   .collect();
 *
 * // Scalar projection without materializing the orders
 * const revenue = lazy(orders).project(f('total')).fold(0, (acc, t) => acc + t);
 * ```
 */

import {
  avgAggregator,
  extremumAggregator,
  floatExtremumAggregator,
  sumAggregator,
  type Aggregator,
} from './aggregate.js';
import {
  isPresent,
  type FieldAccessor,
  type FieldPredicate,
  type NumericAccessor,
  type RecordPredicate,
} from './field.js';
import { assertCount } from './guards.js';
import type { SortKey } from './ordering.js';
import { toIterable, type QuerySource } from './queryable.js';
import { QueryTelemetry, type EngineOptions, type PassStats } from './telemetry.js';

export type LazyPipelineOptions = EngineOptions;

/**
 * Opens one pass: a fresh iterable over the pipeline's output. Source pulls
 * are counted into `stats`.
 */
type PassFactory<T> = (stats: PassStats) => Iterable<T>;

// =============================================================================
// Stages
// =============================================================================

function* countPulls<T>(source: Iterable<T>, stats: PassStats): Generator<T> {
  for (const item of source) {
    stats.rowsProcessed++;
    yield item;
  }
}

function* filterStage<T>(upstream: Iterable<T>, test: RecordPredicate<T>): Generator<T> {
  for (const item of upstream) {
    if (test(item)) yield item;
  }
}

function* mapStage<T, U>(upstream: Iterable<T>, transform: (item: T) => U): Generator<U> {
  for (const item of upstream) {
    yield transform(item);
  }
}

function* projectStage<T, F>(upstream: Iterable<T>, accessor: FieldAccessor<T, F>): Generator<NonNullable<F>> {
  for (const item of upstream) {
    const value = accessor(item);
    if (isPresent(value)) yield value;
  }
}

function* takeStage<T>(upstream: Iterable<T>, count: number): Generator<T> {
  // Checked before pulling, so an exhausted take never reads upstream again.
  if (count === 0) return;
  let taken = 0;
  for (const item of upstream) {
    yield item;
    taken++;
    if (taken >= count) return;
  }
}

function* skipStage<T>(upstream: Iterable<T>, count: number): Generator<T> {
  let skipped = 0;
  for (const item of upstream) {
    if (skipped < count) {
      skipped++;
      continue;
    }
    yield item;
  }
}

// =============================================================================
// LazyPipeline
// =============================================================================

export class LazyPipeline<T> implements Iterable<T> {
  private readonly telemetry: QueryTelemetry;

  private constructor(
    private readonly openPass: PassFactory<T>,
    private readonly options: LazyPipelineOptions
  ) {
    this.telemetry = new QueryTelemetry('LazyPipeline', options);
  }

  /**
   * Start a pipeline over a source. The source is re-iterated by every
   * terminal, so it must be re-iterable (an array, Set or Queryable) when more
   * than one terminal will run.
   */
  static from<T>(source: QuerySource<T>, options: LazyPipelineOptions = {}): LazyPipeline<T> {
    return new LazyPipeline(stats => countPulls(toIterable(source), stats), options);
  }

  // ===========================================================================
  // Stages
  // ===========================================================================

  filter<F>(accessor: FieldAccessor<T, F>, predicate: FieldPredicate<F>): LazyPipeline<T> {
    return this.pipe(upstream => filterStage(upstream, item => predicate(accessor(item))));
  }

  where(predicate: RecordPredicate<T>): LazyPipeline<T> {
    return this.pipe(upstream => filterStage(upstream, predicate));
  }

  /**
   * Replace each element with a field value, dropping absent values.
   */
  project<F>(accessor: FieldAccessor<T, F>): LazyPipeline<NonNullable<F>> {
    return this.pipe(upstream => projectStage(upstream, accessor));
  }

  mapItems<U>(transform: (item: T) => U): LazyPipeline<U> {
    return this.pipe(upstream => mapStage(upstream, transform));
  }

  take(n: number): LazyPipeline<T> {
    assertCount('take', 'n', n);
    return this.pipe(upstream => takeStage(upstream, n));
  }

  skip(n: number): LazyPipeline<T> {
    assertCount('skip', 'n', n);
    return this.pipe(upstream => skipStage(upstream, n));
  }

  // ===========================================================================
  // Terminals
  // ===========================================================================

  collect(): T[] {
    return this.run('collect', items => Array.from(items));
  }

  first(): T | undefined {
    return this.run('first', items => {
      for (const item of items) return item;
      return undefined;
    });
  }

  count(): number {
    return this.run('count', items => {
      let count = 0;
      for (const _ of items) count++;
      return count;
    });
  }

  any(): boolean {
    return this.run('any', items => {
      for (const _ of items) return true;
      return false;
    });
  }

  find(predicate: RecordPredicate<T>): T | undefined {
    return this.run('find', items => {
      for (const item of items) {
        if (predicate(item)) return item;
      }
      return undefined;
    });
  }

  /**
   * True when every element satisfies `predicate` (vacuously true when empty).
   */
  allMatch(predicate: RecordPredicate<T>): boolean {
    return this.run('allMatch', items => {
      for (const item of items) {
        if (!predicate(item)) return false;
      }
      return true;
    });
  }

  forEach(visit: (item: T) => void): void {
    this.run('forEach', items => {
      for (const item of items) visit(item);
    });
  }

  fold<A>(initial: A, combine: (accumulator: A, item: T) => A): A {
    return this.run('fold', items => {
      let accumulator = initial;
      for (const item of items) {
        accumulator = combine(accumulator, item);
      }
      return accumulator;
    });
  }

  sumBy(accessor: NumericAccessor<T>): number {
    return this.aggregate('sumBy', accessor, sumAggregator());
  }

  avgBy(accessor: NumericAccessor<T>): number | undefined {
    return this.aggregate('avgBy', accessor, avgAggregator());
  }

  minBy<F extends SortKey>(accessor: FieldAccessor<T, F>): NonNullable<F> | undefined {
    return this.aggregate('minBy', accessor, extremumAggregator<F>('min'));
  }

  maxBy<F extends SortKey>(accessor: FieldAccessor<T, F>): NonNullable<F> | undefined {
    return this.aggregate('maxBy', accessor, extremumAggregator<F>('max'));
  }

  minByFloat(accessor: NumericAccessor<T>): number | undefined {
    return this.aggregate('minByFloat', accessor, floatExtremumAggregator('min'));
  }

  maxByFloat(accessor: NumericAccessor<T>): number | undefined {
    return this.aggregate('maxByFloat', accessor, floatExtremumAggregator('max'));
  }

  /**
   * Iterate the pipeline directly. Passes run this way are not logged.
   */
  [Symbol.iterator](): Iterator<T> {
    return this.openPass({ rowsProcessed: 0 })[Symbol.iterator]();
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private pipe<U>(stage: (upstream: Iterable<T>) => Iterable<U>): LazyPipeline<U> {
    const openPass = this.openPass;
    return new LazyPipeline(stats => stage(openPass(stats)), this.options);
  }

  private run<R>(operation: string, consume: (items: Iterable<T>) => R): R {
    return this.telemetry.track(operation, stats => consume(this.openPass(stats)));
  }

  private aggregate<V, R>(
    operation: string,
    accessor: FieldAccessor<T, V>,
    aggregator: Aggregator<V, R>
  ): R {
    return this.run(operation, items => {
      for (const item of items) aggregator.update(accessor(item));
      return aggregator.finalize();
    });
  }
}

/**
 * Start a lazy pipeline over any source.
 */
export function lazy<T>(source: QuerySource<T>, options: LazyPipelineOptions = {}): LazyPipeline<T> {
  return LazyPipeline.from(source, options);
}
