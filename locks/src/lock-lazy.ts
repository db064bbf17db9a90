/**
 * @quarry/locks - LockLazyQuery
 *
 * Lazy query over locked values. Stages are recorded as descriptors and run
 * together in a single loop: for each element the read guard is acquired
 * once, every stage and the terminal's step are evaluated under it, and the
 * guard is released before the next element. As soon as a `take` stage is
 * exhausted, or the terminal has its answer, no further lock is acquired.
 *
 * @example
 * ```typescript
 * // Acquires locks only until three low-stock items are found
 * const reorder = lockLazy(inventory)
 *   .filter(f('stock'), s => s < 5)
 *   .take(3)
 *   .collect();
 * ```
 */

import {
  avgAggregator,
  createNoopLogger,
  defaultCloner,
  extremumAggregator,
  floatExtremumAggregator,
  isPresent,
  PredicateChain,
  QueryTelemetry,
  sumAggregator,
  assertCount,
  type Aggregator,
  type Cloner,
  type FieldAccessor,
  type FieldPredicate,
  type NumericAccessor,
  type RecordPredicate,
  type SortKey,
} from '@quarry/core';
import { LockAccess, type LockQueryOptions } from './access.js';
import { lockIterable, type LockSource } from './collections.js';

export type LockStage<T> =
  | { readonly kind: 'filter'; readonly chain: PredicateChain<T> }
  | { readonly kind: 'skip'; readonly count: number }
  | { readonly kind: 'take'; readonly count: number };

/**
 * Per-pass stage state: remaining counts for skip/take stages.
 */
class StageRun<T> {
  private readonly remaining: number[];

  constructor(private readonly stages: readonly LockStage<T>[]) {
    this.remaining = stages.map(stage => (stage.kind === 'filter' ? 0 : stage.count));
  }

  /**
   * True once some take stage has let its last element through; nothing can
   * reach the terminal after that.
   */
  exhausted(): boolean {
    return this.stages.some((stage, i) => stage.kind === 'take' && this.remaining[i] === 0);
  }

  /**
   * Run one value through every stage in order.
   */
  admit(value: T): boolean {
    for (let i = 0; i < this.stages.length; i++) {
      const stage = this.stages[i];
      switch (stage.kind) {
        case 'filter':
          if (!stage.chain.matches(value)) return false;
          break;
        case 'skip':
          if (this.remaining[i] > 0) {
            this.remaining[i]--;
            return false;
          }
          break;
        case 'take':
          if (this.remaining[i] === 0) return false;
          this.remaining[i]--;
          break;
        default: {
          const _exhaustiveCheck: never = stage;
          throw new Error(`Unhandled stage: ${String(_exhaustiveCheck)}`);
        }
      }
    }
    return true;
  }
}

export class LockLazyQuery<T> {
  private readonly cloner: Cloner<T>;
  private readonly access: LockAccess;
  private readonly telemetry: QueryTelemetry;

  constructor(
    private readonly source: LockSource<T>,
    private readonly options: LockQueryOptions<T> = {},
    private readonly stages: readonly LockStage<T>[] = []
  ) {
    this.cloner = options.cloner ?? defaultCloner;
    this.telemetry = new QueryTelemetry('LockLazyQuery', options);
    this.access = new LockAccess(options.failureMode ?? 'abort', options.logger ?? createNoopLogger());
  }

  // ===========================================================================
  // Stages
  // ===========================================================================

  filter<F>(accessor: FieldAccessor<T, F>, predicate: FieldPredicate<F>): LockLazyQuery<T> {
    return this.withFilter(chain => chain.and(accessor, predicate));
  }

  where(predicate: RecordPredicate<T>): LockLazyQuery<T> {
    return this.withFilter(chain => chain.andRecord(predicate));
  }

  skip(n: number): LockLazyQuery<T> {
    assertCount('skip', 'n', n);
    return this.append({ kind: 'skip', count: n });
  }

  take(n: number): LockLazyQuery<T> {
    assertCount('take', 'n', n);
    return this.append({ kind: 'take', count: n });
  }

  // ===========================================================================
  // Terminals
  // ===========================================================================

  /**
   * Owned copies of every element that passes the stages.
   */
  collect(): T[] {
    const out: T[] = [];
    this.run('collect', value => {
      out.push(this.cloner(value));
      return true;
    });
    return out;
  }

  /** Alias of `collect` */
  all(): T[] {
    return this.collect();
  }

  first(): T | undefined {
    let found: T | undefined;
    this.run('first', value => {
      found = this.cloner(value);
      return false;
    });
    return found;
  }

  count(): number {
    let count = 0;
    this.run('count', () => {
      count++;
      return true;
    });
    return count;
  }

  any(): boolean {
    let found = false;
    this.run('any', () => {
      found = true;
      return false;
    });
    return found;
  }

  /**
   * Owned copy of the first element satisfying `predicate`.
   */
  find(predicate: RecordPredicate<T>): T | undefined {
    let found: T | undefined;
    this.run('find', value => {
      if (!predicate(value)) return true;
      found = this.cloner(value);
      return false;
    });
    return found;
  }

  allMatch(predicate: RecordPredicate<T>): boolean {
    let matched = true;
    this.run('allMatch', value => {
      if (predicate(value)) return true;
      matched = false;
      return false;
    });
    return matched;
  }

  /**
   * Visit each value under its guard. The value must not be retained.
   */
  forEach(visit: (value: T) => void): void {
    this.run('forEach', value => {
      visit(value);
      return true;
    });
  }

  fold<A>(initial: A, combine: (accumulator: A, value: T) => A): A {
    let accumulator = initial;
    this.run('fold', value => {
      accumulator = combine(accumulator, value);
      return true;
    });
    return accumulator;
  }

  /**
   * Field values read under the guard; absent values are dropped.
   */
  select<F>(accessor: FieldAccessor<T, F>): NonNullable<F>[] {
    const out: NonNullable<F>[] = [];
    this.run('select', value => {
      const selected = accessor(value);
      if (isPresent(selected)) out.push(selected);
      return true;
    });
    return out;
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

  // ===========================================================================
  // Internals
  // ===========================================================================

  private append(stage: LockStage<T>): LockLazyQuery<T> {
    return new LockLazyQuery(this.source, this.options, [...this.stages, stage]);
  }

  /**
   * Extend a trailing filter stage, so consecutive filters share one chain.
   */
  private withFilter(extend: (chain: PredicateChain<T>) => PredicateChain<T>): LockLazyQuery<T> {
    const last = this.stages[this.stages.length - 1];
    if (last !== undefined && last.kind === 'filter') {
      return new LockLazyQuery(this.source, this.options, [
        ...this.stages.slice(0, -1),
        { kind: 'filter', chain: extend(last.chain) },
      ]);
    }
    return this.append({ kind: 'filter', chain: extend(PredicateChain.empty()) });
  }

  /**
   * One pass. `step` runs under the guard for every admitted value and
   * returns false once the terminal needs nothing more.
   */
  private run(operation: string, step: (value: T) => boolean): void {
    this.telemetry.track(operation, stats => {
      const stages = new StageRun(this.stages);
      if (stages.exhausted()) return;

      this.access.scan(lockIterable(this.source), operation, stats, value => {
        if (stages.admit(value) && !step(value)) return false;
        return !stages.exhausted();
      });
    });
  }

  private aggregate<V, R>(
    operation: string,
    accessor: FieldAccessor<T, V>,
    aggregator: Aggregator<V, R>
  ): R {
    this.run(operation, value => {
      aggregator.update(accessor(value));
      return true;
    });
    return aggregator.finalize();
  }
}

/**
 * Start a lazy query over locked values.
 */
export function lockLazy<T>(source: LockSource<T>, options: LockQueryOptions<T> = {}): LockLazyQuery<T> {
  return new LockLazyQuery(source, options);
}
