/**
 * @quarry/locks - LockQuery
 *
 * Eager query over a collection of individually locked values. Each terminal
 * walks the collection once, holding one read guard at a time; predicates
 * and accessors run against the guarded value in place, so filtering,
 * counting and aggregating copy nothing. Only results that must outlive the
 * guard (`all`, `first`, `limit`, sorting, grouping) are cloned, and only for
 * elements that passed the chain.
 *
 * Consistency: elements are read one after another with no snapshot across
 * them. A writer may change an element that was already visited, or one not
 * yet reached; each element is seen in some committed state.
 *
 * @example
 * ```typescript
 * import { field } from '@quarry/core';
 * import { lockArray, lockQuery } from '@quarry/locks';
 *
 * const inventory = lockArray(products);
 * const f = field<Product>();
 *
 * lockQuery(inventory).filter(f('stock'), s => s === 0).count();
 * lockQuery(inventory, { failureMode: 'skip', logger }).orderByFloat(f('price'));
 * ```
 */

import {
  avgAggregator,
  compareFloat,
  compareKeys,
  createNoopLogger,
  defaultCloner,
  err,
  extremumAggregator,
  floatExtremumAggregator,
  groupInto,
  isPresent,
  KeyIndex,
  ok,
  PredicateChain,
  QueryTelemetry,
  reversed,
  sortByKey,
  sumAggregator,
  assertCount,
  type Aggregator,
  type Cloner,
  type FieldAccessor,
  type FieldPredicate,
  type NumericAccessor,
  type PassStats,
  type RecordPredicate,
  type Result,
  type SortKey,
} from '@quarry/core';
import { LockAccess, type LockQueryOptions } from './access.js';
import { lockIterable, type LockSource } from './collections.js';
import { LockAccessError } from './errors.js';
import type { LockValue, ReadGuard } from './types.js';

export class LockQuery<T> {
  private readonly cloner: Cloner<T>;
  private readonly access: LockAccess;
  private readonly telemetry: QueryTelemetry;

  /**
   * @param chain - predicates already applied (default: none)
   */
  constructor(
    private readonly source: LockSource<T>,
    private readonly options: LockQueryOptions<T> = {},
    private readonly chain: PredicateChain<T> = PredicateChain.empty()
  ) {
    this.cloner = options.cloner ?? defaultCloner;
    this.telemetry = new QueryTelemetry('LockQuery', options);
    this.access = new LockAccess(options.failureMode ?? 'abort', options.logger ?? createNoopLogger());
  }

  // ===========================================================================
  // Builders
  // ===========================================================================

  filter<F>(accessor: FieldAccessor<T, F>, predicate: FieldPredicate<F>): LockQuery<T> {
    return new LockQuery(this.source, this.options, this.chain.and(accessor, predicate));
  }

  where(predicate: RecordPredicate<T>): LockQuery<T> {
    return new LockQuery(this.source, this.options, this.chain.andRecord(predicate));
  }

  // ===========================================================================
  // Terminals
  // ===========================================================================

  /**
   * Owned copies of every matching value.
   */
  all(): T[] {
    return this.telemetry.track('all', stats => this.cloneMatches('all', stats));
  }

  /**
   * Owned copy of the first match; stops acquiring after it.
   */
  first(): T | undefined {
    return this.telemetry.track('first', stats => {
      let found: T | undefined;
      this.scanMatches('first', stats, value => {
        found = this.cloner(value);
        return false;
      });
      return found;
    });
  }

  count(): number {
    return this.telemetry.track('count', stats => {
      let count = 0;
      this.scanMatches('count', stats, () => {
        count++;
        return true;
      });
      return count;
    });
  }

  exists(): boolean {
    return this.telemetry.track('exists', stats => {
      let found = false;
      this.scanMatches('exists', stats, () => {
        found = true;
        return false;
      });
      return found;
    });
  }

  /**
   * Owned copies of at most `n` matches; stops acquiring once `n` are found.
   */
  limit(n: number): T[] {
    assertCount('limit', 'n', n);
    return this.telemetry.track('limit', stats => {
      const out: T[] = [];
      if (n === 0) return out;
      this.scanMatches('limit', stats, value => {
        out.push(this.cloner(value));
        return out.length < n;
      });
      return out;
    });
  }

  /**
   * Field values of matching elements, read under the guard; absent values
   * are dropped.
   */
  select<F>(accessor: FieldAccessor<T, F>): NonNullable<F>[] {
    return this.telemetry.track('select', stats => {
      const values: NonNullable<F>[] = [];
      this.scanMatches('select', stats, value => {
        const selected = accessor(value);
        if (isPresent(selected)) values.push(selected);
        return true;
      });
      return values;
    });
  }

  sum(accessor: NumericAccessor<T>): number {
    return this.aggregate('sum', accessor, sumAggregator());
  }

  avg(accessor: NumericAccessor<T>): number | undefined {
    return this.aggregate('avg', accessor, avgAggregator());
  }

  min<F extends SortKey>(accessor: FieldAccessor<T, F>): NonNullable<F> | undefined {
    return this.aggregate('min', accessor, extremumAggregator<F>('min'));
  }

  max<F extends SortKey>(accessor: FieldAccessor<T, F>): NonNullable<F> | undefined {
    return this.aggregate('max', accessor, extremumAggregator<F>('max'));
  }

  minFloat(accessor: NumericAccessor<T>): number | undefined {
    return this.aggregate('minFloat', accessor, floatExtremumAggregator('min'));
  }

  maxFloat(accessor: NumericAccessor<T>): number | undefined {
    return this.aggregate('maxFloat', accessor, floatExtremumAggregator('max'));
  }

  orderBy<F extends SortKey>(accessor: FieldAccessor<T, F>): T[] {
    return this.sorted('orderBy', accessor, compareKeys);
  }

  orderByDesc<F extends SortKey>(accessor: FieldAccessor<T, F>): T[] {
    return this.sorted('orderByDesc', accessor, reversed(compareKeys));
  }

  orderByFloat(accessor: FieldAccessor<T, number>): T[] {
    return this.sorted('orderByFloat', accessor, compareFloat);
  }

  orderByFloatDesc(accessor: FieldAccessor<T, number>): T[] {
    return this.sorted('orderByFloatDesc', accessor, reversed(compareFloat));
  }

  /**
   * Owned copies grouped by key, groups in first-seen order; Date keys
   * compare by instant.
   */
  groupBy<F>(accessor: FieldAccessor<T, F>): Map<F, T[]> {
    return this.telemetry.track('groupBy', stats => {
      const groups = new KeyIndex<F, T[]>();
      this.scanMatches('groupBy', stats, value => {
        groupInto(groups, accessor(value), this.cloner(value));
        return true;
      });
      return groups.toMap();
    });
  }

  /**
   * One result per element that matched or could not be read, in source
   * order. Lock failures are reported as Err regardless of the failure mode;
   * non-matching elements are left out.
   */
  allSettled(): Result<T, LockAccessError>[] {
    return this.telemetry.track('allSettled', stats => {
      const results: Result<T, LockAccessError>[] = [];
      for (const lock of this.locks()) {
        stats.rowsProcessed++;
        let guard: ReadGuard<T>;
        try {
          guard = lock.read();
        } catch (error) {
          if (error instanceof LockAccessError) {
            results.push(err(error));
            continue;
          }
          throw error;
        }
        try {
          if (this.chain.matches(guard.value)) {
            results.push(ok(this.cloner(guard.value)));
          }
        } finally {
          guard.release();
        }
      }
      return results;
    });
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private locks(): Iterable<LockValue<T>> {
    return lockIterable(this.source);
  }

  private scanMatches(operation: string, stats: PassStats, visit: (value: T) => boolean): void {
    this.access.scan(this.locks(), operation, stats, value =>
      this.chain.matches(value) ? visit(value) : true
    );
  }

  private cloneMatches(operation: string, stats: PassStats): T[] {
    const out: T[] = [];
    this.scanMatches(operation, stats, value => {
      out.push(this.cloner(value));
      return true;
    });
    return out;
  }

  private aggregate<V, R>(
    operation: string,
    accessor: FieldAccessor<T, V>,
    aggregator: Aggregator<V, R>
  ): R {
    return this.telemetry.track(operation, stats => {
      this.scanMatches(operation, stats, value => {
        aggregator.update(accessor(value));
        return true;
      });
      return aggregator.finalize();
    });
  }

  private sorted<K>(
    operation: string,
    accessor: FieldAccessor<T, K>,
    compare: (a: K, b: K) => number
  ): T[] {
    return this.telemetry.track(operation, stats =>
      sortByKey(this.cloneMatches(operation, stats), accessor, compare)
    );
  }
}

/**
 * Start an eager query over locked values.
 */
export function lockQuery<T>(source: LockSource<T>, options: LockQueryOptions<T> = {}): LockQuery<T> {
  return new LockQuery(source, options);
}
