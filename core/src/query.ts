/**
 * @quarry/core - EagerQuery
 *
 * Immediate-evaluation query over an in-memory dataset. The source is
 * materialized into an array once (arrays are borrowed as-is); predicates are
 * accumulated in an immutable PredicateChain and every terminal runs one full
 * pass over the data.
 *
 * Terminals come in two families:
 * - reference family (`all`, `first`, `limit`, aggregates): returns the
 *   records themselves, never duplicates
 * - owned family (`orderBy*`, `groupBy`, `toOwned`): returns copies made by
 *   the query's cloner, so the caller can reorder or mutate them freely
 *
 * @example
 * ```typescript
 * import { field, query } from '@quarry/core';
 *
 * interface Product { name: string; price: number; category: string }
 * const f = field<Product>();
 *
 * const tools = query(products).filter(f('category'), c => c === 'tools');
 * tools.count();                  // 12
 * tools.sum(f('price'));          // 389.5
 * tools.orderByFloat(f('price')); // cloned, cheapest first
 * ```
 */

import {
  avgAggregator,
  avgTimestampAggregator,
  countAggregator,
  extremumAggregator,
  floatExtremumAggregator,
  sumAggregator,
  type Aggregator,
} from './aggregate.js';
import {
  DAY_MS,
  HOUR_MS,
  MINUTE_MS,
  extractMonth,
  isAfter,
  isBefore,
  isBetween,
  isBusinessHours,
  isSameDay,
  isWeekday,
  isWeekend,
} from './datetime.js';
import {
  defaultCloner,
  isPresent,
  type Cloner,
  type DateAccessor,
  type FieldAccessor,
  type FieldPredicate,
  type NumericAccessor,
  type RecordPredicate,
} from './field.js';
import { assertCount } from './guards.js';
import { groupInto, KeyIndex } from './key-index.js';
import { compareFloat, compareKeys, reversed, sortByKey, type SortKey } from './ordering.js';
import { PredicateChain } from './predicate.js';
import { toArray, type QuerySource } from './queryable.js';
import { QueryTelemetry, type EngineOptions, type PassStats } from './telemetry.js';

export interface EagerQueryOptions<T> extends EngineOptions {
  /** Duplicates records for owned results (default: structuredClone) */
  cloner?: Cloner<T>;
}

/**
 * Result of `query.skip(n)`; finish with `limit`.
 */
export interface SkippedQuery<T> {
  limit(n: number): T[];
}

export class EagerQuery<T> {
  private readonly data: readonly T[];
  private readonly cloner: Cloner<T>;
  private readonly telemetry: QueryTelemetry;

  /**
   * @param chain - predicates already applied (default: none)
   */
  constructor(
    source: QuerySource<T>,
    private readonly options: EagerQueryOptions<T> = {},
    private readonly chain: PredicateChain<T> = PredicateChain.empty()
  ) {
    this.data = toArray(source);
    this.cloner = options.cloner ?? defaultCloner;
    this.telemetry = new QueryTelemetry('EagerQuery', options);
  }

  // ===========================================================================
  // Builders
  // ===========================================================================

  /**
   * Keep records whose field satisfies `predicate`. Returns a new query; this
   * one is unchanged and can be reused.
   */
  filter<F>(accessor: FieldAccessor<T, F>, predicate: FieldPredicate<F>): EagerQuery<T> {
    return this.derive(this.chain.and(accessor, predicate));
  }

  /**
   * Keep records satisfying a whole-record predicate.
   */
  where(predicate: RecordPredicate<T>): EagerQuery<T> {
    return this.derive(this.chain.andRecord(predicate));
  }

  // ===========================================================================
  // Reference family
  // ===========================================================================

  all(): T[] {
    return this.telemetry.track('all', stats => this.matches(stats));
  }

  first(): T | undefined {
    return this.telemetry.track('first', stats => {
      for (const record of this.data) {
        stats.rowsProcessed++;
        if (this.chain.matches(record)) return record;
      }
      return undefined;
    });
  }

  count(): number {
    return this.telemetry.track('count', stats => {
      let count = 0;
      for (const record of this.data) {
        stats.rowsProcessed++;
        if (this.chain.matches(record)) count++;
      }
      return count;
    });
  }

  exists(): boolean {
    return this.telemetry.track('exists', stats => {
      for (const record of this.data) {
        stats.rowsProcessed++;
        if (this.chain.matches(record)) return true;
      }
      return false;
    });
  }

  /**
   * At most `n` matching records, in source order.
   */
  limit(n: number): T[] {
    assertCount('limit', 'n', n);
    return this.telemetry.track('limit', stats => this.window(stats, 0, n));
  }

  /**
   * Skip the first `n` matching records.
   */
  skip(n: number): SkippedQuery<T> {
    assertCount('skip', 'n', n);
    return {
      limit: (limit: number): T[] => {
        assertCount('limit', 'n', limit);
        return this.telemetry.track('skip', stats => this.window(stats, n, limit));
      },
    };
  }

  /**
   * Zero-based page of matching records.
   */
  page(pageIndex: number, pageSize: number): T[] {
    assertCount('page', 'pageIndex', pageIndex);
    assertCount('page', 'pageSize', pageSize);
    return this.skip(pageIndex * pageSize).limit(pageSize);
  }

  /**
   * Field values of matching records; absent values are dropped.
   */
  select<F>(accessor: FieldAccessor<T, F>): NonNullable<F>[] {
    return this.telemetry.track('select', stats => {
      const values: NonNullable<F>[] = [];
      for (const record of this.data) {
        stats.rowsProcessed++;
        if (!this.chain.matches(record)) continue;
        const value = accessor(record);
        if (isPresent(value)) values.push(value);
      }
      return values;
    });
  }

  /** 0 when nothing matches */
  sum(accessor: NumericAccessor<T>): number {
    return this.aggregate('sum', accessor, sumAggregator());
  }

  /** undefined when nothing matches */
  avg(accessor: NumericAccessor<T>): number | undefined {
    return this.aggregate('avg', accessor, avgAggregator());
  }

  min<F extends SortKey>(accessor: FieldAccessor<T, F>): NonNullable<F> | undefined {
    return this.aggregate('min', accessor, extremumAggregator<F>('min'));
  }

  max<F extends SortKey>(accessor: FieldAccessor<T, F>): NonNullable<F> | undefined {
    return this.aggregate('max', accessor, extremumAggregator<F>('max'));
  }

  /** NaN is the largest number */
  minFloat(accessor: NumericAccessor<T>): number | undefined {
    return this.aggregate('minFloat', accessor, floatExtremumAggregator('min'));
  }

  maxFloat(accessor: NumericAccessor<T>): number | undefined {
    return this.aggregate('maxFloat', accessor, floatExtremumAggregator('max'));
  }

  // ===========================================================================
  // Owned family
  // ===========================================================================

  /**
   * Cloned matches sorted ascending by key (stable, absent keys first).
   */
  orderBy<F extends SortKey>(accessor: FieldAccessor<T, F>): T[] {
    return this.sorted('orderBy', accessor, compareKeys);
  }

  /**
   * Cloned matches sorted descending by key; equal keys keep source order.
   */
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
   * Cloned matches grouped by key, groups in first-seen order. Keys compare
   * as in KeyIndex: SameValueZero, with Dates by instant.
   */
  groupBy<F>(accessor: FieldAccessor<T, F>): Map<F, T[]> {
    return this.telemetry.track('groupBy', stats => {
      const groups = new KeyIndex<F, T[]>();
      for (const record of this.matches(stats)) {
        groupInto(groups, accessor(record), this.cloner(record));
      }
      return groups.toMap();
    });
  }

  /**
   * Cloned matches in source order.
   */
  toOwned(): T[] {
    return this.telemetry.track('toOwned', stats => this.matches(stats).map(record => this.cloner(record)));
  }

  // ===========================================================================
  // Date filters
  // ===========================================================================

  whereAfter(accessor: DateAccessor<T>, reference: Date): EagerQuery<T> {
    return this.filter(accessor, d => isPresent(d) && isAfter(d, reference));
  }

  whereBefore(accessor: DateAccessor<T>, reference: Date): EagerQuery<T> {
    return this.filter(accessor, d => isPresent(d) && isBefore(d, reference));
  }

  /** Inclusive */
  whereBetween(accessor: DateAccessor<T>, start: Date, end: Date): EagerQuery<T> {
    return this.filter(accessor, d => isPresent(d) && isBetween(d, start, end));
  }

  /** Same UTC calendar day as `now` */
  whereToday(accessor: DateAccessor<T>, now: Date = new Date()): EagerQuery<T> {
    return this.filter(accessor, d => isPresent(d) && isSameDay(d, now));
  }

  whereYear(accessor: DateAccessor<T>, year: number): EagerQuery<T> {
    return this.filter(accessor, d => isPresent(d) && d.getUTCFullYear() === year);
  }

  /** `month` is 1-12 */
  whereMonth(accessor: DateAccessor<T>, month: number): EagerQuery<T> {
    return this.filter(accessor, d => isPresent(d) && extractMonth(d) === month);
  }

  whereDay(accessor: DateAccessor<T>, day: number): EagerQuery<T> {
    return this.filter(accessor, d => isPresent(d) && d.getUTCDate() === day);
  }

  whereWeekend(accessor: DateAccessor<T>): EagerQuery<T> {
    return this.filter(accessor, d => isPresent(d) && isWeekend(d));
  }

  whereWeekday(accessor: DateAccessor<T>): EagerQuery<T> {
    return this.filter(accessor, d => isPresent(d) && isWeekday(d));
  }

  /** 09:00 to 17:00 UTC, end exclusive */
  whereBusinessHours(accessor: DateAccessor<T>): EagerQuery<T> {
    return this.filter(accessor, d => isPresent(d) && isBusinessHours(d));
  }

  // ===========================================================================
  // Timestamp filters and aggregates (epoch milliseconds)
  // ===========================================================================

  whereAfterTimestamp(accessor: NumericAccessor<T>, reference: number): EagerQuery<T> {
    return this.filter(accessor, t => isPresent(t) && t > reference);
  }

  whereBeforeTimestamp(accessor: NumericAccessor<T>, reference: number): EagerQuery<T> {
    return this.filter(accessor, t => isPresent(t) && t < reference);
  }

  /** Inclusive */
  whereBetweenTimestamp(accessor: NumericAccessor<T>, start: number, end: number): EagerQuery<T> {
    return this.filter(accessor, t => isPresent(t) && t >= start && t <= end);
  }

  whereLastDaysTimestamp(accessor: NumericAccessor<T>, days: number, now: number = Date.now()): EagerQuery<T> {
    return this.whereAfterTimestamp(accessor, now - days * DAY_MS);
  }

  whereNextDaysTimestamp(accessor: NumericAccessor<T>, days: number, now: number = Date.now()): EagerQuery<T> {
    return this.whereBeforeTimestamp(accessor, now + days * DAY_MS);
  }

  whereLastHoursTimestamp(accessor: NumericAccessor<T>, hours: number, now: number = Date.now()): EagerQuery<T> {
    return this.whereAfterTimestamp(accessor, now - hours * HOUR_MS);
  }

  whereNextHoursTimestamp(accessor: NumericAccessor<T>, hours: number, now: number = Date.now()): EagerQuery<T> {
    return this.whereBeforeTimestamp(accessor, now + hours * HOUR_MS);
  }

  whereLastMinutesTimestamp(accessor: NumericAccessor<T>, minutes: number, now: number = Date.now()): EagerQuery<T> {
    return this.whereAfterTimestamp(accessor, now - minutes * MINUTE_MS);
  }

  whereNextMinutesTimestamp(accessor: NumericAccessor<T>, minutes: number, now: number = Date.now()): EagerQuery<T> {
    return this.whereBeforeTimestamp(accessor, now + minutes * MINUTE_MS);
  }

  minTimestamp(accessor: NumericAccessor<T>): number | undefined {
    return this.aggregate('minTimestamp', accessor, floatExtremumAggregator('min'));
  }

  maxTimestamp(accessor: NumericAccessor<T>): number | undefined {
    return this.aggregate('maxTimestamp', accessor, floatExtremumAggregator('max'));
  }

  /** Truncated to an integer */
  avgTimestamp(accessor: NumericAccessor<T>): number | undefined {
    return this.aggregate('avgTimestamp', accessor, avgTimestampAggregator());
  }

  sumTimestamp(accessor: NumericAccessor<T>): number {
    return this.aggregate('sumTimestamp', accessor, sumAggregator());
  }

  countTimestamp(accessor: NumericAccessor<T>): number {
    return this.aggregate('countTimestamp', accessor, countAggregator());
  }

  orderByTimestamp(accessor: FieldAccessor<T, number>): T[] {
    return this.sorted('orderByTimestamp', accessor, compareFloat);
  }

  orderByTimestampDesc(accessor: FieldAccessor<T, number>): T[] {
    return this.sorted('orderByTimestampDesc', accessor, reversed(compareFloat));
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private derive(chain: PredicateChain<T>): EagerQuery<T> {
    return new EagerQuery(this.data, this.options, chain);
  }

  private matches(stats: PassStats): T[] {
    const out: T[] = [];
    for (const record of this.data) {
      stats.rowsProcessed++;
      if (this.chain.matches(record)) out.push(record);
    }
    return out;
  }

  private window(stats: PassStats, offset: number, limit: number): T[] {
    const out: T[] = [];
    if (limit === 0) return out;
    let skipped = 0;
    for (const record of this.data) {
      stats.rowsProcessed++;
      if (!this.chain.matches(record)) continue;
      if (skipped < offset) {
        skipped++;
        continue;
      }
      out.push(record);
      if (out.length === limit) break;
    }
    return out;
  }

  private aggregate<V, R>(
    operation: string,
    accessor: FieldAccessor<T, V>,
    aggregator: Aggregator<V, R>
  ): R {
    return this.telemetry.track(operation, stats => {
      for (const record of this.data) {
        stats.rowsProcessed++;
        if (this.chain.matches(record)) aggregator.update(accessor(record));
      }
      return aggregator.finalize();
    });
  }

  private sorted<K>(
    operation: string,
    accessor: FieldAccessor<T, K>,
    compare: (a: K, b: K) => number
  ): T[] {
    return this.telemetry.track(operation, stats =>
      sortByKey(this.matches(stats), accessor, compare).map(record => this.cloner(record))
    );
  }
}

/**
 * Start an eager query over any source.
 */
export function query<T>(source: QuerySource<T>, options: EagerQueryOptions<T> = {}): EagerQuery<T> {
  return new EagerQuery(source, options);
}
