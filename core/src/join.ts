/**
 * @quarry/core - JoinEngine
 *
 * Hash equi-joins between two datasets. The build side is indexed into a
 * KeyIndex (SameValueZero key equality with Dates compared by instant, no
 * coercion: `1` never matches `'1'`), then the probe side is scanned once.
 * Output order follows the probe side; multiple matches for one probe row
 * appear in build-side source order.
 *
 * Records with a `null`/`undefined` key never match anything. Left and right
 * joins still emit them once, with `undefined` for the missing side.
 *
 * @example
 * ```typescript
 * import { field, join } from '@quarry/core';
 *
 * const rows = join(orders, customers).innerJoin(
 *   field<Order>()('customerId'),
 *   field<Customer>()('id'),
 *   (order, customer) => ({ orderId: order.id, name: customer.name })
 * );
 * ```
 */

import { QueryError } from './errors.js';
import { isPresent, type FieldAccessor } from './field.js';
import { groupInto, KeyIndex } from './key-index.js';
import { toArray, type QuerySource } from './queryable.js';
import { QueryTelemetry, type EngineOptions, type PassStats } from './telemetry.js';

export interface JoinOptions extends EngineOptions {
  /** Throw once a join would emit more rows than this; 0 = unlimited (default: 0) */
  maxOutputRows?: number;
}

/**
 * Index records by key, keeping source order within each key.
 */
export function buildIndex<T, K>(
  records: readonly T[],
  key: FieldAccessor<T, K | null | undefined>
): KeyIndex<K, T[]> {
  const index = new KeyIndex<K, T[]>();
  for (const record of records) {
    const value = key(record);
    if (isPresent(value)) groupInto(index, value, record);
  }
  return index;
}

/**
 * Collects join output and enforces the row limit before each combiner call.
 */
class JoinOutput<O> {
  readonly rows: O[] = [];

  constructor(
    private readonly operation: string,
    private readonly maxOutputRows: number
  ) {}

  emit(produce: () => O): void {
    if (this.maxOutputRows > 0 && this.rows.length >= this.maxOutputRows) {
      throw QueryError.joinRowLimitExceeded(this.operation, this.maxOutputRows);
    }
    this.rows.push(produce());
  }
}

export class JoinEngine<L, R> {
  private readonly left: readonly L[];
  private readonly right: readonly R[];
  private readonly maxOutputRows: number;
  private readonly telemetry: QueryTelemetry;

  constructor(left: QuerySource<L>, right: QuerySource<R>, options: JoinOptions = {}) {
    this.left = toArray(left);
    this.right = toArray(right);
    this.maxOutputRows = options.maxOutputRows ?? 0;
    this.telemetry = new QueryTelemetry('JoinEngine', options);
  }

  /**
   * One row per matching (left, right) pair.
   */
  innerJoin<K, O>(
    leftKey: FieldAccessor<L, K | null | undefined>,
    rightKey: FieldAccessor<R, K | null | undefined>,
    combine: (left: L, right: R) => O
  ): O[] {
    return this.inner('innerJoin', leftKey, rightKey, () => true, combine);
  }

  /**
   * Inner join that keeps only pairs satisfying `predicate`.
   */
  innerJoinWhere<K, O>(
    leftKey: FieldAccessor<L, K | null | undefined>,
    rightKey: FieldAccessor<R, K | null | undefined>,
    predicate: (left: L, right: R) => boolean,
    combine: (left: L, right: R) => O
  ): O[] {
    return this.inner('innerJoinWhere', leftKey, rightKey, predicate, combine);
  }

  /**
   * Every left row at least once; unmatched rows get `undefined` for right.
   */
  leftJoin<K, O>(
    leftKey: FieldAccessor<L, K | null | undefined>,
    rightKey: FieldAccessor<R, K | null | undefined>,
    combine: (left: L, right: R | undefined) => O
  ): O[] {
    return this.telemetry.track('leftJoin', stats => {
      this.countInputs(stats);
      const index = buildIndex(this.right, rightKey);
      const output = new JoinOutput<O>('leftJoin', this.maxOutputRows);

      for (const leftRecord of this.left) {
        const key = leftKey(leftRecord);
        const matches = isPresent(key) ? index.get(key) : undefined;
        if (!matches) {
          output.emit(() => combine(leftRecord, undefined));
          continue;
        }
        for (const rightRecord of matches) {
          output.emit(() => combine(leftRecord, rightRecord));
        }
      }
      return output.rows;
    });
  }

  /**
   * Every right row at least once; unmatched rows get `undefined` for left.
   * Output follows right-side order.
   */
  rightJoin<K, O>(
    leftKey: FieldAccessor<L, K | null | undefined>,
    rightKey: FieldAccessor<R, K | null | undefined>,
    combine: (left: L | undefined, right: R) => O
  ): O[] {
    return this.telemetry.track('rightJoin', stats => {
      this.countInputs(stats);
      const index = buildIndex(this.left, leftKey);
      const output = new JoinOutput<O>('rightJoin', this.maxOutputRows);

      for (const rightRecord of this.right) {
        const key = rightKey(rightRecord);
        const matches = isPresent(key) ? index.get(key) : undefined;
        if (!matches) {
          output.emit(() => combine(undefined, rightRecord));
          continue;
        }
        for (const leftRecord of matches) {
          output.emit(() => combine(leftRecord, rightRecord));
        }
      }
      return output.rows;
    });
  }

  /**
   * Cartesian product, left-major.
   */
  crossJoin<O>(combine: (left: L, right: R) => O): O[] {
    return this.telemetry.track('crossJoin', stats => {
      this.countInputs(stats);
      const output = new JoinOutput<O>('crossJoin', this.maxOutputRows);
      for (const leftRecord of this.left) {
        for (const rightRecord of this.right) {
          output.emit(() => combine(leftRecord, rightRecord));
        }
      }
      return output.rows;
    });
  }

  private inner<K, O>(
    operation: string,
    leftKey: FieldAccessor<L, K | null | undefined>,
    rightKey: FieldAccessor<R, K | null | undefined>,
    predicate: (left: L, right: R) => boolean,
    combine: (left: L, right: R) => O
  ): O[] {
    return this.telemetry.track(operation, stats => {
      this.countInputs(stats);
      const index = buildIndex(this.right, rightKey);
      const output = new JoinOutput<O>(operation, this.maxOutputRows);

      for (const leftRecord of this.left) {
        const key = leftKey(leftRecord);
        if (!isPresent(key)) continue;
        const matches = index.get(key);
        if (!matches) continue;
        for (const rightRecord of matches) {
          if (predicate(leftRecord, rightRecord)) {
            output.emit(() => combine(leftRecord, rightRecord));
          }
        }
      }
      return output.rows;
    });
  }

  private countInputs(stats: PassStats): void {
    stats.rowsProcessed += this.left.length + this.right.length;
  }
}

/**
 * Start a join between two sources.
 */
export function join<L, R>(left: QuerySource<L>, right: QuerySource<R>, options: JoinOptions = {}): JoinEngine<L, R> {
  return new JoinEngine(left, right, options);
}
