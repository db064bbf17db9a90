/**
 * @quarry/locks - LockJoinEngine
 *
 * Joins two collections of locked values. Each lock is read exactly once per
 * join: the value is copied under its guard and released, then the hash join
 * runs over the copies with no lock held. Combiners therefore receive owned
 * values and may keep them.
 *
 * @example
 * ```typescript
 * const rows = lockJoin(orderLocks, customerLocks).innerJoin(
 *   o => o.customerId,
 *   c => c.id,
 *   (order, customer) => ({ order: order.id, customer: customer.name })
 * );
 * ```
 */

import {
  createNoopLogger,
  defaultCloner,
  JoinEngine,
  QueryTelemetry,
  type Cloner,
  type FieldAccessor,
  type JoinOptions,
} from '@quarry/core';
import { LockAccess, type LockFailureMode } from './access.js';
import { lockIterable, type LockSource } from './collections.js';

export interface LockJoinOptions<L, R> extends JoinOptions {
  leftCloner?: Cloner<L>;
  rightCloner?: Cloner<R>;
  /** Default: 'abort' */
  failureMode?: LockFailureMode;
}

export class LockJoinEngine<L, R> {
  private readonly access: LockAccess;
  private readonly telemetry: QueryTelemetry;

  constructor(
    private readonly left: LockSource<L>,
    private readonly right: LockSource<R>,
    private readonly options: LockJoinOptions<L, R> = {}
  ) {
    this.access = new LockAccess(options.failureMode ?? 'abort', options.logger ?? createNoopLogger());
    this.telemetry = new QueryTelemetry('LockJoinEngine', options);
  }

  innerJoin<K, O>(
    leftKey: FieldAccessor<L, K | null | undefined>,
    rightKey: FieldAccessor<R, K | null | undefined>,
    combine: (left: L, right: R) => O
  ): O[] {
    return this.engine('innerJoin').innerJoin(leftKey, rightKey, combine);
  }

  innerJoinWhere<K, O>(
    leftKey: FieldAccessor<L, K | null | undefined>,
    rightKey: FieldAccessor<R, K | null | undefined>,
    predicate: (left: L, right: R) => boolean,
    combine: (left: L, right: R) => O
  ): O[] {
    return this.engine('innerJoinWhere').innerJoinWhere(leftKey, rightKey, predicate, combine);
  }

  leftJoin<K, O>(
    leftKey: FieldAccessor<L, K | null | undefined>,
    rightKey: FieldAccessor<R, K | null | undefined>,
    combine: (left: L, right: R | undefined) => O
  ): O[] {
    return this.engine('leftJoin').leftJoin(leftKey, rightKey, combine);
  }

  rightJoin<K, O>(
    leftKey: FieldAccessor<L, K | null | undefined>,
    rightKey: FieldAccessor<R, K | null | undefined>,
    combine: (left: L | undefined, right: R) => O
  ): O[] {
    return this.engine('rightJoin').rightJoin(leftKey, rightKey, combine);
  }

  crossJoin<O>(combine: (left: L, right: R) => O): O[] {
    return this.engine('crossJoin').crossJoin(combine);
  }

  /**
   * Copy both sides under their guards and hand the copies to a JoinEngine.
   */
  private engine(operation: string): JoinEngine<L, R> {
    const left = this.snapshot(this.left, this.options.leftCloner ?? defaultCloner, operation);
    const right = this.snapshot(this.right, this.options.rightCloner ?? defaultCloner, operation);
    return new JoinEngine(left, right, this.options);
  }

  private snapshot<T>(source: LockSource<T>, cloner: Cloner<T>, operation: string): T[] {
    return this.telemetry.track(`${operation}:snapshot`, stats => {
      const copies: T[] = [];
      this.access.scan(lockIterable(source), operation, stats, value => {
        copies.push(cloner(value));
        return true;
      });
      return copies;
    });
  }
}

/**
 * Start a join between two collections of locked values.
 */
export function lockJoin<L, R>(
  left: LockSource<L>,
  right: LockSource<R>,
  options: LockJoinOptions<L, R> = {}
): LockJoinEngine<L, R> {
  return new LockJoinEngine(left, right, options);
}
