/**
 * @quarry/locks - Saved and materialized lock queries
 *
 * A LockView stores how to narrow a LockQuery and applies it to any base
 * query, like a SQL view. A MaterializedLockView keeps the owned result of a
 * query and recomputes it only on `refresh()`.
 *
 * @example
 * ```typescript
 * const lowStock = new LockView<Product>(q => q.filter(f('stock'), s => s < 5));
 * lowStock.apply(lockQuery(inventory)).count();
 *
 * const cached = new MaterializedLockView(() => lowStock.apply(lockQuery(inventory)).all());
 * cached.count();   // no locks acquired
 * cached.refresh(); // re-reads the inventory
 * ```
 */

import type { LockQuery } from './lock-query.js';

export class LockView<T> {
  constructor(private readonly build: (base: LockQuery<T>) => LockQuery<T>) {}

  apply(base: LockQuery<T>): LockQuery<T> {
    return this.build(base);
  }
}

export class MaterializedLockView<T> {
  private data: T[];
  private refreshedAt: number;

  /**
   * Runs `compute` immediately.
   */
  constructor(
    private readonly compute: () => T[],
    private readonly now: () => number = Date.now
  ) {
    this.data = compute();
    this.refreshedAt = now();
  }

  get(): readonly T[] {
    return this.data;
  }

  count(): number {
    return this.data.length;
  }

  refresh(): void {
    this.data = this.compute();
    this.refreshedAt = this.now();
  }

  /** Epoch milliseconds of the last computation */
  get lastRefreshed(): number {
    return this.refreshedAt;
  }
}
