/**
 * @quarry/locks - Shared lock state
 *
 * Holds the value, the poison flag and the guard plumbing. Subclasses decide
 * which acquisitions conflict.
 */

import { defaultCloner, type Cloner } from '@quarry/core';
import { PoisonedLockError } from './errors.js';
import { LockReadGuard, LockWriteGuard, type GuardTarget } from './guard.js';
import type { LockKind, LockOptions, ReadGuard, WritableLockValue, WriteGuard } from './types.js';

export abstract class BaseLock<T> implements WritableLockValue<T> {
  readonly label: string | undefined;
  private current: T;
  private poisoned = false;
  private readonly target: GuardTarget<T>;

  protected constructor(readonly kind: LockKind, value: T, options: LockOptions = {}) {
    this.current = value;
    this.label = options.label;
    this.target = {
      kind,
      label: options.label,
      load: () => this.current,
      store: next => {
        this.current = next;
      },
    };
  }

  read(): ReadGuard<T> {
    this.assertNotPoisoned();
    this.acquireShared();
    return new LockReadGuard(this.target, () => this.releaseShared());
  }

  write(): WriteGuard<T> {
    this.assertNotPoisoned();
    this.acquireExclusive();
    return new LockWriteGuard(
      this.target,
      () => this.releaseExclusive(),
      () => {
        this.poisoned = true;
      }
    );
  }

  /**
   * Replace the value with `transform(current)` under the write lock. If the
   * transform throws, the lock is poisoned and the error propagates.
   */
  update(transform: (current: T) => T): T {
    const guard = this.write();
    let next: T;
    try {
      next = transform(guard.value);
    } catch (error) {
      guard.releasePoisoned();
      throw error;
    }
    guard.set(next);
    guard.release();
    return next;
  }

  /**
   * Store `value` and return the previous one.
   */
  replace(value: T): T {
    const guard = this.write();
    try {
      const previous = guard.value;
      guard.set(value);
      return previous;
    } finally {
      guard.release();
    }
  }

  /**
   * Owned copy of the current value.
   */
  snapshot(cloner: Cloner<T> = defaultCloner): T {
    const guard = this.read();
    try {
      return cloner(guard.value);
    } finally {
      guard.release();
    }
  }

  isPoisoned(): boolean {
    return this.poisoned;
  }

  clearPoison(): void {
    this.poisoned = false;
  }

  protected abstract acquireShared(): void;
  protected abstract releaseShared(): void;
  protected abstract acquireExclusive(): void;
  protected abstract releaseExclusive(): void;

  private assertNotPoisoned(): void {
    if (this.poisoned) {
      throw new PoisonedLockError(this.kind, this.label);
    }
  }
}
