/**
 * @quarry/locks - Lock capability
 *
 * A LockValue is any container that can lend its value through a guard.
 * Acquisition is synchronous: it either returns a guard or throws a
 * LockAccessError. Query adapters only ever hold one guard at a time and
 * release it before touching the next element.
 */

export interface ReadGuard<T> {
  /** The guarded value; throws GuardReleasedError after release */
  readonly value: T;
  /** Idempotent */
  release(): void;
}

export interface WriteGuard<T> extends ReadGuard<T> {
  set(value: T): void;
  /** Release and mark the lock poisoned. Used when a writer fails mid-update. */
  releasePoisoned(): void;
}

export interface LockValue<T> {
  read(): ReadGuard<T>;
}

export interface WritableLockValue<T> extends LockValue<T> {
  write(): WriteGuard<T>;
}

export type LockKind = 'rwlock' | 'mutex';

export interface LockOptions {
  /** Shown in error messages */
  label?: string;
}
