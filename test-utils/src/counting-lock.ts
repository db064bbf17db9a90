/**
 * Lock wrapper that records every acquisition, for asserting how many
 * elements a query touched and how many guards it held at once.
 */

import { RwLock, type ReadGuard, type WritableLockValue, type WriteGuard } from '@quarry/locks';

/** Read guards outstanding across a set of locks */
export interface HeldTracker {
  held: number;
  maxHeld: number;
}

export class CountingLock<T> implements WritableLockValue<T> {
  readonly inner: RwLock<T>;
  reads = 0;
  writes = 0;

  constructor(
    value: T,
    label?: string,
    private readonly tracker?: HeldTracker
  ) {
    this.inner = new RwLock(value, { label });
  }

  read(): ReadGuard<T> {
    this.reads++;
    const guard = this.inner.read();
    const tracker = this.tracker;
    if (!tracker) return guard;

    tracker.held++;
    tracker.maxHeld = Math.max(tracker.maxHeld, tracker.held);
    let released = false;
    return {
      get value() {
        return guard.value;
      },
      release() {
        if (released) return;
        released = true;
        tracker.held--;
        guard.release();
      },
    };
  }

  write(): WriteGuard<T> {
    this.writes++;
    return this.inner.write();
  }
}

export function countingLocks<T>(values: Iterable<T>): CountingLock<T>[] {
  return Array.from(values, (value, i) => new CountingLock(value, `#${i}`));
}

/**
 * Counting locks sharing one tracker of outstanding read guards.
 */
export function trackedLocks<T>(values: Iterable<T>): { locks: CountingLock<T>[]; tracker: HeldTracker } {
  const tracker: HeldTracker = { held: 0, maxHeld: 0 };
  const locks = Array.from(values, (value, i) => new CountingLock(value, `#${i}`, tracker));
  return { locks, tracker };
}

export function totalReads<T>(locks: readonly CountingLock<T>[]): number {
  return locks.reduce((sum, lock) => sum + lock.reads, 0);
}
