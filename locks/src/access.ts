/**
 * @quarry/locks - Per-element lock access
 *
 * Every adapter visits elements the same way: acquire one read guard,
 * evaluate under it, release, move on. Guards never nest. What happens when
 * acquisition fails depends on the failure mode:
 * - 'abort' (default): the LockAccessError propagates and ends the pass
 * - 'skip': the element is left out and a warning is logged
 *
 * Errors thrown by caller code under a guard always propagate, after the
 * guard is released.
 */

import type { Cloner, EngineOptions, Logger, PassStats } from '@quarry/core';
import { LockAccessError } from './errors.js';
import type { LockValue, ReadGuard } from './types.js';

export type LockFailureMode = 'abort' | 'skip';

export interface LockQueryOptions<T> extends EngineOptions {
  /** Duplicates values for owned results (default: structuredClone) */
  cloner?: Cloner<T>;
  /** Default: 'abort' */
  failureMode?: LockFailureMode;
}

export class LockAccess {
  constructor(
    private readonly failureMode: LockFailureMode,
    private readonly logger: Logger
  ) {}

  /**
   * Acquire a read guard, or undefined when the element is skipped.
   */
  acquire<T>(lock: LockValue<T>, index: number, operation: string): ReadGuard<T> | undefined {
    try {
      return lock.read();
    } catch (error) {
      if (this.failureMode === 'skip' && error instanceof LockAccessError) {
        this.logger.warn('lock element skipped', {
          operation,
          index,
          errorCode: error.code,
          reason: error.message,
        });
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Visit each lock's value under its own guard, in source order. `visit`
   * returns false to stop; no further lock is acquired after that.
   */
  scan<T>(
    locks: Iterable<LockValue<T>>,
    operation: string,
    stats: PassStats,
    visit: (value: T) => boolean
  ): void {
    let index = 0;
    for (const lock of locks) {
      const position = index++;
      stats.rowsProcessed++;
      const guard = this.acquire(lock, position, operation);
      if (guard === undefined) continue;

      let keepGoing: boolean;
      try {
        keepGoing = visit(guard.value);
      } finally {
        guard.release();
      }
      if (!keepGoing) return;
    }
  }
}
