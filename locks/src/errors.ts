/**
 * @quarry/locks - Lock errors
 *
 * Error hierarchy:
 * - LockAccessError (LOCK_ERROR): base for every failure to reach a locked value
 *   - LockUnavailableError (LOCK_UNAVAILABLE): the lock is held in a conflicting mode
 *   - PoisonedLockError (LOCK_POISONED): a writer failed while holding the lock
 *   - GuardReleasedError (GUARD_RELEASED): a guard was used after release
 */

import { captureStackTrace, ErrorCode, QuarryError } from '@quarry/core';

export class LockAccessError extends QuarryError {
  constructor(
    message: string,
    code: string = ErrorCode.LOCK_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'LockAccessError';
    captureStackTrace(this, LockAccessError);
  }
}

/**
 * Thrown instead of blocking when a lock is held in a conflicting mode.
 *
 * @example
 * ```typescript
 * const writer = lock.write();
 * lock.read(); // throws LockUnavailableError: rwlock is write-locked
 * ```
 */
export class LockUnavailableError extends LockAccessError {
  constructor(message: string, details?: Record<string, unknown>, suggestion?: string) {
    super(message, ErrorCode.LOCK_UNAVAILABLE, details, suggestion);
    this.name = 'LockUnavailableError';
    captureStackTrace(this, LockUnavailableError);
  }

  static forRead(kind: string, label: string | undefined): LockUnavailableError {
    return new LockUnavailableError(
      `${describe(kind, label)} is write-locked`,
      { kind, label, requested: 'read' },
      'Release the write guard before querying'
    );
  }

  static forWrite(kind: string, label: string | undefined, readers: number): LockUnavailableError {
    return new LockUnavailableError(
      `${describe(kind, label)} is ${readers > 0 ? `read-locked by ${readers} guard(s)` : 'locked by another guard'}`,
      { kind, label, requested: 'write', readers },
      'Release outstanding guards before writing'
    );
  }

  /**
   * An exclusive lock is already held; `requested` is the guard the caller
   * asked for.
   */
  static forHeld(kind: string, label: string | undefined, requested: 'read' | 'write'): LockUnavailableError {
    return new LockUnavailableError(
      `${describe(kind, label)} is locked by another guard`,
      { kind, label, requested },
      'Release the outstanding guard first'
    );
  }
}

export class PoisonedLockError extends LockAccessError {
  constructor(kind: string, label: string | undefined) {
    super(
      `${describe(kind, label)} is poisoned`,
      ErrorCode.LOCK_POISONED,
      { kind, label },
      'A writer failed while holding the lock; inspect the value and call clearPoison()'
    );
    this.name = 'PoisonedLockError';
    captureStackTrace(this, PoisonedLockError);
  }
}

export class GuardReleasedError extends LockAccessError {
  constructor(kind: string, label: string | undefined) {
    super(`Guard for ${describe(kind, label)} was already released`, ErrorCode.GUARD_RELEASED, { kind, label });
    this.name = 'GuardReleasedError';
    captureStackTrace(this, GuardReleasedError);
  }
}

function describe(kind: string, label: string | undefined): string {
  return label === undefined ? kind : `${kind} '${label}'`;
}
