/**
 * @quarry/locks
 *
 * Query adapters for collections whose elements are each behind their own
 * read/write lock. Values are evaluated in place under one short-lived guard
 * at a time; nothing is bulk-copied before querying.
 */

export type {
  LockValue,
  WritableLockValue,
  ReadGuard,
  WriteGuard,
  LockKind,
  LockOptions,
} from './types.js';
export {
  LockAccessError,
  LockUnavailableError,
  PoisonedLockError,
  GuardReleasedError,
} from './errors.js';
export { BaseLock } from './base-lock.js';
export { RwLock } from './rw-lock.js';
export { Mutex } from './mutex.js';
export {
  lockIterable,
  withRead,
  withWrite,
  createLock,
  lockArray,
  lockMap,
  lockValues,
  type Lock,
  type LockSource,
} from './collections.js';
export { LockAccess, type LockFailureMode, type LockQueryOptions } from './access.js';
export { LockQuery, lockQuery } from './lock-query.js';
export { LockLazyQuery, lockLazy, type LockStage } from './lock-lazy.js';
export { LockJoinEngine, lockJoin, type LockJoinOptions } from './lock-join.js';
export { LockView, MaterializedLockView } from './lock-view.js';
