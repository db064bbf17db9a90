/**
 * @quarry/locks - Lock collections and scoped access
 *
 * Query adapters accept any iterable of locks, a Queryable of locks, or a Map
 * whose values are locks (queried in insertion order).
 */

import { toIterable, type QuerySource } from '@quarry/core';
import { Mutex } from './mutex.js';
import { RwLock } from './rw-lock.js';
import type { LockKind, LockValue, WritableLockValue, WriteGuard } from './types.js';

export type LockSource<T> = QuerySource<LockValue<T>> | ReadonlyMap<unknown, LockValue<T>>;

export type Lock<T> = RwLock<T> | Mutex<T>;

function isLockMap<T>(source: LockSource<T>): source is ReadonlyMap<unknown, LockValue<T>> {
  return source instanceof Map;
}

/**
 * Resolve any lock source to an iterable of locks, without copying.
 */
export function lockIterable<T>(source: LockSource<T>): Iterable<LockValue<T>> {
  return isLockMap(source) ? source.values() : toIterable(source);
}

/**
 * Run `fn` with the value under a read guard; the guard is released even
 * when `fn` throws.
 */
export function withRead<T, R>(lock: LockValue<T>, fn: (value: T) => R): R {
  const guard = lock.read();
  try {
    return fn(guard.value);
  } finally {
    guard.release();
  }
}

/**
 * Run `fn` under a write guard. If `fn` throws, the lock is poisoned and the
 * error propagates.
 */
export function withWrite<T, R>(lock: WritableLockValue<T>, fn: (guard: WriteGuard<T>) => R): R {
  const guard = lock.write();
  let result: R;
  try {
    result = fn(guard);
  } catch (error) {
    guard.releasePoisoned();
    throw error;
  }
  guard.release();
  return result;
}

export function createLock<T>(value: T, kind: LockKind = 'rwlock', label?: string): Lock<T> {
  return kind === 'mutex' ? new Mutex(value, { label }) : new RwLock(value, { label });
}

/**
 * Wrap each value in its own lock.
 */
export function lockArray<T>(values: Iterable<T>, kind: LockKind = 'rwlock'): Lock<T>[] {
  return Array.from(values, value => createLock(value, kind));
}

/**
 * Wrap each entry's value in its own lock, keyed as the input. Lock labels
 * are the stringified keys.
 */
export function lockMap<K, T>(entries: Iterable<readonly [K, T]>, kind: LockKind = 'rwlock'): Map<K, Lock<T>> {
  const locks = new Map<K, Lock<T>>();
  for (const [key, value] of entries) {
    locks.set(key, createLock(value, kind, String(key)));
  }
  return locks;
}

/**
 * Queryable view over a Map's lock values.
 */
export function lockValues<K, T>(map: ReadonlyMap<K, LockValue<T>>): Iterable<LockValue<T>> {
  return {
    [Symbol.iterator]: () => map.values(),
  };
}
