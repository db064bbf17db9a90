import { describe, it, expect, vi } from 'vitest';
import { createTestLogger, ErrorCode, field, isErr, isOk, partition } from '@quarry/core';
import { countingLocks, sampleProducts, totalReads, trackedLocks, type Product } from '@quarry/test-utils';
import { lockArray, lockMap, type Lock } from '../collections.js';
import { LockUnavailableError, PoisonedLockError, type LockAccessError } from '../errors.js';
import { lockQuery, LockQuery } from '../lock-query.js';

const f = field<Product>();
const ids = (records: { id: number }[]) => records.map(r => r.id);

function poison<T>(lock: Lock<T>): void {
  expect(() =>
    lock.update(() => {
      throw new Error('writer failed');
    })
  ).toThrow('writer failed');
}

// =============================================================================
// Zero-copy evaluation
// =============================================================================

describe('LockQuery', () => {
  it('should read each lock once and copy nothing for count', () => {
    const locks = countingLocks(sampleProducts());
    const cloner = vi.fn((p: Product) => ({ ...p }));

    const count = lockQuery(locks, { cloner }).filter(f('category'), c => c === 'tools').count();

    expect(count).toBe(4);
    expect(totalReads(locks)).toBe(6);
    expect(cloner).not.toHaveBeenCalled();
  });

  it('should aggregate under the guards without copying', () => {
    const cloner = vi.fn((p: Product) => ({ ...p }));
    const tools = lockQuery(lockArray(sampleProducts()), { cloner }).filter(f('category'), c => c === 'tools');

    expect(tools.sum(f('price'))).toBeCloseTo(238.24);
    expect(tools.avg(f('stock'))).toBe(3.75);
    expect(tools.min(f('name'))).toBe('Anvil');
    expect(tools.max(f('name'))).toBe('File');
    expect(tools.minFloat(f('price'))).toBe(9.75);
    expect(tools.maxFloat(f('price'))).toBe(120);
    expect(tools.select(f('discount'))).toEqual([1.5]);
    expect(cloner).not.toHaveBeenCalled();
  });

  it('should stop acquiring once exists and first have an answer', () => {
    const locks = countingLocks(sampleProducts());
    expect(lockQuery(locks).filter(f('stock'), s => s === 0).exists()).toBe(true);
    expect(totalReads(locks)).toBe(3);

    const again = countingLocks(sampleProducts());
    expect(lockQuery(again).filter(f('stock'), s => s === 0).first()?.name).toBe('Chisel');
    expect(totalReads(again)).toBe(3);
    expect(again[3].reads).toBe(0);
  });

  it('should stop acquiring once limit is reached', () => {
    const locks = countingLocks(sampleProducts());
    expect(ids(lockQuery(locks).filter(f('category'), c => c === 'tools').limit(2))).toEqual([1, 3]);
    expect(totalReads(locks)).toBe(3);

    const none = countingLocks(sampleProducts());
    expect(lockQuery(none).limit(0)).toEqual([]);
    expect(totalReads(none)).toBe(0);
  });

  // ===========================================================================
  // Owned results
  // ===========================================================================

  it('should clone only matching elements for owned results', () => {
    const cloner = vi.fn((p: Product) => ({ ...p }));
    const locks = lockArray(sampleProducts());
    const tools = lockQuery(locks, { cloner }).filter(f('category'), c => c === 'tools');

    const all = tools.all();
    expect(ids(all)).toEqual([1, 3, 4, 6]);
    expect(cloner).toHaveBeenCalledTimes(4);

    all[0].stock = 1000;
    expect(locks[0].snapshot().stock).toBe(3);
  });

  it('should sort owned copies', () => {
    const rows = lockArray([
      { cat: 'A', p: 10 },
      { cat: 'B', p: 5 },
      { cat: 'A', p: 20 },
    ]);
    expect(lockQuery(rows).orderByFloat(r => r.p).map(r => r.p)).toEqual([5, 10, 20]);
    expect(lockQuery(rows).orderByFloatDesc(r => r.p).map(r => r.p)).toEqual([20, 10, 5]);
    expect(lockQuery(rows).filter(r => r.cat, c => c === 'A').sum(r => r.p)).toBe(30);
    expect(lockQuery(rows).filter(r => r.cat, c => c === 'B').avg(r => r.p)).toBe(5);
  });

  it('should order and group by key', () => {
    const locks = lockArray(sampleProducts());
    const tools = lockQuery(locks).filter(f('category'), c => c === 'tools');
    expect(ids(tools.orderBy(f('stock')))).toEqual([3, 6, 1, 4]);
    expect(ids(tools.orderByDesc(f('stock')))).toEqual([4, 1, 3, 6]);

    const groups = lockQuery(locks).groupBy(f('category'));
    expect([...groups.keys()]).toEqual(['tools', 'hardware', 'adhesives']);
    expect(ids(groups.get('hardware') ?? [])).toEqual([2]);
  });

  it('should group equal dates together', () => {
    const locks = lockArray([
      { id: 1, day: new Date('2024-05-01T00:00:00Z') },
      { id: 2, day: new Date('2024-05-01T00:00:00Z') },
    ]);
    const groups = lockQuery(locks).groupBy(r => r.day);
    expect(groups.size).toBe(1);
    expect([...groups.values()].map(ids)).toEqual([[1, 2]]);
  });

  it('should query a Map of locks in insertion order', () => {
    const locks = lockMap(sampleProducts().map(p => [p.name, p] as const));
    expect(lockQuery(locks).where(p => p.price < 10).all().map(p => p.name)).toEqual(['Bolt', 'Epoxy', 'File']);
  });

  it('should be reusable and return new queries from builders', () => {
    const base = lockQuery(lockArray(sampleProducts()));
    const narrowed = base.where(p => p.stock > 100);
    expect(narrowed).toBeInstanceOf(LockQuery);
    expect(base.count()).toBe(6);
    expect(narrowed.count()).toBe(1);
  });

  it('should hold at most one guard at a time', () => {
    const { locks, tracker } = trackedLocks(sampleProducts());
    const tools = lockQuery(locks).filter(f('category'), c => c === 'tools');
    expect(tools.count()).toBe(4);
    expect(ids(tools.all())).toEqual([1, 3, 4, 6]);
    expect(ids(lockQuery(locks).orderByDesc(f('id')))).toEqual([6, 5, 4, 3, 2, 1]);
    expect(tracker.maxHeld).toBe(1);
    expect(tracker.held).toBe(0);
  });

  // ===========================================================================
  // Failure modes
  // ===========================================================================

  describe('failure modes', () => {
    it('should abort on a poisoned element by default and release earlier guards', () => {
      const locks = lockArray(sampleProducts());
      poison(locks[2]);

      expect(() => lockQuery(locks).count()).toThrow(PoisonedLockError);
      expect(() => locks[0].write().release()).not.toThrow();
      expect(() => locks[1].write().release()).not.toThrow();
    });

    it('should abort on a write-locked element', () => {
      const locks = lockArray(sampleProducts());
      const writer = locks[1].write();
      expect(() => lockQuery(locks).all()).toThrow(LockUnavailableError);
      writer.release();
      expect(lockQuery(locks).count()).toBe(6);
    });

    it('should skip unreadable elements and log a warning in skip mode', () => {
      const logger = createTestLogger();
      const locks = lockArray(sampleProducts());
      poison(locks[2]);
      const writer = locks[4].write();

      const names = lockQuery(locks, { failureMode: 'skip', logger }).all().map(p => p.name);
      writer.release();

      expect(names).toEqual(['Anvil', 'Bolt', 'Drill', 'File']);
      const warnings = logger.getLogsByLevel('warn');
      expect(warnings.map(w => w.message)).toEqual(['lock element skipped', 'lock element skipped']);
      expect(warnings[0].context).toEqual({
        operation: 'all',
        index: 2,
        errorCode: ErrorCode.LOCK_POISONED,
        reason: 'rwlock is poisoned',
      });
      expect(warnings[1].context).toMatchObject({ index: 4, errorCode: ErrorCode.LOCK_UNAVAILABLE });
    });

    it('should propagate predicate errors and release the guard', () => {
      const locks = lockArray(sampleProducts());
      const failure = new Error('predicate failed');
      const q = lockQuery(locks, { failureMode: 'skip' }).where(p => {
        if (p.id === 2) throw failure;
        return true;
      });

      expect(() => q.count()).toThrow(failure);
      expect(() => locks[1].write().release()).not.toThrow();
    });

    it('should report every element outcome with allSettled', () => {
      const locks = lockArray(sampleProducts());
      poison(locks[0]);
      poison(locks[5]);

      const settled = lockQuery(locks).filter(f('category'), c => c === 'tools').allSettled();

      expect(settled.map(r => (isOk(r) ? r.value.id : 'err'))).toEqual(['err', 3, 4, 'err']);
      const { values, errors } = partition<Product, LockAccessError>(settled);
      expect(ids(values)).toEqual([3, 4]);
      expect(errors.every(e => e instanceof PoisonedLockError)).toBe(true);
      expect(settled.filter(isErr)).toHaveLength(2);
    });
  });

  it('should log each pass', () => {
    const logger = createTestLogger();
    lockQuery(lockArray(sampleProducts()), { logger }).filter(f('stock'), s => s === 0).exists();
    expect(logger.getLogsByLevel('debug')[0].context).toMatchObject({
      component: 'LockQuery',
      operation: 'exists',
      rowsProcessed: 3,
    });
  });
});
