import { describe, it, expect, vi } from 'vitest';
import { createTestLogger, ErrorCode, join, QueryError } from '@quarry/core';
import {
  countingLocks,
  generateCustomers,
  generateOrders,
  sampleCustomers,
  sampleOrders,
  totalReads,
  type Customer,
  type Order,
} from '@quarry/test-utils';
import { lockArray, lockMap } from '../collections.js';
import { PoisonedLockError } from '../errors.js';
import { lockJoin } from '../lock-join.js';

const orderKey = (o: Order) => o.customerId;
const customerKey = (c: Customer) => c.id;

function poisoned<T>(values: T[], index: number) {
  const locks = lockArray(values);
  expect(() =>
    locks[index].update(() => {
      throw new Error('writer failed');
    })
  ).toThrow('writer failed');
  return locks;
}

describe('LockJoinEngine', () => {
  it('should read each lock exactly once per join', () => {
    const orders = countingLocks(sampleOrders());
    const customers = countingLocks(sampleCustomers());

    const rows = lockJoin(orders, customers).innerJoin(orderKey, customerKey, (o, c) => [o.id, c.name]);

    expect(rows).toEqual([
      [100, 'Ada'],
      [101, 'Brook'],
      [102, 'Ada'],
    ]);
    expect(totalReads(orders)).toBe(5);
    expect(totalReads(customers)).toBe(3);
  });

  it('should hand owned copies to the combiner', () => {
    const customers = lockArray(sampleCustomers());
    const rows = lockJoin(lockArray(sampleOrders()), customers).innerJoin(orderKey, customerKey, (_, c) => c);

    rows[0].name = 'changed';
    expect(customers[0].snapshot().name).toBe('Ada');
  });

  it('should use the configured cloners', () => {
    const leftCloner = vi.fn((o: Order) => ({ ...o }));
    const rightCloner = vi.fn((c: Customer) => ({ ...c }));
    lockJoin(lockArray(sampleOrders()), lockArray(sampleCustomers()), { leftCloner, rightCloner }).crossJoin(
      () => 1
    );

    expect(leftCloner).toHaveBeenCalledTimes(5);
    expect(rightCloner).toHaveBeenCalledTimes(3);
  });

  describe('join kinds', () => {
    const engine = lockJoin(lockArray(sampleOrders()), lockMap(sampleCustomers().map(c => [c.id, c] as const)));

    it('should keep unmatched left rows in a left join', () => {
      expect(engine.leftJoin(orderKey, customerKey, (o, c) => [o.id, c?.name])).toEqual([
        [100, 'Ada'],
        [101, 'Brook'],
        [102, 'Ada'],
        [103, undefined],
        [104, undefined],
      ]);
    });

    it('should follow right-side order in a right join', () => {
      expect(engine.rightJoin(orderKey, customerKey, (o, c) => [o?.id, c.name])).toEqual([
        [100, 'Ada'],
        [102, 'Ada'],
        [101, 'Brook'],
        [undefined, 'Cato'],
      ]);
    });

    it('should filter pairs in innerJoinWhere', () => {
      expect(engine.innerJoinWhere(orderKey, customerKey, o => o.total > 50, o => o.id)).toEqual([100, 102]);
    });

    it('should produce the full product in a cross join', () => {
      expect(engine.crossJoin((o, c) => `${o.id}:${c.id}`)).toHaveLength(15);
    });
  });

  it('should enforce maxOutputRows', () => {
    const combine = vi.fn(() => 1);
    const engine = lockJoin(lockArray(sampleOrders()), lockArray(sampleCustomers()), { maxOutputRows: 14 });

    expect(() => engine.crossJoin(combine)).toThrow(QueryError);
    expect(combine).toHaveBeenCalledTimes(14);
  });

  describe('failure modes', () => {
    it('should abort on a poisoned element by default', () => {
      const customers = poisoned(sampleCustomers(), 0);
      expect(() => lockJoin(lockArray(sampleOrders()), customers).innerJoin(orderKey, customerKey, o => o.id)).toThrow(
        PoisonedLockError
      );
    });

    it('should leave out a poisoned element in skip mode', () => {
      const logger = createTestLogger();
      const customers = poisoned(sampleCustomers(), 0);

      const rows = lockJoin(lockArray(sampleOrders()), customers, { failureMode: 'skip', logger }).innerJoin(
        orderKey,
        customerKey,
        (o, c) => [o.id, c.name]
      );

      expect(rows).toEqual([[101, 'Brook']]);
      expect(logger.getLogsByLevel('warn')[0].context).toEqual({
        operation: 'innerJoin',
        index: 0,
        errorCode: ErrorCode.LOCK_POISONED,
        reason: 'rwlock is poisoned',
      });
    });
  });

  it('should log the snapshot passes and the join pass', () => {
    const logger = createTestLogger();
    lockJoin(lockArray(sampleOrders()), lockArray(sampleCustomers()), { logger }).innerJoin(
      orderKey,
      customerKey,
      o => o.id
    );

    expect(
      logger.getLogsByLevel('debug').map(entry => [entry.context?.component, entry.context?.operation, entry.context?.rowsProcessed])
    ).toEqual([
      ['LockJoinEngine', 'innerJoin:snapshot', 5],
      ['LockJoinEngine', 'innerJoin:snapshot', 3],
      ['JoinEngine', 'innerJoin', 8],
    ]);
  });
});

describe('LockJoinEngine over generated data', () => {
  it('should agree with a join over the plain values', () => {
    const orders = generateOrders(60, 8, 11);
    const customers = generateCustomers(8, 11);
    const pair = (o: Order, c: Customer) => `${o.id}:${c.id}`;

    expect(lockJoin(lockArray(orders), lockArray(customers)).innerJoin(orderKey, customerKey, pair)).toEqual(
      join(orders, customers).innerJoin(orderKey, customerKey, pair)
    );
  });
});
