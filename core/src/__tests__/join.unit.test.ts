import { describe, it, expect, vi } from 'vitest';
import { sampleCustomers, sampleOrders, type Customer, type Order } from '@quarry/test-utils';
import { ErrorCode, QueryError } from '../errors.js';
import { field } from '../field.js';
import { buildIndex, join, JoinEngine } from '../join.js';
import { createTestLogger } from '../logging.js';

const o = field<Order>();
const c = field<Customer>();

// =============================================================================
// Inner joins
// =============================================================================

describe('JoinEngine', () => {
  describe('innerJoin', () => {
    it('should emit one row per matching pair in probe order', () => {
      const rows = join(sampleOrders(), sampleCustomers()).innerJoin(
        o('customerId'),
        c('id'),
        (order, customer) => [order.id, customer.name]
      );
      expect(rows).toEqual([
        [100, 'Ada'],
        [101, 'Brook'],
        [102, 'Ada'],
      ]);
    });

    it('should join a small category dataset', () => {
      const left = [
        { cat: 'A', p: 10 },
        { cat: 'B', p: 5 },
        { cat: 'A', p: 20 },
      ];
      const right = [{ cat: 'A', note: 'x' }];
      const rows = join(left, right).innerJoin(
        l => l.cat,
        r => r.cat,
        (l, r) => ({ p: l.p, note: r.note })
      );
      expect(rows).toEqual([
        { p: 10, note: 'x' },
        { p: 20, note: 'x' },
      ]);
    });

    it('should keep build-side order for several matches', () => {
      const rows = join([{ k: 1 }], [
        { k: 1, n: 'a' },
        { k: 2, n: 'b' },
        { k: 1, n: 'c' },
      ]).innerJoin(
        l => l.k,
        r => r.k,
        (_, r) => r.n
      );
      expect(rows).toEqual(['a', 'c']);
    });

    it('should not coerce keys', () => {
      const left: { k: number | string }[] = [{ k: 1 }];
      const right: { k: number | string }[] = [{ k: '1' }];
      expect(join(left, right).innerJoin(l => l.k, r => r.k, () => true)).toEqual([]);
    });

    it('should filter pairs with innerJoinWhere', () => {
      const rows = join(sampleOrders(), sampleCustomers()).innerJoinWhere(
        o('customerId'),
        c('id'),
        order => order.total > 50,
        order => order.id
      );
      expect(rows).toEqual([100, 102]);
    });
  });

  // ===========================================================================
  // Outer and cross joins
  // ===========================================================================

  describe('leftJoin', () => {
    it('should emit every left row, undefined when unmatched', () => {
      const rows = join(sampleOrders(), sampleCustomers()).leftJoin(
        o('customerId'),
        c('id'),
        (order, customer) => [order.id, customer?.name]
      );
      expect(rows).toEqual([
        [100, 'Ada'],
        [101, 'Brook'],
        [102, 'Ada'],
        [103, undefined],
        [104, undefined],
      ]);
    });
  });

  describe('rightJoin', () => {
    it('should follow right-side order', () => {
      const rows = join(sampleOrders(), sampleCustomers()).rightJoin(
        o('customerId'),
        c('id'),
        (order, customer) => [order?.id, customer.name]
      );
      expect(rows).toEqual([
        [100, 'Ada'],
        [102, 'Ada'],
        [101, 'Brook'],
        [undefined, 'Cato'],
      ]);
    });
  });

  describe('crossJoin', () => {
    it('should produce |L| x |R| rows, left-major', () => {
      const rows = join(sampleOrders(), sampleCustomers()).crossJoin((order, customer) => [
        order.id,
        customer.id,
      ]);
      expect(rows).toHaveLength(15);
      expect(rows.slice(0, 4)).toEqual([
        [100, 10],
        [100, 11],
        [100, 12],
        [101, 10],
      ]);
    });

    it('should be empty when either side is empty', () => {
      expect(join<number, number>([], [1, 2]).crossJoin((a, b) => a + b)).toEqual([]);
    });
  });

  // ===========================================================================
  // Row limit
  // ===========================================================================

  describe('maxOutputRows', () => {
    it('should abort before the combiner runs for the excess row', () => {
      const combine = vi.fn((order: Order, customer: Customer) => order.id + customer.id);
      const engine = join(sampleOrders(), sampleCustomers(), { maxOutputRows: 14 });

      try {
        engine.crossJoin(combine);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(QueryError);
        expect(error instanceof QueryError && error.code).toBe(ErrorCode.JOIN_ROW_LIMIT_EXCEEDED);
        expect(error instanceof Error && error.message).toBe('crossJoin produced more than 14 rows');
      }
      expect(combine).toHaveBeenCalledTimes(14);
    });

    it('should allow exactly the limit', () => {
      const rows = join(sampleOrders(), sampleCustomers(), { maxOutputRows: 3 }).innerJoin(
        o('customerId'),
        c('id'),
        order => order.id
      );
      expect(rows).toEqual([100, 101, 102]);
    });

    it('should treat 0 as unlimited', () => {
      expect(new JoinEngine(sampleOrders(), sampleCustomers(), { maxOutputRows: 0 }).crossJoin(() => 1)).toHaveLength(15);
    });
  });

  it('should log rows processed from both sides', () => {
    const logger = createTestLogger();
    join(sampleOrders(), sampleCustomers(), { logger }).leftJoin(o('customerId'), c('id'), order => order.id);

    const [entry] = logger.getLogsByLevel('debug');
    expect(entry.context).toMatchObject({ component: 'JoinEngine', operation: 'leftJoin', rowsProcessed: 8 });
  });
});

describe('buildIndex', () => {
  it('should group records by key and skip absent keys', () => {
    const index = buildIndex(sampleOrders(), o('customerId'));
    expect([...index.keys()]).toEqual([10, 11, 99]);
    expect(index.get(10)?.map(order => order.id)).toEqual([100, 102]);
  });
});

describe('Date keys', () => {
  const shipments = [
    { id: 1, day: new Date('2024-05-01T00:00:00Z') },
    { id: 2, day: new Date('2024-05-02T00:00:00Z') },
    { id: 3, day: new Date('2024-05-01T00:00:00Z') },
  ];
  const holidays = [{ name: 'May Day', day: new Date('2024-05-01T00:00:00Z') }];

  it('should match dates by instant, not by object', () => {
    const rows = join(shipments, holidays).innerJoin(
      s => s.day,
      h => h.day,
      (s, h) => [s.id, h.name]
    );
    expect(rows).toEqual([
      [1, 'May Day'],
      [3, 'May Day'],
    ]);
  });

  it('should index equal dates under the first key seen', () => {
    const index = buildIndex(shipments, s => s.day);
    expect(index.size).toBe(2);
    expect(index.keys()[0]).toBe(shipments[0].day);
    expect(index.get(new Date('2024-05-01T00:00:00Z'))?.map(s => s.id)).toEqual([1, 3]);
  });

  it('should keep unmatched dates in a right join', () => {
    const rows = join(holidays, shipments).rightJoin(
      h => h.day,
      s => s.day,
      (h, s) => [h?.name, s.id]
    );
    expect(rows).toEqual([
      ['May Day', 1],
      [undefined, 2],
      ['May Day', 3],
    ]);
  });
});
