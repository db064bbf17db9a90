/**
 * Property-based tests for the query engines.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { join } from '../join.js';
import { lazy } from '../lazy.js';
import { query } from '../query.js';

interface Row {
  k: number;
  i: number;
}

const rowsArb = fc
  .array(fc.integer({ min: 0, max: 5 }), { maxLength: 40 })
  .map(keys => keys.map((k, i): Row => ({ k, i })));

describe('query engine properties', () => {
  it('eager and lazy counts agree', () => {
    fc.assert(
      fc.property(rowsArb, fc.integer({ min: 0, max: 5 }), (rows, threshold) => {
        const eager = query(rows).filter(r => r.k, k => k >= threshold).count();
        const deferred = lazy(rows).filter(r => r.k, k => k >= threshold).count();
        expect(deferred).toBe(eager);
      })
    );
  });

  it('take yields min(n, matches)', () => {
    fc.assert(
      fc.property(rowsArb, fc.nat({ max: 50 }), (rows, n) => {
        const matches = query(rows).filter(r => r.k, k => k % 2 === 0).count();
        const taken = lazy(rows).filter(r => r.k, k => k % 2 === 0).take(n).collect();
        expect(taken.length).toBe(Math.min(n, matches));
      })
    );
  });

  it('first visits exactly up to the first match', () => {
    fc.assert(
      fc.property(rowsArb, rows => {
        let visited = 0;
        lazy(rows)
          .where(r => {
            visited++;
            return r.k === 5;
          })
          .first();
        const firstMatch = rows.findIndex(r => r.k === 5);
        expect(visited).toBe(firstMatch === -1 ? rows.length : firstMatch + 1);
      })
    );
  });

  it('orderBy is stable and orderByDesc keeps ties stable', () => {
    fc.assert(
      fc.property(rowsArb, rows => {
        const asc = query(rows).orderBy(r => r.k);
        const desc = query(rows).orderByDesc(r => r.k);
        for (let j = 1; j < asc.length; j++) {
          const [a, b] = [asc[j - 1], asc[j]];
          expect(a.k < b.k || (a.k === b.k && a.i < b.i)).toBe(true);
          const [c, d] = [desc[j - 1], desc[j]];
          expect(c.k > d.k || (c.k === d.k && c.i < d.i)).toBe(true);
        }
      })
    );
  });

  it('groupBy partitions the matches', () => {
    fc.assert(
      fc.property(rowsArb, rows => {
        const groups = query(rows).groupBy(r => r.k);
        const sizes = [...groups.values()].reduce((sum, group) => sum + group.length, 0);
        expect(sizes).toBe(rows.length);
        for (const [key, group] of groups) {
          expect(group.every(r => r.k === key)).toBe(true);
        }
      })
    );
  });

  it('join cardinalities follow key multiplicities', () => {
    fc.assert(
      fc.property(rowsArb, rowsArb, (left, right) => {
        const matches = (k: number) => right.filter(r => r.k === k).length;
        const engine = join(left, right);

        const inner = engine.innerJoin(l => l.k, r => r.k, (l, r) => [l.i, r.i]);
        expect(inner.length).toBe(left.reduce((sum, l) => sum + matches(l.k), 0));

        const outer = engine.leftJoin(l => l.k, r => r.k, l => l.i);
        expect(outer.length).toBe(left.reduce((sum, l) => sum + Math.max(1, matches(l.k)), 0));

        expect(engine.crossJoin(() => 0).length).toBe(left.length * right.length);
      })
    );
  });
});
