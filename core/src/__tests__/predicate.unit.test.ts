import { describe, it, expect, vi } from 'vitest';
import { PredicateChain } from '../predicate.js';

interface Row {
  a: number;
  b: string;
}

describe('PredicateChain', () => {
  it('should match everything when empty', () => {
    const chain = PredicateChain.empty<Row>();
    expect(chain.isEmpty()).toBe(true);
    expect(chain.matches({ a: 1, b: 'x' })).toBe(true);
  });

  it('should be immutable', () => {
    const base = PredicateChain.empty<Row>();
    const narrowed = base.and(r => r.a, a => a > 1);
    expect(base.length).toBe(0);
    expect(narrowed.length).toBe(1);
  });

  it('should AND predicates in registration order and short-circuit', () => {
    const first = vi.fn((a: number) => a > 1);
    const second = vi.fn((r: Row) => r.b === 'x');
    const chain = PredicateChain.empty<Row>().and(r => r.a, first).andRecord(second);

    expect(chain.matches({ a: 0, b: 'x' })).toBe(false);
    expect(second).not.toHaveBeenCalled();

    expect(chain.matches({ a: 2, b: 'x' })).toBe(true);
    expect(chain.matches({ a: 2, b: 'y' })).toBe(false);
    expect(first).toHaveBeenCalledTimes(3);
    expect(second).toHaveBeenCalledTimes(2);
  });

  it('should concatenate chains', () => {
    const left = PredicateChain.empty<Row>().and(r => r.a, a => a > 0);
    const right = PredicateChain.empty<Row>().and(r => r.b, b => b.length === 1);
    const both = left.concat(right);
    expect(both.length).toBe(2);
    expect(both.matches({ a: 1, b: 'x' })).toBe(true);
    expect(both.matches({ a: 1, b: 'xy' })).toBe(false);
    expect(left.concat(PredicateChain.empty())).toBe(left);
  });
});
