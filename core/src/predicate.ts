/**
 * @quarry/core - PredicateChain
 *
 * Immutable, ordered list of field predicates combined with AND. Each entry is
 * compiled once into a record test (accessor + predicate) so evaluation is a
 * plain loop with no per-row lookups.
 */

import type { FieldAccessor, FieldPredicate, RecordPredicate } from './field.js';

/**
 * One compiled link of the chain.
 */
interface CompiledPredicate<T> {
  readonly test: RecordPredicate<T>;
}

export class PredicateChain<T> {
  private constructor(private readonly links: readonly CompiledPredicate<T>[]) {}

  /**
   * The chain that matches every record.
   */
  static empty<T>(): PredicateChain<T> {
    return new PredicateChain<T>([]);
  }

  /**
   * Append a field predicate; returns a new chain.
   */
  and<F>(accessor: FieldAccessor<T, F>, predicate: FieldPredicate<F>): PredicateChain<T> {
    return this.append({ test: record => predicate(accessor(record)) });
  }

  /**
   * Append a whole-record predicate; returns a new chain.
   */
  andRecord(predicate: RecordPredicate<T>): PredicateChain<T> {
    return this.append({ test: predicate });
  }

  /**
   * Concatenate another chain after this one.
   */
  concat(other: PredicateChain<T>): PredicateChain<T> {
    if (other.links.length === 0) return this;
    if (this.links.length === 0) return other;
    return new PredicateChain([...this.links, ...other.links]);
  }

  /**
   * Evaluate in registration order, stopping at the first false.
   */
  matches(record: T): boolean {
    for (const link of this.links) {
      if (!link.test(record)) {
        return false;
      }
    }
    return true;
  }

  get length(): number {
    return this.links.length;
  }

  isEmpty(): boolean {
    return this.links.length === 0;
  }

  private append(link: CompiledPredicate<T>): PredicateChain<T> {
    return new PredicateChain([...this.links, link]);
  }
}
