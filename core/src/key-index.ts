/**
 * @quarry/core - KeyIndex
 *
 * Insertion-ordered map keyed by field value. Primitive keys compare with
 * SameValueZero, as in a plain `Map`; `Date` keys compare by epoch
 * milliseconds, so two Date objects for the same instant share one entry.
 * Invalid dates all share one entry, matching the NaN rule of `compareKeys`.
 * Other object keys compare by identity.
 *
 * @example
 * ```typescript
 * const index = new KeyIndex<Date, string[]>();
 * index.upsert(new Date(0), () => []).push('a');
 * index.upsert(new Date(0), () => []).push('b');
 * index.size; // 1
 * ```
 */

interface Slot<K, V> {
  /** The first key object seen for this entry */
  readonly key: K;
  readonly value: V;
}

export class KeyIndex<K, V> {
  private readonly byValue = new Map<K, Slot<K, V>>();
  private readonly byTime = new Map<number, Slot<K, V>>();
  private readonly slots: Slot<K, V>[] = [];

  get size(): number {
    return this.slots.length;
  }

  get(key: K): V | undefined {
    return this.lookup(key)?.value;
  }

  has(key: K): boolean {
    return this.lookup(key) !== undefined;
  }

  /**
   * The entry for `key`, created with `init()` on first sight.
   */
  upsert(key: K, init: () => V): V {
    const existing = this.lookup(key);
    if (existing) return existing.value;

    const slot: Slot<K, V> = { key, value: init() };
    if (key instanceof Date) {
      this.byTime.set(key.getTime(), slot);
    } else {
      this.byValue.set(key, slot);
    }
    this.slots.push(slot);
    return slot.value;
  }

  keys(): K[] {
    return this.slots.map(slot => slot.key);
  }

  /**
   * Entries as a plain `Map`, in first-seen order, keyed by the first key
   * object seen for each entry.
   */
  toMap(): Map<K, V> {
    return new Map(this.slots.map(slot => [slot.key, slot.value]));
  }

  private lookup(key: K): Slot<K, V> | undefined {
    return key instanceof Date ? this.byTime.get(key.getTime()) : this.byValue.get(key);
  }
}

/**
 * Group values by key into arrays, first-seen key order.
 */
export function groupInto<K, V>(index: KeyIndex<K, V[]>, key: K, value: V): void {
  index.upsert(key, () => []).push(value);
}
