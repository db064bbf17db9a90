/**
 * @quarry/locks - RwLock
 *
 * Any number of readers or a single writer. A conflicting acquisition throws
 * LockUnavailableError; there is no waiting.
 *
 * @example
 * ```typescript
 * const stock = new RwLock({ sku: 'A-1', quantity: 4 }, { label: 'A-1' });
 *
 * withRead(stock, item => item.quantity);          // 4
 * stock.update(item => ({ ...item, quantity: 5 }));
 * ```
 */

import { BaseLock } from './base-lock.js';
import { LockUnavailableError } from './errors.js';
import type { LockOptions } from './types.js';

export class RwLock<T> extends BaseLock<T> {
  private readers = 0;
  private writer = false;

  constructor(value: T, options: LockOptions = {}) {
    super('rwlock', value, options);
  }

  get readerCount(): number {
    return this.readers;
  }

  get isWriteLocked(): boolean {
    return this.writer;
  }

  protected acquireShared(): void {
    if (this.writer) {
      throw LockUnavailableError.forRead(this.kind, this.label);
    }
    this.readers++;
  }

  protected releaseShared(): void {
    this.readers--;
  }

  protected acquireExclusive(): void {
    if (this.writer || this.readers > 0) {
      throw LockUnavailableError.forWrite(this.kind, this.label, this.readers);
    }
    this.writer = true;
  }

  protected releaseExclusive(): void {
    this.writer = false;
  }
}
