/**
 * @quarry/locks - Mutex
 *
 * Exclusive for reads and writes alike: a read guard blocks other readers.
 */

import { BaseLock } from './base-lock.js';
import { LockUnavailableError } from './errors.js';
import type { LockOptions } from './types.js';

export class Mutex<T> extends BaseLock<T> {
  private held = false;

  constructor(value: T, options: LockOptions = {}) {
    super('mutex', value, options);
  }

  get isLocked(): boolean {
    return this.held;
  }

  protected acquireShared(): void {
    this.acquire('read');
  }

  protected releaseShared(): void {
    this.held = false;
  }

  protected acquireExclusive(): void {
    this.acquire('write');
  }

  protected releaseExclusive(): void {
    this.held = false;
  }

  private acquire(requested: 'read' | 'write'): void {
    if (this.held) {
      throw LockUnavailableError.forHeld(this.kind, this.label, requested);
    }
    this.held = true;
  }
}
