/**
 * @quarry/locks - Guard implementations shared by the lock kinds
 */

import { GuardReleasedError } from './errors.js';
import type { ReadGuard, WriteGuard } from './types.js';

/**
 * Access to the lock internals a guard needs.
 */
export interface GuardTarget<T> {
  readonly kind: string;
  readonly label: string | undefined;
  load(): T;
  store(value: T): void;
}

export class LockReadGuard<T> implements ReadGuard<T> {
  protected released = false;

  constructor(
    protected readonly target: GuardTarget<T>,
    private readonly onRelease: () => void
  ) {}

  get value(): T {
    this.assertHeld();
    return this.target.load();
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.onRelease();
  }

  protected assertHeld(): void {
    if (this.released) {
      throw new GuardReleasedError(this.target.kind, this.target.label);
    }
  }
}

export class LockWriteGuard<T> extends LockReadGuard<T> implements WriteGuard<T> {
  constructor(
    target: GuardTarget<T>,
    onRelease: () => void,
    private readonly onPoison: () => void
  ) {
    super(target, onRelease);
  }

  set(value: T): void {
    this.assertHeld();
    this.target.store(value);
  }

  releasePoisoned(): void {
    if (this.released) return;
    this.onPoison();
    this.release();
  }
}
