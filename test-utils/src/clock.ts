/**
 * Manually advanced clock for telemetry and time-window tests.
 */
export interface ManualClock {
  now(): number;
  advance(ms: number): void;
  set(ms: number): void;
}

export function createManualClock(start: number = 0): ManualClock {
  let current = start;
  return {
    now: () => current,
    advance(ms) {
      current += ms;
    },
    set(ms) {
      current = ms;
    },
  };
}

/**
 * A clock that moves forward by `stepMs` on every read, so each timed pass
 * lasts exactly `stepMs`.
 */
export function createSteppingClock(stepMs: number, start: number = 0): () => number {
  let current = start - stepMs;
  return () => {
    current += stepMs;
    return current;
  };
}
