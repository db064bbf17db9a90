/**
 * Stack trace capture utility
 *
 * Wraps V8's Error.captureStackTrace so error subclasses can drop their own
 * constructor frames without reaching for `any`.
 *
 * @example
 * ```typescript
 * class PoisonedLockError extends Error {
 *   constructor(message: string) {
 *     super(message);
 *     this.name = 'PoisonedLockError';
 *     captureStackTrace(this, PoisonedLockError);
 *   }
 * }
 * ```
 */

/**
 * Shape of V8's Error.captureStackTrace
 */
interface V8Error {
  captureStackTrace(targetObject: object, constructorOpt?: Function): void;
}

function hasV8CaptureStackTrace(
  errorConstructor: typeof Error
): errorConstructor is typeof Error & V8Error {
  return 'captureStackTrace' in errorConstructor &&
    typeof errorConstructor.captureStackTrace === 'function';
}

/**
 * Captures a stack trace on `error`, omitting frames above `constructorOpt`.
 *
 * Outside V8 this is a no-op; the Error constructor has already filled in
 * `stack`.
 */
export function captureStackTrace(
  error: Error,
  constructorOpt?: Function
): void {
  if (hasV8CaptureStackTrace(Error)) {
    Error.captureStackTrace(error, constructorOpt);
  }
}
