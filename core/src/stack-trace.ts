/**
 * Stack trace capture for error classes.
 *
 * V8 exposes `Error.captureStackTrace`, which drops the frames of the error
 * constructor itself so a trace starts where the error was thrown. Other
 * engines populate `stack` from the Error constructor and need nothing here.
 */

interface V8ErrorConstructor {
  captureStackTrace(targetObject: object, constructorOpt?: Function): void;
}

function hasV8CaptureStackTrace(
  errorConstructor: ErrorConstructor
): errorConstructor is ErrorConstructor & V8ErrorConstructor {
  return 'captureStackTrace' in errorConstructor &&
    typeof errorConstructor.captureStackTrace === 'function';
}

/**
 * Capture a stack trace on `error`, omitting `constructorOpt` and every frame above it.
 *
 * @example
 * ```typescript
 * class SourceError extends Error {
 *   constructor(message: string) {
 *     super(message);
 *     captureStackTrace(this, SourceError);
 *   }
 * }
 * ```
 */
export function captureStackTrace(error: Error, constructorOpt?: Function): void {
  if (hasV8CaptureStackTrace(Error)) {
    Error.captureStackTrace(error, constructorOpt);
  }
}
