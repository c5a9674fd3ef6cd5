/**
 * fallible/try
 *
 * The boundary where exceptions become failures. Nothing else in the library
 * catches: an exception thrown anywhere outside `tryCatch`/`tryCatchAsync`
 * propagates to the caller.
 *
 * @example
 * ```typescript
 * // Observe the concrete exception first, narrow it to a domain error after
 * const config = pipe(
 *   tryCatch(() => JSON.parse(raw)),
 *   R.tapError((thrown) => console.error("config is not JSON", thrown)),
 *   R.mapError(() => "INVALID_CONFIG" as const)
 * );
 * ```
 */

import type { AsyncOutcome, Outcome } from "./outcome";
import { failure, success } from "./outcome";
import {
  type Awaitable,
  detach,
  expectSettled,
  isPromiseLike,
  toPromise,
  withCleanup,
} from "./internal/awaitable";

/**
 * Turns whatever was thrown (or rejected) into the failure's error.
 */
export type ErrorFactory<E> = (thrown: unknown) => E;

export type TryOptions = {
  /**
   * Cleanup clause: runs exactly once after the operation, whether it returned
   * or threw, before `tryCatch` returns. An exception it throws propagates; a
   * promise it returns is not awaited (use `tryCatchAsync` for that).
   */
  finally?: () => void;
};

export type TryAsyncOptions = {
  /** Cleanup clause; awaited before the returned promise settles. */
  finally?: () => Awaitable<void>;
};

const keepThrown: ErrorFactory<unknown> = (thrown) => thrown;

function captureOutcome<T, E>(
  operation: () => Awaitable<T>,
  onError: ErrorFactory<E>
): Awaitable<Outcome<T, E>> {
  let produced: Awaitable<T>;
  try {
    produced = operation();
  } catch (thrown) {
    return failure(onError(thrown));
  }
  if (isPromiseLike(produced)) {
    return Promise.resolve(produced).then(
      (value) => success(value),
      (thrown: unknown) => failure(onError(thrown))
    );
  }
  return success(produced);
}

function tryOutcome<T, E>(
  operation: () => Awaitable<T>,
  onError: ErrorFactory<E>,
  cleanup: (() => Awaitable<void>) | undefined
): Awaitable<Outcome<T, E>> {
  const run = () => captureOutcome(operation, onError);
  return cleanup ? withCleanup(run, cleanup, "finally clause") : run();
}

function splitArguments<E>(
  onErrorOrOptions: ErrorFactory<E> | TryAsyncOptions | undefined,
  options: TryAsyncOptions | undefined
): { onError: ErrorFactory<unknown>; cleanup: (() => Awaitable<void>) | undefined } {
  if (typeof onErrorOrOptions === "function") {
    return { onError: onErrorOrOptions, cleanup: options?.finally };
  }
  return { onError: keepThrown, cleanup: onErrorOrOptions?.finally };
}

/**
 * Runs `operation` and captures a thrown exception as a failure.
 *
 * Without `onError` the thrown value itself, untouched, is the error. With it,
 * `onError(thrown)` is.
 *
 * @example
 * ```typescript
 * tryCatch(() => 42); // success(42)
 * tryCatch(() => JSON.parse("{"), () => "INVALID_JSON"); // failure("INVALID_JSON")
 *
 * const lock = acquire();
 * tryCatch(() => work(lock), { finally: () => lock.release() });
 * ```
 */
export function tryCatch<T>(operation: () => T, options?: TryOptions): Outcome<T, unknown>;
export function tryCatch<T, E>(
  operation: () => T,
  onError: ErrorFactory<E>,
  options?: TryOptions
): Outcome<T, E>;
export function tryCatch<T, E>(
  operation: () => T,
  onErrorOrOptions?: ErrorFactory<E> | TryOptions,
  options?: TryOptions
): Outcome<T, unknown> {
  const { onError, cleanup } = splitArguments(onErrorOrOptions, options);
  const release = cleanup ? () => detach(cleanup(), "tryCatch") : undefined;
  return expectSettled(tryOutcome(operation, onError, release), "tryCatch");
}

/**
 * `tryCatch` for operations and cleanup clauses that may be async. A rejection,
 * including one caused by an aborted `AbortSignal`, is captured like a throw.
 *
 * @example
 * ```typescript
 * const user = await tryCatchAsync(
 *   () => fetchUser(id),
 *   (e) => ({ type: "FETCH_FAILED" as const, cause: e }),
 *   { finally: () => span.end() }
 * );
 * ```
 */
export function tryCatchAsync<T>(
  operation: () => Awaitable<T>,
  options?: TryAsyncOptions
): AsyncOutcome<T, unknown>;
export function tryCatchAsync<T, E>(
  operation: () => Awaitable<T>,
  onError: ErrorFactory<E>,
  options?: TryAsyncOptions
): AsyncOutcome<T, E>;
export function tryCatchAsync<T, E>(
  operation: () => Awaitable<T>,
  onErrorOrOptions?: ErrorFactory<E> | TryAsyncOptions,
  options?: TryAsyncOptions
): AsyncOutcome<T, unknown> {
  const { onError, cleanup } = splitArguments(onErrorOrOptions, options);
  return toPromise(tryOutcome(operation, onError, cleanup));
}
