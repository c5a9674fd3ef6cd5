/**
 * A value that is available now or later.
 *
 * Every combinator is written once against `Awaitable`: it suspends only where
 * its input or a callback result is actually pending, so an all-sync chain stays
 * synchronous and anything pending makes the result pending.
 */

import { PendingContinuationError } from "../errors";

export type Awaitable<T> = T | PromiseLike<T>;

export function isPromiseLike<T>(value: Awaitable<T>): value is PromiseLike<T> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * Runs `next` on `value` once it is available. Returns synchronously when
 * `value` is present and `next` does not suspend.
 */
export function sequence<A, B>(value: Awaitable<A>, next: (resolved: A) => Awaitable<B>): Awaitable<B> {
  return isPromiseLike(value) ? Promise.resolve(value).then(next) : next(value);
}

/**
 * Narrows the result of a combinator used in its synchronous form.
 */
export function expectSettled<T>(value: Awaitable<T>, combinator: string): T {
  if (isPromiseLike(value)) {
    throw new PendingContinuationError(combinator);
  }
  return value;
}

export function toPromise<T>(value: Awaitable<T>): Promise<T> {
  return Promise.resolve(value);
}

/**
 * Discards the result of a callback typed to return nothing, as the sync
 * combinators do. A promise returned anyway is not awaited, but its rejection
 * is reported rather than left unhandled.
 */
export function detach(value: unknown, combinator: string): void {
  if (!isPromiseLike(value)) return;
  void value.then(undefined, (rejection: unknown) => {
    console.warn(
      `fallible: a promise returned to ${combinator}() rejected after ${combinator}() had returned; ` +
        `use ${combinator}Async() to await it.`,
      rejection
    );
  });
}

// =============================================================================
// Scoped cleanup
// =============================================================================

/**
 * Runs `body`, then `cleanup` exactly once whichever way `body` exits, and only
 * then hands back the body's value or rethrows its exception.
 *
 * An exception from `cleanup` propagates. If `body` had already thrown, the
 * body's exception is lost, so a warning is written for it.
 */
export function withCleanup<T>(
  body: () => Awaitable<T>,
  cleanup: () => Awaitable<void>,
  label: string
): Awaitable<T> {
  let produced: Awaitable<T>;
  try {
    produced = body();
  } catch (thrown) {
    return cleanupThenRethrow(cleanup, thrown, label);
  }
  if (isPromiseLike(produced)) {
    return Promise.resolve(produced).then(
      (value) => sequence<void, T>(cleanup(), () => value),
      (thrown: unknown) => cleanupThenRethrow(cleanup, thrown, label)
    );
  }
  return sequence<void, T>(cleanup(), () => produced);
}

function cleanupThenRethrow(
  cleanup: () => Awaitable<void>,
  thrown: unknown,
  label: string
): Awaitable<never> {
  const discardOriginal = (cleanupError: unknown): never => {
    console.warn(
      `fallible: ${label} threw while an exception was already propagating; ` +
        `the earlier exception is discarded in favour of the ${label} exception.`,
      thrown
    );
    throw cleanupError;
  };

  let pending: Awaitable<void>;
  try {
    pending = cleanup();
  } catch (cleanupError) {
    return discardOriginal(cleanupError);
  }
  if (isPromiseLike(pending)) {
    return Promise.resolve(pending).then(() => {
      throw thrown;
    }, discardOriginal);
  }
  throw thrown;
}
