/**
 * fallible/combinators (internal)
 *
 * Transformations over an Outcome. Each combinator has one implementation over
 * `Awaitable` and two typed entry points:
 *
 * - `map`, `bind`, ... take a present Outcome and synchronous callbacks and
 *   return a present Outcome.
 * - `mapAsync`, `bindAsync`, ... take a present or pending Outcome and sync or
 *   async callbacks and always return a Promise.
 */

import type { AsyncOutcome, MaybeAsyncOutcome, Outcome } from "./outcome";
import { failure, success } from "./outcome";
import { type Awaitable, detach, expectSettled, sequence, toPromise } from "./internal/awaitable";

// =============================================================================
// Kernels
// =============================================================================

function mapOutcome<T, U, E>(
  outcome: MaybeAsyncOutcome<T, E>,
  fn: (value: T) => Awaitable<U>
): Awaitable<Outcome<U, E>> {
  return sequence<Outcome<T, E>, Outcome<U, E>>(outcome, (resolved) =>
    resolved.ok ? sequence<U, Outcome<U, E>>(fn(resolved.value), success) : resolved
  );
}

function bindOutcome<T, U, E, F>(
  outcome: MaybeAsyncOutcome<T, E>,
  fn: (value: T) => Awaitable<Outcome<U, F>>
): Awaitable<Outcome<U, E | F>> {
  return sequence<Outcome<T, E>, Outcome<U, E | F>>(outcome, (resolved) =>
    resolved.ok ? fn(resolved.value) : resolved
  );
}

function mapErrorOutcome<T, E, F>(
  outcome: MaybeAsyncOutcome<T, E>,
  fn: (error: E) => Awaitable<F>
): Awaitable<Outcome<T, F>> {
  return sequence<Outcome<T, E>, Outcome<T, F>>(outcome, (resolved) =>
    resolved.ok ? resolved : sequence<F, Outcome<T, F>>(fn(resolved.error), failure)
  );
}

function matchOutcome<T, E, R>(
  outcome: MaybeAsyncOutcome<T, E>,
  handlers: MatchHandlers<T, E, Awaitable<R>>
): Awaitable<R> {
  return sequence<Outcome<T, E>, R>(outcome, (resolved) =>
    resolved.ok ? handlers.success(resolved.value) : handlers.failure(resolved.error)
  );
}

function tapOutcome<T, E>(
  outcome: MaybeAsyncOutcome<T, E>,
  action: (value: T) => Awaitable<unknown>
): Awaitable<Outcome<T, E>> {
  return sequence<Outcome<T, E>, Outcome<T, E>>(outcome, (resolved) =>
    resolved.ok ? sequence<unknown, Outcome<T, E>>(action(resolved.value), () => resolved) : resolved
  );
}

function tapErrorOutcome<T, E>(
  outcome: MaybeAsyncOutcome<T, E>,
  action: (error: E) => Awaitable<unknown>
): Awaitable<Outcome<T, E>> {
  return sequence<Outcome<T, E>, Outcome<T, E>>(outcome, (resolved) =>
    resolved.ok ? resolved : sequence<unknown, Outcome<T, E>>(action(resolved.error), () => resolved)
  );
}

function ensureOutcome<T, E, F>(
  outcome: MaybeAsyncOutcome<T, E>,
  predicate: (value: T) => Awaitable<boolean>,
  error: F
): Awaitable<Outcome<T, E | F>> {
  return sequence<Outcome<T, E>, Outcome<T, E | F>>(outcome, (resolved) =>
    resolved.ok
      ? sequence<boolean, Outcome<T, E | F>>(predicate(resolved.value), (holds) =>
          holds ? resolved : failure(error)
        )
      : resolved
  );
}

// =============================================================================
// Pure transformations
// =============================================================================

/**
 * Handlers for `match`: exactly one of them runs.
 */
export type MatchHandlers<T, E, R> = {
  success: (value: T) => R;
  failure: (error: E) => R;
};

/**
 * Transforms the value of a successful Outcome. A failure is returned as is and
 * `fn` is not called.
 *
 * @example
 * ```typescript
 * map(success(5), (x) => x * 2); // success(10)
 * map(failure("not found"), (x: number) => x * 2); // failure("not found")
 * ```
 */
export function map<T, U, E>(outcome: Outcome<T, E>, fn: (value: T) => U): Outcome<U, E> {
  return expectSettled(mapOutcome(outcome, fn), "map");
}

export function mapAsync<T, U, E>(
  outcome: MaybeAsyncOutcome<T, E>,
  fn: (value: T) => Awaitable<U>
): AsyncOutcome<U, E> {
  return toPromise(mapOutcome(outcome, fn));
}

/**
 * Chains an operation that can itself fail ("flatMap").
 *
 * On success the continuation's Outcome is returned directly; on failure the
 * original failure short-circuits the chain.
 *
 * @example
 * ```typescript
 * const half = (n: number): Outcome<number, "ODD"> =>
 *   n % 2 === 0 ? success(n / 2) : failure("ODD");
 *
 * bind(success(10), half); // success(5)
 * bind(success(7), half); // failure("ODD")
 * ```
 */
export function bind<T, U, E, F = E>(
  outcome: Outcome<T, E>,
  fn: (value: T) => Outcome<U, F>
): Outcome<U, E | F> {
  return expectSettled(bindOutcome(outcome, fn), "bind");
}

export function bindAsync<T, U, E, F = E>(
  outcome: MaybeAsyncOutcome<T, E>,
  fn: (value: T) => Awaitable<Outcome<U, F>>
): AsyncOutcome<U, E | F> {
  return toPromise(bindOutcome(outcome, fn));
}

/**
 * Transforms the error of a failed Outcome. A success is returned as is.
 */
export function mapError<T, E, F>(outcome: Outcome<T, E>, fn: (error: E) => F): Outcome<T, F> {
  return expectSettled(mapErrorOutcome(outcome, fn), "mapError");
}

export function mapErrorAsync<T, E, F>(
  outcome: MaybeAsyncOutcome<T, E>,
  fn: (error: E) => Awaitable<F>
): AsyncOutcome<T, F> {
  return toPromise(mapErrorOutcome(outcome, fn));
}

/**
 * Reduces an Outcome to a single value by running the handler for its variant.
 *
 * @example
 * ```typescript
 * match(success(5), {
 *   success: (x) => `Success: ${x}`,
 *   failure: (e) => `Error: ${e}`,
 * }); // "Success: 5"
 * ```
 */
export function match<T, E, R>(outcome: Outcome<T, E>, handlers: MatchHandlers<T, E, R>): R {
  return expectSettled(matchOutcome(outcome, handlers), "match");
}

export function matchAsync<T, E, R>(
  outcome: MaybeAsyncOutcome<T, E>,
  handlers: MatchHandlers<T, E, Awaitable<R>>
): Promise<R> {
  return toPromise(matchOutcome(outcome, handlers));
}

/**
 * Turns a success into a failure when its value does not satisfy `predicate`.
 *
 * @example
 * ```typescript
 * ensure(success(""), (s) => s.length > 0, "EMPTY"); // failure("EMPTY")
 * ```
 */
export function ensure<T, E, F = E>(
  outcome: Outcome<T, E>,
  predicate: (value: T) => boolean,
  error: F
): Outcome<T, E | F> {
  return expectSettled(ensureOutcome(outcome, predicate, error), "ensure");
}

export function ensureAsync<T, E, F = E>(
  outcome: MaybeAsyncOutcome<T, E>,
  predicate: (value: T) => Awaitable<boolean>,
  error: F
): AsyncOutcome<T, E | F> {
  return toPromise(ensureOutcome(outcome, predicate, error));
}

// =============================================================================
// Side effects
// =============================================================================

/**
 * Runs `action` on a success value and returns the same Outcome object.
 *
 * Whatever `action` returns is ignored; a promise from it is not awaited (use
 * `tapAsync` for that).
 *
 * @example
 * ```typescript
 * tap(success(5), (x) => audit.push(x)); // success(5)
 * ```
 */
export function tap<T, E>(outcome: Outcome<T, E>, action: (value: T) => void): Outcome<T, E> {
  return expectSettled(
    tapOutcome(outcome, (value) => detach(action(value), "tap")),
    "tap"
  );
}

export function tapAsync<T, E>(
  outcome: MaybeAsyncOutcome<T, E>,
  action: (value: T) => Awaitable<unknown>
): AsyncOutcome<T, E> {
  return toPromise(tapOutcome(outcome, action));
}

/**
 * Runs `action` on a failure's error and returns the same Outcome object.
 */
export function tapError<T, E>(outcome: Outcome<T, E>, action: (error: E) => void): Outcome<T, E> {
  return expectSettled(
    tapErrorOutcome(outcome, (error) => detach(action(error), "tapError")),
    "tapError"
  );
}

export function tapErrorAsync<T, E>(
  outcome: MaybeAsyncOutcome<T, E>,
  action: (error: E) => Awaitable<unknown>
): AsyncOutcome<T, E> {
  return toPromise(tapErrorOutcome(outcome, action));
}
