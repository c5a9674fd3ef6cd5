/**
 * fallible/functional
 *
 * Pipe-based composition for Outcome chains. Every combinator has a curried
 * form under `R`, so a chain reads top to bottom in the order it runs.
 */

import type { AsyncOutcome, MaybeAsyncOutcome, Outcome } from "../outcome";
import type { Awaitable } from "../internal/awaitable";
import {
  bind,
  bindAsync,
  ensure,
  ensureAsync,
  map,
  mapAsync,
  mapError,
  mapErrorAsync,
  match,
  matchAsync,
  tap,
  tapAsync,
  tapError,
  tapErrorAsync,
  type MatchHandlers,
} from "../combinators";
import { bindIf, bindIfAsync } from "../conditional";
import {
  using,
  usingAsync,
  type AsyncDisposableResource,
  type DisposableResource,
} from "../resource";

// =============================================================================
// Composition
// =============================================================================

/**
 * Pipe a value through a series of functions left-to-right.
 *
 * @example
 * ```typescript
 * pipe(
 *   success(5),
 *   R.map((x) => x * 2),
 *   R.bind((x) => (x > 5 ? success(String(x)) : failure("too small")))
 * ); // success("10")
 * ```
 */
export function pipe<A>(a: A): A;
export function pipe<A, B>(a: A, ab: (a: A) => B): B;
export function pipe<A, B, C>(a: A, ab: (a: A) => B, bc: (b: B) => C): C;
export function pipe<A, B, C, D>(a: A, ab: (a: A) => B, bc: (b: B) => C, cd: (c: C) => D): D;
export function pipe<A, B, C, D, E>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E
): E;
export function pipe<A, B, C, D, E, F>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F
): F;
export function pipe<A, B, C, D, E, F, G>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F,
  fg: (f: F) => G
): G;
export function pipe<A, B, C, D, E, F, G, H>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F,
  fg: (f: F) => G,
  gh: (g: G) => H
): H;
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export function pipe(a: unknown, ...fns: Array<(x: any) => any>): unknown {
  return fns.reduce((acc, fn) => fn(acc), a);
}

/**
 * Compose functions left-to-right into a reusable chain.
 *
 * @example
 * ```typescript
 * const parsePort = flow(
 *   (raw: string) => tryCatch(() => Number.parseInt(raw, 10)),
 *   R.ensure((n) => Number.isInteger(n) && n > 0, "INVALID_PORT")
 * );
 * parsePort("8080"); // success(8080)
 * ```
 */
export function flow<A, B>(ab: (a: A) => B): (a: A) => B;
export function flow<A, B, C>(ab: (a: A) => B, bc: (b: B) => C): (a: A) => C;
export function flow<A, B, C, D>(ab: (a: A) => B, bc: (b: B) => C, cd: (c: C) => D): (a: A) => D;
export function flow<A, B, C, D, E>(
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E
): (a: A) => E;
export function flow<A, B, C, D, E, F>(
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F
): (a: A) => F;
export function flow<A, B, C, D, E, F, G>(
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F,
  fg: (f: F) => G
): (a: A) => G;
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export function flow(...fns: Array<(x: any) => any>): (a: unknown) => unknown {
  return (a: unknown) => fns.reduce((acc, fn) => fn(acc), a);
}

/**
 * Identity function - returns its argument unchanged.
 */
export const identity = <A>(a: A): A => a;

// =============================================================================
// Pipeable Outcome Functions (R namespace)
// =============================================================================

/**
 * Curried combinators for use in pipe() and flow().
 *
 * The `*Async` members accept a pending Outcome, so once a chain turns async
 * every later step uses the async member.
 *
 * @example
 * ```typescript
 * const name = await pipe(
 *   tryCatchAsync(() => loadUser(id), () => "LOAD_FAILED" as const),
 *   R.ensureAsync((user) => user.active, "INACTIVE" as const),
 *   R.tapAsync((user) => audit.record(user.id)),
 *   R.mapAsync((user) => user.name)
 * );
 * ```
 */
export const R = {
  map:
    <T, U, E>(fn: (value: T) => U) =>
    (outcome: Outcome<T, E>): Outcome<U, E> =>
      map(outcome, fn),

  mapAsync:
    <T, U, E>(fn: (value: T) => Awaitable<U>) =>
    (outcome: MaybeAsyncOutcome<T, E>): AsyncOutcome<U, E> =>
      mapAsync(outcome, fn),

  bind:
    <T, U, E, F = E>(fn: (value: T) => Outcome<U, F>) =>
    (outcome: Outcome<T, E>): Outcome<U, E | F> =>
      bind(outcome, fn),

  bindAsync:
    <T, U, E, F = E>(fn: (value: T) => Awaitable<Outcome<U, F>>) =>
    (outcome: MaybeAsyncOutcome<T, E>): AsyncOutcome<U, E | F> =>
      bindAsync(outcome, fn),

  mapError:
    <T, E, F>(fn: (error: E) => F) =>
    (outcome: Outcome<T, E>): Outcome<T, F> =>
      mapError(outcome, fn),

  mapErrorAsync:
    <T, E, F>(fn: (error: E) => Awaitable<F>) =>
    (outcome: MaybeAsyncOutcome<T, E>): AsyncOutcome<T, F> =>
      mapErrorAsync(outcome, fn),

  match:
    <T, E, U>(handlers: MatchHandlers<T, E, U>) =>
    (outcome: Outcome<T, E>): U =>
      match(outcome, handlers),

  matchAsync:
    <T, E, U>(handlers: MatchHandlers<T, E, Awaitable<U>>) =>
    (outcome: MaybeAsyncOutcome<T, E>): Promise<U> =>
      matchAsync(outcome, handlers),

  tap:
    <T, E>(action: (value: T) => void) =>
    (outcome: Outcome<T, E>): Outcome<T, E> =>
      tap(outcome, action),

  tapAsync:
    <T, E>(action: (value: T) => Awaitable<unknown>) =>
    (outcome: MaybeAsyncOutcome<T, E>): AsyncOutcome<T, E> =>
      tapAsync(outcome, action),

  tapError:
    <T, E>(action: (error: E) => void) =>
    (outcome: Outcome<T, E>): Outcome<T, E> =>
      tapError(outcome, action),

  tapErrorAsync:
    <T, E>(action: (error: E) => Awaitable<unknown>) =>
    (outcome: MaybeAsyncOutcome<T, E>): AsyncOutcome<T, E> =>
      tapErrorAsync(outcome, action),

  /** Predicate `true` skips the continuation; see `bindIf`. */
  bindIf:
    <T, E, F = E>(predicate: (value: T) => boolean, continuation: (value: T) => Outcome<T, F>) =>
    (outcome: Outcome<T, E>): Outcome<T, E | F> =>
      bindIf(outcome, predicate, continuation),

  bindIfAsync:
    <T, E, F = E>(
      predicate: (value: T) => Awaitable<boolean>,
      continuation: (value: T) => Awaitable<Outcome<T, F>>
    ) =>
    (outcome: MaybeAsyncOutcome<T, E>): AsyncOutcome<T, E | F> =>
      bindIfAsync(outcome, predicate, continuation),

  ensure:
    <T, E, F = E>(predicate: (value: T) => boolean, error: F) =>
    (outcome: Outcome<T, E>): Outcome<T, E | F> =>
      ensure(outcome, predicate, error),

  ensureAsync:
    <T, E, F = E>(predicate: (value: T) => Awaitable<boolean>, error: F) =>
    (outcome: MaybeAsyncOutcome<T, E>): AsyncOutcome<T, E | F> =>
      ensureAsync(outcome, predicate, error),

  using:
    <R extends DisposableResource, T, E, F = E>(body: (resource: R) => Outcome<T, F>) =>
    (outcome: Outcome<R, E>): Outcome<T, E | F> =>
      using(outcome, body),

  usingAsync:
    <R extends AsyncDisposableResource, T, E, F = E>(
      body: (resource: R) => Awaitable<Outcome<T, F>>
    ) =>
    (outcome: MaybeAsyncOutcome<R, E>): AsyncOutcome<T, E | F> =>
      usingAsync(outcome, body),
};
