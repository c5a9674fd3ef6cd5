/**
 * fallible/conditional
 *
 * Predicate-gated continuation for Outcome chains.
 *
 * Read the predicate as "already good enough": when it returns `true` the
 * success passes through untouched and the continuation is skipped; only when
 * it returns `false` does the continuation run.
 *
 * @example
 * ```typescript
 * // Top up balances below the threshold, leave the rest alone
 * const topped = bindIf(
 *   success(balance),
 *   (b) => b >= MINIMUM,
 *   (b) => map(chargeCard(MINIMUM - b), () => MINIMUM)
 * );
 * ```
 */

import type { AsyncOutcome, MaybeAsyncOutcome, Outcome } from "./outcome";
import { type Awaitable, expectSettled, sequence, toPromise } from "./internal/awaitable";

function bindIfOutcome<T, E, F>(
  outcome: MaybeAsyncOutcome<T, E>,
  predicate: (value: T) => Awaitable<boolean>,
  continuation: (value: T) => Awaitable<Outcome<T, F>>
): Awaitable<Outcome<T, E | F>> {
  return sequence<Outcome<T, E>, Outcome<T, E | F>>(outcome, (resolved) => {
    if (!resolved.ok) return resolved;
    return sequence<boolean, Outcome<T, E | F>>(predicate(resolved.value), (skip) =>
      skip ? resolved : continuation(resolved.value)
    );
  });
}

/**
 * Runs `continuation` on a success only when `predicate` returns `false`.
 *
 * - failure: predicate and continuation are both skipped, the failure is returned
 * - predicate `true`: the original success is returned, continuation skipped
 * - predicate `false`: the continuation's Outcome is returned
 *
 * @example
 * ```typescript
 * bindIf(success(10), (x) => x > 5, (x) => success(x * 2)); // success(10)
 * bindIf(success(3), (x) => x > 5, (x) => success(x * 2)); // success(6)
 * ```
 */
export function bindIf<T, E, F = E>(
  outcome: Outcome<T, E>,
  predicate: (value: T) => boolean,
  continuation: (value: T) => Outcome<T, F>
): Outcome<T, E | F> {
  return expectSettled(bindIfOutcome(outcome, predicate, continuation), "bindIf");
}

/**
 * `bindIf` for a pending Outcome, an async predicate, an async continuation, or
 * any mix of them.
 */
export function bindIfAsync<T, E, F = E>(
  outcome: MaybeAsyncOutcome<T, E>,
  predicate: (value: T) => Awaitable<boolean>,
  continuation: (value: T) => Awaitable<Outcome<T, F>>
): AsyncOutcome<T, E | F> {
  return toPromise(bindIfOutcome(outcome, predicate, continuation));
}
