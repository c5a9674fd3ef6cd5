/**
 * fallible/resource
 *
 * Scoped use of a resource acquired as an Outcome: the resource is disposed
 * exactly once when the body is done with it, however the body exits.
 *
 * @example
 * ```typescript
 * const rows = await usingAsync(openConnection(url), async (conn) =>
 *   tryCatchAsync(() => conn.query("select 1"), () => "QUERY_FAILED" as const)
 * );
 * // the connection is closed here, whatever the query did
 * ```
 */

import type { AsyncOutcome, MaybeAsyncOutcome, Outcome } from "./outcome";
import {
  type Awaitable,
  detach,
  expectSettled,
  sequence,
  toPromise,
  withCleanup,
} from "./internal/awaitable";

/**
 * A resource released synchronously.
 */
export interface DisposableResource {
  dispose(): void;
}

/**
 * A resource whose release may be async.
 */
export interface AsyncDisposableResource {
  dispose(): Awaitable<void>;
}

function usingOutcome<R, T, E, F>(
  outcome: MaybeAsyncOutcome<R, E>,
  body: (resource: R) => Awaitable<Outcome<T, F>>,
  release: (resource: R) => Awaitable<void>
): Awaitable<Outcome<T, E | F>> {
  return sequence<Outcome<R, E>, Outcome<T, E | F>>(outcome, (resolved) => {
    if (!resolved.ok) return resolved;
    const resource = resolved.value;
    return withCleanup<Outcome<T, E | F>>(
      () => body(resource),
      () => release(resource),
      "dispose()"
    );
  });
}

/**
 * Runs `body` with the resource of a successful Outcome, then disposes it.
 *
 * - failure: `body` is not called and nothing is disposed
 * - success: the resource is disposed after `body` returns a success, returns a
 *   failure, or throws; a thrown exception propagates after disposal and is not
 *   turned into a failure (use `tryCatch` inside the body for that)
 *
 * Nested calls dispose innermost first. A promise returned by `dispose()` is
 * not awaited; `usingAsync` awaits it.
 *
 * @example
 * ```typescript
 * using(openFile(path), (file) => success(file.readAll()));
 * ```
 */
export function using<R extends DisposableResource, T, E, F = E>(
  outcome: Outcome<R, E>,
  body: (resource: R) => Outcome<T, F>
): Outcome<T, E | F> {
  return expectSettled(
    usingOutcome(outcome, body, (resource) => detach(resource.dispose(), "using")),
    "using"
  );
}

/**
 * `using` for a pending resource Outcome, an async body, an async `dispose()`,
 * or any mix of them. Disposal is awaited before the returned promise settles.
 */
export function usingAsync<R extends AsyncDisposableResource, T, E, F = E>(
  outcome: MaybeAsyncOutcome<R, E>,
  body: (resource: R) => Awaitable<Outcome<T, F>>
): AsyncOutcome<T, E | F> {
  return toPromise(usingOutcome(outcome, body, (resource) => resource.dispose()));
}
