/**
 * fallible/classify
 *
 * Builds an error factory that maps thrown exceptions to domain errors by their
 * class, so `tryCatch` and `mapError` stay unaware of concrete exception types.
 *
 * @example
 * ```typescript
 * type FetchError =
 *   | { type: "TIMEOUT"; ms: number }
 *   | { type: "NETWORK" }
 *   | { type: "UNKNOWN"; thrown: unknown };
 *
 * const toFetchError = classifyError<FetchError>(
 *   [
 *     on(TimeoutError, (e) => ({ type: "TIMEOUT", ms: e.ms })),
 *     on(TypeError, () => ({ type: "NETWORK" })),
 *   ],
 *   (thrown) => ({ type: "UNKNOWN", thrown })
 * );
 *
 * const user = await tryCatchAsync(() => fetchUser(id), toFetchError);
 * ```
 */

import type { Outcome } from "./outcome";
import { failure, success } from "./outcome";
import type { ErrorFactory } from "./try";

/**
 * One branch of `classifyError`: converts exceptions of a single class and
 * passes everything else through as a failure.
 */
export type ErrorCase<E> = {
  readonly convert: (thrown: unknown) => Outcome<E, unknown>;
};

/**
 * Declares how exceptions that are `instanceof errorClass` become domain errors.
 */
export function on<I, E>(
  errorClass: abstract new (...args: never[]) => I,
  handler: (error: I) => E
): ErrorCase<E> {
  return {
    convert: (thrown) => (thrown instanceof errorClass ? success(handler(thrown)) : failure(thrown)),
  };
}

/**
 * Combines cases into a single error factory. Cases are tried in order, so list
 * subclasses before their base classes; `fallback` receives anything unmatched.
 */
export function classifyError<E>(
  cases: readonly ErrorCase<E>[],
  fallback: ErrorFactory<E>
): ErrorFactory<E> {
  return (thrown) => {
    for (const errorCase of cases) {
      const converted = errorCase.convert(thrown);
      if (converted.ok) return converted.value;
    }
    return fallback(thrown);
  };
}
