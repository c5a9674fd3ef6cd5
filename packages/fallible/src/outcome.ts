/**
 * fallible/outcome (internal)
 *
 * The Outcome value: a success carrying a value or a failure carrying an error.
 * Combinators live in combinators.ts, conditional.ts, try.ts and resource.ts.
 */

import { InvalidOutcomeAccessError } from "./errors";

// =============================================================================
// Core Outcome Types
// =============================================================================

/**
 * A successful outcome.
 * Use `success(value)` to create instances.
 */
export type Success<T> = { readonly ok: true; readonly value: T };

/**
 * A failed outcome.
 * Use `failure(error)` to create instances.
 */
export type Failure<E> = { readonly ok: false; readonly error: E };

/**
 * Either a successful computation or a failed one. `T` and `E` are unrelated.
 */
export type Outcome<T, E = unknown> = Success<T> | Failure<E>;

/**
 * A Promise that resolves to an Outcome.
 */
export type AsyncOutcome<T, E = unknown> = Promise<Outcome<T, E>>;

/**
 * An Outcome that is either present or still pending.
 */
export type MaybeAsyncOutcome<T, E = unknown> = Outcome<T, E> | PromiseLike<Outcome<T, E>>;

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a successful Outcome.
 *
 * @example
 * ```typescript
 * const answer = success(42); // { ok: true, value: 42 }
 * ```
 */
export const success = <T>(value: T): Success<T> => ({ ok: true, value });

/**
 * Creates a failed Outcome.
 *
 * @example
 * ```typescript
 * const missing = failure("NOT_FOUND"); // { ok: false, error: "NOT_FOUND" }
 * ```
 */
export const failure = <E>(error: E): Failure<E> => ({ ok: false, error });

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Checks if an Outcome is successful.
 */
export const isSuccess = <T, E>(outcome: Outcome<T, E>): outcome is Success<T> => outcome.ok;

/**
 * Checks if an Outcome is a failure.
 */
export const isFailure = <T, E>(outcome: Outcome<T, E>): outcome is Failure<E> => !outcome.ok;

// =============================================================================
// Accessors
// =============================================================================

/**
 * Reads the value of a successful Outcome.
 *
 * Reading the value of a failure is a bug in the caller, not a domain error:
 * it throws `InvalidOutcomeAccessError` instead of returning a Failure.
 *
 * @example
 * ```typescript
 * getValue(success(42)); // 42
 * getValue(failure("boom")); // throws InvalidOutcomeAccessError
 * ```
 */
export function getValue<T, E>(outcome: Outcome<T, E>): T {
  if (outcome.ok) return outcome.value;
  throw new InvalidOutcomeAccessError("Outcome is not successful", outcome);
}

/**
 * Reads the error of a failed Outcome. Throws `InvalidOutcomeAccessError` on a success.
 */
export function getError<T, E>(outcome: Outcome<T, E>): E {
  if (!outcome.ok) return outcome.error;
  throw new InvalidOutcomeAccessError("Outcome is successful", outcome);
}
