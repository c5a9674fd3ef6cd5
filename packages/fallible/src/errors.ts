/**
 * fallible/errors
 *
 * Errors the library itself throws. Both signal a bug at the call site, so they
 * are thrown rather than carried in a Failure.
 */

/**
 * Thrown by `getValue` on a failure and by `getError` on a success.
 */
export class InvalidOutcomeAccessError extends Error {
  /** The Outcome that was read through the wrong accessor */
  public readonly outcome: unknown;

  constructor(message: string, outcome: unknown) {
    super(message);
    this.name = "InvalidOutcomeAccessError";
    this.outcome = outcome;
  }
}

/**
 * Thrown when a synchronous combinator receives a promise from one of its
 * callbacks. The `*Async` form of the same combinator accepts async callbacks.
 *
 * @example
 * ```typescript
 * map(success(1), async (n) => n + 1);
 * // PendingContinuationError: map() received a pending value from its callback; use mapAsync() instead
 * ```
 */
export class PendingContinuationError extends Error {
  /** Name of the synchronous combinator that was misused */
  public readonly combinator: string;

  constructor(combinator: string) {
    super(
      `${combinator}() received a pending value from its callback; use ${combinator}Async() instead`
    );
    this.name = "PendingContinuationError";
    this.combinator = combinator;
  }
}
