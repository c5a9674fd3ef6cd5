/**
 * fallible
 *
 * An Outcome type for typed error handling: a value or an error, carried
 * explicitly through a chain of combinators instead of thrown.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Fallible, type AsyncOutcome } from 'fallible';
 *
 * async function getUser(id: string): AsyncOutcome<User, 'NOT_FOUND'> {
 *   const user = await db.find(id);
 *   return user ? Fallible.success(user) : Fallible.failure('NOT_FOUND');
 * }
 *
 * const greeting = await Fallible.matchAsync(getUser(id), {
 *   success: (user) => `Hello, ${user.name}`,
 *   failure: () => 'Who are you?',
 * });
 * ```
 *
 * ## Entry Points
 *
 * - `fallible` - Fallible namespace plus named exports of everything below
 * - `fallible/functional` - pipe/flow and the curried `R` combinators
 */

import * as outcome from "./outcome";
import * as combinators from "./combinators";
import { bindIf, bindIfAsync } from "./conditional";
import { tryCatch, tryCatchAsync } from "./try";
import { using, usingAsync } from "./resource";
import { classifyError, on } from "./classify";
import { InvalidOutcomeAccessError, PendingContinuationError } from "./errors";
import { pipe, flow, identity, R } from "./functional";

// =============================================================================
// Fallible namespace (single export)
// =============================================================================

const Fallible = {
  // Outcome (constructors, guards, accessors)
  ...outcome,
  // Combinators
  ...combinators,
  bindIf,
  bindIfAsync,
  // Exception capture
  tryCatch,
  tryCatchAsync,
  classifyError,
  on,
  // Resources
  using,
  usingAsync,
  // Errors
  InvalidOutcomeAccessError,
  PendingContinuationError,
  // Functional
  pipe,
  flow,
  identity,
  R,
} as const;

export { Fallible };

// =============================================================================
// Named value exports (tree-shake friendly)
// =============================================================================

export { success, failure, isSuccess, isFailure, getValue, getError } from "./outcome";

export {
  map,
  mapAsync,
  bind,
  bindAsync,
  mapError,
  mapErrorAsync,
  match,
  matchAsync,
  ensure,
  ensureAsync,
  tap,
  tapAsync,
  tapError,
  tapErrorAsync,
} from "./combinators";

export { bindIf, bindIfAsync } from "./conditional";

export { tryCatch, tryCatchAsync } from "./try";

export { using, usingAsync } from "./resource";

export { classifyError, on } from "./classify";

export { InvalidOutcomeAccessError, PendingContinuationError } from "./errors";

export { pipe, flow, identity, R } from "./functional";

// =============================================================================
// Type exports (cannot live on runtime object)
// =============================================================================

export type { Success, Failure, Outcome, AsyncOutcome, MaybeAsyncOutcome } from "./outcome";
export type { MatchHandlers } from "./combinators";
export type { ErrorFactory, TryOptions, TryAsyncOptions } from "./try";
export type { DisposableResource, AsyncDisposableResource } from "./resource";
export type { ErrorCase } from "./classify";
export type { Awaitable } from "./internal/awaitable";
