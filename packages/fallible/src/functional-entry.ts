/**
 * fallible/functional
 *
 * Pipe-based composition for Outcome chains.
 *
 * @example
 * ```typescript
 * import { pipe, R } from 'fallible/functional';
 *
 * const label = pipe(
 *   parseAmount(input),
 *   R.ensure((amount) => amount > 0, 'NOT_POSITIVE' as const),
 *   R.map((amount) => amount.toFixed(2)),
 *   R.match({
 *     success: (text) => `Total: ${text}`,
 *     failure: (error) => `Rejected: ${error}`,
 *   })
 * );
 * ```
 */

export { pipe, flow, identity, R } from "./functional";

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

export type { MatchHandlers } from "./combinators";
