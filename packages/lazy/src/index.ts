/**
 * @pledge/lazy
 *
 * Demand-driven engines. Outcomes are built only as far as a consumer forces
 * them, so a prefix of the parsed output can be used while later input is
 * still being read.
 *
 * @module
 */

export { Lazy } from "./lazy.js";
export { LazyList } from "./list.js";
export type { ListCell } from "./list.js";

export {
  Success,
  Failure,
  Committed,
  settle as settleOutcome,
  settleAll as settleOutcomeAll,
  reveal as revealEnding,
} from "./outcome.js";
export type { Outcome, Ending, Settled as SettledOutcome } from "./outcome.js";

export {
  LazyParser,
  lazy,
  lazyParserEngine,
  stream,
  parseStream,
  evaluate,
} from "./parser.js";
export type { LazyParserF, LazyToolkit } from "./parser.js";

export {
  LazyStateParser,
  lazyState,
  lazyStateParserEngine,
  stream as streamState,
  parseStream as parseStateStream,
  evaluate as evaluateState,
  transactional,
} from "./state-parser.js";
export type { LazyStateParserF, LazyStateToolkit, Produced } from "./state-parser.js";
