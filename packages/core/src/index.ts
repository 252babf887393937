/**
 * @pledge/core
 *
 * The pieces every engine shares:
 * - The result algebra (success / failure / committed) and its sequencing rule
 * - The engine interface and the generic combinators derived from it
 * - Token streams over arrays, strings and iterators
 * - Messages, errors, configuration and logging
 *
 * @module
 */

// Type-level functions
export type { $, TypeFunction } from "./hkt.js";

// Result algebra
export {
  Success,
  Failure,
  Committed,
  isSuccess,
  isFailure,
  isCommitted,
  bindResult,
  mapResult,
  adjustResult,
  settle,
  toRunResult,
  toStateRunResult,
} from "./result.js";
export type { Result, Settled, RunResult, StateRunResult, Snapshot } from "./result.js";

// Engine interface
export { Continue, Done } from "./engine.js";
export type { Step, Labeled, Commitment, ParserEngine, StatefulEngine } from "./engine.js";

// Generic combinators
export { derive, deriveStateful, toolkit, statefulToolkit } from "./combinators.js";
export type { Combinators, StatefulCombinators, Toolkit, StatefulToolkit } from "./combinators.js";

// Token streams
export {
  fromArray,
  fromString,
  fromIterator,
  fromIterable,
  isTokenStream,
  toStream,
  collect,
} from "./stream.js";
export type { TokenStream, Input } from "./stream.js";

// Messages and errors
export {
  END_OF_INPUT,
  EXPECTED_END_OF_INPUT,
  NO_CHOICE,
  indent,
  showToken,
  unexpectedToken,
  choiceFailure,
} from "./messages.js";
export { ParseError } from "./errors.js";

// Configuration and logging
export { config, LOG_LEVELS } from "./config.js";
export type { PledgeConfig, LogLevel } from "./config.js";
export { createLogger, trace } from "./logger.js";
export type { Logger } from "./logger.js";
