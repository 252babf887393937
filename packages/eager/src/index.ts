/**
 * @pledge/eager
 *
 * Engines that build each result in full when a parser is applied.
 *
 * @module
 */

export { Parser, eager, parserEngine } from "./parser.js";
export type { ParserF } from "./parser.js";

export { StateParser, eagerState, stateParserEngine, transactional } from "./state-parser.js";
export type { StateParserF } from "./state-parser.js";
