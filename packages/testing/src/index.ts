/**
 * @pledge/testing
 *
 * Shared vitest suites for parser engines. An engine package proves it
 * behaves like every other engine by running `describeEngine` with a harness
 * for its own parser type.
 *
 * @example
 * ```typescript
 * import { describeEngine } from "@pledge/testing";
 *
 * describeEngine<ParserF<string>>({
 *   name: "eager",
 *   kit: eager<string>(),
 *   run: <A>(p: Parser<string, A>, input: string) => p.parse(input),
 *   tag: <A>(p: Parser<string, A>, input: string) => p.apply(fromString(input))._tag,
 * });
 * ```
 *
 * @module
 */

export { describeEngine, view } from "./conformance.js";
export type { EngineHarness, Tag, View } from "./conformance.js";
