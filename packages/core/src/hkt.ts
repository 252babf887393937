/**
 * Higher-Kinded Types for @pledge/core
 *
 * Every engine has its own parser type (`Parser<T, A>`, `StateParser<S, T, A>`,
 * `LazyParser<T, A>`, ...). The generic combinator layer is written once
 * against a type-level function `F` whose application `$<F, A>` is the
 * engine's parser producing an `A`.
 *
 * ## Encoding
 *
 * A type-level function is an interface whose `_` member mentions
 * `this["__kind__"]`. Applying it intersects the interface with the argument
 * and reads `_` back:
 *
 * ```typescript
 * interface ParserF<T> extends TypeFunction {
 *   readonly _: Parser<T, this["__kind__"]>;
 * }
 *
 * type P = $<ParserF<string>, number>; // → Parser<string, number>
 * ```
 *
 * Multi-parameter parser types fix every parameter except the produced value.
 */

/**
 * Base shape of a type-level function.
 */
export interface TypeFunction {
  readonly __kind__: unknown;
  readonly _: unknown;
}

/**
 * Apply the type-level function `F` to `A`.
 */
export type $<F extends TypeFunction, A> = (F & { readonly __kind__: A })["_"];
