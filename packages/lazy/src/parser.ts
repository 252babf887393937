/**
 * Lazy engine
 *
 * `LazyParser<T, A>` produces a `Lazy<Outcome>` when applied. Applying a
 * parser does no work; forcing the outcome runs just enough of the parser to
 * decide its tag. A committed parser reports its commitment before it runs,
 * mapped values are computed on demand, and `stream` turns repetition into a
 * list that is parsed as it is read.
 */

import {
  END_OF_INPUT,
  EXPECTED_END_OF_INPUT,
  ParseError,
  toStream,
  toolkit,
  trace,
  unexpectedToken,
  type Input,
  type Labeled,
  type ParserEngine,
  type RunResult,
  type Step,
  type TokenStream,
  type Toolkit,
  type TypeFunction,
} from "@pledge/core";
import { Lazy } from "./lazy.js";
import type { LazyList } from "./list.js";
import {
  adjustOutcome,
  bindOutcome,
  Committed,
  Failure,
  firstOf,
  loopOutcome,
  mapOutcome,
  orElse,
  runOutcome,
  Success,
  type Outcome,
} from "./outcome.js";
import { unfold } from "./streaming.js";

/**
 * Type-level function for `LazyParser<T, A>` with the token type fixed.
 */
export interface LazyParserF<T> extends TypeFunction {
  readonly _: LazyParser<T, this["__kind__"]>;
}

type LazyOutcome<T, A> = Lazy<Outcome<TokenStream<T>, A>>;

// ============================================================================
// LazyParser Type Definition
// ============================================================================

export class LazyParser<T, A> {
  constructor(private readonly run: (input: TokenStream<T>) => LazyOutcome<T, A>) {}

  /**
   * Apply to a remainder. Nothing runs until the outcome is forced.
   */
  apply(input: TokenStream<T>): LazyOutcome<T, A> {
    return this.run(input);
  }

  /**
   * Force the whole outcome and reduce it to a plain outcome plus leftover
   * input.
   */
  parse(input: Input<T>): RunResult<T, A> {
    const result = runOutcome(this.run(toStream(input)));
    if (!result.ok) {
      trace("lazy", () => `parse failed at token ${result.rest.offset}: ${result.message}`);
    }
    return result;
  }

  /**
   * Parse the whole input, throwing a `ParseError` on failure or leftover input.
   */
  parseAll(input: Input<T>): A {
    const result = this.parse(input);
    if (!result.ok) {
      throw new ParseError(result.message, result.rest.offset);
    }
    if (result.rest.uncons() !== undefined) {
      throw new ParseError(EXPECTED_END_OF_INPUT, result.rest.offset);
    }
    return result.value;
  }

  map<B>(f: (a: A) => B): LazyParser<T, B> {
    return map(this, f);
  }

  flatMap<B>(f: (a: A) => LazyParser<T, B>): LazyParser<T, B> {
    return bind(this, f);
  }

  andThen<B>(next: LazyParser<T, B>): LazyParser<T, B> {
    return bind(this, () => next);
  }

  skip<B>(next: LazyParser<T, B>): LazyParser<T, A> {
    return bind(this, (a) => map(next, () => a));
  }

  onFail(alternative: LazyParser<T, A>): LazyParser<T, A> {
    return onFail(this, alternative);
  }

  commit(): LazyParser<T, A> {
    return commit(this);
  }

  adjustErr(f: (message: string) => string): LazyParser<T, A> {
    return adjustErr(this, f);
  }
}

// ============================================================================
// Primitives
// ============================================================================

export function pure<T, A>(a: A): LazyParser<T, A> {
  return new LazyParser((input) => Lazy.of(Success(Lazy.of(input), Lazy.of(a))));
}

export function fail<T, A = never>(message: string): LazyParser<T, A> {
  return new LazyParser<T, A>((input) => Lazy.of(Failure(input, message)));
}

export function map<T, A, B>(p: LazyParser<T, A>, f: (a: A) => B): LazyParser<T, B> {
  return new LazyParser((input) => mapOutcome(p.apply(input), f));
}

export function bind<T, A, B>(p: LazyParser<T, A>, f: (a: A) => LazyParser<T, B>): LazyParser<T, B> {
  return new LazyParser((input) => bindOutcome(p.apply(input), (rest, a) => f(a).apply(rest)));
}

/** The committed tag is known without running `p`. */
export function commit<T, A>(p: LazyParser<T, A>): LazyParser<T, A> {
  return new LazyParser((input) => Lazy.of(Committed(Lazy.defer(() => p.apply(input).force()))));
}

export function adjustErr<T, A>(p: LazyParser<T, A>, f: (message: string) => string): LazyParser<T, A> {
  return new LazyParser((input) => adjustOutcome(p.apply(input), f));
}

export function onFail<T, A>(p: LazyParser<T, A>, q: LazyParser<T, A>): LazyParser<T, A> {
  return new LazyParser((input) => orElse(p.apply(input), () => q.apply(input)));
}

export function oneOfLabeled<T, A>(alternatives: ReadonlyArray<Labeled<LazyParser<T, A>>>): LazyParser<T, A> {
  const attempts = alternatives.map(
    ([label, p]): Labeled<(input: TokenStream<T>) => LazyOutcome<T, A>> => [label, (input) => p.apply(input)],
  );
  return new LazyParser((input) => firstOf(input, attempts, "lazy"));
}

export function tailRecM<T, S, B>(init: S, step: (state: S) => LazyParser<T, Step<S, B>>): LazyParser<T, B> {
  return new LazyParser((input) => loopOutcome(init, input, (state, rest) => step(state).apply(rest)));
}

export function next<T>(): LazyParser<T, T> {
  return new LazyParser((input) =>
    Lazy.defer<Outcome<TokenStream<T>, T>>(() => {
      const cell = input.uncons();
      return cell === undefined ? Failure(input, END_OF_INPUT) : Success(Lazy.of(cell[1]), Lazy.of(cell[0]));
    }),
  );
}

export function eof<T>(): LazyParser<T, void> {
  return new LazyParser((input) =>
    Lazy.defer<Outcome<TokenStream<T>, void>>(() =>
      input.uncons() === undefined
        ? Success(Lazy.of(input), Lazy.of(undefined))
        : Failure(input, EXPECTED_END_OF_INPUT),
    ),
  );
}

export function satisfy<T>(predicate: (token: T) => boolean): LazyParser<T, T> {
  return new LazyParser((input) =>
    Lazy.defer<Outcome<TokenStream<T>, T>>(() => {
      const cell = input.uncons();
      if (cell === undefined) return Failure(input, END_OF_INPUT);
      const [token, rest] = cell;
      return predicate(token) ? Success(Lazy.of(rest), Lazy.of(token)) : Failure(input, unexpectedToken(token));
    }),
  );
}

export function reparse<T>(tokens: readonly T[]): LazyParser<T, void> {
  return new LazyParser((input) => Lazy.of(Success(Lazy.defer(() => input.prepend(tokens)), Lazy.of(undefined))));
}

export function position<T>(): LazyParser<T, number> {
  return new LazyParser((input) => Lazy.of(Success(Lazy.of(input), Lazy.of(input.consumed))));
}

// ============================================================================
// Streaming
// ============================================================================

/**
 * Repeat `p`, succeeding at once with a list whose items are parsed as the
 * list is read. The list ends at the first plain failure of `p`, or before a
 * match that consumed no input; a committed failure throws `ParseError` when
 * the list reaches it. The remainder is known once the list has been read to
 * its end.
 *
 * Whatever runs after the stream sees the same commitment `many(p)` would
 * give it: committed if any item committed, and a committed failure if an
 * item failed after committing.
 */
export function stream<T, A>(p: LazyParser<T, A>): LazyParser<T, LazyList<A>> {
  return new LazyParser((input) => {
    const { items, end, ending } = unfold(
      input,
      (z) => p.apply(z),
      (z) => z,
      (value: A) => value,
    );
    return Lazy.of(Success(end, Lazy.of(items), ending));
  });
}

/**
 * Yield each item of `stream(p)` as soon as it has been parsed, and return
 * the leftover input.
 *
 * @example
 * ```typescript
 * const P = lazy<number>();
 * for (const n of parseStream(P.next, readings())) {
 *   if (n < 0) break; // no further readings are pulled
 * }
 * ```
 */
export function* parseStream<T, A>(p: LazyParser<T, A>, input: Input<T>): Generator<A, TokenStream<T>, undefined> {
  const { items, end } = unfold(
    toStream(input),
    (z) => p.apply(z),
    (z) => z,
    (value: A) => value,
  );
  yield* items;
  return end.force();
}

/**
 * Apply `p` to an input and hand back the unforced outcome.
 */
export function evaluate<T, A>(p: LazyParser<T, A>, input: Input<T>): LazyOutcome<T, A> {
  return p.apply(toStream(input));
}

// ============================================================================
// Instances
// ============================================================================

export function lazyParserEngine<T>(): ParserEngine<LazyParserF<T>, T> {
  return {
    pure: <A>(a: A): LazyParser<T, A> => pure<T, A>(a),
    fail: <A = never>(message: string): LazyParser<T, A> => fail<T, A>(message),
    map: <A, B>(p: LazyParser<T, A>, f: (a: A) => B): LazyParser<T, B> => map(p, f),
    bind: <A, B>(p: LazyParser<T, A>, f: (a: A) => LazyParser<T, B>): LazyParser<T, B> => bind(p, f),
    onFail: <A>(p: LazyParser<T, A>, q: LazyParser<T, A>): LazyParser<T, A> => onFail(p, q),
    tailRecM: <S, B>(init: S, step: (state: S) => LazyParser<T, Step<S, B>>): LazyParser<T, B> =>
      tailRecM(init, step),
    commit: <A>(p: LazyParser<T, A>): LazyParser<T, A> => commit(p),
    adjustErr: <A>(p: LazyParser<T, A>, f: (message: string) => string): LazyParser<T, A> => adjustErr(p, f),
    oneOfLabeled: <A>(alternatives: ReadonlyArray<Labeled<LazyParser<T, A>>>): LazyParser<T, A> =>
      oneOfLabeled(alternatives),
    next: next<T>(),
    eof: eof<T>(),
    satisfy: (predicate: (token: T) => boolean): LazyParser<T, T> => satisfy(predicate),
    reparse: (tokens: readonly T[]): LazyParser<T, void> => reparse(tokens),
    position: position<T>(),
  };
}

export type LazyToolkit<T> = Toolkit<LazyParserF<T>, T> & {
  stream<A>(p: LazyParser<T, A>): LazyParser<T, LazyList<A>>;
};

/**
 * Primitives, derived combinators and `stream` for the lazy engine.
 *
 * @example
 * ```typescript
 * const P = lazy<string>();
 * const word = P.many1(P.satisfy((c) => c !== " ")).skip(P.optional(P.exact(" ")));
 * const words = parseStream(word, "to be or not");
 * words.next().value; // → ["t", "o"]; "be or not" is not parsed yet
 * ```
 */
export function lazy<T = string>(): LazyToolkit<T> {
  return {
    ...toolkit(lazyParserEngine<T>()),
    stream: <A>(p: LazyParser<T, A>): LazyParser<T, LazyList<A>> => stream(p),
  };
}
