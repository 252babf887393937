/**
 * Eager engine
 *
 * `Parser<T, A>` maps the remaining tokens to a fully built
 * `Result<TokenStream<T>, A>` each time it is applied.
 */

import {
  adjustResult,
  bindResult,
  choiceFailure,
  Committed,
  END_OF_INPUT,
  EXPECTED_END_OF_INPUT,
  Failure,
  mapResult,
  ParseError,
  settle,
  Success,
  toRunResult,
  toStream,
  toolkit,
  trace,
  unexpectedToken,
  type Input,
  type Labeled,
  type ParserEngine,
  type Result,
  type RunResult,
  type Step,
  type TokenStream,
  type Toolkit,
  type TypeFunction,
} from "@pledge/core";

/**
 * Type-level function for `Parser<T, A>` with the token type fixed.
 */
export interface ParserF<T> extends TypeFunction {
  readonly _: Parser<T, this["__kind__"]>;
}

// ============================================================================
// Parser Type Definition
// ============================================================================

export class Parser<T, A> {
  constructor(private readonly run: (input: TokenStream<T>) => Result<TokenStream<T>, A>) {}

  /**
   * Apply to a remainder, keeping the commitment marker.
   */
  apply(input: TokenStream<T>): Result<TokenStream<T>, A> {
    return this.run(input);
  }

  /**
   * Run against an input and reduce to a plain outcome plus leftover input.
   */
  parse(input: Input<T>): RunResult<T, A> {
    const result = toRunResult(this.run(toStream(input)));
    if (!result.ok) {
      trace("eager", () => `parse failed at token ${result.rest.offset}: ${result.message}`);
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

  map<B>(f: (a: A) => B): Parser<T, B> {
    return map(this, f);
  }

  flatMap<B>(f: (a: A) => Parser<T, B>): Parser<T, B> {
    return bind(this, f);
  }

  /** Run `next` after this parser, keeping its value. */
  andThen<B>(next: Parser<T, B>): Parser<T, B> {
    return bind(this, () => next);
  }

  /** Run `next` after this parser, keeping this parser's value. */
  skip<B>(next: Parser<T, B>): Parser<T, A> {
    return bind(this, (a) => map(next, () => a));
  }

  onFail(alternative: Parser<T, A>): Parser<T, A> {
    return onFail(this, alternative);
  }

  commit(): Parser<T, A> {
    return commit(this);
  }

  adjustErr(f: (message: string) => string): Parser<T, A> {
    return adjustErr(this, f);
  }
}

// ============================================================================
// Primitives
// ============================================================================

export function pure<T, A>(a: A): Parser<T, A> {
  return new Parser((input) => Success(input, a));
}

export function fail<T, A = never>(message: string): Parser<T, A> {
  return new Parser((input) => Failure(input, message));
}

export function map<T, A, B>(p: Parser<T, A>, f: (a: A) => B): Parser<T, B> {
  return new Parser((input) => mapResult(p.apply(input), f));
}

export function bind<T, A, B>(p: Parser<T, A>, f: (a: A) => Parser<T, B>): Parser<T, B> {
  return new Parser((input) => bindResult(p.apply(input), (rest, a) => f(a).apply(rest)));
}

export function commit<T, A>(p: Parser<T, A>): Parser<T, A> {
  return new Parser((input) => Committed(p.apply(input)));
}

export function adjustErr<T, A>(p: Parser<T, A>, f: (message: string) => string): Parser<T, A> {
  return new Parser((input) => adjustResult(p.apply(input), f));
}

export function onFail<T, A>(p: Parser<T, A>, q: Parser<T, A>): Parser<T, A> {
  return new Parser((input) => {
    const r = p.apply(input);
    return r._tag === "Failure" ? q.apply(input) : r;
  });
}

export function oneOfLabeled<T, A>(alternatives: ReadonlyArray<Labeled<Parser<T, A>>>): Parser<T, A> {
  return new Parser((input) => {
    const failures: Array<[string, string]> = [];
    for (const [label, p] of alternatives) {
      const r = p.apply(input);
      if (r._tag !== "Failure") return r;
      trace("eager", () => `alternative "${label}" failed: ${r.message}`);
      failures.push([label, r.message]);
    }
    return Failure(input, choiceFailure(failures));
  });
}

export function tailRecM<T, S, B>(init: S, step: (state: S) => Parser<T, Step<S, B>>): Parser<T, B> {
  return new Parser((input) => {
    let state = init;
    let rest = input;
    let committed = false;
    for (;;) {
      const r = step(state).apply(rest);
      committed ||= r._tag === "Committed";
      const s = settle(r);
      if (s._tag === "Failure") {
        return committed ? Committed(s) : s;
      }
      if (s.value._tag === "Done") {
        const done = Success(s.rest, s.value.value);
        return committed ? Committed(done) : done;
      }
      state = s.value.state;
      rest = s.rest;
    }
  });
}

export function next<T>(): Parser<T, T> {
  return new Parser((input) => {
    const cell = input.uncons();
    return cell === undefined ? Failure(input, END_OF_INPUT) : Success(cell[1], cell[0]);
  });
}

export function eof<T>(): Parser<T, void> {
  return new Parser((input) =>
    input.uncons() === undefined ? Success(input, undefined) : Failure(input, EXPECTED_END_OF_INPUT),
  );
}

export function satisfy<T>(predicate: (token: T) => boolean): Parser<T, T> {
  return new Parser((input) => {
    const cell = input.uncons();
    if (cell === undefined) return Failure(input, END_OF_INPUT);
    const [token, rest] = cell;
    return predicate(token) ? Success(rest, token) : Failure(input, unexpectedToken(token));
  });
}

export function reparse<T>(tokens: readonly T[]): Parser<T, void> {
  return new Parser((input) => Success(input.prepend(tokens), undefined));
}

export function position<T>(): Parser<T, number> {
  return new Parser((input) => Success(input, input.consumed));
}

// ============================================================================
// Instances
// ============================================================================

export function parserEngine<T>(): ParserEngine<ParserF<T>, T> {
  return {
    pure: <A>(a: A): Parser<T, A> => pure<T, A>(a),
    fail: <A = never>(message: string): Parser<T, A> => fail<T, A>(message),
    map: <A, B>(p: Parser<T, A>, f: (a: A) => B): Parser<T, B> => map(p, f),
    bind: <A, B>(p: Parser<T, A>, f: (a: A) => Parser<T, B>): Parser<T, B> => bind(p, f),
    onFail: <A>(p: Parser<T, A>, q: Parser<T, A>): Parser<T, A> => onFail(p, q),
    tailRecM: <S, B>(init: S, step: (state: S) => Parser<T, Step<S, B>>): Parser<T, B> =>
      tailRecM(init, step),
    commit: <A>(p: Parser<T, A>): Parser<T, A> => commit(p),
    adjustErr: <A>(p: Parser<T, A>, f: (message: string) => string): Parser<T, A> => adjustErr(p, f),
    oneOfLabeled: <A>(alternatives: ReadonlyArray<Labeled<Parser<T, A>>>): Parser<T, A> =>
      oneOfLabeled(alternatives),
    next: next<T>(),
    eof: eof<T>(),
    satisfy: (predicate: (token: T) => boolean): Parser<T, T> => satisfy(predicate),
    reparse: (tokens: readonly T[]): Parser<T, void> => reparse(tokens),
    position: position<T>(),
  };
}

/**
 * Primitives and derived combinators for the eager engine.
 *
 * @example
 * ```typescript
 * const P = eager<string>();
 * const digit = P.satisfy((c) => c >= "0" && c <= "9");
 * P.many(digit).parse("123abc"); // → { ok: true, value: ["1", "2", "3"], rest: ... }
 * ```
 */
export function eager<T = string>(): Toolkit<ParserF<T>, T> {
  return toolkit(parserEngine<T>());
}
