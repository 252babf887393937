/**
 * Stateful eager engine
 *
 * `StateParser<S, T, A>` threads a caller-defined state `S` alongside the
 * remaining tokens. Every result carries the state it finished with, failures
 * included.
 *
 * State is not rolled back: a failure reports the state as it stood when the
 * failure happened. A choice hands each alternative the state the choice began
 * with, and once a branch is committed its state is the one that survives.
 * `transactional` opts a parser into reporting its starting state on failure.
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
  statefulToolkit,
  Success,
  toStateRunResult,
  toStream,
  trace,
  unexpectedToken,
  type Input,
  type Labeled,
  type Result,
  type Snapshot,
  type StatefulEngine,
  type StatefulToolkit,
  type StateRunResult,
  type Step,
  type TypeFunction,
} from "@pledge/core";

/**
 * Type-level function for `StateParser<S, T, A>` with state and token types fixed.
 */
export interface StateParserF<S, T> extends TypeFunction {
  readonly _: StateParser<S, T, this["__kind__"]>;
}

type StateResult<S, T, A> = Result<Snapshot<T, S>, A>;

// ============================================================================
// StateParser Type Definition
// ============================================================================

export class StateParser<S, T, A> {
  constructor(private readonly run: (ctx: Snapshot<T, S>) => StateResult<S, T, A>) {}

  /**
   * Apply to a remainder and state, keeping the commitment marker.
   */
  apply(ctx: Snapshot<T, S>): StateResult<S, T, A> {
    return this.run(ctx);
  }

  /**
   * Run from an initial state; reduce to a plain outcome, leftover input and
   * final state.
   */
  parse(input: Input<T>, state: S): StateRunResult<S, T, A> {
    const result = toStateRunResult(this.run({ input: toStream(input), state }));
    if (!result.ok) {
      trace("eager-state", () => `parse failed at token ${result.rest.offset}: ${result.message}`);
    }
    return result;
  }

  /**
   * Parse the whole input and return the value with the final state.
   */
  parseAll(input: Input<T>, state: S): { value: A; state: S } {
    const result = this.parse(input, state);
    if (!result.ok) {
      throw new ParseError(result.message, result.rest.offset);
    }
    if (result.rest.uncons() !== undefined) {
      throw new ParseError(EXPECTED_END_OF_INPUT, result.rest.offset);
    }
    return { value: result.value, state: result.state };
  }

  map<B>(f: (a: A) => B): StateParser<S, T, B> {
    return map(this, f);
  }

  flatMap<B>(f: (a: A) => StateParser<S, T, B>): StateParser<S, T, B> {
    return bind(this, f);
  }

  andThen<B>(next: StateParser<S, T, B>): StateParser<S, T, B> {
    return bind(this, () => next);
  }

  skip<B>(next: StateParser<S, T, B>): StateParser<S, T, A> {
    return bind(this, (a) => map(next, () => a));
  }

  onFail(alternative: StateParser<S, T, A>): StateParser<S, T, A> {
    return onFail(this, alternative);
  }

  commit(): StateParser<S, T, A> {
    return commit(this);
  }

  adjustErr(f: (message: string) => string): StateParser<S, T, A> {
    return adjustErr(this, f);
  }
}

// ============================================================================
// Primitives
// ============================================================================

export function pure<S, T, A>(a: A): StateParser<S, T, A> {
  return new StateParser((ctx) => Success(ctx, a));
}

export function fail<S, T, A = never>(message: string): StateParser<S, T, A> {
  return new StateParser((ctx) => Failure(ctx, message));
}

export function map<S, T, A, B>(p: StateParser<S, T, A>, f: (a: A) => B): StateParser<S, T, B> {
  return new StateParser((ctx) => mapResult(p.apply(ctx), f));
}

export function bind<S, T, A, B>(
  p: StateParser<S, T, A>,
  f: (a: A) => StateParser<S, T, B>,
): StateParser<S, T, B> {
  return new StateParser((ctx) => bindResult(p.apply(ctx), (rest, a) => f(a).apply(rest)));
}

export function commit<S, T, A>(p: StateParser<S, T, A>): StateParser<S, T, A> {
  return new StateParser((ctx) => Committed(p.apply(ctx)));
}

export function adjustErr<S, T, A>(
  p: StateParser<S, T, A>,
  f: (message: string) => string,
): StateParser<S, T, A> {
  return new StateParser((ctx) => adjustResult(p.apply(ctx), f));
}

export function onFail<S, T, A>(p: StateParser<S, T, A>, q: StateParser<S, T, A>): StateParser<S, T, A> {
  return new StateParser((ctx) => {
    const r = p.apply(ctx);
    return r._tag === "Failure" ? q.apply(ctx) : r;
  });
}

export function oneOfLabeled<S, T, A>(
  alternatives: ReadonlyArray<Labeled<StateParser<S, T, A>>>,
): StateParser<S, T, A> {
  return new StateParser((ctx) => {
    const failures: Array<[string, string]> = [];
    for (const [label, p] of alternatives) {
      const r = p.apply(ctx);
      if (r._tag !== "Failure") return r;
      trace("eager-state", () => `alternative "${label}" failed: ${r.message}`);
      failures.push([label, r.message]);
    }
    return Failure(ctx, choiceFailure(failures));
  });
}

export function tailRecM<S, T, L, B>(
  init: L,
  step: (state: L) => StateParser<S, T, Step<L, B>>,
): StateParser<S, T, B> {
  return new StateParser((ctx) => {
    let loop = init;
    let rest = ctx;
    let committed = false;
    for (;;) {
      const r = step(loop).apply(rest);
      committed ||= r._tag === "Committed";
      const s = settle(r);
      if (s._tag === "Failure") {
        return committed ? Committed(s) : s;
      }
      if (s.value._tag === "Done") {
        const done = Success(s.rest, s.value.value);
        return committed ? Committed(done) : done;
      }
      loop = s.value.state;
      rest = s.rest;
    }
  });
}

export function next<S, T>(): StateParser<S, T, T> {
  return new StateParser((ctx) => {
    const cell = ctx.input.uncons();
    return cell === undefined
      ? Failure(ctx, END_OF_INPUT)
      : Success({ input: cell[1], state: ctx.state }, cell[0]);
  });
}

export function eof<S, T>(): StateParser<S, T, void> {
  return new StateParser((ctx) =>
    ctx.input.uncons() === undefined ? Success(ctx, undefined) : Failure(ctx, EXPECTED_END_OF_INPUT),
  );
}

export function satisfy<S, T>(predicate: (token: T) => boolean): StateParser<S, T, T> {
  return new StateParser((ctx) => {
    const cell = ctx.input.uncons();
    if (cell === undefined) return Failure(ctx, END_OF_INPUT);
    const [token, rest] = cell;
    return predicate(token)
      ? Success({ input: rest, state: ctx.state }, token)
      : Failure(ctx, unexpectedToken(token));
  });
}

export function reparse<S, T>(tokens: readonly T[]): StateParser<S, T, void> {
  return new StateParser((ctx) => Success({ input: ctx.input.prepend(tokens), state: ctx.state }, undefined));
}

export function position<S, T>(): StateParser<S, T, number> {
  return new StateParser((ctx) => Success(ctx, ctx.input.consumed));
}

export function getState<S, T>(): StateParser<S, T, S> {
  return new StateParser((ctx) => Success(ctx, ctx.state));
}

export function putState<S, T>(state: S): StateParser<S, T, void> {
  return new StateParser((ctx) => Success({ input: ctx.input, state }, undefined));
}

/**
 * Failures of `p`, committed or not, report the state `p` started with.
 */
export function transactional<S, T, A>(p: StateParser<S, T, A>): StateParser<S, T, A> {
  return new StateParser((ctx) => {
    const r = p.apply(ctx);
    const s = settle(r);
    if (s._tag === "Success") return r;
    const restored = Failure({ input: s.rest.input, state: ctx.state }, s.message);
    return r._tag === "Committed" ? Committed(restored) : restored;
  });
}

// ============================================================================
// Instances
// ============================================================================

export function stateParserEngine<S, T>(): StatefulEngine<StateParserF<S, T>, T, S> {
  return {
    pure: <A>(a: A): StateParser<S, T, A> => pure<S, T, A>(a),
    fail: <A = never>(message: string): StateParser<S, T, A> => fail<S, T, A>(message),
    map: <A, B>(p: StateParser<S, T, A>, f: (a: A) => B): StateParser<S, T, B> => map(p, f),
    bind: <A, B>(p: StateParser<S, T, A>, f: (a: A) => StateParser<S, T, B>): StateParser<S, T, B> =>
      bind(p, f),
    onFail: <A>(p: StateParser<S, T, A>, q: StateParser<S, T, A>): StateParser<S, T, A> => onFail(p, q),
    tailRecM: <L, B>(init: L, step: (state: L) => StateParser<S, T, Step<L, B>>): StateParser<S, T, B> =>
      tailRecM(init, step),
    commit: <A>(p: StateParser<S, T, A>): StateParser<S, T, A> => commit(p),
    adjustErr: <A>(p: StateParser<S, T, A>, f: (message: string) => string): StateParser<S, T, A> =>
      adjustErr(p, f),
    oneOfLabeled: <A>(alternatives: ReadonlyArray<Labeled<StateParser<S, T, A>>>): StateParser<S, T, A> =>
      oneOfLabeled(alternatives),
    next: next<S, T>(),
    eof: eof<S, T>(),
    satisfy: (predicate: (token: T) => boolean): StateParser<S, T, T> => satisfy(predicate),
    reparse: (tokens: readonly T[]): StateParser<S, T, void> => reparse(tokens),
    position: position<S, T>(),
    getState: getState<S, T>(),
    putState: (state: S): StateParser<S, T, void> => putState(state),
    transactional: <A>(p: StateParser<S, T, A>): StateParser<S, T, A> => transactional(p),
  };
}

/**
 * Primitives, derived combinators and state operations for the stateful
 * eager engine.
 *
 * @example
 * ```typescript
 * const P = eagerState<number>();
 * const counted = P.bind(P.next, (c) => P.map(P.modifyState((n) => n + 1), () => c));
 * P.many(counted).parse("abc", 0); // → { ok: true, value: ["a", "b", "c"], state: 3, ... }
 * ```
 */
export function eagerState<S, T = string>(): StatefulToolkit<StateParserF<S, T>, T, S> {
  return statefulToolkit(stateParserEngine<S, T>());
}
