/**
 * Stateful lazy engine
 *
 * `LazyStateParser<S, T, A>` combines the demand-driven outcomes of
 * `LazyParser` with the threaded state of the stateful eager engine. State
 * follows the same rules: no rollback on failure, each alternative starts
 * from the pre-choice state, and a committed branch's state is final.
 *
 * Items read from `stream` carry the state as it stood when each item was
 * produced, so walking a prefix never shows state from work further along.
 */

import {
  END_OF_INPUT,
  EXPECTED_END_OF_INPUT,
  ParseError,
  statefulToolkit,
  toStream,
  trace,
  unexpectedToken,
  type Input,
  type Labeled,
  type Snapshot,
  type StatefulEngine,
  type StatefulToolkit,
  type StateRunResult,
  type Step,
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
  mapEnding,
  mapOutcome,
  orElse,
  runStateOutcome,
  Success,
  type Outcome,
} from "./outcome.js";
import { unfold } from "./streaming.js";

/**
 * Type-level function for `LazyStateParser<S, T, A>` with state and token types fixed.
 */
export interface LazyStateParserF<S, T> extends TypeFunction {
  readonly _: LazyStateParser<S, T, this["__kind__"]>;
}

type LazyStateOutcome<S, T, A> = Lazy<Outcome<Snapshot<T, S>, A>>;

/** An item read from `stream`, with the state it was produced in. */
export interface Produced<S, A> {
  readonly value: A;
  readonly state: S;
}

// ============================================================================
// LazyStateParser Type Definition
// ============================================================================

export class LazyStateParser<S, T, A> {
  constructor(private readonly run: (ctx: Snapshot<T, S>) => LazyStateOutcome<S, T, A>) {}

  apply(ctx: Snapshot<T, S>): LazyStateOutcome<S, T, A> {
    return this.run(ctx);
  }

  parse(input: Input<T>, state: S): StateRunResult<S, T, A> {
    const result = runStateOutcome(this.run({ input: toStream(input), state }));
    if (!result.ok) {
      trace("lazy-state", () => `parse failed at token ${result.rest.offset}: ${result.message}`);
    }
    return result;
  }

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

  map<B>(f: (a: A) => B): LazyStateParser<S, T, B> {
    return map(this, f);
  }

  flatMap<B>(f: (a: A) => LazyStateParser<S, T, B>): LazyStateParser<S, T, B> {
    return bind(this, f);
  }

  andThen<B>(next: LazyStateParser<S, T, B>): LazyStateParser<S, T, B> {
    return bind(this, () => next);
  }

  skip<B>(next: LazyStateParser<S, T, B>): LazyStateParser<S, T, A> {
    return bind(this, (a) => map(next, () => a));
  }

  onFail(alternative: LazyStateParser<S, T, A>): LazyStateParser<S, T, A> {
    return onFail(this, alternative);
  }

  commit(): LazyStateParser<S, T, A> {
    return commit(this);
  }

  adjustErr(f: (message: string) => string): LazyStateParser<S, T, A> {
    return adjustErr(this, f);
  }
}

// ============================================================================
// Primitives
// ============================================================================

export function pure<S, T, A>(a: A): LazyStateParser<S, T, A> {
  return new LazyStateParser((ctx) => Lazy.of(Success(Lazy.of(ctx), Lazy.of(a))));
}

export function fail<S, T, A = never>(message: string): LazyStateParser<S, T, A> {
  return new LazyStateParser<S, T, A>((ctx) => Lazy.of(Failure(ctx, message)));
}

export function map<S, T, A, B>(p: LazyStateParser<S, T, A>, f: (a: A) => B): LazyStateParser<S, T, B> {
  return new LazyStateParser((ctx) => mapOutcome(p.apply(ctx), f));
}

export function bind<S, T, A, B>(
  p: LazyStateParser<S, T, A>,
  f: (a: A) => LazyStateParser<S, T, B>,
): LazyStateParser<S, T, B> {
  return new LazyStateParser((ctx) => bindOutcome(p.apply(ctx), (rest, a) => f(a).apply(rest)));
}

export function commit<S, T, A>(p: LazyStateParser<S, T, A>): LazyStateParser<S, T, A> {
  return new LazyStateParser((ctx) => Lazy.of(Committed(Lazy.defer(() => p.apply(ctx).force()))));
}

export function adjustErr<S, T, A>(
  p: LazyStateParser<S, T, A>,
  f: (message: string) => string,
): LazyStateParser<S, T, A> {
  return new LazyStateParser((ctx) => adjustOutcome(p.apply(ctx), f));
}

export function onFail<S, T, A>(
  p: LazyStateParser<S, T, A>,
  q: LazyStateParser<S, T, A>,
): LazyStateParser<S, T, A> {
  return new LazyStateParser((ctx) => orElse(p.apply(ctx), () => q.apply(ctx)));
}

export function oneOfLabeled<S, T, A>(
  alternatives: ReadonlyArray<Labeled<LazyStateParser<S, T, A>>>,
): LazyStateParser<S, T, A> {
  const attempts = alternatives.map(
    ([label, p]): Labeled<(ctx: Snapshot<T, S>) => LazyStateOutcome<S, T, A>> => [label, (ctx) => p.apply(ctx)],
  );
  return new LazyStateParser((ctx) => firstOf(ctx, attempts, "lazy-state"));
}

export function tailRecM<S, T, L, B>(
  init: L,
  step: (state: L) => LazyStateParser<S, T, Step<L, B>>,
): LazyStateParser<S, T, B> {
  return new LazyStateParser((ctx) => loopOutcome(init, ctx, (loop, rest) => step(loop).apply(rest)));
}

export function next<S, T>(): LazyStateParser<S, T, T> {
  return new LazyStateParser((ctx) =>
    Lazy.defer<Outcome<Snapshot<T, S>, T>>(() => {
      const cell = ctx.input.uncons();
      return cell === undefined
        ? Failure(ctx, END_OF_INPUT)
        : Success(Lazy.of({ input: cell[1], state: ctx.state }), Lazy.of(cell[0]));
    }),
  );
}

export function eof<S, T>(): LazyStateParser<S, T, void> {
  return new LazyStateParser((ctx) =>
    Lazy.defer<Outcome<Snapshot<T, S>, void>>(() =>
      ctx.input.uncons() === undefined
        ? Success(Lazy.of(ctx), Lazy.of(undefined))
        : Failure(ctx, EXPECTED_END_OF_INPUT),
    ),
  );
}

export function satisfy<S, T>(predicate: (token: T) => boolean): LazyStateParser<S, T, T> {
  return new LazyStateParser((ctx) =>
    Lazy.defer<Outcome<Snapshot<T, S>, T>>(() => {
      const cell = ctx.input.uncons();
      if (cell === undefined) return Failure(ctx, END_OF_INPUT);
      const [token, rest] = cell;
      return predicate(token)
        ? Success(Lazy.of({ input: rest, state: ctx.state }), Lazy.of(token))
        : Failure(ctx, unexpectedToken(token));
    }),
  );
}

export function reparse<S, T>(tokens: readonly T[]): LazyStateParser<S, T, void> {
  return new LazyStateParser((ctx) =>
    Lazy.of(
      Success(
        Lazy.defer(() => ({ input: ctx.input.prepend(tokens), state: ctx.state })),
        Lazy.of(undefined),
      ),
    ),
  );
}

export function position<S, T>(): LazyStateParser<S, T, number> {
  return new LazyStateParser((ctx) => Lazy.of(Success(Lazy.of(ctx), Lazy.of(ctx.input.consumed))));
}

export function getState<S, T>(): LazyStateParser<S, T, S> {
  return new LazyStateParser((ctx) => Lazy.of(Success(Lazy.of(ctx), Lazy.of(ctx.state))));
}

export function putState<S, T>(state: S): LazyStateParser<S, T, void> {
  return new LazyStateParser((ctx) =>
    Lazy.of(Success(Lazy.of({ input: ctx.input, state }), Lazy.of(undefined))),
  );
}

/**
 * Failures of `p`, committed or not, report the state `p` started with.
 */
export function transactional<S, T, A>(p: LazyStateParser<S, T, A>): LazyStateParser<S, T, A> {
  return new LazyStateParser((ctx) => {
    const restore = (o: Outcome<Snapshot<T, S>, A>): Outcome<Snapshot<T, S>, A> => {
      switch (o._tag) {
        case "Success":
          return mapEnding(o, (e) => Failure({ input: e.rest.input, state: ctx.state }, e.message));
        case "Failure":
          return Failure({ input: o.rest.input, state: ctx.state }, o.message);
        case "Committed":
          return Committed<Snapshot<T, S>, A>(o.inner.map(restore));
      }
    };
    return p.apply(ctx).map(restore);
  });
}

// ============================================================================
// Streaming
// ============================================================================

/**
 * Repeat `p`, succeeding at once with a list of items parsed as the list is
 * read. See `stream` for the lazy engine; here each item also carries the
 * state it was produced in.
 */
export function stream<S, T, A>(p: LazyStateParser<S, T, A>): LazyStateParser<S, T, LazyList<Produced<S, A>>> {
  return new LazyStateParser((ctx) => {
    const { items, end, ending } = unfold(
      ctx,
      (z) => p.apply(z),
      (z) => z.input,
      (value: A, rest): Produced<S, A> => ({ value, state: rest.state }),
    );
    return Lazy.of(Success(end, Lazy.of(items), ending));
  });
}

/**
 * Yield each item with its state as soon as it has been parsed, and return the
 * leftover input with the final state.
 */
export function* parseStream<S, T, A>(
  p: LazyStateParser<S, T, A>,
  input: Input<T>,
  state: S,
): Generator<Produced<S, A>, Snapshot<T, S>, undefined> {
  const { items, end } = unfold(
    { input: toStream(input), state },
    (z) => p.apply(z),
    (z) => z.input,
    (value: A, rest): Produced<S, A> => ({ value, state: rest.state }),
  );
  yield* items;
  return end.force();
}

export function evaluate<S, T, A>(
  p: LazyStateParser<S, T, A>,
  input: Input<T>,
  state: S,
): LazyStateOutcome<S, T, A> {
  return p.apply({ input: toStream(input), state });
}

// ============================================================================
// Instances
// ============================================================================

export function lazyStateParserEngine<S, T>(): StatefulEngine<LazyStateParserF<S, T>, T, S> {
  return {
    pure: <A>(a: A): LazyStateParser<S, T, A> => pure<S, T, A>(a),
    fail: <A = never>(message: string): LazyStateParser<S, T, A> => fail<S, T, A>(message),
    map: <A, B>(p: LazyStateParser<S, T, A>, f: (a: A) => B): LazyStateParser<S, T, B> => map(p, f),
    bind: <A, B>(
      p: LazyStateParser<S, T, A>,
      f: (a: A) => LazyStateParser<S, T, B>,
    ): LazyStateParser<S, T, B> => bind(p, f),
    onFail: <A>(p: LazyStateParser<S, T, A>, q: LazyStateParser<S, T, A>): LazyStateParser<S, T, A> =>
      onFail(p, q),
    tailRecM: <L, B>(
      init: L,
      step: (state: L) => LazyStateParser<S, T, Step<L, B>>,
    ): LazyStateParser<S, T, B> => tailRecM(init, step),
    commit: <A>(p: LazyStateParser<S, T, A>): LazyStateParser<S, T, A> => commit(p),
    adjustErr: <A>(p: LazyStateParser<S, T, A>, f: (message: string) => string): LazyStateParser<S, T, A> =>
      adjustErr(p, f),
    oneOfLabeled: <A>(alternatives: ReadonlyArray<Labeled<LazyStateParser<S, T, A>>>): LazyStateParser<S, T, A> =>
      oneOfLabeled(alternatives),
    next: next<S, T>(),
    eof: eof<S, T>(),
    satisfy: (predicate: (token: T) => boolean): LazyStateParser<S, T, T> => satisfy(predicate),
    reparse: (tokens: readonly T[]): LazyStateParser<S, T, void> => reparse(tokens),
    position: position<S, T>(),
    getState: getState<S, T>(),
    putState: (state: S): LazyStateParser<S, T, void> => putState(state),
    transactional: <A>(p: LazyStateParser<S, T, A>): LazyStateParser<S, T, A> => transactional(p),
  };
}

export type LazyStateToolkit<S, T> = StatefulToolkit<LazyStateParserF<S, T>, T, S> & {
  stream<A>(p: LazyStateParser<S, T, A>): LazyStateParser<S, T, LazyList<Produced<S, A>>>;
};

/**
 * Primitives, derived combinators, state operations and `stream` for the
 * stateful lazy engine.
 */
export function lazyState<S, T = string>(): LazyStateToolkit<S, T> {
  return {
    ...statefulToolkit(lazyStateParserEngine<S, T>()),
    stream: <A>(p: LazyStateParser<S, T, A>): LazyStateParser<S, T, LazyList<Produced<S, A>>> => stream(p),
  };
}
