/**
 * Generic combinators
 *
 * Written once against the primitive set of `ParserEngine` and shared by all
 * engines. Repetition is built on `tailRecM`, so long inputs do not grow the
 * call stack, and every repetition stops when an iteration succeeds without
 * consuming input.
 */

import type { $, TypeFunction } from "./hkt.js";
import { Continue, Done, type ParserEngine, type StatefulEngine, type Step } from "./engine.js";
import { indent, NO_CHOICE, showToken } from "./messages.js";

// ============================================================================
// Types
// ============================================================================

type BinOp<A> = (left: A, right: A) => A;

export interface Combinators<F extends TypeFunction, T> {
  /** Alias of `next`. */
  readonly token: $<F, T>;
  /** Alias of `next`. */
  readonly anyToken: $<F, T>;
  /** Alias of `eof`. */
  readonly endOfInput: $<F, void>;

  apply<A, B>(pf: $<F, (a: A) => B>, pa: $<F, A>): $<F, B>;
  /** Run both, keep the first value. */
  discard<A, B>(pa: $<F, A>, pb: $<F, B>): $<F, A>;
  /** Run both, keep the second value. */
  andThen<A, B>(pa: $<F, A>, pb: $<F, B>): $<F, B>;
  pair<A, B>(pa: $<F, A>, pb: $<F, B>): $<F, [A, B]>;
  sequence<A>(ps: ReadonlyArray<$<F, A>>): $<F, A[]>;
  /** Build the parser on first use; for recursive grammars. */
  defer<A>(thunk: () => $<F, A>): $<F, A>;

  /** A failure no choice can recover from. */
  failBad<A = never>(message: string): $<F, A>;
  adjustErrBad<A>(p: $<F, A>, f: (message: string) => string): $<F, A>;
  /** Unlabeled choice: the first alternative not to fail plainly. */
  oneOf<A>(ps: ReadonlyArray<$<F, A>>): $<F, A>;

  satisfyMsg(predicate: (token: T) => boolean, message: string): $<F, T>;
  /** One token equal (`===`) to `expected`. */
  exact(expected: T): $<F, T>;
  literal(expected: Iterable<T>): $<F, T[]>;

  optional<A>(p: $<F, A>): $<F, A | null>;
  option<A>(fallback: A, p: $<F, A>): $<F, A>;
  many<A>(p: $<F, A>): $<F, A[]>;
  many1<A>(p: $<F, A>): $<F, A[]>;
  skipMany<A>(p: $<F, A>): $<F, void>;
  exactly<A>(n: number, p: $<F, A>): $<F, A[]>;
  upto<A>(n: number, p: $<F, A>): $<F, A[]>;
  sepBy<A, Sep>(p: $<F, A>, sep: $<F, Sep>): $<F, A[]>;
  sepBy1<A, Sep>(p: $<F, A>, sep: $<F, Sep>): $<F, A[]>;
  bracket<Open, Close, A>(open: $<F, Open>, close: $<F, Close>, p: $<F, A>): $<F, A>;
  bracketSep<Open, Sep, Close, A>(
    open: $<F, Open>,
    sep: $<F, Sep>,
    close: $<F, Close>,
    p: $<F, A>,
  ): $<F, A[]>;
  /** Items until the terminator; fails listing both if neither matches. */
  manyFinally<A, Z>(p: $<F, A>, terminator: $<F, Z>): $<F, A[]>;

  chainl1<A>(p: $<F, A>, op: $<F, BinOp<A>>): $<F, A>;
  chainr1<A>(p: $<F, A>, op: $<F, BinOp<A>>): $<F, A>;
  chainl<A>(p: $<F, A>, op: $<F, BinOp<A>>, fallback: A): $<F, A>;
  chainr<A>(p: $<F, A>, op: $<F, BinOp<A>>, fallback: A): $<F, A>;
}

export interface StatefulCombinators<F extends TypeFunction, S> {
  modifyState(f: (state: S) => S): $<F, void>;
  queryState<A>(f: (state: S) => A): $<F, A>;
}

export type Toolkit<F extends TypeFunction, T> = ParserEngine<F, T> & Combinators<F, T>;

export type StatefulToolkit<F extends TypeFunction, T, S> = StatefulEngine<F, T, S> &
  Combinators<F, T> &
  StatefulCombinators<F, S>;

// ============================================================================
// Accumulators
// ============================================================================

/** Newest-first list, so each iteration adds one cell without copying. */
type Stack<A> = { readonly head: A; readonly tail: Stack<A> } | null;

function push<A>(tail: Stack<A>, head: A): Stack<A> {
  return { head, tail };
}

function toArray<A>(stack: Stack<A>): A[] {
  const out: A[] = [];
  for (let s = stack; s !== null; s = s.tail) out.push(s.head);
  return out.reverse();
}

// ============================================================================
// Derivation
// ============================================================================

export function derive<F extends TypeFunction, T>(E: ParserEngine<F, T>): Combinators<F, T> {
  const andThen = <A, B>(pa: $<F, A>, pb: $<F, B>): $<F, B> => E.bind<A, B>(pa, () => pb);

  const discard = <A, B>(pa: $<F, A>, pb: $<F, B>): $<F, A> =>
    E.bind<A, A>(pa, (a) => E.map<B, A>(pb, () => a));

  const pair = <A, B>(pa: $<F, A>, pb: $<F, B>): $<F, [A, B]> =>
    E.bind<A, [A, B]>(pa, (a) => E.map<B, [A, B]>(pb, (b) => [a, b]));

  const adjustErrBad = <A>(p: $<F, A>, f: (message: string) => string): $<F, A> =>
    E.commit<A>(E.adjustErr<A>(p, f));

  /**
   * Fold successive matches of `p` into `init`. Stops at the first plain
   * failure, or before an iteration that consumed nothing.
   */
  const repeatFold = <A, B>(p: $<F, A>, init: B, f: (acc: B, a: A) => B): $<F, B> =>
    E.tailRecM<B, B>(init, (acc) =>
      E.onFail<Step<B, B>>(
        E.bind<number, Step<B, B>>(E.position, (before) =>
          E.bind<A, Step<B, B>>(p, (a) =>
            E.map<number, Step<B, B>>(E.position, (after) =>
              after === before ? Done(acc) : Continue(f(acc, a)),
            ),
          ),
        ),
        E.pure<Step<B, B>>(Done(acc)),
      ),
    );

  const many = <A>(p: $<F, A>): $<F, A[]> =>
    E.map<Stack<A>, A[]>(repeatFold<A, Stack<A>>(p, null, push), toArray);

  const many1 = <A>(p: $<F, A>): $<F, A[]> =>
    E.bind<A, A[]>(
      E.adjustErr<A>(p, (m) => `In a sequence:\n${indent(m)}`),
      (x) => E.map<A[], A[]>(many<A>(p), (xs) => [x, ...xs]),
    );

  const sepBy1 = <A, Sep>(p: $<F, A>, sep: $<F, Sep>): $<F, A[]> =>
    E.adjustErr<A[]>(
      E.bind<A, A[]>(p, (x) => E.map<A[], A[]>(many<A>(andThen<Sep, A>(sep, p)), (xs) => [x, ...xs])),
      (m) => `When looking for a non-empty sequence with separators:\n${indent(m)}`,
    );

  const manyFinally = <A, Z>(p: $<F, A>, terminator: $<F, Z>): $<F, A[]> =>
    E.tailRecM<Stack<A>, A[]>(null, (acc) =>
      E.oneOfLabeled<Step<Stack<A>, A[]>>([
        [
          "item in a sequence",
          E.bind<number, Step<Stack<A>, A[]>>(E.position, (before) =>
            E.bind<A, Step<Stack<A>, A[]>>(p, (a) =>
              E.bind<number, Step<Stack<A>, A[]>>(E.position, (after) =>
                after === before
                  ? E.fail<Step<Stack<A>, A[]>>("item consumed no input")
                  : E.pure<Step<Stack<A>, A[]>>(Continue(push(acc, a))),
              ),
            ),
          ),
        ],
        ["sequence terminator", E.map<Z, Step<Stack<A>, A[]>>(terminator, () => Done(toArray(acc)))],
      ]),
    );

  const chainl1 = <A>(p: $<F, A>, op: $<F, BinOp<A>>): $<F, A> =>
    E.bind<A, A>(p, (x) =>
      repeatFold<[BinOp<A>, A], A>(pair<BinOp<A>, A>(op, p), x, (acc, [f, y]) => f(acc, y)),
    );

  const chainr1 = <A>(p: $<F, A>, op: $<F, BinOp<A>>): $<F, A> =>
    E.bind<A, A>(p, (x) =>
      E.map<Stack<[BinOp<A>, A]>, A>(
        repeatFold<[BinOp<A>, A], Stack<[BinOp<A>, A]>>(pair<BinOp<A>, A>(op, p), null, push),
        (stack) => {
          const links = toArray(stack);
          if (links.length === 0) return x;
          let acc = links[links.length - 1][1];
          for (let i = links.length - 1; i >= 0; i--) {
            const left = i === 0 ? x : links[i - 1][1];
            acc = links[i][0](left, acc);
          }
          return acc;
        },
      ),
    );

  const satisfyMsg = (predicate: (token: T) => boolean, message: string): $<F, T> =>
    E.adjustErr<T>(E.satisfy(predicate), (m) => `${message}: ${m}`);

  const exact = (expected: T): $<F, T> =>
    satisfyMsg((token) => token === expected, `expected ${showToken(expected)}`);

  const sequence = <A>(ps: ReadonlyArray<$<F, A>>): $<F, A[]> =>
    E.tailRecM<[number, Stack<A>], A[]>([0, null], ([i, acc]) =>
      i >= ps.length
        ? E.pure<Step<[number, Stack<A>], A[]>>(Done(toArray(acc)))
        : E.map<A, Step<[number, Stack<A>], A[]>>(ps[i], (a) => Continue([i + 1, push(acc, a)])),
    );

  return {
    token: E.next,
    anyToken: E.next,
    endOfInput: E.eof,

    apply: <A, B>(pf: $<F, (a: A) => B>, pa: $<F, A>): $<F, B> =>
      E.bind<(a: A) => B, B>(pf, (f) => E.map<A, B>(pa, f)),
    discard,
    andThen,
    pair,
    sequence,
    defer: <A>(thunk: () => $<F, A>): $<F, A> => {
      let cached: $<F, A> | undefined;
      return E.bind<void, A>(E.pure<void>(undefined), () => (cached ??= thunk()));
    },

    failBad: <A = never>(message: string): $<F, A> => E.commit<A>(E.fail<A>(message)),
    adjustErrBad,
    oneOf: <A>(ps: ReadonlyArray<$<F, A>>): $<F, A> =>
      ps.reduceRight<$<F, A>>((rest, p) => E.onFail<A>(p, rest), E.fail<A>(NO_CHOICE)),

    satisfyMsg,
    exact,
    literal: (expected: Iterable<T>): $<F, T[]> => sequence<T>(Array.from(expected, exact)),

    optional: <A>(p: $<F, A>): $<F, A | null> =>
      E.onFail<A | null>(
        E.map<A, A | null>(p, (a) => a),
        E.pure<A | null>(null),
      ),
    option: <A>(fallback: A, p: $<F, A>): $<F, A> => E.onFail<A>(p, E.pure<A>(fallback)),
    many,
    many1,
    skipMany: <A>(p: $<F, A>): $<F, void> => repeatFold<A, void>(p, undefined, () => undefined),
    exactly: <A>(n: number, p: $<F, A>): $<F, A[]> =>
      E.tailRecM<[number, Stack<A>], A[]>([n, null], ([left, acc]) =>
        left <= 0
          ? E.pure<Step<[number, Stack<A>], A[]>>(Done(toArray(acc)))
          : E.map<A, Step<[number, Stack<A>], A[]>>(
              E.adjustErr<A>(p, (m) => `When expecting exactly ${left} more items:\n${indent(m)}`),
              (a) => Continue([left - 1, push(acc, a)]),
            ),
      ),
    upto: <A>(n: number, p: $<F, A>): $<F, A[]> =>
      E.tailRecM<[number, Stack<A>], A[]>([n, null], ([left, acc]) =>
        left <= 0
          ? E.pure<Step<[number, Stack<A>], A[]>>(Done(toArray(acc)))
          : E.onFail<Step<[number, Stack<A>], A[]>>(
              E.map<A, Step<[number, Stack<A>], A[]>>(p, (a) => Continue([left - 1, push(acc, a)])),
              E.pure<Step<[number, Stack<A>], A[]>>(Done(toArray(acc))),
            ),
      ),
    sepBy: <A, Sep>(p: $<F, A>, sep: $<F, Sep>): $<F, A[]> =>
      E.onFail<A[]>(sepBy1<A, Sep>(p, sep), E.pure<A[]>([])),
    sepBy1,
    bracket: <Open, Close, A>(open: $<F, Open>, close: $<F, Close>, p: $<F, A>): $<F, A> =>
      andThen<Open, A>(
        E.adjustErr<Open>(open, (m) => `Missing opening bracket:\n${indent(m)}`),
        discard<A, Close>(
          p,
          adjustErrBad<Close>(close, (m) => `Missing closing bracket:\n${indent(m)}`),
        ),
      ),
    bracketSep: <Open, Sep, Close, A>(
      open: $<F, Open>,
      sep: $<F, Sep>,
      close: $<F, Close>,
      p: $<F, A>,
    ): $<F, A[]> =>
      E.onFail<A[]>(
        andThen<Open, A[]>(open, andThen<Close, A[]>(close, E.pure<A[]>([]))),
        andThen<Open, A[]>(
          E.adjustErr<Open>(open, (m) => `Missing opening bracket:\n${indent(m)}`),
          E.bind<A, A[]>(
            E.adjustErr<A>(p, (m) => `After first bracket in a group:\n${indent(m)}`),
            (x) =>
              E.map<A[], A[]>(
                manyFinally<A, Close>(
                  andThen<Sep, A>(sep, p),
                  adjustErrBad<Close>(close, (m) => `When looking for closing bracket:\n${indent(m)}`),
                ),
                (xs) => [x, ...xs],
              ),
          ),
        ),
      ),
    manyFinally,

    chainl1,
    chainr1,
    chainl: <A>(p: $<F, A>, op: $<F, BinOp<A>>, fallback: A): $<F, A> =>
      E.onFail<A>(chainl1<A>(p, op), E.pure<A>(fallback)),
    chainr: <A>(p: $<F, A>, op: $<F, BinOp<A>>, fallback: A): $<F, A> =>
      E.onFail<A>(chainr1<A>(p, op), E.pure<A>(fallback)),
  };
}

export function deriveStateful<F extends TypeFunction, T, S>(
  E: StatefulEngine<F, T, S>,
): Combinators<F, T> & StatefulCombinators<F, S> {
  return {
    ...derive<F, T>(E),
    modifyState: (f: (state: S) => S): $<F, void> => E.bind<S, void>(E.getState, (s) => E.putState(f(s))),
    queryState: <A>(f: (state: S) => A): $<F, A> => E.map<S, A>(E.getState, f),
  };
}

/** Primitives and derived combinators in one object. */
export function toolkit<F extends TypeFunction, T>(E: ParserEngine<F, T>): Toolkit<F, T> {
  return { ...E, ...derive<F, T>(E) };
}

export function statefulToolkit<F extends TypeFunction, T, S>(
  E: StatefulEngine<F, T, S>,
): StatefulToolkit<F, T, S> {
  return { ...E, ...deriveStateful<F, T, S>(E) };
}
