/**
 * Lazy Outcome Algebra
 *
 * The demand-driven counterpart of the core result algebra. A lazy parser
 * produces a `Lazy<Outcome<Z, A>>`:
 *
 * - `Success`: the remainder and the value are themselves lazy, so the tag
 *   can be observed before either is computed
 * - `Failure`: a recoverable failure
 * - `Committed`: holds its settled outcome lazily, so commitment is visible
 *   before the committed parser has run
 *
 * A success may also carry an `ending`: what it turns out to be once its
 * remainder is known. `stream` succeeds before its items are parsed, so a
 * commitment or committed failure among them only shows up there.
 *
 * Sequencing follows the core rules exactly; only the moment work happens
 * differs.
 */

import {
  choiceFailure,
  Continue,
  trace,
  type Labeled,
  type RunResult,
  type Snapshot,
  type StateRunResult,
  type Step,
  type TokenStream,
} from "@pledge/core";
import { Lazy } from "./lazy.js";

// ============================================================================
// Outcome Type Definition
// ============================================================================

export interface Success<Z, A> {
  readonly _tag: "Success";
  readonly rest: Lazy<Z>;
  readonly value: Lazy<A>;
  /** Commitment found while computing `rest`, if it can find any. */
  readonly ending?: Lazy<Ending<Z>>;
}

export interface Failure<Z> {
  readonly _tag: "Failure";
  readonly rest: Z;
  readonly message: string;
}

export type Settled<Z, A> = Success<Z, A> | Failure<Z>;

export interface Committed<Z, A> {
  readonly _tag: "Committed";
  readonly inner: Lazy<Settled<Z, A>>;
}

export type Outcome<Z, A> = Success<Z, A> | Failure<Z> | Committed<Z, A>;

/**
 * `"plain"`: nothing committed. `"committed"`: the success is committed.
 * A `Failure`: the parse failed after committing.
 */
export type Ending<Z> = "plain" | "committed" | Failure<Z>;

// ============================================================================
// Constructors
// ============================================================================

export function Success<Z, A>(rest: Lazy<Z>, value: Lazy<A>, ending?: Lazy<Ending<Z>>): Success<Z, A> {
  return ending === undefined ? { _tag: "Success", rest, value } : { _tag: "Success", rest, value, ending };
}

export function Failure<Z>(rest: Z, message: string): Failure<Z> {
  return { _tag: "Failure", rest, message };
}

/**
 * Mark a lazily computed outcome as committed without forcing it. An inner
 * outcome that is already known to be committed is returned as-is.
 */
export function Committed<Z, A>(inner: Lazy<Outcome<Z, A>>): Committed<Z, A> {
  if (inner.forced) {
    const o = inner.force();
    return o._tag === "Committed" ? o : { _tag: "Committed", inner: Lazy.of(o) };
  }
  return { _tag: "Committed", inner: Lazy.defer(() => settle(inner.force())) };
}

/**
 * Drop the commitment marker, forcing the committed outcome if needed.
 */
export function settle<Z, A>(o: Outcome<Z, A>): Settled<Z, A> {
  return o._tag === "Committed" ? o.inner.force() : o;
}

/**
 * Force the ending of a success that has one, turning any commitment it
 * finds into a `Committed` wrapper. Other outcomes are returned unchanged.
 */
export function reveal<Z, A>(o: Outcome<Z, A>): Outcome<Z, A> {
  if (o._tag !== "Success" || o.ending === undefined) return o;
  const ending = o.ending.force();
  if (ending === "plain") return Success(o.rest, o.value);
  return Committed<Z, A>(Lazy.of<Outcome<Z, A>>(ending === "committed" ? Success(o.rest, o.value) : ending));
}

/**
 * `settle`, then reveal the ending of the settled success. The result has no
 * ending left to force.
 */
export function settleAll<Z, A>(o: Outcome<Z, A>): Settled<Z, A> {
  const s = settle(o);
  return s._tag === "Success" && s.ending !== undefined ? settle(reveal(s)) : s;
}

/** Rewrite the committed failure an ending may hold. */
export function mapEnding<Z, A>(s: Success<Z, A>, f: (failure: Failure<Z>) => Failure<Z>): Success<Z, A> {
  if (s.ending === undefined) return s;
  return Success(
    s.rest,
    s.value,
    s.ending.map<Ending<Z>>((e) => (typeof e === "object" ? f(e) : e)),
  );
}

// ============================================================================
// Operations
// ============================================================================

export function bindOutcome<Z, A, B>(
  lo: Lazy<Outcome<Z, A>>,
  k: (rest: Z, a: A) => Lazy<Outcome<Z, B>>,
): Lazy<Outcome<Z, B>> {
  return Lazy.defer<Outcome<Z, B>>(() => {
    const o = reveal(lo.force());
    switch (o._tag) {
      case "Success":
        return k(o.rest.force(), o.value.force()).force();
      case "Failure":
        return o;
      case "Committed":
        // Stays unforced: the caller sees the tag before the continuation runs
        return Committed<Z, B>(
          o.inner.map<Outcome<Z, B>>((inner) => {
            const s = settleAll(inner);
            return s._tag === "Success" ? k(s.rest.force(), s.value.force()).force() : s;
          }),
        );
    }
  });
}

function mapNow<Z, A, B>(o: Outcome<Z, A>, f: (a: A) => B): Outcome<Z, B> {
  switch (o._tag) {
    case "Success":
      return Success(o.rest, o.value.map(f), o.ending);
    case "Failure":
      return o;
    case "Committed":
      return Committed<Z, B>(o.inner.map<Outcome<Z, B>>((s) => mapNow(s, f)));
  }
}

/** `f` runs only when the value is demanded. */
export function mapOutcome<Z, A, B>(lo: Lazy<Outcome<Z, A>>, f: (a: A) => B): Lazy<Outcome<Z, B>> {
  return Lazy.defer(() => mapNow(lo.force(), f));
}

function adjustNow<Z, A>(o: Outcome<Z, A>, f: (message: string) => string): Outcome<Z, A> {
  switch (o._tag) {
    case "Success":
      return mapEnding(o, (e) => Failure(e.rest, f(e.message)));
    case "Failure":
      return Failure(o.rest, f(o.message));
    case "Committed":
      return Committed<Z, A>(o.inner.map<Outcome<Z, A>>((s) => adjustNow(s, f)));
  }
}

export function adjustOutcome<Z, A>(
  lo: Lazy<Outcome<Z, A>>,
  f: (message: string) => string,
): Lazy<Outcome<Z, A>> {
  return Lazy.defer(() => adjustNow(lo.force(), f));
}

/**
 * Run `retry` if `lo` turns out to be a plain failure.
 */
export function orElse<Z, A>(lo: Lazy<Outcome<Z, A>>, retry: () => Lazy<Outcome<Z, A>>): Lazy<Outcome<Z, A>> {
  return Lazy.defer(() => {
    const o = lo.force();
    return o._tag === "Failure" ? retry().force() : o;
  });
}

/**
 * Try each labeled attempt on `input` in turn; see `oneOfLabeled`.
 */
export function firstOf<Z, A>(
  input: Z,
  attempts: ReadonlyArray<Labeled<(input: Z) => Lazy<Outcome<Z, A>>>>,
  scope: string,
): Lazy<Outcome<Z, A>> {
  return Lazy.defer<Outcome<Z, A>>(() => {
    const failures: Array<[string, string]> = [];
    for (const [label, attempt] of attempts) {
      const o = attempt(input).force();
      if (o._tag !== "Failure") return o;
      trace(scope, () => `alternative "${label}" failed: ${o.message}`);
      failures.push([label, o.message]);
    }
    return Failure(input, choiceFailure(failures));
  });
}

/**
 * Iterate `step` until it yields `Done`, without growing the stack.
 *
 * Iterations run strictly until the first committed one. From there the loop
 * continues inside the committed outcome, so the commitment is observable
 * before the remaining iterations have run.
 */
export function loopOutcome<Z, L, B>(
  init: L,
  input: Z,
  step: (state: L, input: Z) => Lazy<Outcome<Z, Step<L, B>>>,
): Lazy<Outcome<Z, B>> {
  const advance = (start: Outcome<Z, Step<L, B>>, committed: boolean): Outcome<Z, B> => {
    let o = start;
    for (;;) {
      o = reveal(o);
      if (o._tag === "Committed" && !committed) {
        return Committed<Z, B>(o.inner.map<Outcome<Z, B>>((s) => advance(s, true)));
      }
      const current = settleAll(o);
      if (current._tag === "Failure") return current;
      const stepped = current.value.force();
      if (stepped._tag === "Done") return Success(current.rest, Lazy.of(stepped.value));
      o = step(stepped.state, current.rest.force()).force();
    }
  };
  return Lazy.defer(() => advance(Success(Lazy.of(input), Lazy.of<Step<L, B>>(Continue(init))), false));
}

// ============================================================================
// Top-level outcomes
// ============================================================================

/** Force an outcome fully and reduce it to what a driver returns. */
export function runOutcome<T, A>(lo: Lazy<Outcome<TokenStream<T>, A>>): RunResult<T, A> {
  const s = settleAll(lo.force());
  return s._tag === "Success"
    ? { ok: true, value: s.value.force(), rest: s.rest.force() }
    : { ok: false, message: s.message, rest: s.rest };
}

export function runStateOutcome<S, T, A>(lo: Lazy<Outcome<Snapshot<T, S>, A>>): StateRunResult<S, T, A> {
  const s = settleAll(lo.force());
  if (s._tag === "Failure") {
    return { ok: false, message: s.message, rest: s.rest.input, state: s.rest.state };
  }
  const rest = s.rest.force();
  return { ok: true, value: s.value.force(), rest: rest.input, state: rest.state };
}
