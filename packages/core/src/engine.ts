/**
 * Engine interface
 *
 * The primitive set an evaluation strategy must supply. Everything in
 * `combinators.ts` is derived from these operations alone, which is what keeps
 * the four engines observably identical.
 *
 * Laws (for success-only chains):
 *   - Left identity:  bind(pure(a), f) ≡ f(a)
 *   - Right identity: bind(p, pure) ≡ p
 *   - Associativity:  bind(bind(p, f), g) ≡ bind(p, a => bind(f(a), g))
 *
 * Commitment:
 *   - if p yields Committed, onFail(p, q) ≡ p and q never runs
 *   - if p yields a plain Failure, onFail(p, q) ≡ q on the original input
 *   - commit(p) keeps p's value/message and remainder, adding only the tag
 */

import type { $, TypeFunction } from "./hkt.js";

// ============================================================================
// Loop steps
// ============================================================================

export interface Continue<S> {
  readonly _tag: "Continue";
  readonly state: S;
}

export interface Done<B> {
  readonly _tag: "Done";
  readonly value: B;
}

/** One iteration of `tailRecM`: go round again with a new state, or stop. */
export type Step<S, B> = Continue<S> | Done<B>;

export function Continue<S>(state: S): Continue<S> {
  return { _tag: "Continue", state };
}

export function Done<B>(value: B): Done<B> {
  return { _tag: "Done", value };
}

/** A choice alternative and the name it is reported under. */
export type Labeled<P> = readonly [label: string, parser: P];

// ============================================================================
// Commitment
// ============================================================================

export interface Commitment<F extends TypeFunction> {
  /** Mark every result of `p` as immune to backtracking. */
  commit<A>(p: $<F, A>): $<F, A>;
  /** Rewrite the message of any failure of `p`, committed or not. */
  adjustErr<A>(p: $<F, A>, f: (message: string) => string): $<F, A>;
  /**
   * Try each alternative on the same input. The first success or committed
   * result wins; if every alternative fails plainly, the failure lists each
   * label with its message.
   */
  oneOfLabeled<A>(alternatives: ReadonlyArray<Labeled<$<F, A>>>): $<F, A>;
}

// ============================================================================
// Engine
// ============================================================================

export interface ParserEngine<F extends TypeFunction, T> extends Commitment<F> {
  pure<A>(a: A): $<F, A>;
  fail<A = never>(message: string): $<F, A>;
  map<A, B>(p: $<F, A>, f: (a: A) => B): $<F, B>;
  bind<A, B>(p: $<F, A>, f: (a: A) => $<F, B>): $<F, B>;
  /** Run `q` on the original input if `p` fails without commitment. */
  onFail<A>(p: $<F, A>, q: $<F, A>): $<F, A>;
  /**
   * Stack-safe iteration, equal in meaning to
   * `bind(step(s), l => l is Continue ? tailRecM(l.state, step) : pure(l.value))`.
   */
  tailRecM<S, B>(init: S, step: (state: S) => $<F, Step<S, B>>): $<F, B>;

  /** Consume and return one token. */
  readonly next: $<F, T>;
  /** Succeed, consuming nothing, iff no tokens remain. */
  readonly eof: $<F, void>;
  /** Consume one token satisfying the predicate; consume nothing otherwise. */
  satisfy(predicate: (token: T) => boolean): $<F, T>;
  /** Push tokens back onto the front of the remaining input. */
  reparse(tokens: readonly T[]): $<F, void>;
  /**
   * Tokens taken so far, re-read tokens included (`TokenStream.consumed`).
   * Never fails, never consumes, never goes down.
   */
  readonly position: $<F, number>;
}

/**
 * Engines threading a caller-defined state alongside the input.
 *
 * State is never rolled back automatically: a failure reports the state it
 * failed with, and a committed branch's state is final. Each alternative of a
 * choice starts from the state the choice started with.
 */
export interface StatefulEngine<F extends TypeFunction, T, S> extends ParserEngine<F, T> {
  readonly getState: $<F, S>;
  putState(state: S): $<F, void>;
  /** Any failure of `p`, committed or not, reports the state from before `p`. */
  transactional<A>(p: $<F, A>): $<F, A>;
}
