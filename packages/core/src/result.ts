/**
 * Result Algebra
 *
 * Result<Z, A> is the outcome of applying a parser to a context `Z` (the
 * remaining tokens, or the remaining tokens plus threaded state):
 *
 * - `Success`: a value and the context to continue from
 * - `Failure`: a recoverable failure; an enclosing choice may try a sibling
 * - `Committed`: a success or failure that no enclosing choice may discard
 *
 * A committed result never wraps another committed result: `Committed(...)`
 * collapses nesting as it is built.
 */

import type { TokenStream } from "./stream.js";

// ============================================================================
// Result Type Definition
// ============================================================================

export interface Success<Z, A> {
  readonly _tag: "Success";
  readonly rest: Z;
  readonly value: A;
}

export interface Failure<Z> {
  readonly _tag: "Failure";
  readonly rest: Z;
  readonly message: string;
}

/**
 * A success or failure, without the commitment marker.
 */
export type Settled<Z, A> = Success<Z, A> | Failure<Z>;

export interface Committed<Z, A> {
  readonly _tag: "Committed";
  readonly result: Settled<Z, A>;
}

export type Result<Z, A> = Success<Z, A> | Failure<Z> | Committed<Z, A>;

// ============================================================================
// Constructors
// ============================================================================

export function Success<Z, A>(rest: Z, value: A): Success<Z, A> {
  return { _tag: "Success", rest, value };
}

export function Failure<Z>(rest: Z, message: string): Failure<Z> {
  return { _tag: "Failure", rest, message };
}

/**
 * Mark a result as committed. Already-committed results are returned as-is.
 */
export function Committed<Z, A>(result: Result<Z, A>): Committed<Z, A> {
  return result._tag === "Committed" ? result : { _tag: "Committed", result };
}

// ============================================================================
// Type Guards
// ============================================================================

export function isSuccess<Z, A>(r: Result<Z, A>): r is Success<Z, A> {
  return r._tag === "Success";
}

export function isFailure<Z, A>(r: Result<Z, A>): r is Failure<Z> {
  return r._tag === "Failure";
}

export function isCommitted<Z, A>(r: Result<Z, A>): r is Committed<Z, A> {
  return r._tag === "Committed";
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Sequence a result with a continuation.
 *
 * A success feeds its value and context to `k`; a failure short-circuits; a
 * committed result is sequenced underneath and stays committed, so commitment
 * flows forward through every later step.
 */
export function bindResult<Z, A, B>(
  r: Result<Z, A>,
  k: (rest: Z, a: A) => Result<Z, B>,
): Result<Z, B> {
  switch (r._tag) {
    case "Success":
      return k(r.rest, r.value);
    case "Failure":
      return r;
    case "Committed":
      return Committed(bindResult(r.result, k));
  }
}

export function mapResult<Z, A, B>(r: Result<Z, A>, f: (a: A) => B): Result<Z, B> {
  switch (r._tag) {
    case "Success":
      return Success(r.rest, f(r.value));
    case "Failure":
      return r;
    case "Committed":
      return Committed(mapResult(r.result, f));
  }
}

/**
 * Rewrite the message of a failure, committed or not. Successes pass through.
 */
export function adjustResult<Z, A>(r: Result<Z, A>, f: (message: string) => string): Result<Z, A> {
  switch (r._tag) {
    case "Success":
      return r;
    case "Failure":
      return Failure(r.rest, f(r.message));
    case "Committed":
      return Committed(adjustResult(r.result, f));
  }
}

/**
 * Drop the commitment marker.
 */
export function settle<Z, A>(r: Result<Z, A>): Settled<Z, A> {
  return r._tag === "Committed" ? r.result : r;
}

// ============================================================================
// Top-level outcomes
// ============================================================================

/**
 * What a driver hands back to the caller. Commitment is not visible here.
 */
export type RunResult<T, A> =
  | { readonly ok: true; readonly value: A; readonly rest: TokenStream<T> }
  | { readonly ok: false; readonly message: string; readonly rest: TokenStream<T> };

/**
 * Outcome of a stateful driver: the plain outcome plus the final state.
 */
export type StateRunResult<S, T, A> = RunResult<T, A> & { readonly state: S };

/**
 * Remaining input plus threaded state: the context of the stateful engines.
 */
export interface Snapshot<T, S> {
  readonly input: TokenStream<T>;
  readonly state: S;
}

export function toRunResult<T, A>(r: Result<TokenStream<T>, A>): RunResult<T, A> {
  const s = settle(r);
  return s._tag === "Success"
    ? { ok: true, value: s.value, rest: s.rest }
    : { ok: false, message: s.message, rest: s.rest };
}

export function toStateRunResult<S, T, A>(
  r: Result<Snapshot<T, S>, A>,
): StateRunResult<S, T, A> {
  const s = settle(r);
  return s._tag === "Success"
    ? { ok: true, value: s.value, rest: s.rest.input, state: s.rest.state }
    : { ok: false, message: s.message, rest: s.rest.input, state: s.rest.state };
}
