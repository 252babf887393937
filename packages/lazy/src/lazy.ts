/**
 * Memoized thunks
 *
 * A `Lazy<A>` runs its computation the first time it is forced and hands back
 * the same value on every later force.
 *
 * @example
 * ```typescript
 * const n = Lazy.defer(() => expensive());
 * n.forced;  // false
 * n.force(); // runs expensive() once
 * n.force(); // cached
 * ```
 */

type Cell<A> =
  | { readonly _tag: "Pending"; readonly thunk: () => A }
  | { readonly _tag: "Forcing" }
  | { readonly _tag: "Forced"; readonly value: A };

export class Lazy<A> {
  private cell: Cell<A>;

  private constructor(cell: Cell<A>) {
    this.cell = cell;
  }

  /** An already-computed value. */
  static of<A>(value: A): Lazy<A> {
    return new Lazy<A>({ _tag: "Forced", value });
  }

  /** A value computed on first demand. */
  static defer<A>(thunk: () => A): Lazy<A> {
    return new Lazy<A>({ _tag: "Pending", thunk });
  }

  /** Whether the value has been computed. Never forces. */
  get forced(): boolean {
    return this.cell._tag === "Forced";
  }

  /**
   * Compute the value, or return the cached one.
   *
   * Throws if called again while the computation is still running. If the
   * computation throws, nothing is cached and the next force runs it again.
   */
  force(): A {
    const cell = this.cell;
    switch (cell._tag) {
      case "Forced":
        return cell.value;
      case "Forcing":
        throw new Error("Lazy value forced again while it was being computed");
      case "Pending": {
        this.cell = { _tag: "Forcing" };
        try {
          const value = cell.thunk();
          this.cell = { _tag: "Forced", value };
          return value;
        } catch (error) {
          this.cell = cell;
          throw error;
        }
      }
    }
  }

  /** Apply `f` when the result is demanded. */
  map<B>(f: (a: A) => B): Lazy<B> {
    return Lazy.defer(() => f(this.force()));
  }
}
