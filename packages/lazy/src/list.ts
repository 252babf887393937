/**
 * Lazy lists
 *
 * A memoized, persistent list whose cells are computed as a consumer walks
 * it. Walking the list twice computes each cell once.
 */

import { Lazy } from "./lazy.js";

export type ListCell<A> =
  | { readonly _tag: "Nil" }
  | { readonly _tag: "Cons"; readonly head: A; readonly tail: LazyList<A> };

const NIL: ListCell<never> = { _tag: "Nil" };

export class LazyList<A> implements Iterable<A> {
  constructor(private readonly cell: Lazy<ListCell<A>>) {}

  static empty<A>(): LazyList<A> {
    return new LazyList<A>(Lazy.of(NIL));
  }

  static cons<A>(head: A, tail: LazyList<A>): LazyList<A> {
    return new LazyList<A>(Lazy.of<ListCell<A>>({ _tag: "Cons", head, tail }));
  }

  /** The first item and the rest, or `undefined` for the empty list. Forces one cell. */
  uncons(): readonly [A, LazyList<A>] | undefined {
    const cell = this.cell.force();
    return cell._tag === "Nil" ? undefined : [cell.head, cell.tail];
  }

  *[Symbol.iterator](): Generator<A, void, undefined> {
    for (let cell = this.cell.force(); cell._tag === "Cons"; cell = cell.tail.cell.force()) {
      yield cell.head;
    }
  }

  /** Up to `n` leading items, forcing no more cells than needed. */
  take(n: number): A[] {
    const out: A[] = [];
    let cell = out.length < n ? this.uncons() : undefined;
    while (cell !== undefined) {
      out.push(cell[0]);
      cell = out.length < n ? cell[1].uncons() : undefined;
    }
    return out;
  }

  /** Walk to the end. */
  toArray(): A[] {
    return Array.from(this);
  }
}
