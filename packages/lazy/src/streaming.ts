/**
 * Incremental repetition
 *
 * `unfold` applies a parser again and again from a starting remainder and
 * exposes the matches as a `LazyList`. Nothing is parsed until the list is
 * walked, and each step parses exactly one more item.
 */

import { ParseError, type TokenStream } from "@pledge/core";
import { Lazy } from "./lazy.js";
import { LazyList, type ListCell } from "./list.js";
import { reveal, settleAll, type Ending, type Outcome } from "./outcome.js";

type End<Z> = { readonly _tag: "End"; readonly end: Z; readonly ending: Ending<Z> };

type Node<Z, I> = End<Z> | { readonly _tag: "Item"; readonly item: I; readonly next: Lazy<Node<Z, I>> };

export interface Unfolded<Z, I> {
  /**
   * The parsed items, produced as they are demanded. Reaching a committed
   * failure throws `ParseError`.
   */
  readonly items: LazyList<I>;
  /** Where parsing stopped. Forcing this walks `items` to the end. */
  readonly end: Lazy<Z>;
  /** Whether any item committed, or the failure that stopped the list after committing. */
  readonly ending: Lazy<Ending<Z>>;
}

/**
 * Parse items one at a time from `start`.
 *
 * The list ends at the first plain failure, or before an item that consumed
 * no input. A committed failure also ends it; `ending` reports that failure
 * and the list throws it as a `ParseError` when walked that far.
 */
export function unfold<Z, A, I>(
  start: Z,
  parseItem: (input: Z) => Lazy<Outcome<Z, A>>,
  inputOf: (input: Z) => TokenStream<unknown>,
  emit: (value: A, rest: Z) => I,
): Unfolded<Z, I> {
  const nodeAt = (z: Z, committed: boolean): Lazy<Node<Z, I>> =>
    Lazy.defer<Node<Z, I>>(() => {
      const o = reveal(parseItem(z).force());
      const now = committed || o._tag === "Committed";
      const s = settleAll(o);
      if (s._tag === "Failure") {
        if (o._tag === "Committed") return { _tag: "End", end: z, ending: s };
        return { _tag: "End", end: z, ending: committed ? "committed" : "plain" };
      }
      const rest = s.rest.force();
      if (inputOf(rest).consumed === inputOf(z).consumed) {
        return { _tag: "End", end: z, ending: now ? "committed" : "plain" };
      }
      return { _tag: "Item", item: emit(s.value.force(), rest), next: nodeAt(rest, now) };
    });

  const toList = (node: Lazy<Node<Z, I>>): LazyList<I> =>
    new LazyList(
      node.map<ListCell<I>>((n) => {
        if (n._tag === "Item") return { _tag: "Cons", head: n.item, tail: toList(n.next) };
        if (typeof n.ending === "object") {
          throw new ParseError(n.ending.message, inputOf(n.ending.rest).offset);
        }
        return { _tag: "Nil" };
      }),
    );

  const first = nodeAt(start, false);
  const last = Lazy.defer<End<Z>>(() => {
    let node = first.force();
    while (node._tag === "Item") node = node.next.force();
    return node;
  });
  return {
    items: toList(first),
    end: last.map((node) => node.end),
    ending: last.map((node) => node.ending),
  };
}
