import { describe, expect, it, vi } from "vitest";
import { Lazy } from "../lazy.js";
import { LazyList, type ListCell } from "../list.js";

describe("LazyList", () => {
  const oneTwo = LazyList.cons(1, LazyList.cons(2, LazyList.empty<number>()));

  it("iterates its items", () => {
    expect([...oneTwo]).toEqual([1, 2]);
    expect(oneTwo.toArray()).toEqual([1, 2]);
  });

  it("uncons", () => {
    expect(oneTwo.uncons()?.[0]).toBe(1);
    expect(oneTwo.uncons()?.[1].toArray()).toEqual([2]);
    expect(LazyList.empty<number>().uncons()).toBeUndefined();
  });

  it("take stops early", () => {
    expect(oneTwo.take(1)).toEqual([1]);
    expect(oneTwo.take(5)).toEqual([1, 2]);
    expect(oneTwo.take(0)).toEqual([]);
  });

  it("computes each cell once", () => {
    const cell = vi.fn((): ListCell<number> => ({ _tag: "Cons", head: 7, tail: LazyList.empty<number>() }));
    const list = new LazyList(Lazy.defer(cell));
    expect(cell).not.toHaveBeenCalled();
    expect(list.toArray()).toEqual([7]);
    expect(list.toArray()).toEqual([7]);
    expect(cell).toHaveBeenCalledTimes(1);
  });

  it("take(0) forces nothing", () => {
    const cell = vi.fn((): ListCell<number> => ({ _tag: "Nil" }));
    new LazyList(Lazy.defer(cell)).take(0);
    expect(cell).not.toHaveBeenCalled();
  });
});
