import { describe, expect, it } from "vitest";
import { collect, fromArray, fromIterable, fromIterator, fromString, isTokenStream, toStream } from "../stream.js";

describe("fromString", () => {
  it("yields code points", () => {
    expect(collect(fromString("a\u{1F600}b"))).toEqual(["a", "\u{1F600}", "b"]);
  });

  it("counts offsets in code points", () => {
    const after = fromString("\u{1F600}b").uncons()?.[1];
    expect(after?.offset).toBe(1);
  });
});

describe("fromArray", () => {
  it("is persistent", () => {
    const s = fromArray([1, 2]);
    expect(s.uncons()?.[0]).toBe(1);
    expect(s.uncons()?.[0]).toBe(1);
    expect(collect(s)).toEqual([1, 2]);
    expect(s.offset).toBe(0);
  });

  it("ends with undefined", () => {
    expect(fromArray([]).uncons()).toBeUndefined();
  });
});

describe("fromIterator", () => {
  it("pulls each position once", () => {
    let pulls = 0;
    function* source(): Generator<string> {
      for (const c of "abc") {
        pulls++;
        yield c;
      }
    }
    const s = fromIterator(source());
    expect(pulls).toBe(0);
    const first = s.uncons();
    s.uncons();
    expect(pulls).toBe(1);
    expect(first?.[0]).toBe("a");
    expect(collect(s)).toEqual(["a", "b", "c"]);
    expect(collect(s)).toEqual(["a", "b", "c"]);
    expect(pulls).toBe(3);
  });

  it("fromIterable accepts any iterable", () => {
    expect(collect(fromIterable(new Set([3, 1])))).toEqual([3, 1]);
  });
});

describe("prepend", () => {
  it("puts tokens in front and moves the offset back", () => {
    const base = fromString("cd").uncons()?.[1];
    if (base === undefined) throw new Error("expected a token");
    const pushed = base.prepend(["a", "b"]);
    expect(pushed.offset).toBe(-1);
    expect(collect(pushed)).toEqual(["a", "b", "d"]);
    expect(pushed.uncons()?.[1].offset).toBe(0);
  });

  it("counts re-read tokens in consumed and never lowers it", () => {
    const base = fromString("cd").uncons()?.[1];
    if (base === undefined) throw new Error("expected a token");
    const pushed = base.prepend(["a", "b"]);
    expect(pushed.consumed).toBe(1);
    const afterA = pushed.uncons()?.[1];
    const afterB = afterA?.uncons()?.[1];
    const afterD = afterB?.uncons()?.[1];
    expect([afterA?.consumed, afterB?.consumed, afterD?.consumed]).toEqual([2, 3, 4]);
    expect([afterA?.offset, afterB?.offset, afterD?.offset]).toEqual([0, 1, 2]);
  });

  it("does not nest after repeated pushbacks", () => {
    let s = fromArray(["a", "b"]);
    for (let i = 0; i < 3; i++) {
      const cell = s.prepend(["x"]).uncons();
      if (cell === undefined) throw new Error("expected a token");
      s = cell[1];
    }
    expect(s.consumed).toBe(3);
    expect(s.offset).toBe(0);
    expect(collect(s)).toEqual(["a", "b"]);
    expect(s.uncons()?.[1].consumed).toBe(4);
  });

  it("returns the same stream for no tokens", () => {
    const s = fromArray([1]);
    expect(s.prepend([])).toBe(s);
  });
});

describe("toStream", () => {
  it("passes streams through and wraps iterables", () => {
    const s = fromString("ab");
    expect(toStream(s)).toBe(s);
    expect(isTokenStream(s)).toBe(true);
    expect(isTokenStream("ab")).toBe(false);
    expect(collect(toStream("ab"))).toEqual(["a", "b"]);
    expect(collect(toStream([1, 2]))).toEqual([1, 2]);
  });
});
