import { describe, expect, it } from "vitest";
import { ParseError } from "@pledge/core";
import { eagerState } from "../state-parser.js";

const S = eagerState<number>();
const digit = S.satisfy((c) => c >= "0" && c <= "9");
const tick = S.modifyState((n) => n + 1);

describe("state primitives", () => {
  it("getState and putState never consume", () => {
    expect(S.getState.parse("ab", 7)).toMatchObject({ ok: true, value: 7, state: 7 });
    const r = S.andThen(S.putState(3), S.getState).parse("ab", 7);
    expect(r).toMatchObject({ ok: true, value: 3, state: 3 });
    expect(r.rest.offset).toBe(0);
  });

  it("modifyState and queryState", () => {
    const counted = S.bind(S.next, (c) => S.map(tick, () => c));
    expect(S.many(counted).parse("abc", 0)).toMatchObject({ ok: true, value: ["a", "b", "c"], state: 3 });
    expect(S.queryState((n) => n * 2).parse("", 21)).toMatchObject({ ok: true, value: 42, state: 21 });
  });
});

describe("state across failure and choice", () => {
  it("a failure carries the state it failed with", () => {
    expect(S.andThen(S.putState(5), S.fail("boom")).parse("x", 0)).toMatchObject({
      ok: false,
      message: "boom",
      state: 5,
    });
  });

  it("each alternative starts from the pre-choice state", () => {
    const p = S.onFail(S.andThen(S.putState(9), S.fail<number>("no")), S.getState);
    expect(p.parse("", 1)).toMatchObject({ ok: true, value: 1, state: 1 });

    const labeled = S.oneOfLabeled([
      ["a", S.andThen(S.putState(7), S.fail<number>("x"))],
      ["b", S.getState],
    ]);
    expect(labeled.parse("", 3)).toMatchObject({ ok: true, value: 3, state: 3 });
  });

  it("a failed choice reports the pre-choice state", () => {
    const labeled = S.oneOfLabeled([["a", S.andThen(S.putState(7), S.fail<number>("x"))]]);
    expect(labeled.parse("", 3)).toMatchObject({ ok: false, state: 3 });
  });

  it("a committed branch's state is final", () => {
    const p = S.onFail(S.andThen(S.putState(9), S.failBad<number>("no")), S.getState);
    expect(p.parse("", 1)).toMatchObject({ ok: false, message: "no", state: 9 });
  });

  it("a discarded repetition step discards its state", () => {
    const r = S.many(S.andThen(tick, digit)).parse("12a", 0);
    expect(r).toMatchObject({ ok: true, value: ["1", "2"], state: 2 });
  });
});

describe("transactional", () => {
  it("restores the starting state on a plain failure", () => {
    expect(S.transactional(S.andThen(S.putState(9), S.fail("no"))).parse("", 1)).toMatchObject({
      ok: false,
      message: "no",
      state: 1,
    });
  });

  it("restores the starting state on a committed failure", () => {
    const p = S.onFail(S.transactional(S.andThen(S.putState(9), S.failBad<number>("no"))), S.pure(0));
    expect(p.parse("", 1)).toMatchObject({ ok: false, message: "no", state: 1 });
  });

  it("keeps the state of a success", () => {
    expect(S.transactional(S.putState(4)).parse("", 1)).toMatchObject({ ok: true, state: 4 });
  });
});

describe("parseAll", () => {
  it("returns the value and final state", () => {
    expect(S.many(S.andThen(tick, digit)).parseAll("42", 10)).toEqual({ value: ["4", "2"], state: 12 });
  });

  it("throws ParseError on leftover input", () => {
    expect(() => S.many(digit).parseAll("4x", 0)).toThrow(new ParseError("expected end of input", 1));
  });
});
