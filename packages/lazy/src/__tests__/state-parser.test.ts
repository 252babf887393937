import { describe, expect, it, vi } from "vitest";
import { collect } from "@pledge/core";
import { evaluate, lazyState, parseStream, type LazyStateParser } from "../state-parser.js";

const S = lazyState<number>();
const digit = S.satisfy((c) => c >= "0" && c <= "9");
const tick = S.modifyState((n) => n + 1);
const counted = S.bind(S.next, (c) => S.map(tick, () => c));

describe("stateful streaming", () => {
  it("items carry the state they were produced in", () => {
    expect([...parseStream(counted, "abc", 10)]).toEqual([
      { value: "a", state: 11 },
      { value: "b", state: 12 },
      { value: "c", state: 13 },
    ]);
  });

  it("a prefix shows its own state before later items run", () => {
    const items = parseStream(counted, "abc", 0);
    expect(items.next()).toEqual({ done: false, value: { value: "a", state: 1 } });
    expect(items.next()).toEqual({ done: false, value: { value: "b", state: 2 } });
  });

  it("returns the leftover input and final state", () => {
    const items = parseStream(S.andThen(tick, digit), "12x", 0);
    let step = items.next();
    while (!step.done) step = items.next();
    expect(step.value.state).toBe(2);
    expect(collect(step.value.input)).toEqual(["x"]);
  });

  it("stream through parse reports the final state", () => {
    const r = S.stream(counted).parse("ab", 0);
    expect(r.ok && r.value.toArray()).toEqual([
      { value: "a", state: 1 },
      { value: "b", state: 2 },
    ]);
    expect(r.state).toBe(2);
  });
});

describe("stateful stream commitment", () => {
  const item = S.andThen(tick, S.andThen(S.exact("#"), S.commit(digit)));

  it("a committed failure reaches parse with the state it failed in", () => {
    const r = S.andThen(S.stream(item), S.eof).parse("#1#x", 0);
    expect(r).toMatchObject({ ok: false, message: 'satisfy: unexpected token "x"', state: 2 });
    expect(collect(r.rest)).toEqual(["x"]);
  });

  it("transactional restores the state for it", () => {
    expect(S.transactional(S.stream(item)).parse("#1#x", 0)).toMatchObject({ ok: false, state: 0 });
    expect(S.transactional(S.andThen(S.stream(item), S.eof)).parse("#1#x", 0)).toMatchObject({
      ok: false,
      state: 0,
    });
  });
});

describe("state across failure and choice", () => {
  it("each alternative starts from the pre-choice state", () => {
    const p = S.onFail(S.andThen(S.putState(9), S.fail<number>("no")), S.getState);
    expect(p.parse("", 1)).toMatchObject({ ok: true, value: 1, state: 1 });
  });

  it("a committed branch's state is final", () => {
    const p = S.onFail(S.andThen(S.putState(9), S.failBad<number>("no")), S.getState);
    expect(p.parse("", 1)).toMatchObject({ ok: false, message: "no", state: 9 });
  });

  it("a discarded repetition step discards its state", () => {
    expect(S.many(S.andThen(tick, digit)).parse("12a", 0)).toMatchObject({
      ok: true,
      value: ["1", "2"],
      state: 2,
    });
  });

  it("queryState", () => {
    expect(S.queryState((n) => n * 2).parseAll("", 21)).toEqual({ value: 42, state: 21 });
  });
});

describe("transactional", () => {
  it("restores the starting state on failure", () => {
    expect(S.transactional(S.andThen(S.putState(9), S.fail("no"))).parse("", 1)).toMatchObject({
      ok: false,
      message: "no",
      state: 1,
    });
    const committed = S.transactional(S.andThen(S.putState(9), S.failBad("no")));
    expect(committed.parse("", 1)).toMatchObject({ ok: false, message: "no", state: 1 });
  });

  it("keeps commitment lazy", () => {
    const build = vi.fn((): LazyStateParser<number, string, string> => S.next);
    const o = evaluate(S.transactional(S.commit(S.defer(build))), "a", 0).force();
    expect(o._tag).toBe("Committed");
    expect(build).not.toHaveBeenCalled();
  });
});
