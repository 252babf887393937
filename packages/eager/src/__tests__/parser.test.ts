import { afterEach, describe, expect, it, vi } from "vitest";
import { collect, config, fromArray, fromIterable, ParseError } from "@pledge/core";
import { eager } from "../parser.js";

const P = eager<string>();
const digit = P.satisfy((c) => c >= "0" && c <= "9");
const letter = P.satisfy((c) => c >= "a" && c <= "z");

afterEach(() => {
  config.reset();
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Fluent methods
// ---------------------------------------------------------------------------

describe("Parser methods", () => {
  it("map and flatMap", () => {
    const counted = digit.map(Number).flatMap((n) => P.exactly(n, letter));
    expect(counted.parseAll("2ab")).toEqual(["a", "b"]);
  });

  it("andThen and skip", () => {
    expect(digit.andThen(letter).parseAll("1a")).toBe("a");
    expect(digit.skip(letter).parseAll("1a")).toBe("1");
  });

  it("onFail and commit", () => {
    expect(digit.onFail(letter).parseAll("a")).toBe("a");
    const r = digit.commit().onFail(letter).parse("a");
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.message).toBe('satisfy: unexpected token "a"');
  });

  it("adjustErr", () => {
    const r = digit.adjustErr((m) => `wanted a digit (${m})`).parse("a");
    expect(r).toMatchObject({ ok: false, message: 'wanted a digit (satisfy: unexpected token "a")' });
  });
});

// ---------------------------------------------------------------------------
// Drivers
// ---------------------------------------------------------------------------

describe("parse", () => {
  it("accepts token arrays", () => {
    const N = eager<number>();
    const positive = N.many(N.satisfy((n) => n > 0));
    const r = positive.parse(fromArray([3, 1, 0, 2]));
    expect(r.ok && r.value).toEqual([3, 1]);
    expect(r.rest.offset).toBe(2);
    expect(collect(r.rest)).toEqual([0, 2]);
  });

  it("accepts any iterable", () => {
    function* letters(): Generator<string> {
      yield "x";
      yield "y";
    }
    const r = P.many(letter).parse(fromIterable(letters()));
    expect(r.ok && r.value).toEqual(["x", "y"]);
  });

  it("hides commitment from the caller", () => {
    expect(P.commit(digit).parse("1")).toMatchObject({ ok: true, value: "1" });
    expect(P.commit(digit).parse("x")).toMatchObject({ ok: false, message: 'satisfy: unexpected token "x"' });
  });
});

describe("parseAll", () => {
  it("returns the value when all input is consumed", () => {
    expect(P.many(digit).parseAll("12")).toEqual(["1", "2"]);
  });

  it("throws on leftover input", () => {
    expect(() => P.many(digit).parseAll("12a")).toThrow(
      new ParseError("expected end of input", 2),
    );
    expect(() => P.many(digit).parseAll("12a")).toThrow("Parse error at token 2: expected end of input");
  });

  it("throws on failure with the failure offset", () => {
    let caught: unknown;
    try {
      P.andThen(digit, digit).parseAll("1a");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ParseError);
    expect(caught).toMatchObject({ offset: 1, reason: 'satisfy: unexpected token "a"' });
  });
});

// ---------------------------------------------------------------------------
// Tracing
// ---------------------------------------------------------------------------

describe("tracing", () => {
  it("logs failed alternatives and failed runs when enabled", () => {
    config.set({ trace: true, log: "debug" });
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    P.oneOfLabeled([["num", digit]]).parse("x");

    expect(debug).toHaveBeenCalledTimes(2);
    expect(debug).toHaveBeenNthCalledWith(
      1,
      '[pledge/eager] DEBUG: alternative "num" failed: satisfy: unexpected token "x"',
    );
    expect(debug).toHaveBeenNthCalledWith(
      2,
      '[pledge/eager] DEBUG: parse failed at token 0: failed to parse any of the possible choices:\n  num:\n    satisfy: unexpected token "x"',
    );
  });

  it("is silent by default", () => {
    config.set({ log: "debug" });
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    P.oneOfLabeled([["num", digit]]).parse("x");
    expect(debug).not.toHaveBeenCalled();
  });
});
