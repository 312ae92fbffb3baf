// test/core/reader/parse.spec.ts

import { describe, it, expect } from "vitest";
import { parse, parseSource, parseProgram, numberOrSymbol, groupTokens } from "../../../src/core/reader/parse";
import { int, float, sym, list, exprToString } from "../../../src/core/reader/datum";
import { CarlaeSyntaxError } from "../../../src/core/errors";

describe("numberOrSymbol", () => {
  it("reads integers", () => {
    expect(numberOrSymbol("8")).toEqual(int(8));
    expect(numberOrSymbol("+5")).toEqual(int(5));
    expect(numberOrSymbol("-12")).toEqual(int(-12));
    expect(numberOrSymbol("12345678901234567890")).toEqual(int(12345678901234567890n));
  });

  it("reads floats", () => {
    expect(numberOrSymbol("-5.32")).toEqual(float(-5.32));
    expect(numberOrSymbol("2.0")).toEqual(float(2));
    expect(numberOrSymbol("1e3")).toEqual(float(1000));
    expect(numberOrSymbol(".5")).toEqual(float(0.5));
  });

  it("falls back to symbols", () => {
    expect(numberOrSymbol("1.2.3.4")).toEqual(sym("1.2.3.4"));
    expect(numberOrSymbol("x")).toEqual(sym("x"));
    expect(numberOrSymbol("-")).toEqual(sym("-"));
  });
});

describe("parse", () => {
  it("builds a combination from tokens", () => {
    expect(parse(["(", "+", "2", "3", ")"])).toEqual(list([sym("+"), int(2), int(3)]));
  });

  it("nests groups", () => {
    expect(parseSource("(a (b c) d)")).toEqual(list([sym("a"), list([sym("b"), sym("c")]), sym("d")]));
  });

  it("parses the empty combination", () => {
    expect(parseSource("()")).toEqual(list([]));
  });

  it("parses a lone atom", () => {
    expect(parse(["42"])).toEqual(int(42));
  });

  it("rejects a lone paren", () => {
    expect(() => parse(["("])).toThrow(CarlaeSyntaxError);
    expect(() => parse([")"])).toThrow(CarlaeSyntaxError);
  });

  it("rejects an empty program", () => {
    expect(() => parse([])).toThrow(CarlaeSyntaxError);
  });

  it("rejects unbalanced input", () => {
    expect(() => parseSource(")(spam)(")).toThrow(CarlaeSyntaxError);
    expect(() => parseSource("(a))")).toThrow(CarlaeSyntaxError);
    expect(() => parseSource("((a)")).toThrow(CarlaeSyntaxError);
    expect(() => parseSource("(a b")).toThrow(CarlaeSyntaxError);
  });

  it("reports the kind of syntax failure", () => {
    try {
      parseSource("((a)");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(CarlaeSyntaxError);
      expect(e instanceof CarlaeSyntaxError && e.code).toBe("E0002");
    }
  });

  it("keeps keyword tokens as symbols", () => {
    expect(parseSource("(:= x 1)")).toEqual(list([sym(":="), sym("x"), int(1)]));
  });
});

describe("groupTokens", () => {
  it("groups bare tokens and paren runs at depth zero", () => {
    expect(groupTokens(["a", "(", "b", "(", "c", ")", ")", "d"])).toEqual([
      ["a"],
      ["(", "b", "(", "c", ")", ")"],
      ["d"],
    ]);
  });
});

describe("parseProgram", () => {
  it("returns every top-level form", () => {
    const forms = parseProgram("(:= x 1)\n# note\nx");
    expect(forms.map(exprToString)).toEqual(["(:= x 1)", "x"]);
  });

  it("rejects empty source", () => {
    expect(() => parseProgram("  # nothing\n")).toThrow(CarlaeSyntaxError);
  });
});
