// test/core/eval/run.spec.ts
// End-to-end: text -> tokens -> tree -> value, with environment threading

import { describe, it, expect } from "vitest";
import { run, runProgram } from "../../../src/core/eval/run";
import { tokenize } from "../../../src/core/reader/tokenize";
import { parse } from "../../../src/core/reader/parse";
import { int, sym, list } from "../../../src/core/reader/datum";
import { VInt, VNil, formatValue } from "../../../src/core/eval/values";
import { createSessionEnv } from "../../../src/core/prims";
import { CarlaeNameError, CarlaeResourceError, CarlaeSyntaxError } from "../../../src/core/errors";

describe("run", () => {
  it("goes from text to value", () => {
    const toks = tokenize("(+ 2 3)");
    expect(toks).toEqual(["(", "+", "2", "3", ")"]);
    expect(parse(toks)).toEqual(list([sym("+"), int(2), int(3)]));
    expect(run("(+ 2 3)")[0]).toEqual(VInt(5));
  });

  it("creates a session environment under a builtins root when none is given", () => {
    const [, env] = run("(:= x 1)");
    expect(env.hasOwn("x")).toBe(true);
    expect(env.hasOwn("+")).toBe(false);
    expect(env.parent?.hasOwn("+")).toBe(true);
  });

  it("threads bindings through a returned environment", () => {
    const [, env] = run("(:= x 10)");
    const [value, same] = run("(+ x x)", env);
    expect(value).toEqual(VInt(20));
    expect(same).toBe(env);
  });

  it("does not share bindings between fresh sessions", () => {
    run("(:= shared 1)");
    expect(() => run("shared")).toThrow(CarlaeNameError);
  });

  it("returns closures from function forms", () => {
    const [fn, env] = run("(:= adder (function (a b) (+ a b)))");
    expect(formatValue(fn)).toBe("<function>");
    expect(run("(adder 3 4)", env)[0]).toEqual(VInt(7));
  });

  it("classifies failures", () => {
    expect(() => run(")(spam)(")).toThrow(CarlaeSyntaxError);
    expect(() => run("")).toThrow(CarlaeSyntaxError);
    expect(() => run("(unknown-name)")).toThrow(CarlaeNameError);
  });

  it("computes with integers beyond 2^53 exactly", () => {
    expect(run("(- 9007199254740993 9007199254740992)")[0]).toEqual(VInt(1));
    expect(formatValue(run("(* 1000000000 1000000000 1000)")[0])).toBe("1000000000000000000000");
    expect(formatValue(run("12345678901234567890")[0])).toBe("12345678901234567890");
    expect(formatValue(run("-12345678901234567890")[0])).toBe("-12345678901234567890");
  });

  it("applies the configured depth limit", () => {
    const [, env] = run("(:= (spin n) (spin n))");
    expect(() => run("(spin 0)", env, { maxDepth: 100 })).toThrow(CarlaeResourceError);
  });
});

describe("runProgram", () => {
  it("evaluates each form and returns the last value", () => {
    const src = [
      "# squares",
      "(:= (square y) (* y y))",
      "(:= n 6)",
      "(square n)",
    ].join("\n");
    expect(runProgram(src)[0]).toEqual(VInt(36));
  });

  it("uses the given environment", () => {
    const env = createSessionEnv();
    runProgram("(:= a 1) (:= b 2)", env);
    expect(env.names()).toEqual(["a", "b"]);
  });

  it("returns the empty list for a program of empty combinations", () => {
    expect(runProgram("()")[0]).toEqual(VNil);
  });

  it("stops at the first failure", () => {
    const env = createSessionEnv();
    expect(() => runProgram("(:= a 1) (missing) (:= b 2)", env)).toThrow(CarlaeNameError);
    expect(env.names()).toEqual(["a"]);
  });
});
