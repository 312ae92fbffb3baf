// test/core/prims.spec.ts

import { describe, it, expect } from "vitest";
import { add, subtract, multiply, divide, BUILTINS, createGlobalEnv } from "../../src/core/prims";
import { VInt, VFloat, VNil } from "../../src/core/eval/values";
import { CarlaeEvaluationError } from "../../src/core/errors";

function failure(thunk: () => unknown): CarlaeEvaluationError {
  try {
    thunk();
  } catch (e) {
    if (e instanceof CarlaeEvaluationError) return e;
    throw e;
  }
  throw new Error("expected an evaluation error");
}

describe("+", () => {
  it("sums integers", () => {
    expect(add([VInt(1), VInt(2), VInt(3)])).toEqual(VInt(6));
  });

  it("is zero with no arguments", () => {
    expect(add([])).toEqual(VInt(0));
  });

  it("promotes on a float operand", () => {
    expect(add([VInt(1), VFloat(0.5)])).toEqual(VFloat(1.5));
  });

  it("rejects non-numbers", () => {
    const e = failure(() => add([VInt(1), VNil]));
    expect(e.code).toBe("E0105");
    expect(e.message).toBe("Type mismatch in +: expected number, got ()");
  });
});

describe("-", () => {
  it("negates a single argument", () => {
    expect(subtract([VInt(5)])).toEqual(VInt(-5));
    expect(subtract([VFloat(1.5)])).toEqual(VFloat(-1.5));
  });

  it("subtracts the rest from the first", () => {
    expect(subtract([VInt(10), VInt(1), VInt(2)])).toEqual(VInt(7));
  });

  it("needs at least one argument", () => {
    expect(failure(() => subtract([])).code).toBe("E0102");
  });
});

describe("*", () => {
  it("multiplies", () => {
    expect(multiply([VInt(2), VInt(3), VInt(4)])).toEqual(VInt(24));
    expect(multiply([])).toEqual(VInt(1));
    expect(multiply([VInt(2), VFloat(2.5)])).toEqual(VFloat(5));
  });
});

describe("/", () => {
  it("keeps exact integer quotients as integers", () => {
    expect(divide([VInt(6), VInt(3)])).toEqual(VInt(2));
    expect(divide([VInt(8), VInt(2), VInt(2)])).toEqual(VInt(2));
    expect(divide([VInt(-6), VInt(3)])).toEqual(VInt(-2));
  });

  it("produces floats for inexact or float division", () => {
    expect(divide([VInt(7), VInt(2)])).toEqual(VFloat(3.5));
    expect(divide([VFloat(6), VInt(3)])).toEqual(VFloat(2));
  });

  it("stays a float once a step was inexact", () => {
    expect(divide([VInt(3), VInt(2), VInt(3)])).toEqual(VFloat(0.5));
  });

  it("rejects a zero divisor", () => {
    expect(failure(() => divide([VInt(1), VInt(0)])).code).toBe("E0200");
  });
});

describe("integer precision", () => {
  it("keeps sums and differences exact past 2^53", () => {
    expect(subtract([VInt(9007199254740993n), VInt(9007199254740992n)])).toEqual(VInt(1));
    expect(add([VInt(9007199254740992n), VInt(1)])).toEqual(VInt(9007199254740993n));
  });

  it("keeps products exact", () => {
    expect(multiply([VInt(1000000000), VInt(1000000000), VInt(1000)])).toEqual(VInt(10n ** 21n));
  });

  it("divides large integers exactly", () => {
    expect(divide([VInt(10n ** 21n), VInt(1000)])).toEqual(VInt(10n ** 18n));
  });

  it("converts to float once a float operand is involved", () => {
    expect(add([VInt(2), VFloat(0.5)])).toEqual(VFloat(2.5));
    expect(subtract([VInt(3), VFloat(0.5)])).toEqual(VFloat(2.5));
  });

  it("rejects a float zero divisor", () => {
    expect(failure(() => divide([VInt(1), VFloat(0)])).code).toBe("E0200");
  });
});

describe("builtin table", () => {
  it("installs the four operators into a root environment", () => {
    expect(Array.from(BUILTINS.keys())).toEqual(["+", "-", "*", "/"]);
    const env = createGlobalEnv();
    expect(env.names()).toEqual(["*", "+", "-", "/"]);
    expect(env.parent).toBeUndefined();
  });
});
