// src/core/prims.ts
// Builtin table installed into the root environment.
// Integers stay integers until a float operand shows up.

import type { Val, IntVal, NumVal, NativeVal } from "./eval/values";
import { VInt, VFloat, isNumVal, formatValue, toNumber } from "./eval/values";
import { Environment } from "./eval/env";
import { CarlaeEvaluationError } from "./errors";

function nums(op: string, args: Val[]): NumVal[] {
  return args.map(a => {
    if (!isNumVal(a)) {
      throw new CarlaeEvaluationError("E0105", { op, expected: "number", actual: formatValue(a) });
    }
    return a;
  });
}

function atLeastOne(op: string, xs: NumVal[]): [NumVal, NumVal[]] {
  const [first, ...rest] = xs;
  if (first === undefined) {
    throw new CarlaeEvaluationError("E0102", { expected: `at least 1 for ${op}`, actual: 0 });
  }
  return [first, rest];
}

const allInts = (xs: NumVal[]): xs is IntVal[] => xs.every(x => x.tag === "Int");

export function add(args: Val[]): Val {
  const xs = nums("+", args);
  if (allInts(xs)) return VInt(xs.reduce((acc, x) => acc + x.n, 0n));
  return VFloat(xs.reduce((acc, x) => acc + toNumber(x), 0));
}

export function subtract(args: Val[]): Val {
  const xs = nums("-", args);
  const [first, rest] = atLeastOne("-", xs);
  if (rest.length === 0) return first.tag === "Int" ? VInt(-first.n) : VFloat(-first.n);
  if (first.tag === "Int" && allInts(rest)) {
    return VInt(first.n - rest.reduce((acc, x) => acc + x.n, 0n));
  }
  return VFloat(toNumber(first) - rest.reduce((acc, x) => acc + toNumber(x), 0));
}

export function multiply(args: Val[]): Val {
  const xs = nums("*", args);
  if (allInts(xs)) return VInt(xs.reduce((acc, x) => acc * x.n, 1n));
  return VFloat(xs.reduce((acc, x) => acc * toNumber(x), 1));
}

/** Left to right. The result stays an integer only while every step divides exactly. */
export function divide(args: Val[]): Val {
  const xs = nums("/", args);
  const [first, rest] = atLeastOne("/", xs);
  let acc: NumVal = first;
  for (const x of rest) {
    if (toNumber(x) === 0) throw new CarlaeEvaluationError("E0200");
    acc = acc.tag === "Int" && x.tag === "Int" && acc.n % x.n === 0n
      ? VInt(acc.n / x.n)
      : VFloat(toNumber(acc) / toNumber(x));
  }
  return acc;
}

const native = (name: string, fn: (args: Val[]) => Val): NativeVal => ({ tag: "Native", name, fn });

export const BUILTINS: ReadonlyMap<string, NativeVal> = new Map([
  ["+", native("+", add)],
  ["-", native("-", subtract)],
  ["*", native("*", multiply)],
  ["/", native("/", divide)],
]);

/** Fresh root environment holding only the builtins. */
export function createGlobalEnv(): Environment {
  return new Environment(undefined, BUILTINS);
}

/** A child of a fresh root, where a session's own bindings land. */
export function createSessionEnv(): Environment {
  return createGlobalEnv().extend();
}
