// src/core/eval/values.ts
// Runtime values produced by evaluation

import type { Expr, IntExpr, FloatExpr } from "../reader/datum";
import { formatFloat } from "../reader/datum";
import type { Environment } from "./env";

export type IntVal = IntExpr;
export type FloatVal = FloatExpr;
export type NumVal = IntVal | FloatVal;

/** Host-implemented operation over already-evaluated arguments. */
export type NativeVal = { tag: "Native"; name: string; fn: (args: Val[]) => Val };

/**
 * User-defined function. `env` is the defining environment, captured by
 * reference; calls extend it, never the caller's environment.
 */
export type ClosureVal = {
  tag: "Closure";
  params: readonly string[];
  body: Expr;
  env: Environment;
  /** Set when bound through the `(:= (name ...) body)` shorthand. */
  name?: string;
};

export type NilVal = { tag: "Nil" };

export type Val = NumVal | NativeVal | ClosureVal | NilVal;

export const VNil: NilVal = { tag: "Nil" };

export const VInt = (n: bigint | number): IntVal => ({ tag: "Int", n: BigInt(n) });
export const VFloat = (n: number): FloatVal => ({ tag: "Float", n });

export const isNumVal = (v: Val): v is NumVal => v.tag === "Int" || v.tag === "Float";
/** Numeric value as a JavaScript number; integers past 2^53 lose precision here. */
export const toNumber = (v: NumVal): number => (v.tag === "Int" ? Number(v.n) : v.n);
export const isCallable = (v: Val): v is NativeVal | ClosureVal => v.tag === "Native" || v.tag === "Closure";

export function formatValue(v: Val): string {
  switch (v.tag) {
    case "Int": return String(v.n);
    case "Float": return formatFloat(v.n);
    case "Nil": return "()";
    case "Native": return `<builtin ${v.name}>`;
    case "Closure": return v.name ? `<function ${v.name}>` : "<function>";
  }
}
