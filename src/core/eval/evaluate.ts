// src/core/eval/evaluate.ts
// Recursive tree walk. Special forms are recognized by a keyword in operator
// position only; everything else is application.

import type { Expr, ListExpr } from "../reader/datum";
import { exprToString, isSym } from "../reader/datum";
import { ASSIGN, FUNCTION } from "../reader/tokenize";
import type { Val, ClosureVal } from "./values";
import { VNil, formatValue } from "./values";
import type { Environment } from "./env";
import { CarlaeEvaluationError, CarlaeResourceError } from "../errors";

export type EvalOptions = {
  /** Nesting limit for evaluate calls; past it a CarlaeResourceError is raised. */
  maxDepth?: number;
};

export const DEFAULT_MAX_DEPTH = 1000;

export function evaluate(expr: Expr, env: Environment, options: EvalOptions = {}): Val {
  return evalIn(expr, env, 0, options.maxDepth ?? DEFAULT_MAX_DEPTH);
}

function evalIn(expr: Expr, env: Environment, depth: number, maxDepth: number): Val {
  if (depth > maxDepth) throw new CarlaeResourceError(maxDepth);

  switch (expr.tag) {
    case "Int":
    case "Float":
      return expr;
    case "Sym":
      return env.get(expr.name);
    case "List":
      return evalList(expr, env, depth + 1, maxDepth);
  }
}

function evalList(expr: ListExpr, env: Environment, depth: number, maxDepth: number): Val {
  const [head] = expr.items;
  if (head === undefined) return VNil;

  if (isSym(head) && head.name === ASSIGN) return evalAssign(expr, env, depth, maxDepth);
  if (isSym(head) && head.name === FUNCTION) return evalFunction(expr, env);

  const vals = expr.items.map(e => evalIn(e, env, depth, maxDepth));
  const [op, ...args] = vals;
  if (op === undefined) return VNil;
  if (vals.length === 1) return op;

  switch (op.tag) {
    case "Closure":
      return applyClosure(op, args, depth, maxDepth);
    case "Native":
      return op.fn(args);
    default:
      throw new CarlaeEvaluationError("E0103", { value: formatValue(op) });
  }
}

/**
 * Closure call: exact arity, parameters bound in a fresh child of the
 * defining environment, body evaluated there.
 */
export function applyClosure(fn: ClosureVal, args: Val[], depth = 0, maxDepth = DEFAULT_MAX_DEPTH): Val {
  if (fn.params.length !== args.length) {
    throw new CarlaeEvaluationError("E0102", { expected: fn.params.length, actual: args.length });
  }
  const callEnv = fn.env.extend(fn.params.map((p, i): [string, Val] => [p, args[i] ?? VNil]));
  return evalIn(fn.body, callEnv, depth, maxDepth);
}

// (:= name expr) | (:= (name params...) body)
function evalAssign(expr: ListExpr, env: Environment, depth: number, maxDepth: number): Val {
  const [, target, body] = expr.items;
  if (expr.items.length !== 3 || target === undefined || body === undefined) {
    throw malformed(ASSIGN, expr, "expected (:= name expr) or (:= (name params...) body)");
  }

  if (target.tag === "List") {
    const [name, ...params] = target.items;
    if (name === undefined || name.tag !== "Sym") {
      throw malformed(ASSIGN, expr, "function name must be a symbol");
    }
    return env.set(name.name, makeClosure(paramNames(ASSIGN, expr, params), body, env, name.name));
  }

  if (target.tag !== "Sym") throw malformed(ASSIGN, expr, "name must be a symbol");
  return env.set(target.name, evalIn(body, env, depth, maxDepth));
}

// (function (params...) body)
function evalFunction(expr: ListExpr, env: Environment): Val {
  const [, params, body] = expr.items;
  if (expr.items.length !== 3 || params === undefined || body === undefined || params.tag !== "List") {
    throw malformed(FUNCTION, expr, "expected (function (params...) body)");
  }
  return makeClosure(paramNames(FUNCTION, expr, params.items), body, env);
}

function makeClosure(params: string[], body: Expr, env: Environment, name?: string): ClosureVal {
  return name === undefined
    ? { tag: "Closure", params, body, env }
    : { tag: "Closure", params, body, env, name };
}

function paramNames(form: string, expr: ListExpr, params: Expr[]): string[] {
  return params.map(p => {
    if (p.tag !== "Sym") throw malformed(form, expr, `parameter ${exprToString(p)} is not a symbol`);
    return p.name;
  });
}

function malformed(form: string, expr: ListExpr, detail: string): CarlaeEvaluationError {
  return new CarlaeEvaluationError("E0104", { form, detail: `${detail} in ${exprToString(expr)}` });
}
