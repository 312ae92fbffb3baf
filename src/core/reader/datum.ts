// src/core/reader/datum.ts
// Expression tree produced by the parser and walked by the evaluator

export type IntExpr = { tag: "Int"; n: bigint };
export type FloatExpr = { tag: "Float"; n: number };
export type SymExpr = { tag: "Sym"; name: string };
export type ListExpr = { tag: "List"; items: Expr[] };

/**
 * An atom (integer, float, symbol) or a combination of sub-expressions.
 * Trees are never mutated after parsing; closures hold on to their bodies.
 */
export type Expr = IntExpr | FloatExpr | SymExpr | ListExpr;

export function int(n: bigint | number): IntExpr { return { tag: "Int", n: BigInt(n) }; }
export function float(n: number): FloatExpr { return { tag: "Float", n }; }
export function sym(name: string): SymExpr { return { tag: "Sym", name }; }
export function list(items: Expr[]): ListExpr { return { tag: "List", items }; }

export const isSym = (e: Expr): e is SymExpr => e.tag === "Sym";

/** Floats always print with a fractional part or exponent so they stay distinguishable from ints. */
export function formatFloat(n: number): string {
  if (Number.isNaN(n)) return "nan";
  if (!Number.isFinite(n)) return n > 0 ? "inf" : "-inf";
  const s = Object.is(n, -0) ? "-0" : String(n);
  return /[.e]/.test(s) ? s : `${s}.0`;
}

export function exprToString(e: Expr): string {
  switch (e.tag) {
    case "Int": return String(e.n);
    case "Float": return formatFloat(e.n);
    case "Sym": return e.name;
    case "List": return `(${e.items.map(exprToString).join(" ")})`;
  }
}
