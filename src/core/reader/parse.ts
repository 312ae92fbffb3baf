// src/core/reader/parse.ts
// Token list -> expression tree, by splitting each combination into top-level groups.

import { type Tok, tokenize, LPAREN, RPAREN } from "./tokenize";
import type { Expr } from "./datum";
import { int, float, sym, list } from "./datum";
import { CarlaeSyntaxError } from "../errors";

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOAT_RE = /^[+-]?(inf|infinity|nan)$/i;

/**
 * Classify a single atom: integer first, then float, otherwise a symbol name.
 * `1.2.3` and `-` stay symbols.
 */
export function numberOrSymbol(s: string): Expr {
  if (INT_RE.test(s)) return int(parseInteger(s));
  if (FLOAT_RE.test(s)) return float(Number(s));
  if (SPECIAL_FLOAT_RE.test(s)) {
    const negative = s.startsWith("-");
    const body = s.replace(/^[+-]/, "").toLowerCase();
    if (body === "nan") return float(NaN);
    return float(negative ? -Infinity : Infinity);
  }
  return sym(s);
}

function parseInteger(s: string): bigint {
  const digits = BigInt(s.replace(/^[+-]/, ""));
  return s.startsWith("-") ? -digits : digits;
}

export function parse(toks: Tok[]): Expr {
  if (toks.length === 0) throw new CarlaeSyntaxError("E0003");

  if (toks.length === 1) {
    const only = toks[0];
    if (only === undefined || only === LPAREN || only === RPAREN) {
      throw new CarlaeSyntaxError("E0002");
    }
    return numberOrSymbol(only);
  }

  if (toks[0] !== LPAREN || toks[toks.length - 1] !== RPAREN) {
    throw new CarlaeSyntaxError("E0001", { detail: "expected a single parenthesized form" });
  }

  return list(groupTokens(toks.slice(1, -1)).map(parse));
}

/**
 * Split the inside of a combination into its top-level elements. A bare token
 * at depth 0 is its own group; a paren run is one group up to its matching ')'.
 */
export function groupTokens(toks: Tok[]): Tok[][] {
  const groups: Tok[][] = [];
  let depth = 0;
  let open = -1;

  toks.forEach((t, i) => {
    if (t === LPAREN) {
      if (depth === 0) open = i;
      depth++;
      return;
    }
    if (t === RPAREN) {
      depth--;
      if (depth < 0) throw new CarlaeSyntaxError("E0002");
      if (depth === 0) {
        groups.push(toks.slice(open, i + 1));
        open = -1;
      }
      return;
    }
    if (depth === 0) groups.push([t]);
  });

  if (depth > 0) throw new CarlaeSyntaxError("E0002");
  return groups;
}

export function parseSource(src: string): Expr {
  return parse(tokenize(src));
}

/** Every top-level form of a multi-form source, in order. */
export function parseProgram(src: string): Expr[] {
  const toks = tokenize(src);
  if (toks.length === 0) throw new CarlaeSyntaxError("E0003");
  return groupTokens(toks).map(parse);
}
