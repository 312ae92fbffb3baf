// src/core/reader/tokenize.ts
// Source text -> flat token list. Never fails; structure is checked by the parser.

export type Tok = string;

export const LPAREN = "(";
export const RPAREN = ")";
export const ASSIGN = ":=";
export const FUNCTION = "function";

/** Always split out as their own token, wherever they appear. */
export const KEYWORDS: readonly string[] = [ASSIGN, FUNCTION];

const COMMENT = "#";

const isParen = (c: string) => c === LPAREN || c === RPAREN;
const isWS = (c: string) => c === " " || c === "\n";

export function tokenize(src: string): Tok[] {
  const toks: Tok[] = [];
  let current = "";
  let inComment = false;

  const flush = () => {
    if (current.length > 0) toks.push(current);
    current = "";
  };

  for (const c of src) {
    if (isWS(c) || isParen(c)) flush();

    if (isWS(c)) {
      if (c === "\n") inComment = false;
      continue;
    }
    if (inComment) continue;

    if (isParen(c)) {
      toks.push(c);
      continue;
    }

    if (c === COMMENT) {
      inComment = true;
      continue;
    }

    current += c;
    if (KEYWORDS.includes(current)) flush();
  }

  flush();
  return toks;
}
