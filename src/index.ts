// src/index.ts
// Carlae - Public API

// ═══════════════════════════════════════════════════════════════════════════════
// READER
// ═══════════════════════════════════════════════════════════════════════════════

export { tokenize, KEYWORDS, type Tok } from "./core/reader/tokenize";
export { parse, parseSource, parseProgram, groupTokens, numberOrSymbol } from "./core/reader/parse";
export {
  int, float, sym, list, exprToString,
  type Expr, type IntExpr, type FloatExpr, type SymExpr, type ListExpr,
} from "./core/reader/datum";

// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATION
// ═══════════════════════════════════════════════════════════════════════════════

export { Environment } from "./core/eval/env";
export { evaluate, applyClosure, DEFAULT_MAX_DEPTH, type EvalOptions } from "./core/eval/evaluate";
export { run, runProgram, type RunOptions, type RunResult } from "./core/eval/run";
export {
  VNil, VInt, VFloat, formatValue, isCallable, isNumVal, toNumber,
  type Val, type IntVal, type FloatVal, type NumVal, type NativeVal, type ClosureVal, type NilVal,
} from "./core/eval/values";
export { BUILTINS, createGlobalEnv, createSessionEnv } from "./core/prims";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS & DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  CarlaeError,
  CarlaeSyntaxError,
  CarlaeNameError,
  CarlaeEvaluationError,
  CarlaeResourceError,
  isCarlaeError,
} from "./core/errors";
export type { Diagnostic, DiagnosticSeverity } from "./outcome/diagnostic";
export { formatDiagnostic } from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, type DiagnosticCode } from "./outcome/codes";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG & REPL
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export { ReplSession, parenBalance, type ReplOutput, type ReplSessionOptions } from "./repl/session";
