// src/core/errors.ts
// Error taxonomy raised by the reader and the evaluator.
// Every failure aborts the current run; callers classify on the subclass.

import type { Diagnostic } from "../outcome/diagnostic";
import { makeDiagnostic, type DiagnosticCode } from "../outcome/codes";

export abstract class CarlaeError extends Error {
  readonly diagnostic: Diagnostic;

  protected constructor(
    public readonly code: DiagnosticCode,
    params?: Record<string, string | number>
  ) {
    const diagnostic = makeDiagnostic(code, params);
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = "CarlaeError";
  }
}

/** Malformed or unbalanced parenthesization, a lone paren, an empty program. */
export class CarlaeSyntaxError extends CarlaeError {
  constructor(code: "E0001" | "E0002" | "E0003", params?: Record<string, string | number>) {
    super(code, params);
    this.name = "CarlaeSyntaxError";
  }
}

export class CarlaeNameError extends CarlaeError {
  constructor(public readonly symbol: string) {
    super("E0101", { name: symbol });
    this.name = "CarlaeNameError";
  }
}

/** Anything else that goes wrong while evaluating: calls, special-form shapes, arithmetic. */
export class CarlaeEvaluationError extends CarlaeError {
  constructor(
    code: "E0102" | "E0103" | "E0104" | "E0105" | "E0200",
    params?: Record<string, string | number>
  ) {
    super(code, params);
    this.name = "CarlaeEvaluationError";
  }
}

export class CarlaeResourceError extends CarlaeError {
  constructor(public readonly limit: number) {
    super("E0300", { limit });
    this.name = "CarlaeResourceError";
  }
}

export function isCarlaeError(e: unknown): e is CarlaeError {
  return e instanceof CarlaeError;
}
