import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "Malformed expression: {detail}" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "Unbalanced parentheses" },
  E0003: { code: "E0003", severity: "error", category: "Syntax", template: "Empty program" },

  E0101: { code: "E0101", severity: "error", category: "Name", template: "Undefined variable: {name}" },
  E0102: { code: "E0102", severity: "error", category: "Evaluation", template: "Wrong number of arguments: expected {expected}, got {actual}" },
  E0103: { code: "E0103", severity: "error", category: "Evaluation", template: "Not callable: {value}" },
  E0104: { code: "E0104", severity: "error", category: "Evaluation", template: "Malformed {form} form: {detail}" },
  E0105: { code: "E0105", severity: "error", category: "Evaluation", template: "Type mismatch in {op}: expected {expected}, got {actual}" },

  E0200: { code: "E0200", severity: "error", category: "Evaluation", template: "Division by zero" },

  E0300: { code: "E0300", severity: "error", category: "Resource", template: "Evaluation depth exceeded: {limit}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    data: params,
  };
}
