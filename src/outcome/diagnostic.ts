export type DiagnosticSeverity = "error" | "warning" | "info" | "hint";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  data?: Record<string, unknown>;
}

export function formatDiagnostic(d: Diagnostic): string {
  return `${d.severity}[${d.code}]: ${d.message}`;
}
