/**
 * Position of a construct in a schema or error-table source file.
 * Lines and columns are 1-based.
 */
export interface Span {
  file?: string;
  line: number;
  column: number;
  endColumn?: number;
}

export type DiagnosticSeverity = "error" | "warning";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, unknown>;
}

/**
 * Render a diagnostic the way compilers print them:
 * `file:line:col: error E0001: message`.
 */
export function formatDiagnostic(diag: Diagnostic): string {
  const where = diag.span
    ? `${diag.span.file ?? "<schema>"}:${diag.span.line}:${diag.span.column}: `
    : "";
  return `${where}${diag.severity} ${diag.code}: ${diag.message}`;
}
