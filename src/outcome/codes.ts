import type { Diagnostic, DiagnosticSeverity, Span } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "Malformed schema: {detail}" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "Missing layer marker" },

  E0101: { code: "E0101", severity: "error", category: "Schema", template: "Unknown type reference: {name}" },
  E0102: { code: "E0102", severity: "error", category: "Schema", template: "Duplicate constructor id {id}" },
  E0103: { code: "E0103", severity: "error", category: "Schema", template: "Duplicate declaration: {name}" },
  E0104: { code: "E0104", severity: "error", category: "Schema", template: "Constructor id mismatch for {name}" },

  E0201: { code: "E0201", severity: "error", category: "Errors", template: "Ambiguous error pattern: {pattern}" },
  E0202: { code: "E0202", severity: "error", category: "Errors", template: "Malformed error table: {detail}" },

  E0301: { code: "E0301", severity: "error", category: "Output", template: "Layer regression: {from} -> {to}" },
  E0302: { code: "E0302", severity: "error", category: "Output", template: "Cannot write output: {detail}" },

  W0001: { code: "W0001", severity: "warning", category: "Errors", template: "Error description is empty: {pattern}" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
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
    span,
    data: params,
  };
}
