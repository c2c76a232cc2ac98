import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "schema-syntax"
  | "schema-consistency"
  | "id-mismatch"
  | "error-table"
  | "layer-regression"
  | "io-error"
  | "internal-error";

export interface Failure {
  reason: FailureReason;
  message: string;
  diagnostics: Diagnostic[];
}

export function failure(reason: FailureReason, message: string, diagnostics: Diagnostic[] = []): Failure {
  return { reason, message, diagnostics };
}
