import { makeDiagnostic, type DiagnosticCode } from "./codes";
import type { Diagnostic, Span } from "./diagnostic";
import { failure, type Failure, type FailureReason } from "./failure";

// ─────────────────────────────────────────────────────────────────
// Compile-time errors
// ─────────────────────────────────────────────────────────────────

/**
 * Base class of every error the compilers raise. All of them are fatal to
 * a generation run; `toFailure` turns one into the value the layer tracker
 * reports instead of throwing.
 */
export class TlgenError extends Error {
  constructor(
    message: string,
    public readonly code: DiagnosticCode,
    public readonly reason: FailureReason,
    public readonly span?: Span,
    public readonly params: Record<string, string | number> = {}
  ) {
    super(message);
    this.name = "TlgenError";
  }

  toDiagnostic(): Diagnostic {
    return { ...makeDiagnostic(this.code, this.params, this.span), message: this.message };
  }

  toFailure(): Failure {
    return failure(this.reason, this.message, [this.toDiagnostic()]);
  }
}

export class SchemaSyntaxError extends TlgenError {
  constructor(
    detail: string,
    public readonly token: string,
    span: Span
  ) {
    super(
      `SchemaSyntaxError: ${detail} at line ${span.line}, column ${span.column} (near '${token}')`,
      "E0001",
      "schema-syntax",
      span,
      { detail, token }
    );
    this.name = "SchemaSyntaxError";
  }
}

export class MissingLayerError extends TlgenError {
  constructor(file?: string) {
    super(
      `SchemaSyntaxError: no '// LAYER N' marker found${file ? ` in ${file}` : ""}`,
      "E0002",
      "schema-syntax",
      file ? { file, line: 1, column: 1 } : undefined
    );
    this.name = "MissingLayerError";
  }
}

export class UnknownTypeReferenceError extends TlgenError {
  constructor(
    public readonly typeName: string,
    public readonly declaration: string,
    span?: Span,
    detail?: string
  ) {
    super(
      `UnknownTypeReferenceError: '${typeName}' used by ${declaration} ${detail ?? "is not declared"}`,
      "E0101",
      "schema-consistency",
      span,
      { name: typeName }
    );
    this.name = "UnknownTypeReferenceError";
  }
}

export class DuplicateConstructorIdError extends TlgenError {
  constructor(
    public readonly constructorId: number,
    public readonly first: string,
    public readonly second: string,
    span?: Span
  ) {
    super(
      `DuplicateConstructorIdError: ${formatId(constructorId)} is used by both ${first} and ${second}`,
      "E0102",
      "schema-consistency",
      span,
      { id: formatId(constructorId) }
    );
    this.name = "DuplicateConstructorIdError";
  }
}

export class DuplicateDeclarationError extends TlgenError {
  constructor(public readonly qualifiedName: string, span?: Span) {
    super(
      `DuplicateDeclarationError: ${qualifiedName} is declared more than once`,
      "E0103",
      "schema-consistency",
      span,
      { name: qualifiedName }
    );
    this.name = "DuplicateDeclarationError";
  }
}

export class IdMismatchError extends TlgenError {
  constructor(
    public readonly qualifiedName: string,
    public readonly explicitId: number,
    public readonly computedId: number,
    public readonly signature: string,
    span?: Span
  ) {
    super(
      `IdMismatchError: ${qualifiedName} declares ${formatId(explicitId)} but '${signature}' hashes to ${formatId(computedId)}`,
      "E0104",
      "id-mismatch",
      span,
      { name: qualifiedName }
    );
    this.name = "IdMismatchError";
  }
}

export class ErrorPatternAmbiguity extends TlgenError {
  constructor(
    public readonly errorCode: number,
    public readonly pattern: string,
    public readonly previous: string,
    span?: Span
  ) {
    super(
      `ErrorPatternAmbiguity: ${pattern} under code ${errorCode} matches the same messages as ${previous}`,
      "E0201",
      "error-table",
      span,
      { pattern }
    );
    this.name = "ErrorPatternAmbiguity";
  }
}

export class ErrorTableFormatError extends TlgenError {
  constructor(detail: string, span?: Span) {
    super(`ErrorTableFormatError: ${detail}`, "E0202", "error-table", span, { detail });
    this.name = "ErrorTableFormatError";
  }
}

export class LayerRegressionError extends TlgenError {
  constructor(
    public readonly fromLayer: number,
    public readonly toLayer: number
  ) {
    super(
      `LayerRegressionError: output is at layer ${fromLayer}, schema declares ${toLayer}`,
      "E0301",
      "layer-regression",
      undefined,
      { from: fromLayer, to: toLayer }
    );
    this.name = "LayerRegressionError";
  }
}

export class OutputWriteError extends TlgenError {
  constructor(detail: string, public readonly cause?: unknown) {
    super(`OutputWriteError: ${detail}`, "E0302", "io-error", undefined, { detail });
    this.name = "OutputWriteError";
  }
}

export function formatId(id: number): string {
  return `0x${(id >>> 0).toString(16).padStart(8, "0")}`;
}

/**
 * Convert anything thrown during a run into a Failure. Unknown throwables
 * are internal errors and keep their message.
 */
export function toFailure(err: unknown): Failure {
  if (err instanceof TlgenError) {
    return err.toFailure();
  }
  const message = err instanceof Error ? err.message : String(err);
  return failure("internal-error", message);
}
