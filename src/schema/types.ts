// src/schema/types.ts
// Raw declarations as read from TL schema text

import type { Span } from "../outcome/diagnostic";

export type Section = "types" | "functions";

/**
 * A parameter or result type as written. Names are not resolved yet.
 */
export type TypeExpr =
  | { readonly tag: "Bitmask" }
  | { readonly tag: "Named"; readonly name: string; readonly bare: boolean }
  | { readonly tag: "Vector"; readonly boxed: boolean; readonly item: TypeExpr }
  | { readonly tag: "Generic"; readonly name: string; readonly bang: boolean }
  | { readonly tag: "Conditional"; readonly field: string; readonly bit: number; readonly inner: TypeExpr };

export interface RawParam {
  readonly name: string;
  readonly type: TypeExpr;
  /** The type exactly as it appears after the colon. */
  readonly typeText: string;
  readonly span: Span;
}

export interface RawDeclaration {
  readonly section: Section;
  readonly namespace?: string;
  readonly name: string;
  /** `namespace.name`, or `name` when there is no namespace. */
  readonly qualifiedName: string;
  readonly explicitId?: number;
  /** Names bound by `{X:Type}`. */
  readonly typeParams: readonly string[];
  readonly params: readonly RawParam[];
  readonly result: TypeExpr;
  readonly resultText: string;
  /** Canonical text the constructor id is the CRC-32 of. */
  readonly signature: string;
  /** Position among all declarations of the schema. */
  readonly index: number;
  readonly span: Span;
}

export interface SkippedDeclaration {
  readonly name: string;
  readonly line: number;
  readonly reason: string;
}

export interface ParsedSchema {
  readonly file?: string;
  readonly layer?: number;
  readonly declarations: readonly RawDeclaration[];
  readonly skipped: readonly SkippedDeclaration[];
}

export function typeExprToString(t: TypeExpr): string {
  switch (t.tag) {
    case "Bitmask":
      return "#";
    case "Named":
      return t.bare ? `%${t.name}` : t.name;
    case "Vector":
      return `${t.boxed ? "Vector" : "vector"}<${typeExprToString(t.item)}>`;
    case "Generic":
      return t.bang ? `!${t.name}` : t.name;
    case "Conditional":
      return `${t.field}.${t.bit}?${typeExprToString(t.inner)}`;
  }
}
