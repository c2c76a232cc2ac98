// src/model/types.ts
// Resolved object model: every type reference points at something real

import type { Span } from "../outcome/diagnostic";

export type PrimitiveName = "int" | "long" | "int128" | "int256" | "double" | "string" | "bytes" | "Bool" | "true";

export const PRIMITIVES: ReadonlySet<string> = new Set<PrimitiveName>([
  "int",
  "long",
  "int128",
  "int256",
  "double",
  "string",
  "bytes",
  "Bool",
  "true",
]);

export function isPrimitiveName(name: string): name is PrimitiveName {
  return PRIMITIVES.has(name);
}

export type ParamType =
  | { readonly kind: "Primitive"; readonly name: PrimitiveName }
  | { readonly kind: "Bitmask" }
  | { readonly kind: "Vector"; readonly boxed: boolean; readonly item: ParamType }
  /** Boxed reference to a base type; decoded by id dispatch. */
  | { readonly kind: "Union"; readonly base: string }
  /** Bare reference to a single constructor; no id on the wire. */
  | { readonly kind: "Bare"; readonly constructor: string }
  /** Generic `!X` / `X`, or `Object`: any boxed value. */
  | { readonly kind: "AnyObject" }
  | { readonly kind: "Flag"; readonly field: string; readonly bit: number; readonly inner: ParamType };

export interface Param {
  readonly name: string;
  readonly type: ParamType;
  readonly typeText: string;
  readonly span: Span;
}

interface CombinatorBase {
  readonly id: number;
  readonly namespace?: string;
  readonly name: string;
  readonly qualifiedName: string;
  readonly params: readonly Param[];
  readonly typeParams: readonly string[];
  readonly signature: string;
  /** Position in the schema, across both sections. */
  readonly index: number;
  readonly span: Span;
}

export interface ConstructorDef extends CombinatorBase {
  readonly kind: "constructor";
  /** Qualified name of the base type this constructor builds. */
  readonly belongsTo: string;
}

export interface FunctionDef extends CombinatorBase {
  readonly kind: "function";
  readonly returns: ParamType;
  readonly returnsText: string;
}

export type Combinator = ConstructorDef | FunctionDef;

export interface BaseType {
  readonly namespace?: string;
  readonly name: string;
  readonly qualifiedName: string;
  /** Qualified constructor names, in schema order. */
  readonly constructors: readonly string[];
  readonly ids: readonly number[];
}

export interface TLModel {
  readonly layer: number;
  readonly constructors: readonly ConstructorDef[];
  readonly functions: readonly FunctionDef[];
  readonly bases: readonly BaseType[];
  /** Non-root namespaces, sorted. */
  readonly namespaces: readonly string[];
  readonly byId: ReadonlyMap<number, Combinator>;
  readonly constructorsByName: ReadonlyMap<string, ConstructorDef>;
  readonly functionsByName: ReadonlyMap<string, FunctionDef>;
  readonly basesByName: ReadonlyMap<string, BaseType>;
}

export function splitQualified(qualifiedName: string): { namespace?: string; name: string } {
  const dot = qualifiedName.indexOf(".");
  return dot >= 0
    ? { namespace: qualifiedName.slice(0, dot), name: qualifiedName.slice(dot + 1) }
    : { name: qualifiedName };
}

/** Params that take up a property on the object (bitmasks are derived). */
export function valueParams(c: Pick<CombinatorBase, "params">): readonly Param[] {
  return c.params.filter((p) => p.type.kind !== "Bitmask");
}

export function paramTypeToString(t: ParamType): string {
  switch (t.kind) {
    case "Primitive":
      return t.name;
    case "Bitmask":
      return "#";
    case "Vector":
      return `${t.boxed ? "Vector" : "vector"}<${paramTypeToString(t.item)}>`;
    case "Union":
      return t.base;
    case "Bare":
      return `%${t.constructor}`;
    case "AnyObject":
      return "Object";
    case "Flag":
      return `${t.field}.${t.bit}?${paramTypeToString(t.inner)}`;
  }
}
