// src/model/build.ts
// Resolved declarations -> TLModel

import type { ResolvedDeclaration } from "../ids/resolve";
import { DuplicateDeclarationError, UnknownTypeReferenceError } from "../outcome/errors";
import type { TypeExpr } from "../schema/types";
import {
  isPrimitiveName,
  splitQualified,
  type BaseType,
  type Combinator,
  type ConstructorDef,
  type FunctionDef,
  type Param,
  type ParamType,
  type TLModel,
} from "./types";

export interface ModelInput {
  readonly layer?: number;
  readonly declarations: readonly ResolvedDeclaration[];
}

/**
 * Two passes. The first indexes constructors by name and groups them into
 * base types; the second resolves every parameter and result type against
 * that index.
 */
export function buildModel(input: ModelInput): TLModel {
  const ctorDecls = new Map<string, ResolvedDeclaration>();
  const fnDecls = new Map<string, ResolvedDeclaration>();
  const baseMembers = new Map<string, ResolvedDeclaration[]>();

  // Pass 1: index
  for (const decl of input.declarations) {
    const index = decl.section === "types" ? ctorDecls : fnDecls;
    if (index.has(decl.qualifiedName)) {
      throw new DuplicateDeclarationError(decl.qualifiedName, decl.span);
    }
    index.set(decl.qualifiedName, decl);

    if (decl.section === "types") {
      const members = baseMembers.get(decl.resultText);
      if (members) members.push(decl);
      else baseMembers.set(decl.resultText, [decl]);
    }
  }

  const bases: BaseType[] = [];
  const basesByName = new Map<string, BaseType>();
  for (const [qualifiedName, members] of baseMembers) {
    const base: BaseType = Object.freeze({
      ...splitQualified(qualifiedName),
      qualifiedName,
      constructors: Object.freeze(members.map((m) => m.qualifiedName)),
      ids: Object.freeze(members.map((m) => m.id)),
    });
    bases.push(base);
    basesByName.set(qualifiedName, base);
  }

  // Pass 2: resolve
  const resolveType = (t: TypeExpr, decl: ResolvedDeclaration): ParamType => {
    switch (t.tag) {
      case "Bitmask":
        return { kind: "Bitmask" };
      case "Generic":
        return { kind: "AnyObject" };
      case "Vector":
        return { kind: "Vector", boxed: t.boxed, item: resolveType(t.item, decl) };
      case "Conditional":
        return { kind: "Flag", field: t.field, bit: t.bit, inner: resolveType(t.inner, decl) };
      case "Named":
        return resolveNamed(t.name, t.bare, decl);
    }
  };

  const resolveNamed = (name: string, bare: boolean, decl: ResolvedDeclaration): ParamType => {
    if (!bare && isPrimitiveName(name)) {
      return { kind: "Primitive", name };
    }
    if (!bare && name === "Object") {
      return { kind: "AnyObject" };
    }

    const base = basesByName.get(name);
    if (base) {
      if (!bare) {
        return { kind: "Union", base: name };
      }
      if (base.constructors.length !== 1) {
        throw new UnknownTypeReferenceError(
          `%${name}`,
          decl.qualifiedName,
          decl.span,
          `has ${base.constructors.length} constructors, so it has no single bare layout`
        );
      }
      return { kind: "Bare", constructor: base.constructors[0] };
    }

    if (ctorDecls.has(name)) {
      return { kind: "Bare", constructor: name };
    }

    throw new UnknownTypeReferenceError(bare ? `%${name}` : name, decl.qualifiedName, decl.span);
  };

  const resolveParams = (decl: ResolvedDeclaration): readonly Param[] =>
    Object.freeze(
      decl.params.map((p) =>
        Object.freeze({ name: p.name, type: resolveType(p.type, decl), typeText: p.typeText, span: p.span })
      )
    );

  const common = (decl: ResolvedDeclaration) => ({
    id: decl.id,
    namespace: decl.namespace,
    name: decl.name,
    qualifiedName: decl.qualifiedName,
    params: resolveParams(decl),
    typeParams: decl.typeParams,
    signature: decl.signature,
    index: decl.index,
    span: decl.span,
  });

  const constructors: ConstructorDef[] = [];
  const functions: FunctionDef[] = [];
  const byId = new Map<number, Combinator>();

  for (const decl of input.declarations) {
    let combinator: Combinator;
    if (decl.section === "types") {
      const ctor: ConstructorDef = Object.freeze({ kind: "constructor", ...common(decl), belongsTo: decl.resultText });
      constructors.push(ctor);
      combinator = ctor;
    } else {
      const fn: FunctionDef = Object.freeze({
        kind: "function",
        ...common(decl),
        returns: resolveType(decl.result, decl),
        returnsText: decl.resultText,
      });
      functions.push(fn);
      combinator = fn;
    }
    byId.set(combinator.id, combinator);
  }

  const namespaces = new Set<string>();
  for (const item of [...constructors, ...functions, ...bases]) {
    if (item.namespace) namespaces.add(item.namespace);
  }

  return Object.freeze({
    layer: input.layer ?? 0,
    constructors: Object.freeze(constructors),
    functions: Object.freeze(functions),
    bases: Object.freeze(bases),
    namespaces: Object.freeze([...namespaces].sort()),
    byId,
    constructorsByName: new Map(constructors.map((c) => [c.qualifiedName, c])),
    functionsByName: new Map(functions.map((f) => [f.qualifiedName, f])),
    basesByName,
  });
}
