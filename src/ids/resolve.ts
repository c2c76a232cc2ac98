// src/ids/resolve.ts
// Constructor ids: derive, verify, and check for collisions

import { DuplicateConstructorIdError, DuplicateDeclarationError, IdMismatchError } from "../outcome/errors";
import type { RawDeclaration } from "../schema/types";
import { crc32 } from "./crc32";

export interface ResolvedDeclaration extends RawDeclaration {
  readonly id: number;
  /** True when the id came from a `#hex` suffix rather than the signature. */
  readonly idWasExplicit: boolean;
}

/** The id a declaration's canonical signature hashes to. */
export function computeId(decl: Pick<RawDeclaration, "signature">): number {
  return crc32(decl.signature);
}

/**
 * Give every declaration its constructor id. An explicit id must equal the
 * computed one. Types and functions share one id space.
 */
export function resolveIds(decls: readonly RawDeclaration[]): readonly ResolvedDeclaration[] {
  const byId = new Map<number, ResolvedDeclaration>();
  const out: ResolvedDeclaration[] = [];

  for (const decl of decls) {
    const computed = computeId(decl);
    if (decl.explicitId !== undefined && decl.explicitId !== computed) {
      throw new IdMismatchError(decl.qualifiedName, decl.explicitId, computed, decl.signature, decl.span);
    }

    const resolved: ResolvedDeclaration = Object.freeze({
      ...decl,
      id: computed,
      idWasExplicit: decl.explicitId !== undefined,
    });

    const clash = byId.get(computed);
    if (clash) {
      if (clash.qualifiedName === decl.qualifiedName && clash.section === decl.section) {
        throw new DuplicateDeclarationError(decl.qualifiedName, decl.span);
      }
      throw new DuplicateConstructorIdError(computed, clash.qualifiedName, decl.qualifiedName, decl.span);
    }
    byId.set(computed, resolved);
    out.push(resolved);
  }

  return Object.freeze(out);
}
