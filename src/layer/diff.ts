// src/layer/diff.ts
// Compare an upstream schema against the vendored copy

import { computeId } from "../ids/resolve";
import { parseSchema } from "../schema/parse";
import type { Section } from "../schema/types";
import { sha256Text } from "./fingerprint";
import { writeFileAtomic } from "./staging";

const LAYER_RE = /\/\/\s*LAYER\s+(\d+)/;

/** Combinators the vendored file keeps only as comments. */
export const BUILTIN_SCHEMA_LINES = [
  "boolFalse#bc799737 = Bool;",
  "boolTrue#997275b5 = Bool;",
  "true#3fedd339 = True;",
  "vector#1cb5c415 {t:Type} # [ t ] = Vector t;",
  "error#c4b9f9bb code:int text:string = Error;",
  "null#56730bcc = Null;",
];

export const SCHEMA_HEADER = [
  "///////////////////////////////",
  "///////// Main application API",
  "///////////////////////////////",
  "",
  "---types---",
  "",
  "// boolFalse#bc799737 = Bool;  // Parsed manually",
  "// boolTrue#997275b5 = Bool;  // Parsed manually",
  "",
  "// true#3fedd339 = True;  // Not used",
  "",
  "// vector#1cb5c415 {t:Type} # [ t ] = Vector t;  // Parsed manually",
  "",
  "// error#c4b9f9bb code:int text:string = Error;  // Not used",
  "",
  "// null#56730bcc = Null;  // Parsed manually",
  "",
].join("\n");

const BUILTIN_HEADS = BUILTIN_SCHEMA_LINES.map((line) => line.split("=")[0].trim());

/**
 * Turn an upstream schema into the vendored form: the fixed header first,
 * the upstream built-in lines dropped, blank lines kept. Text that is
 * already in vendored form is returned unchanged.
 */
export function prepareUpstreamSchema(text: string): string {
  const normalized = text.replace(/\r\n/g, "\n");
  if (normalized.startsWith(SCHEMA_HEADER)) {
    return normalized;
  }

  const functionsAt = normalized.indexOf("---functions---");
  const typesPart = functionsAt >= 0 ? normalized.slice(0, functionsAt) : normalized;
  const functionsPart = functionsAt >= 0 ? normalized.slice(functionsAt) : "";

  const kept: string[] = [];
  for (const line of typesPart.trim().split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) {
      kept.push("");
      continue;
    }
    if (trimmed === "---types---") continue;
    if (BUILTIN_HEADS.some((head) => trimmed.startsWith(head))) continue;
    kept.push(line);
  }

  const types = kept.join("\n").trim();
  return functionsPart ? `${SCHEMA_HEADER}\n${types}\n\n${functionsPart}` : `${SCHEMA_HEADER}\n${types}`;
}

export function extractLayer(text: string): number | undefined {
  const m = LAYER_RE.exec(text);
  return m ? parseInt(m[1], 10) : undefined;
}

export type DeclarationRef = {
  readonly section: Section;
  readonly name: string;
  readonly id: number;
};

export type ChangedDeclaration = {
  readonly section: Section;
  readonly name: string;
  readonly fromId: number;
  readonly toId: number;
};

export type SchemaDiff = {
  readonly added: readonly DeclarationRef[];
  readonly removed: readonly DeclarationRef[];
  readonly changed: readonly ChangedDeclaration[];
};

export type SchemaUpdateStatus = "Initial" | "Changed" | "Unchanged";

export type SchemaUpdateReport = {
  readonly status: SchemaUpdateStatus;
  readonly currentLayer?: number;
  readonly candidateLayer?: number;
  readonly currentHash?: string;
  readonly candidateHash: string;
  readonly diff: SchemaDiff;
};

function declarationIds(text: string): Map<string, DeclarationRef> {
  const out = new Map<string, DeclarationRef>();
  for (const decl of parseSchema(text).declarations) {
    out.set(`${decl.section}:${decl.qualifiedName}`, {
      section: decl.section,
      name: decl.qualifiedName,
      id: decl.explicitId ?? computeId(decl),
    });
  }
  return out;
}

function compareRefs(a: { section: Section; name: string }, b: { section: Section; name: string }): number {
  if (a.section !== b.section) return a.section === "types" ? -1 : 1;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

export function diffSchemas(current: string, candidate: string): SchemaDiff {
  const before = declarationIds(current);
  const after = declarationIds(candidate);

  const added: DeclarationRef[] = [];
  const removed: DeclarationRef[] = [];
  const changed: ChangedDeclaration[] = [];

  for (const [key, ref] of after) {
    const prev = before.get(key);
    if (!prev) added.push(ref);
    else if (prev.id !== ref.id) changed.push({ section: ref.section, name: ref.name, fromId: prev.id, toId: ref.id });
  }
  for (const [key, ref] of before) {
    if (!after.has(key)) removed.push(ref);
  }

  return {
    added: added.sort(compareRefs),
    removed: removed.sort(compareRefs),
    changed: changed.sort(compareRefs),
  };
}

/**
 * Decide whether `candidate` (already in vendored form) differs from the
 * vendored text. Pure: the same inputs always give the same report.
 */
export function checkSchemaUpdate(candidate: string, vendored?: string): SchemaUpdateReport {
  const candidateHash = sha256Text(candidate);
  const candidateLayer = extractLayer(candidate);

  if (vendored === undefined) {
    return {
      status: "Initial",
      candidateLayer,
      candidateHash,
      diff: diffSchemas("", candidate),
    };
  }

  const currentHash = sha256Text(vendored);
  const base = {
    currentLayer: extractLayer(vendored),
    candidateLayer,
    currentHash,
    candidateHash,
  };
  if (currentHash === candidateHash) {
    return { status: "Unchanged", ...base, diff: { added: [], removed: [], changed: [] } };
  }
  return { status: "Changed", ...base, diff: diffSchemas(vendored, candidate) };
}

/** Replace the vendored schema file. */
export function applySchemaUpdate(file: string, text: string): void {
  writeFileAtomic(file, text);
}
