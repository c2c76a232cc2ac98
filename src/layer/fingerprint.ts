// src/layer/fingerprint.ts
// Content fingerprints for generated trees and schema files

import { createHash } from "node:crypto";
import type { GeneratedFile } from "../emit/emitter";

/** Deterministic SHA-256 digest for text. */
export function sha256Text(s: string): string {
  return createHash("sha256").update(s, "utf8").digest("hex");
}

/** SHA-256 over `(path, content)` pairs in path order. */
export function fingerprintFiles(files: readonly GeneratedFile[]): string {
  const hash = createHash("sha256");
  const sorted = [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  for (const f of sorted) {
    hash.update(f.path, "utf8").update("\0").update(f.content, "utf8").update("\0");
  }
  return hash.digest("hex");
}

export const MANIFEST_FILE = "manifest.json";

export type Manifest = {
  layer: number;
  fingerprint: string;
  files: string[];
};

export function renderManifest(files: readonly GeneratedFile[], layer: number): GeneratedFile {
  const manifest: Manifest = {
    layer,
    fingerprint: fingerprintFiles(files),
    files: files.map((f) => f.path).sort(),
  };
  return { path: MANIFEST_FILE, content: `${JSON.stringify(manifest, null, 2)}\n` };
}

/** Parse a manifest; anything malformed reads as no manifest. */
export function parseManifest(text: string): Manifest | undefined {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (typeof data !== "object" || data === null) return undefined;
  if (!("layer" in data) || !("fingerprint" in data) || !("files" in data)) return undefined;

  const { layer, fingerprint, files } = data;
  if (typeof layer !== "number" || typeof fingerprint !== "string" || !Array.isArray(files)) return undefined;
  if (!files.every((f): f is string => typeof f === "string")) return undefined;
  return { layer, fingerprint, files };
}
