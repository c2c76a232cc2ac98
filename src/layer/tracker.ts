// src/layer/tracker.ts
// Regenerate an output tree only when its inputs changed, atomically

import * as fs from "fs";
import * as path from "path";
import type { GeneratedFile } from "../emit/emitter";
import { silentLogger, type Logger } from "../log/logger";
import { LayerRegressionError, toFailure } from "../outcome/errors";
import type { Failed, GenerationOutcome, OutcomeMeta } from "../outcome/outcome";
import { fingerprintFiles, MANIFEST_FILE, parseManifest, renderManifest, type Manifest } from "./fingerprint";
import { listTree, withStagingDir, writeTree } from "./staging";

export type GeneratedTree = {
  readonly files: readonly GeneratedFile[];
  readonly layer: number;
};

export type RegenerateRequest = {
  outDir: string;
  /** Produce the file set. Compile errors thrown here become `Failed`. */
  generate: () => GeneratedTree;
  /** Allow a lower layer and rewrite even an identical tree. */
  force?: boolean;
  logger?: Logger;
};

/** Manifest of the tree currently at `outDir`, if there is a readable one. */
export function readManifest(outDir: string): Manifest | undefined {
  const file = path.join(outDir, MANIFEST_FILE);
  if (!fs.existsSync(file)) return undefined;
  return parseManifest(fs.readFileSync(file, "utf8"));
}

/** True when `outDir` holds exactly `files`, byte for byte. */
export function treeMatches(outDir: string, files: readonly GeneratedFile[]): boolean {
  const existing = listTree(outDir);
  if (existing.length !== files.length) return false;

  const wanted = new Map(files.map((f) => [f.path, f.content]));
  for (const rel of existing) {
    const content = wanted.get(rel);
    if (content === undefined) return false;
    if (fs.readFileSync(path.join(outDir, rel), "utf8") !== content) return false;
  }
  return true;
}

/**
 * Bring `outDir` in line with the generated tree. Never throws: compile and
 * write errors are returned as a `Failed` outcome, with the previous tree
 * left as it was.
 */
export function regenerate(request: RegenerateRequest): GenerationOutcome {
  const log = (request.logger ?? silentLogger).child("tracker");
  const started = Date.now();
  const meta = (): OutcomeMeta => ({ durationMs: Date.now() - started, outDir: request.outDir });

  const fail = (err: unknown): Failed => {
    const failure = toFailure(err);
    log.error(failure.message);
    return { tag: "Failed", failure, meta: meta() };
  };

  let tree: GeneratedTree;
  try {
    tree = request.generate();
  } catch (e) {
    return fail(e);
  }

  const manifest = renderManifest(tree.files, tree.layer);
  const fingerprint = fingerprintFiles(tree.files);
  const files = [...tree.files, manifest];

  let previous: Manifest | undefined;
  let existing: string[];
  try {
    previous = readManifest(request.outDir);
    existing = listTree(request.outDir);
  } catch (e) {
    return fail(e);
  }

  if (previous && previous.layer > tree.layer && !request.force) {
    return fail(new LayerRegressionError(previous.layer, tree.layer));
  }

  if (!request.force) {
    try {
      if (treeMatches(request.outDir, files)) {
        log.info(`Output at layer ${tree.layer} is up to date (${fingerprint.slice(0, 12)})`);
        return { tag: "Unchanged", layer: tree.layer, fingerprint, meta: meta() };
      }
    } catch (e) {
      return fail(e);
    }
  }

  try {
    log.debug(`Writing ${files.length} files to staging`);
    withStagingDir(request.outDir, (staging) => writeTree(staging, files));
  } catch (e) {
    return fail(e);
  }

  const newPaths = new Set(files.map((f) => f.path));
  const removed = existing.filter((p) => !newPaths.has(p)).length;
  const from = previous ? `layer ${previous.layer}` : "empty";
  log.info(`Regenerated ${request.outDir}: ${from} -> layer ${tree.layer}, ${files.length} files, ${removed} removed`);

  return {
    tag: "Regenerated",
    layer: tree.layer,
    previousLayer: previous?.layer,
    fingerprint,
    written: files.length,
    removed,
    meta: meta(),
  };
}
