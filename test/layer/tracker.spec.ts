// test/layer/tracker.spec.ts
// Tests for regeneration decisions and atomic replacement of the output tree

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import type { GeneratedFile } from "../../src/emit/emitter";
import { fingerprintFiles, MANIFEST_FILE } from "../../src/layer/fingerprint";
import { listTree } from "../../src/layer/staging";
import { readManifest, regenerate, treeMatches } from "../../src/layer/tracker";
import { exitCodeFor } from "../../src/outcome/outcome";
import { SchemaSyntaxError } from "../../src/outcome/errors";
import { makeTempDir, removeDir } from "../helpers/fixtures";

const files: GeneratedFile[] = [
  { path: "a.ts", content: "export const a = 1;\n" },
  { path: "sub/b.ts", content: "export const b = 2;\n" },
];

describe("regenerate", () => {
  let tmp = "";
  let outDir = "";

  beforeEach(() => {
    tmp = makeTempDir();
    outDir = path.join(tmp, "out");
  });

  afterEach(() => {
    removeDir(tmp);
  });

  const run = (tree: { files: GeneratedFile[]; layer: number }, force = false) =>
    regenerate({ outDir, force, generate: () => tree });

  it("should write a fresh tree with its manifest", () => {
    const outcome = run({ files, layer: 3 });
    expect(outcome.tag).toBe("Regenerated");
    if (outcome.tag !== "Regenerated") return;
    expect(outcome.layer).toBe(3);
    expect(outcome.previousLayer).toBeUndefined();
    expect(outcome.written).toBe(3);
    expect(outcome.removed).toBe(0);
    expect(outcome.fingerprint).toBe(fingerprintFiles(files));
    expect(outcome.meta.outDir).toBe(outDir);
    expect(exitCodeFor(outcome)).toBe(0);

    expect(listTree(outDir)).toEqual(["a.ts", MANIFEST_FILE, "sub/b.ts"]);
    expect(readManifest(outDir)).toEqual({
      layer: 3,
      fingerprint: fingerprintFiles(files),
      files: ["a.ts", "sub/b.ts"],
    });
  });

  it("should leave an identical tree alone", () => {
    run({ files, layer: 3 });
    const mtime = fs.statSync(path.join(outDir, "a.ts")).mtimeMs;

    const outcome = run({ files, layer: 3 });
    expect(outcome.tag).toBe("Unchanged");
    expect(exitCodeFor(outcome)).toBe(2);
    if (outcome.tag === "Unchanged") {
      expect(outcome.fingerprint).toBe(fingerprintFiles(files));
    }
    expect(fs.statSync(path.join(outDir, "a.ts")).mtimeMs).toBe(mtime);
  });

  it("should rewrite an identical tree when forced", () => {
    run({ files, layer: 3 });
    const outcome = run({ files, layer: 3 }, true);
    expect(outcome.tag).toBe("Regenerated");
    if (outcome.tag === "Regenerated") {
      expect(outcome.previousLayer).toBe(3);
    }
  });

  it("should remove files the new tree no longer has", () => {
    run({ files, layer: 3 });
    fs.writeFileSync(path.join(outDir, "stale.ts"), "old");

    const outcome = run({ files: [files[0]], layer: 4 });
    expect(outcome.tag).toBe("Regenerated");
    if (outcome.tag === "Regenerated") {
      expect(outcome.removed).toBe(2);
      expect(outcome.previousLayer).toBe(3);
    }
    expect(listTree(outDir)).toEqual(["a.ts", MANIFEST_FILE]);
  });

  it("should refuse to go back to a lower layer", () => {
    run({ files, layer: 3 });
    const outcome = run({ files: [{ path: "a.ts", content: "lower" }], layer: 2 });
    expect(outcome.tag).toBe("Failed");
    expect(exitCodeFor(outcome)).toBe(1);
    if (outcome.tag === "Failed") {
      expect(outcome.failure.reason).toBe("layer-regression");
      expect(outcome.failure.message).toBe("LayerRegressionError: output is at layer 3, schema declares 2");
    }
    expect(fs.readFileSync(path.join(outDir, "a.ts"), "utf8")).toBe(files[0].content);
  });

  it("should go back to a lower layer when forced", () => {
    run({ files, layer: 3 });
    const outcome = run({ files, layer: 2 }, true);
    expect(outcome.tag).toBe("Regenerated");
    expect(readManifest(outDir)?.layer).toBe(2);
  });

  it("should report compile errors without touching the tree", () => {
    run({ files, layer: 3 });
    const outcome = regenerate({
      outDir,
      generate: () => {
        throw new SchemaSyntaxError("missing '=' before result type", "Bar", { line: 1, column: 5 });
      },
    });
    expect(outcome.tag).toBe("Failed");
    if (outcome.tag === "Failed") {
      expect(outcome.failure.reason).toBe("schema-syntax");
      expect(outcome.failure.diagnostics).toHaveLength(1);
      expect(outcome.failure.diagnostics[0].code).toBe("E0001");
    }
    expect(treeMatches(outDir, [...files, { path: MANIFEST_FILE, content: fs.readFileSync(path.join(outDir, MANIFEST_FILE), "utf8") }])).toBe(true);
  });

  it("should treat other throwables as internal errors", () => {
    const outcome = regenerate({
      outDir,
      generate: () => {
        throw new Error("boom");
      },
    });
    expect(outcome.tag === "Failed" ? outcome.failure : undefined).toMatchObject({
      reason: "internal-error",
      message: "boom",
    });
  });

  it("should keep the previous tree when a write fails", () => {
    run({ files, layer: 3 });
    const outcome = run({ files: [...files, { path: "../escape.ts", content: "x" }], layer: 4 });
    expect(outcome.tag).toBe("Failed");
    if (outcome.tag === "Failed") {
      expect(outcome.failure.reason).toBe("io-error");
      expect(outcome.failure.message).toBe(
        "OutputWriteError: generated path '../escape.ts' is outside the output directory"
      );
    }
    expect(readManifest(outDir)?.layer).toBe(3);
    expect(fs.readdirSync(tmp)).toEqual(["out"]);
  });
});

describe("treeMatches", () => {
  it("should compare paths and contents exactly", () => {
    const dir = makeTempDir();
    try {
      fs.mkdirSync(path.join(dir, "sub"));
      fs.writeFileSync(path.join(dir, "a.ts"), files[0].content);
      fs.writeFileSync(path.join(dir, "sub", "b.ts"), files[1].content);
      expect(treeMatches(dir, files)).toBe(true);
      expect(treeMatches(dir, [files[0]])).toBe(false);
      expect(treeMatches(dir, [files[0], { path: "sub/b.ts", content: "changed" }])).toBe(false);
    } finally {
      removeDir(dir);
    }
  });

  it("should not match a missing directory against a non-empty set", () => {
    expect(treeMatches(path.join("/nonexistent", "tlgen-out"), files)).toBe(false);
  });
});
