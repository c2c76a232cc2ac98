// src/layer/staging.ts
// Write a tree beside its target, then swap it in with renames

import * as fs from "fs";
import * as path from "path";
import type { GeneratedFile } from "../emit/emitter";
import { OutputWriteError, TlgenError } from "../outcome/errors";

/**
 * Run `fill` against a fresh sibling directory of `target`, then replace
 * `target` with it. If anything fails the staging directory is removed and
 * the previous tree is put back.
 */
export function withStagingDir<T>(target: string, fill: (staging: string) => T): T {
  const absTarget = path.resolve(target);
  const parent = path.dirname(absTarget);
  const base = path.basename(absTarget);

  let staging: string;
  try {
    fs.mkdirSync(parent, { recursive: true });
    staging = fs.mkdtempSync(path.join(parent, `.${base}.staging-`));
  } catch (e) {
    throw asWriteError(`cannot create staging directory next to ${absTarget}`, e);
  }

  let backupDir: string | undefined;
  let result: T;
  try {
    result = fill(staging);
    if (fs.existsSync(absTarget)) {
      backupDir = fs.mkdtempSync(path.join(parent, `.${base}.old-`));
      fs.renameSync(absTarget, path.join(backupDir, base));
    }
    fs.renameSync(staging, absTarget);
  } catch (e) {
    fs.rmSync(staging, { recursive: true, force: true });
    if (backupDir) {
      const backup = path.join(backupDir, base);
      if (fs.existsSync(backup) && !fs.existsSync(absTarget)) {
        fs.renameSync(backup, absTarget);
      }
      fs.rmSync(backupDir, { recursive: true, force: true });
    }
    throw asWriteError(`cannot replace ${absTarget}`, e);
  }

  if (backupDir) {
    fs.rmSync(backupDir, { recursive: true, force: true });
  }
  return result;
}

/** Write a file set under `root`. Paths must stay inside it. */
export function writeTree(root: string, files: readonly GeneratedFile[]): void {
  const absRoot = path.resolve(root);
  for (const f of files) {
    const dest = path.resolve(absRoot, f.path);
    const rel = path.relative(absRoot, dest);
    if (path.isAbsolute(f.path) || rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) {
      throw new OutputWriteError(`generated path '${f.path}' is outside the output directory`);
    }
    fs.mkdirSync(path.dirname(dest), { recursive: true });
    fs.writeFileSync(dest, f.content, "utf8");
  }
}

/** Every file under `root`, as sorted `/`-separated relative paths. */
export function listTree(root: string): string[] {
  const out: string[] = [];
  const walk = (dir: string, prefix: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) walk(path.join(dir, entry.name), rel);
      else out.push(rel);
    }
  };
  if (fs.existsSync(root)) walk(root, "");
  return out.sort();
}

/** Replace a single file by writing a sibling temp file and renaming it. */
export function writeFileAtomic(file: string, content: string): void {
  const abs = path.resolve(file);
  const tmp = path.join(path.dirname(abs), `.${path.basename(abs)}.${process.pid}.tmp`);
  try {
    fs.mkdirSync(path.dirname(abs), { recursive: true });
    fs.writeFileSync(tmp, content, "utf8");
    fs.renameSync(tmp, abs);
  } catch (e) {
    fs.rmSync(tmp, { force: true });
    throw asWriteError(`cannot write ${abs}`, e);
  }
}

function asWriteError(detail: string, e: unknown): TlgenError {
  if (e instanceof TlgenError) return e;
  const reason = e instanceof Error ? e.message : String(e);
  return new OutputWriteError(`${detail}: ${reason}`, e);
}
