// test/helpers/fixtures.ts
// Shared fixture paths and scratch directories for tlgen tests

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { TLModel } from "../../src/model/types";
import { compileSchema } from "../../src/pipeline";

export const FIXTURES_DIR = path.join(__dirname, "..", "fixtures");
export const API_SCHEMA = path.join(FIXTURES_DIR, "schema", "api.tl");
export const ERRORS_DIR = path.join(FIXTURES_DIR, "errors");

export function readApiSchema(): string {
  return fs.readFileSync(API_SCHEMA, "utf8");
}

export function compileApi(): TLModel {
  return compileSchema([{ text: readApiSchema(), file: API_SCHEMA }], { requireLayer: true });
}

/** Model for an inline schema, starting in the types section. */
export function compileText(text: string): TLModel {
  return compileSchema([{ text }]);
}

/** Fresh directory under the OS temp dir; remove it with `removeDir`. */
export function makeTempDir(prefix = "tlgen-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** First error a callback throws, for assertions on its fields. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}
