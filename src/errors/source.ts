// src/errors/source.ts
// Error-table source: a directory of `<code>_<NAME>.tsv` files

import * as fs from "fs";
import * as path from "path";
import { makeDiagnostic } from "../outcome/codes";
import type { Diagnostic } from "../outcome/diagnostic";
import { ErrorTableFormatError } from "../outcome/errors";
import type { ErrorCodeGroup, ErrorEntrySource } from "./types";

const FILE_RE = /^(-?\d+)_([A-Za-z0-9_]+)\.tsv$/;
const HEADER = ["id", "message"];

export type ErrorSource = {
  readonly groups: readonly ErrorCodeGroup[];
  readonly warnings: readonly Diagnostic[];
};

/**
 * Parse one TSV file. The first non-blank line must be the `id<TAB>message`
 * header; every following non-blank line is one entry.
 */
export function parseErrorTsv(
  text: string,
  group: { code: number; name: string; file?: string }
): { group: ErrorCodeGroup; warnings: Diagnostic[] } {
  const entries: ErrorEntrySource[] = [];
  const warnings: Diagnostic[] = [];
  let sawHeader = false;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line.trim()) continue;
    const span = { file: group.file, line: i + 1, column: 1 };
    const cells = line.split("\t");

    if (!sawHeader) {
      if (cells.length !== 2 || cells[0].trim() !== HEADER[0] || cells[1].trim() !== HEADER[1]) {
        throw new ErrorTableFormatError(`expected header 'id<TAB>message', got '${line}'`, span);
      }
      sawHeader = true;
      continue;
    }

    if (cells.length !== 2) {
      throw new ErrorTableFormatError(`expected 2 tab-separated columns, got ${cells.length}`, span);
    }
    const id = cells[0].trim();
    const description = cells[1].trim();
    if (!description) {
      warnings.push(makeDiagnostic("W0001", { pattern: id }, span));
    }
    entries.push({ id, description, span });
  }

  if (!sawHeader) {
    throw new ErrorTableFormatError("missing 'id<TAB>message' header", { file: group.file, line: 1, column: 1 });
  }

  return {
    group: Object.freeze({ code: group.code, name: group.name, entries: Object.freeze(entries) }),
    warnings,
  };
}

/** Split `420_FLOOD.tsv` into its code and name. */
export function parseErrorFileName(fileName: string): { code: number; name: string } | undefined {
  const m = FILE_RE.exec(fileName);
  return m ? { code: parseInt(m[1], 10), name: m[2] } : undefined;
}

/**
 * Load every `.tsv` file of a directory, ordered by code then name. A code
 * may only be defined by one file.
 */
export function loadErrorSource(dir: string): ErrorSource {
  let names: string[];
  try {
    names = fs.readdirSync(dir);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ErrorTableFormatError(`cannot read error table directory ${dir}: ${reason}`);
  }

  const files: { code: number; name: string; file: string }[] = [];
  for (const fileName of names) {
    if (!fileName.endsWith(".tsv")) continue;
    const parsed = parseErrorFileName(fileName);
    if (!parsed) {
      throw new ErrorTableFormatError(`error table file '${fileName}' is not named <code>_<NAME>.tsv`);
    }
    files.push({ ...parsed, file: path.join(dir, fileName) });
  }
  files.sort((a, b) => a.code - b.code || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const groups: ErrorCodeGroup[] = [];
  const warnings: Diagnostic[] = [];
  for (const f of files) {
    const clash = groups.find((g) => g.code === f.code);
    if (clash) {
      throw new ErrorTableFormatError(`code ${f.code} is defined by both ${clash.name} and ${f.name}`, {
        file: f.file,
        line: 1,
        column: 1,
      });
    }
    const result = parseErrorTsv(fs.readFileSync(f.file, "utf8"), f);
    groups.push(result.group);
    warnings.push(...result.warnings);
  }

  return Object.freeze({ groups: Object.freeze(groups), warnings: Object.freeze(warnings) });
}
