// src/errors/table.ts
// Compiled error table: code → exact ids + ordered wildcards

import { ErrorPatternAmbiguity, ErrorTableFormatError } from "../outcome/errors";
import { matchWildcard, parseErrorPattern, specificity, type ErrorPattern } from "./pattern";
import type { ErrorCodeGroup, ErrorEntry, ErrorKind } from "./types";

type Wildcard = Extract<ErrorPattern, { kind: "wildcard" }>;

interface CompiledEntry {
  readonly entry: ErrorEntry;
  readonly pattern: ErrorPattern;
}

interface CompiledGroup {
  readonly code: number;
  readonly name: string;
  readonly exact: ReadonlyMap<string, CompiledEntry>;
  /** In source order; resolution picks the most specific, earliest first. */
  readonly wildcards: readonly (CompiledEntry & { readonly pattern: Wildcard })[];
  readonly entries: readonly ErrorEntry[];
}

/**
 * Immutable lookup from `(code, message)` to an error kind. Built once from
 * the source groups; every ambiguity is rejected at build time.
 */
export class ErrorTable {
  private constructor(private readonly groups: ReadonlyMap<number, CompiledGroup>) {}

  static compile(source: readonly ErrorCodeGroup[]): ErrorTable {
    const groups = new Map<number, CompiledGroup>();

    for (const group of source) {
      if (!Number.isInteger(group.code)) {
        throw new ErrorTableFormatError(`error code '${group.code}' is not an integer`);
      }
      if (groups.has(group.code)) {
        throw new ErrorTableFormatError(`error code ${group.code} is defined more than once`);
      }

      const exact = new Map<string, CompiledEntry>();
      const wildcards: (CompiledEntry & { pattern: Wildcard })[] = [];
      const entries: ErrorEntry[] = [];

      for (const src of group.entries) {
        const pattern = parseErrorPattern(src.id, src.span);
        const entry: ErrorEntry = Object.freeze({ code: group.code, id: src.id, description: src.description });

        if (pattern.kind === "exact") {
          if (exact.has(pattern.id)) {
            throw new ErrorPatternAmbiguity(group.code, src.id, src.id, src.span);
          }
          exact.set(pattern.id, { entry, pattern });
        } else {
          const twin = wildcards.find((w) => w.pattern.prefix === pattern.prefix && w.pattern.suffix === pattern.suffix);
          if (twin) {
            throw new ErrorPatternAmbiguity(group.code, src.id, twin.entry.id, src.span);
          }
          wildcards.push({ entry, pattern });
        }
        entries.push(entry);
      }

      groups.set(
        group.code,
        Object.freeze({
          code: group.code,
          name: group.name,
          exact,
          wildcards: Object.freeze(wildcards),
          entries: Object.freeze(entries),
        })
      );
    }

    return new ErrorTable(groups);
  }

  /** Codes in ascending order. */
  get codes(): number[] {
    return [...this.groups.keys()].sort((a, b) => a - b);
  }

  /** Name of a code's group, e.g. `FLOOD` for 420. */
  codeName(code: number): string | undefined {
    return this.groups.get(code)?.name;
  }

  entries(code?: number): readonly ErrorEntry[] {
    if (code !== undefined) {
      return this.groups.get(code)?.entries ?? [];
    }
    return this.codes.flatMap((c) => this.groups.get(c)?.entries ?? []);
  }

  /**
   * Exact id first, then the wildcard with the most fixed characters (the
   * earlier one on a tie), then the code's generic kind, then unknown.
   */
  resolve(code: number, message: string): ErrorKind {
    const group = this.groups.get(code);
    if (!group) {
      return { tag: "Unknown", code, message };
    }

    const exact = group.exact.get(message);
    if (exact) {
      return {
        tag: "Specific",
        code,
        name: group.name,
        id: exact.entry.id,
        message,
        description: exact.entry.description,
      };
    }

    let best: { entry: ErrorEntry; value: number; score: number } | undefined;
    for (const w of group.wildcards) {
      const value = matchWildcard(w.pattern, message);
      if (value === undefined) continue;
      const score = specificity(w.pattern);
      if (!best || score > best.score) {
        best = { entry: w.entry, value, score };
      }
    }
    if (best) {
      return {
        tag: "Specific",
        code,
        name: group.name,
        id: best.entry.id,
        message,
        description: formatDescription(best.entry.description, best.value),
        value: best.value,
      };
    }

    return { tag: "Generic", code, name: group.name, message };
  }
}

export function compileErrorTable(source: readonly ErrorCodeGroup[]): ErrorTable {
  return ErrorTable.compile(source);
}

export function formatDescription(description: string, value: number | undefined): string {
  return value === undefined ? description : description.split("{value}").join(String(value));
}
