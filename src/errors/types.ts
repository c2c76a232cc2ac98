// src/errors/types.ts
// Error-table data: groups by code, entries by pattern, resolved kinds

import type { Span } from "../outcome/diagnostic";

export interface ErrorEntrySource {
  /** Exact id (`FLOOD`) or a pattern with one `X` segment (`FLOOD_WAIT_X`). */
  readonly id: string;
  /** Human text; `{value}` is replaced by the number a pattern captured. */
  readonly description: string;
  readonly span?: Span;
}

/** All entries sharing one numeric code, e.g. 420 `FLOOD`. */
export interface ErrorCodeGroup {
  readonly code: number;
  readonly name: string;
  readonly entries: readonly ErrorEntrySource[];
}

export interface ErrorEntry {
  readonly code: number;
  readonly id: string;
  readonly description: string;
}

export type ErrorKind =
  | {
      readonly tag: "Specific";
      readonly code: number;
      /** Name of the code group, e.g. `FLOOD`. */
      readonly name: string;
      /** The matching entry's id or pattern. */
      readonly id: string;
      readonly message: string;
      /** Description with `{value}` filled in. */
      readonly description: string;
      readonly value?: number;
    }
  | { readonly tag: "Generic"; readonly code: number; readonly name: string; readonly message: string }
  | { readonly tag: "Unknown"; readonly code: number; readonly message: string };
