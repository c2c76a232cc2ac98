// src/errors/pattern.ts
// Error ids with an `X` integer placeholder

import type { Span } from "../outcome/diagnostic";
import { ErrorTableFormatError } from "../outcome/errors";

export type ErrorPattern =
  | { readonly kind: "exact"; readonly id: string }
  | { readonly kind: "wildcard"; readonly id: string; readonly prefix: string; readonly suffix: string };

const ID_RE = /^[A-Za-z0-9_]+$/;
const DIGITS_RE = /^\d+$/;

/**
 * `FLOOD_WAIT_X` → prefix `FLOOD_WAIT_`, suffix ``.
 * `FILE_PART_X_MISSING` → prefix `FILE_PART_`, suffix `_MISSING`.
 */
export function parseErrorPattern(id: string, span?: Span): ErrorPattern {
  if (!ID_RE.test(id)) {
    throw new ErrorTableFormatError(`malformed error id '${id}'`, span);
  }

  const parts = id.split("_");
  const at = parts.indexOf("X");
  if (at < 0) {
    return { kind: "exact", id };
  }
  if (parts.indexOf("X", at + 1) >= 0) {
    throw new ErrorTableFormatError(`error id '${id}' has more than one X placeholder`, span);
  }

  const before = parts.slice(0, at);
  const after = parts.slice(at + 1);
  return {
    kind: "wildcard",
    id,
    prefix: before.length > 0 ? `${before.join("_")}_` : "",
    suffix: after.length > 0 ? `_${after.join("_")}` : "",
  };
}

/** Number of fixed characters a wildcard pins down. */
export function specificity(p: ErrorPattern): number {
  return p.kind === "exact" ? Number.POSITIVE_INFINITY : p.prefix.length + p.suffix.length;
}

/**
 * Match a message against a wildcard. The placeholder must be one or more
 * decimal digits within the safe integer range; the parsed number is returned.
 */
export function matchWildcard(p: Extract<ErrorPattern, { kind: "wildcard" }>, message: string): number | undefined {
  if (message.length <= p.prefix.length + p.suffix.length) return undefined;
  if (!message.startsWith(p.prefix) || !message.endsWith(p.suffix)) return undefined;

  const middle = message.slice(p.prefix.length, message.length - p.suffix.length);
  if (!DIGITS_RE.test(middle)) return undefined;
  const value = Number(middle);
  return Number.isSafeInteger(value) ? value : undefined;
}
