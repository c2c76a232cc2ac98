import type { Failure } from "./failure";

export interface OutcomeMeta {
  durationMs?: number;
  outDir?: string;
}

/** The output tree already matched the inputs; nothing was written. */
export interface Unchanged {
  readonly tag: "Unchanged";
  readonly layer: number;
  readonly fingerprint: string;
  readonly meta: OutcomeMeta;
}

/** The output tree was replaced by a freshly generated one. */
export interface Regenerated {
  readonly tag: "Regenerated";
  readonly layer: number;
  readonly previousLayer?: number;
  readonly fingerprint: string;
  readonly written: number;
  readonly removed: number;
  readonly meta: OutcomeMeta;
}

/** Generation aborted; the previous output tree is untouched. */
export interface Failed {
  readonly tag: "Failed";
  readonly failure: Failure;
  readonly meta: OutcomeMeta;
}

export type GenerationOutcome = Unchanged | Regenerated | Failed;

export function isUnchanged(o: GenerationOutcome): o is Unchanged {
  return o.tag === "Unchanged";
}

export function isRegenerated(o: GenerationOutcome): o is Regenerated {
  return o.tag === "Regenerated";
}

export function isFailed(o: GenerationOutcome): o is Failed {
  return o.tag === "Failed";
}

export function matchOutcome<R>(
  outcome: GenerationOutcome,
  handlers: {
    unchanged: (u: Unchanged) => R;
    regenerated: (r: Regenerated) => R;
    failed: (f: Failed) => R;
  }
): R {
  switch (outcome.tag) {
    case "Unchanged":
      return handlers.unchanged(outcome);
    case "Regenerated":
      return handlers.regenerated(outcome);
    case "Failed":
      return handlers.failed(outcome);
  }
}

/**
 * Process exit codes consumed by CI: 0 when output changed, 2 when there was
 * nothing to do, 1 on failure.
 */
export const EXIT_CODES = {
  Regenerated: 0,
  Failed: 1,
  Unchanged: 2,
} as const;

export function exitCodeFor(outcome: GenerationOutcome): number {
  return EXIT_CODES[outcome.tag];
}
