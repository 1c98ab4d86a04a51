import type { ValidationResult } from "./results.js";

// =============================================================================
// TYPES
// =============================================================================

export type VerdictReason = "resolved" | "nothing-to-resolve" | "errors-remain";

export type Verdict = {
  readonly resolved: boolean;
  readonly reason: VerdictReason;
};

export type DiffInput = {
  text: string;
  path?: string;
};

export type DiffSummary = {
  readonly text: string;
  readonly path?: string;
  readonly changeApplied: boolean;
};

export type EvaluationRecord = {
  readonly pre: ValidationResult;
  readonly post: ValidationResult;
  readonly diff: DiffSummary;
  readonly verdict: Verdict;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function aggregate(
  pre: ValidationResult,
  post: ValidationResult,
  diff: DiffInput,
): EvaluationRecord {
  const summary: DiffSummary = diff.path === undefined
    ? { text: diff.text, changeApplied: hasChanges(diff.text) }
    : { text: diff.text, path: diff.path, changeApplied: hasChanges(diff.text) };

  return Object.freeze({
    pre,
    post,
    diff: Object.freeze(summary),
    verdict: Object.freeze(decideVerdict(pre, post)),
  });
}

export function decideVerdict(pre: ValidationResult, post: ValidationResult): Verdict {
  // Clean before the patch: no credit, even when post is clean too.
  if (pre.status === "clean") {
    return { resolved: false, reason: "nothing-to-resolve" };
  }

  if (post.status !== "clean") {
    return { resolved: false, reason: "errors-remain" };
  }

  if (pre.final.errorCount > 0) {
    return { resolved: true, reason: "resolved" };
  }

  // Pre did not end clean but counted no errors.
  return { resolved: false, reason: "nothing-to-resolve" };
}

function hasChanges(text: string): boolean {
  return text.trim().length > 0;
}
