/**
 * Result records shared by the parser, the validation loop and the aggregator.
 * Purpose: one definition of TestOutcome / ValidationResult, plus the zod schemas
 * used when a persisted phase result is read back by `patchproof aggregate`.
 * Records are frozen on creation; nothing mutates them afterwards.
 */

import { z } from "zod";

import type { Phase } from "./logger.js";

// =============================================================================
// ERROR ENTRIES
// =============================================================================

export const ErrorClassificationSchema = z.enum(["module-missing", "test-failure", "other"]);
export type ErrorClassification = z.infer<typeof ErrorClassificationSchema>;

export const ErrorEntrySchema = z.discriminatedUnion("classification", [
  z.object({
    classification: z.literal("module-missing"),
    module: z.string().min(1),
    message: z.string(),
  }),
  z.object({ classification: z.literal("test-failure"), message: z.string() }),
  z.object({ classification: z.literal("other"), message: z.string() }),
]);

export type ModuleMissingEntry = {
  readonly classification: "module-missing";
  readonly module: string;
  readonly message: string;
};

export type ErrorEntry =
  | ModuleMissingEntry
  | { readonly classification: "test-failure" | "other"; readonly message: string };

// =============================================================================
// TEST OUTCOME
// =============================================================================

const Count = z.number().int().nonnegative();

export const TestOutcomeSchema = z.object({
  exitCode: z.number().int(),
  passed: Count,
  failed: Count,
  errored: Count,
  warningCount: Count,
  errorCount: Count,
  warnings: z.array(z.string()),
  entries: z.array(ErrorEntrySchema),
  summaryFound: z.boolean(),
});

export type TestOutcome = {
  readonly exitCode: number;
  readonly passed: number;
  readonly failed: number;
  readonly errored: number;
  readonly warningCount: number;
  /** failed + errored: every failing result the runner reported. */
  readonly errorCount: number;
  readonly warnings: readonly string[];
  readonly entries: readonly ErrorEntry[];
  readonly summaryFound: boolean;
};

export function createTestOutcome(input: Omit<TestOutcome, "errorCount">): TestOutcome {
  return Object.freeze({
    ...input,
    errorCount: input.failed + input.errored,
    warnings: Object.freeze([...input.warnings]),
    entries: Object.freeze(input.entries.map((entry) => Object.freeze({ ...entry }))),
  });
}

export function isModuleMissing(entry: ErrorEntry): entry is ModuleMissingEntry {
  return entry.classification === "module-missing";
}

// =============================================================================
// VALIDATION RESULT
// =============================================================================

export const PhaseSchema = z.enum(["pre", "post"]);

export const ValidationStatusSchema = z.enum(["clean", "failed", "exhausted"]);
export type ValidationStatus = z.infer<typeof ValidationStatusSchema>;

export const TerminalReasonSchema = z.enum([
  "no-errors",
  "test-failure",
  "retry-bound",
  "timeout",
  "remediation-failed",
]);
export type TerminalReason = z.infer<typeof TerminalReasonSchema>;

export const ValidationResultSchema = z.object({
  phase: PhaseSchema,
  status: ValidationStatusSchema,
  reason: TerminalReasonSchema,
  final: TestOutcomeSchema,
  remediationAttempts: Count,
  installedModules: z.array(z.string()),
  durationMs: Count,
});

export type ValidationResult = {
  readonly phase: Phase;
  readonly status: ValidationStatus;
  readonly reason: TerminalReason;
  readonly final: TestOutcome;
  readonly remediationAttempts: number;
  readonly installedModules: readonly string[];
  readonly durationMs: number;
};

export function createValidationResult(input: ValidationResult): ValidationResult {
  return Object.freeze({
    ...input,
    final: createTestOutcome(input.final),
    installedModules: Object.freeze([...input.installedModules]),
  });
}

export type ValidationResultParse =
  | { ok: true; value: ValidationResult }
  | { ok: false; issues: string };

export function parseValidationResult(value: unknown): ValidationResultParse {
  const parsed = ValidationResultSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
      .join("\n");
    return { ok: false, issues };
  }
  return { ok: true, value: createValidationResult(parsed.data) };
}
