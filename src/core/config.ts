import { z } from "zod";

import { signaturePatternProblem, type SignatureKind } from "./signatures.js";

// =============================================================================
// SCHEMAS
// =============================================================================

export const DEFAULT_TEST_COMMAND = "python -m pytest tests -vv";
export const DEFAULT_INSTALL_COMMAND = "python -m pip install {package}";

function patternList(kind: SignatureKind) {
  const pattern = z
    .string()
    .min(1)
    .superRefine((source, ctx) => {
      const problem = signaturePatternProblem(kind, source);
      if (problem) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
      }
    });
  return z.array(pattern).min(1);
}

export const SignaturesConfigSchema = z
  .object({
    module_missing: patternList("moduleMissing").optional(),
    failed_line: patternList("failedLine").optional(),
    error_line: patternList("errorLine").optional(),
    passed_line: patternList("passedLine").optional(),
    internal_error: patternList("internalError").optional(),
    warning: patternList("warning").optional(),
    summary: patternList("summary").optional(),
  })
  .strict();

export const RemediationConfigSchema = z
  .object({
    max_attempts: z.number().int().nonnegative().default(3),
    install_command: z
      .string()
      .min(1)
      .refine((value) => value.includes("{package}"), {
        message: "install_command must contain the {package} placeholder",
      })
      .default(DEFAULT_INSTALL_COMMAND),
    uninstall_command: z
      .string()
      .min(1)
      .refine((value) => value.includes("{package}"), {
        message: "uninstall_command must contain the {package} placeholder",
      })
      .optional(),
    timeout_seconds: z.number().int().positive().default(600),
    package_map: z.record(z.string().min(1)).default({}),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    repo_path: z.string().min(1),
    test_command: z.string().min(1).default(DEFAULT_TEST_COMMAND),
    timeout_seconds: z.number().int().positive().default(1800),
    artifacts_dir: z.string().min(1).default("artifacts"),
    remediation: RemediationConfigSchema.default({}),
    signatures: SignaturesConfigSchema.default({}),
  })
  .strict();

export type SignaturesConfig = z.infer<typeof SignaturesConfigSchema>;
export type RemediationConfig = z.infer<typeof RemediationConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
