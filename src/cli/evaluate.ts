import path from "node:path";

import { runEvaluation } from "../core/evaluation.js";

import { resolveConfigFromFlags, type ConfigFlags } from "./flags.js";
import { toUserFacingError } from "./user-errors.js";

export type EvaluateFlags = ConfigFlags & {
  runId?: string;
  patchFile?: string;
  patchCommand?: string;
  failUnresolved?: boolean;
};

// Exit code when --fail-unresolved is set and the patch did not resolve the errors.
export const UNRESOLVED_EXIT_CODE = 2;

export async function evaluateCommand(flags: EvaluateFlags): Promise<void> {
  const config = resolveConfigFromFlags(flags);

  try {
    const { record } = await runEvaluation(config, {
      runId: flags.runId,
      // Relative to where the command runs, like --repo and --artifacts-dir.
      patchFile: flags.patchFile ? path.resolve(flags.patchFile) : undefined,
      patchCommand: flags.patchCommand,
    });

    if (flags.failUnresolved && !record.verdict.resolved) {
      process.exitCode = UNRESOLVED_EXIT_CODE;
    }
  } catch (err) {
    throw toUserFacingError(err);
  }
}
