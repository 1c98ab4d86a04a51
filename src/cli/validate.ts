import { runPhase } from "../core/evaluation.js";
import { JsonlLogger, type Phase } from "../core/logger.js";
import { artifactPaths } from "../core/paths.js";
import { defaultRunId } from "../core/utils.js";

import { resolveConfigFromFlags, type ConfigFlags } from "./flags.js";
import { toUserFacingError } from "./user-errors.js";

export type ValidateFlags = ConfigFlags & {
  phase: Phase;
  runId?: string;
};

// Runs one phase on its own so a CI job can apply the patch between invocations.
export async function validateCommand(flags: ValidateFlags): Promise<void> {
  const config = resolveConfigFromFlags(flags);
  const logger = new JsonlLogger(
    artifactPaths(config.artifacts_dir).agentLog,
    flags.runId ?? defaultRunId(),
  );

  try {
    await runPhase(config, flags.phase, { logger });
  } catch (err) {
    throw toUserFacingError(err);
  } finally {
    logger.close();
  }
}
