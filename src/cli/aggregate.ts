import { aggregateArtifacts } from "../core/evaluation.js";

import { UNRESOLVED_EXIT_CODE } from "./evaluate.js";
import { resolveConfigFromFlags, type ConfigFlags } from "./flags.js";

export type AggregateFlags = ConfigFlags & {
  failUnresolved?: boolean;
};

export async function aggregateCommand(flags: AggregateFlags): Promise<void> {
  // Aggregation reads only artifacts; the repository is not touched.
  const config = resolveConfigFromFlags({
    ...flags,
    repo: flags.repo ?? (flags.config ? undefined : "."),
  });
  const { record } = await aggregateArtifacts(config);

  if (flags.failUnresolved && !record.verdict.resolved) {
    process.exitCode = UNRESOLVED_EXIT_CODE;
  }
}
