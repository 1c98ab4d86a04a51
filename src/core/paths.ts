import path from "node:path";

import type { Phase } from "./logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type ArtifactPaths = {
  dir: string;
  agentLog: string;
  patch: string;
  results: string;
  report: string;
};

// =============================================================================
// PATH HELPERS
// =============================================================================

export function artifactPaths(artifactsDir: string): ArtifactPaths {
  const dir = path.resolve(artifactsDir);
  return {
    dir,
    agentLog: path.join(dir, "agent.log"),
    patch: path.join(dir, "changes.patch"),
    results: path.join(dir, "results.json"),
    report: path.join(dir, "report.html"),
  };
}

export function phaseLogPath(artifactsDir: string, phase: Phase): string {
  return path.join(path.resolve(artifactsDir), `${phase}_validation.log`);
}

export function phaseResultPath(artifactsDir: string, phase: Phase): string {
  return path.join(path.resolve(artifactsDir), `${phase}-result.json`);
}
