/*
Purpose: run a full evaluation (pre phase, optional patch, post phase, diff, verdict)
and the single-phase / aggregate-only variants used by CI pipelines.
Assumptions: strictly sequential; each child process is bounded by a timeout.
Usage: runEvaluation(config, { patchFile }), runPhase(config, "pre"), aggregateArtifacts(config).
*/

import { execaCommand } from "execa";

import { applyPatch as gitApplyPatch, diffWorkingTree, type DiffOptions } from "../git/git.js";

import { aggregate, type EvaluationRecord } from "./aggregator.js";
import {
  loadPhaseResult,
  readPatchArtifact,
  resetEvaluationArtifacts,
  resetPhaseLog,
  savePhaseResult,
  writeEvaluationArtifacts,
  writePatchArtifact,
} from "./artifacts.js";
import type { ProjectConfig } from "./config.js";
import { signatureOverridesFromConfig } from "./config-loader.js";
import { PatchError } from "./errors.js";
import { createCommandInstaller, type PackageInstaller } from "./installer.js";
import { JsonlLogger, type EventLogger, type Phase } from "./logger.js";
import { artifactPaths } from "./paths.js";
import { RemediationEngine } from "./remediation.js";
import { renderReport, type RenderedReport } from "./report.js";
import type { ValidationResult } from "./results.js";
import { resolveSignatureSet } from "./signatures.js";
import type { TestRunner } from "./test-runner.js";
import { defaultRunId, writeTextFile } from "./utils.js";
import { runValidationLoop } from "./validation-loop.js";

// =============================================================================
// TYPES
// =============================================================================

export type EvaluationDeps = {
  runner?: TestRunner;
  installer?: PackageInstaller;
  collectDiff?: (repoPath: string, options: DiffOptions) => Promise<string>;
  applyPatch?: (repoPath: string, patchFile: string) => Promise<void>;
  logger?: EventLogger;
  clock?: () => number;
};

export type EvaluationOptions = {
  runId?: string;
  patchFile?: string;
  patchCommand?: string;
};

export type EvaluationOutcome = {
  record: EvaluationRecord;
  rendered: RenderedReport;
  files: { results: string; report: string; patch: string };
};

// =============================================================================
// FULL EVALUATION
// =============================================================================

export async function runEvaluation(
  config: ProjectConfig,
  options: EvaluationOptions = {},
  deps: EvaluationDeps = {},
): Promise<EvaluationOutcome> {
  const runId = options.runId ?? defaultRunId();
  const paths = artifactPaths(config.artifacts_dir);

  await resetEvaluationArtifacts(config.artifacts_dir);
  let ownedLogger: JsonlLogger | null = null;
  if (!deps.logger) {
    await writeTextFile(paths.agentLog, "");
    ownedLogger = new JsonlLogger(paths.agentLog, runId);
  }
  const logger = deps.logger ?? ownedLogger ?? undefined;
  const phaseDeps: EvaluationDeps = { ...deps, logger };

  try {
    logger?.log({
      type: "run.start",
      payload: { repo_path: config.repo_path, test_command: config.test_command },
    });

    const pre = await runPhase(config, "pre", phaseDeps);

    if (options.patchFile || options.patchCommand) {
      await applyPatchStep(config, options, phaseDeps);
    }

    const post = await runPhase(config, "post", phaseDeps);

    const collectDiff = deps.collectDiff ?? diffWorkingTree;
    const diffText = await collectDiff(config.repo_path, { exclude: [config.artifacts_dir] });
    const patchPath = await writePatchArtifact(config.artifacts_dir, diffText);
    logger?.log({
      type: "diff.collect",
      payload: { path: patchPath, bytes: Buffer.byteLength(diffText) },
    });

    const outcome = await finishEvaluation(config, pre, post, { text: diffText, path: patchPath }, logger);
    logger?.log({ type: "run.complete", payload: { resolved: outcome.record.verdict.resolved } });
    return outcome;
  } finally {
    ownedLogger?.close();
  }
}

// =============================================================================
// SINGLE PHASE
// =============================================================================

export async function runPhase(
  config: ProjectConfig,
  phase: Phase,
  deps: EvaluationDeps = {},
): Promise<ValidationResult> {
  const logFile = await resetPhaseLog(config.artifacts_dir, phase);
  const { remediation } = config;

  const installer =
    deps.installer ??
    createCommandInstaller({
      installCommand: remediation.install_command,
      uninstallCommand: remediation.uninstall_command,
      cwd: config.repo_path,
      timeoutSeconds: remediation.timeout_seconds,
    });
  const engine = new RemediationEngine({
    installer,
    packageMap: remediation.package_map,
    logger: deps.logger,
  });

  console.log(`[${phase}] Running: ${config.test_command}`);
  const result = await runValidationLoop({
    phase,
    command: config.test_command,
    cwd: config.repo_path,
    timeoutSeconds: config.timeout_seconds,
    maxAttempts: remediation.max_attempts,
    logFile,
    signatures: resolveSignatureSet(signatureOverridesFromConfig(config)),
    runner: deps.runner,
    remediation: engine,
    logger: deps.logger,
    clock: deps.clock,
  });

  await savePhaseResult(config.artifacts_dir, result);
  const installed = result.installedModules.length > 0 ? result.installedModules.join(", ") : "none";
  console.log(
    `[${phase}] ${result.status} (${result.reason}): ${result.final.errorCount} error(s), reinstalled: ${installed}`,
  );
  return result;
}

// =============================================================================
// AGGREGATE ONLY
// =============================================================================

export async function aggregateArtifacts(
  config: ProjectConfig,
  deps: Pick<EvaluationDeps, "logger"> = {},
): Promise<EvaluationOutcome> {
  const pre = await loadPhaseResult(config.artifacts_dir, "pre");
  const post = await loadPhaseResult(config.artifacts_dir, "post");
  const diffText = await readPatchArtifact(config.artifacts_dir);
  const { patch } = artifactPaths(config.artifacts_dir);

  return finishEvaluation(config, pre, post, { text: diffText, path: patch }, deps.logger);
}

// =============================================================================
// INTERNALS
// =============================================================================

async function finishEvaluation(
  config: ProjectConfig,
  pre: ValidationResult,
  post: ValidationResult,
  diff: { text: string; path: string },
  logger: EventLogger | undefined,
): Promise<EvaluationOutcome> {
  const record = aggregate(pre, post, diff);
  logger?.log({
    type: "verdict",
    payload: {
      resolved: record.verdict.resolved,
      reason: record.verdict.reason,
      pre_errors: pre.final.errorCount,
      post_errors: post.final.errorCount,
      change_applied: record.diff.changeApplied,
    },
  });

  const rendered = renderReport(record);
  const files = await writeEvaluationArtifacts(config.artifacts_dir, record, rendered);
  console.log(`Verdict: ${record.verdict.resolved ? "resolved" : "not resolved"} (${record.verdict.reason})`);
  console.log(`Results: ${files.results}`);

  return { record, rendered, files: { ...files, patch: diff.path } };
}

async function applyPatchStep(
  config: ProjectConfig,
  options: EvaluationOptions,
  deps: EvaluationDeps,
): Promise<void> {
  const { logger } = deps;
  logger?.log({
    type: "patch.apply.start",
    payload: options.patchFile ? { patch_file: options.patchFile } : { command: options.patchCommand ?? "" },
  });

  if (options.patchFile) {
    const apply = deps.applyPatch ?? gitApplyPatch;
    await apply(config.repo_path, options.patchFile);
  }
  if (options.patchCommand) {
    await runPatchCommand(options.patchCommand, config);
  }

  logger?.log({ type: "patch.apply.complete" });
}

async function runPatchCommand(command: string, config: ProjectConfig): Promise<void> {
  const res = await execaCommand(command, {
    cwd: config.repo_path,
    shell: true,
    reject: false,
    timeout: config.timeout_seconds * 1000,
    stdio: "pipe",
    env: process.env,
  });

  if (res.timedOut) {
    throw new PatchError(`Patch command timed out after ${config.timeout_seconds}s: ${command}`);
  }
  if (res.exitCode !== 0) {
    const detail = `${res.stderr}`.trim() || `${res.stdout}`.trim();
    throw new PatchError(`Patch command exited with ${res.exitCode ?? -1}: ${detail || command}`);
  }
}
