import type { EvaluationRecord } from "./aggregator.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import type { Phase } from "./logger.js";
import { artifactPaths, phaseLogPath, phaseResultPath } from "./paths.js";
import { CONCLUSION_HEADER, renderConclusion, type RenderedReport } from "./report.js";
import { parseValidationResult, type ValidationResult } from "./results.js";
import {
  ensureDir,
  pathExists,
  readJsonFile,
  readTextFile,
  writeJsonFile,
  writeTextFile,
} from "./utils.js";

// =============================================================================
// PHASE FILES
// =============================================================================

export async function resetPhaseLog(artifactsDir: string, phase: Phase): Promise<string> {
  const logPath = phaseLogPath(artifactsDir, phase);
  await writeTextFile(logPath, "");
  return logPath;
}

export async function savePhaseResult(artifactsDir: string, result: ValidationResult): Promise<string> {
  const filePath = phaseResultPath(artifactsDir, result.phase);
  await writeJsonFile(filePath, result);
  return filePath;
}

export async function loadPhaseResult(artifactsDir: string, phase: Phase): Promise<ValidationResult> {
  const filePath = phaseResultPath(artifactsDir, phase);
  if (!(await pathExists(filePath))) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.artifacts,
      title: "Phase result missing.",
      message: `No ${phase} result found at ${filePath}.`,
      hint: "Each phase must be validated before its results can be aggregated.",
      next: `patchproof validate --phase ${phase} --artifacts-dir ${artifactsDir}`,
    });
  }

  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (err) {
    throw invalidResultError(filePath, err instanceof Error ? err.message : String(err), err);
  }

  const parsed = parseValidationResult(raw);
  if (!parsed.ok) {
    throw invalidResultError(filePath, parsed.issues);
  }
  if (parsed.value.phase !== phase) {
    throw invalidResultError(filePath, `phase is "${parsed.value.phase}", expected "${phase}"`);
  }
  return parsed.value;
}

// =============================================================================
// EVALUATION FILES
// =============================================================================

export async function resetEvaluationArtifacts(artifactsDir: string): Promise<void> {
  const paths = artifactPaths(artifactsDir);
  await ensureDir(paths.dir);
  await resetPhaseLog(artifactsDir, "pre");
  await resetPhaseLog(artifactsDir, "post");
  await writeTextFile(paths.patch, "");
}

export async function writePatchArtifact(artifactsDir: string, diffText: string): Promise<string> {
  const { patch } = artifactPaths(artifactsDir);
  await writeTextFile(patch, diffText);
  return patch;
}

export async function readPatchArtifact(artifactsDir: string): Promise<string> {
  const { patch } = artifactPaths(artifactsDir);
  return (await pathExists(patch)) ? readTextFile(patch) : "";
}

export async function writeEvaluationArtifacts(
  artifactsDir: string,
  record: EvaluationRecord,
  rendered: RenderedReport,
): Promise<{ results: string; report: string }> {
  const paths = artifactPaths(artifactsDir);
  await writeJsonFile(paths.results, rendered.json);
  await writeTextFile(paths.report, rendered.html);
  await writeConclusion(phaseLogPath(artifactsDir, "post"), renderConclusion(record));
  return { results: paths.results, report: paths.report };
}

// Replaces the conclusion left by an earlier aggregation of the same artifacts.
async function writeConclusion(logPath: string, conclusion: string): Promise<void> {
  const existing = (await pathExists(logPath)) ? await readTextFile(logPath) : "";
  const marker = existing.lastIndexOf(`\n${CONCLUSION_HEADER}\n`);
  const body = marker === -1 ? existing : existing.slice(0, marker);
  await writeTextFile(logPath, body + conclusion);
}

function invalidResultError(filePath: string, detail: string, cause?: unknown): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.artifacts,
    title: "Phase result invalid.",
    message: `Could not read ${filePath}: ${detail}`,
    hint: "Re-run the phase to regenerate the file.",
    cause,
  });
}
