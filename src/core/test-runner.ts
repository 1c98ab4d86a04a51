import { execaCommand } from "execa";

import { EnvironmentError, ExecutionTimeout } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type TestRunRequest = {
  command: string;
  cwd: string;
  timeoutSeconds: number;
  env?: NodeJS.ProcessEnv;
  // Phase name prefixed to error messages.
  label?: string;
};

export type TestRunResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
};

export type TestRunner = (request: TestRunRequest) => Promise<TestRunResult>;

// Shell exit codes for "command not found" and "found but not executable".
const LAUNCH_FAILURE_EXIT_CODES: ReadonlySet<number> = new Set([126, 127]);

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runTestCommand(request: TestRunRequest): Promise<TestRunResult> {
  const startedAt = Date.now();
  const res = await execaCommand(request.command, {
    cwd: request.cwd,
    shell: true,
    reject: false,
    timeout: request.timeoutSeconds * 1000,
    stdio: "pipe",
    env: request.env ?? process.env,
  });
  const durationMs = Date.now() - startedAt;

  const stdout = typeof res.stdout === "string" ? res.stdout : String(res.stdout ?? "");
  const stderr = typeof res.stderr === "string" ? res.stderr : String(res.stderr ?? "");
  const prefix = request.label ? `[${request.label}] ` : "";

  if (res.timedOut) {
    throw new ExecutionTimeout(
      `${prefix}Test command timed out after ${request.timeoutSeconds}s: ${request.command}`,
      request.timeoutSeconds,
    );
  }

  if (typeof res.exitCode !== "number") {
    throw new EnvironmentError(
      `${prefix}Test command could not be launched (cwd=${request.cwd}): ${request.command}`,
      res,
    );
  }

  if (LAUNCH_FAILURE_EXIT_CODES.has(res.exitCode)) {
    throw new EnvironmentError(
      `${prefix}Test command could not be launched (exit ${res.exitCode}): ${stderr.trim() || request.command}`,
    );
  }

  return { exitCode: res.exitCode, stdout, stderr, durationMs };
}
