/*
Purpose: drive one phase (pre or post) of test execution with bounded dependency remediation.
Assumptions: runs are sequential; only module-missing errors are remediable.
Usage: runValidationLoop({ phase, command, cwd, timeoutSeconds, remediation, ... }).
Notes: `transition` is pure; `runValidationLoop` performs the effects each state asks for.
*/

import { ExecutionTimeout } from "./errors.js";
import { silentLogger, type EventLogger, type Phase } from "./logger.js";
import { missingModules, parseOutcome } from "./outcome-parser.js";
import type { RemediationContext, RemediationReport } from "./remediation.js";
import {
  createTestOutcome,
  createValidationResult,
  isModuleMissing,
  type TestOutcome,
  type ValidationResult,
  type ValidationStatus,
} from "./results.js";
import { DEFAULT_SIGNATURES, type SignatureSet } from "./signatures.js";
import { runTestCommand, type TestRunner } from "./test-runner.js";
import { writeTextFile } from "./utils.js";

export const DEFAULT_MAX_ATTEMPTS = 3;

// =============================================================================
// STATES & EVENTS
// =============================================================================

export type LoopProgress = {
  // Successful remediation cycles; bounded by maxAttempts for the whole phase.
  readonly cycles: number;
  readonly remediationAttempts: number;
  readonly installed: readonly string[];
};

type TerminalOf<K extends ValidationStatus, R extends string> = {
  readonly kind: K;
  readonly reason: R;
  readonly final: TestOutcome;
  readonly progress: LoopProgress;
};

export type CleanState = TerminalOf<"clean", "no-errors">;
export type ExhaustedState = TerminalOf<"exhausted", "remediation-failed">;
export type FailedState = TerminalOf<"failed", "test-failure" | "retry-bound" | "timeout">;
export type TerminalState = CleanState | ExhaustedState | FailedState;

export type LoopState =
  | { readonly kind: "running"; readonly progress: LoopProgress }
  | {
      readonly kind: "remediating";
      readonly modules: readonly string[];
      readonly outcome: TestOutcome;
      readonly progress: LoopProgress;
    }
  | TerminalState;

export type LoopEvent =
  | { readonly type: "outcome"; readonly outcome: TestOutcome }
  | { readonly type: "timeout"; readonly outcome: TestOutcome }
  | { readonly type: "remediated"; readonly installed: readonly string[] };

export type TransitionPolicy = {
  maxAttempts: number;
};

export function initialLoopState(): LoopState {
  return { kind: "running", progress: { cycles: 0, remediationAttempts: 0, installed: [] } };
}

export function isTerminal(state: LoopState): state is TerminalState {
  return state.kind === "clean" || state.kind === "exhausted" || state.kind === "failed";
}

export function transition(
  state: LoopState,
  event: LoopEvent,
  policy: TransitionPolicy = { maxAttempts: DEFAULT_MAX_ATTEMPTS },
): LoopState {
  const { progress } = state;

  switch (state.kind) {
    case "running": {
      if (event.type === "timeout") {
        return { kind: "failed", reason: "timeout", final: event.outcome, progress };
      }
      if (event.type !== "outcome") break;

      const { outcome } = event;
      if (outcome.entries.length === 0) {
        return { kind: "clean", reason: "no-errors", final: outcome, progress };
      }
      if (!outcome.entries.every(isModuleMissing)) {
        return { kind: "failed", reason: "test-failure", final: outcome, progress };
      }
      if (progress.cycles >= policy.maxAttempts) {
        return { kind: "failed", reason: "retry-bound", final: outcome, progress };
      }
      return {
        kind: "remediating",
        modules: missingModules(outcome),
        outcome,
        progress: { ...progress, remediationAttempts: progress.remediationAttempts + 1 },
      };
    }

    case "remediating": {
      if (event.type !== "remediated") break;

      const fresh = event.installed.filter(
        (name, index) => !progress.installed.includes(name) && event.installed.indexOf(name) === index,
      );
      if (fresh.length === 0) {
        return { kind: "exhausted", reason: "remediation-failed", final: state.outcome, progress };
      }
      return {
        kind: "running",
        progress: {
          ...progress,
          cycles: progress.cycles + 1,
          installed: [...progress.installed, ...fresh],
        },
      };
    }

    default:
      throw new Error(`Cannot apply ${event.type} to terminal state ${state.kind}`);
  }

  throw new Error(`Cannot apply ${event.type} in state ${state.kind}`);
}

// =============================================================================
// DRIVER
// =============================================================================

export type Remediator = {
  remediate: (
    moduleNames: readonly string[],
    context?: RemediationContext,
  ) => Promise<RemediationReport>;
};

export type ValidationLoopOptions = {
  phase: Phase;
  command: string;
  cwd: string;
  timeoutSeconds: number;
  remediation: Remediator;
  maxAttempts?: number;
  env?: NodeJS.ProcessEnv;
  logFile?: string;
  signatures?: SignatureSet;
  runner?: TestRunner;
  logger?: EventLogger;
  clock?: () => number;
};

export async function runValidationLoop(options: ValidationLoopOptions): Promise<ValidationResult> {
  const {
    phase,
    command,
    remediation,
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    signatures = DEFAULT_SIGNATURES,
    runner = runTestCommand,
    logger = silentLogger,
    clock = Date.now,
  } = options;
  const policy: TransitionPolicy = { maxAttempts };
  const startedAt = clock();

  logger.log({ type: "phase.start", phase, payload: { command, max_attempts: maxAttempts } });

  let state = initialLoopState();
  let runs = 0;
  // Raw output of the latest run; the phase log keeps only the final one.
  let lastOutput = "";

  for (;;) {
    if (isTerminal(state)) {
      const result = createValidationResult({
        phase,
        status: state.kind,
        reason: state.reason,
        final: state.final,
        remediationAttempts: state.progress.remediationAttempts,
        installedModules: state.progress.installed,
        durationMs: Math.max(0, Math.round(clock() - startedAt)),
      });

      if (options.logFile) {
        await writeTextFile(options.logFile, `${formatSummaryBlock(result, command, runs)}\n${lastOutput}`);
      }
      logger.log({
        type: "phase.complete",
        phase,
        payload: {
          status: result.status,
          reason: result.reason,
          error_count: result.final.errorCount,
          remediation_attempts: result.remediationAttempts,
          installed_modules: [...result.installedModules],
        },
      });
      return result;
    }

    let event: LoopEvent;
    if (state.kind === "running") {
      runs += 1;
      const run = await runOnce(options, { runner, signatures, logger, attempt: runs });
      event = run.event;
      lastOutput = run.output;
    } else {
      const attempt = state.progress.remediationAttempts;
      logger.log({
        type: "remediation.start",
        phase,
        attempt,
        payload: { modules: [...state.modules] },
      });
      const report = await remediation.remediate(state.modules, { phase, attempt });
      logger.log({
        type: "remediation.complete",
        phase,
        attempt,
        payload: {
          installed: report.installed,
          failed: report.failures.map((failure) => failure.module),
        },
      });
      event = { type: "remediated", installed: report.installed };
    }

    const next = transition(state, event, policy);
    logger.log({
      type: "loop.transition",
      phase,
      payload: isTerminal(next)
        ? { from: state.kind, to: next.kind, reason: next.reason }
        : { from: state.kind, to: next.kind },
    });
    state = next;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runOnce(
  options: ValidationLoopOptions,
  deps: { runner: TestRunner; signatures: SignatureSet; logger: EventLogger; attempt: number },
): Promise<{ event: LoopEvent; output: string }> {
  const { phase } = options;
  const { logger, attempt } = deps;

  logger.log({ type: "test.run.start", phase, attempt, payload: { command: options.command } });

  try {
    const res = await deps.runner({
      command: options.command,
      cwd: options.cwd,
      timeoutSeconds: options.timeoutSeconds,
      env: options.env,
      label: phase,
    });
    logger.log({
      type: "test.run.complete",
      phase,
      attempt,
      payload: { exit_code: res.exitCode, duration_ms: res.durationMs },
    });

    const outcome = parseOutcome(res.stdout, res.stderr, res.exitCode, deps.signatures);
    logger.log({
      type: "outcome.parsed",
      phase,
      attempt,
      payload: {
        error_count: outcome.errorCount,
        passed: outcome.passed,
        entries: outcome.entries.length,
        missing_modules: missingModules(outcome),
      },
    });
    return {
      event: { type: "outcome", outcome },
      output: `${res.stdout}\n--- STDERR ---\n${res.stderr}\n`,
    };
  } catch (err) {
    if (!(err instanceof ExecutionTimeout)) throw err;

    logger.log({
      type: "test.run.timeout",
      phase,
      attempt,
      payload: { timeout_seconds: err.timeoutSeconds },
    });
    return { event: { type: "timeout", outcome: timeoutOutcome(err) }, output: `${err.message}\n` };
  }
}

function timeoutOutcome(err: ExecutionTimeout): TestOutcome {
  return createTestOutcome({
    exitCode: -1,
    passed: 0,
    failed: 0,
    errored: 1,
    warningCount: 0,
    warnings: [],
    entries: [{ classification: "other", message: err.message }],
    summaryFound: false,
  });
}

export function formatSummaryBlock(result: ValidationResult, command: string, runs: number): string {
  const modules = result.installedModules.length > 0 ? result.installedModules.join(", ") : "none";
  return [
    "=================================",
    `STAGE               : ${result.phase}`,
    `COMMAND             : ${command}`,
    `ATTEMPTS            : ${runs}`,
    `ERROR COUNT         : ${result.final.errorCount}`,
    `MODULES REINSTALLED : ${modules}`,
    `STATUS              : ${result.status} (${result.reason})`,
    "=================================",
    "",
  ].join("\n");
}
