/*
Purpose: turn raw test-command output into a classified TestOutcome.
Assumptions: output is line-oriented; the runner's summary line, when present,
is authoritative for counts. Pure: no IO, no clock.
Usage: parseOutcome(stdout, stderr, exitCode, signatures?).
*/

import {
  createTestOutcome,
  type ErrorEntry,
  type TestOutcome,
} from "./results.js";
import { DEFAULT_SIGNATURES, type SignatureSet } from "./signatures.js";

// =============================================================================
// TYPES
// =============================================================================

type Tallies = {
  passed: number;
  failed: number;
  errored: number;
  warnings: number;
};

type TestLineMatch = {
  test: string;
  message?: string;
};

type EntrySource = "module" | "failed" | "error" | "other";

type EntrySlot = {
  entry: ErrorEntry;
  source: EntrySource;
  detailed: boolean;
  // Error lines without a message say nothing about the cause.
  bare: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseOutcome(
  stdout: string,
  stderr: string,
  exitCode: number,
  signatures: SignatureSet = DEFAULT_SIGNATURES,
): TestOutcome {
  const collector = new EntryCollector();
  const warnings: string[] = [];
  const passedTests = new Set<string>();
  let summary: Tallies | null = null;

  for (const line of splitLines(stdout, stderr)) {
    const moduleName = matchMissingModule(line, signatures.moduleMissing);
    if (moduleName) {
      collector.addModule(moduleName, line);
    }

    if (signatures.internalError.some((pattern) => pattern.test(line))) {
      collector.addOther(line);
      continue;
    }

    const failed = matchTestLine(line, signatures.failedLine);
    if (failed) {
      if (!moduleName) collector.addTestLine("failed", failed, line);
      continue;
    }

    const errored = matchTestLine(line, signatures.errorLine);
    if (errored) {
      if (!moduleName) collector.addTestLine("error", errored, line);
      continue;
    }

    const passed = matchTestLine(line, signatures.passedLine);
    if (passed) {
      passedTests.add(passed.test);
      continue;
    }

    const tallies = matchSummary(line, signatures.summary);
    if (tallies) {
      summary = tallies;
      continue;
    }

    if (signatures.warning.some((pattern) => pattern.test(line))) {
      warnings.push(line);
    }
  }

  const failing = summary
    ? summary.failed + summary.errored > 0 || exitCode !== 0
    : exitCode !== 0;

  let slots = failing ? collector.finish() : [];
  if (failing && slots.length === 0) {
    slots = [synthesizeSlot(summary, exitCode)];
  }

  const failedSlots = slots.filter((slot) => slot.source === "failed").length;
  let counts: Tallies = summary ?? {
    passed: passedTests.size,
    failed: failedSlots,
    errored: slots.length - failedSlots,
    warnings: warnings.length,
  };

  if (failing && counts.failed + counts.errored === 0) {
    counts = { ...counts, errored: Math.max(1, slots.length - failedSlots) };
  }

  return createTestOutcome({
    exitCode,
    passed: counts.passed,
    failed: counts.failed,
    errored: counts.errored,
    warningCount: counts.warnings,
    warnings,
    entries: slots.map((slot) => slot.entry),
    summaryFound: summary !== null,
  });
}

export function missingModules(outcome: TestOutcome): string[] {
  const names: string[] = [];
  for (const entry of outcome.entries) {
    if (entry.classification === "module-missing" && !names.includes(entry.module)) {
      names.push(entry.module);
    }
  }
  return names;
}

// =============================================================================
// ENTRY COLLECTION
// =============================================================================

class EntryCollector {
  private readonly slots: EntrySlot[] = [];
  private readonly index = new Map<string, number>();

  addModule(moduleName: string, line: string): void {
    this.add(`module:${moduleName}`, {
      entry: { classification: "module-missing", module: moduleName, message: line },
      source: "module",
      detailed: true,
      bare: false,
    });
  }

  addOther(line: string): void {
    this.add(`other:${line}`, {
      entry: { classification: "other", message: line },
      source: "other",
      detailed: true,
      bare: false,
    });
  }

  addTestLine(kind: "failed" | "error", match: TestLineMatch, line: string): void {
    const key = `${kind}:${match.test}`;
    const detailed = match.message !== undefined;
    const slot: EntrySlot = {
      entry: { classification: "test-failure", message: line },
      source: kind,
      detailed,
      bare: kind === "error" && !detailed,
    };

    const existing = this.index.get(key);
    if (existing === undefined) {
      this.add(key, slot);
      return;
    }

    // A later line with detail (short summary) replaces a bare progress line.
    if (detailed && !this.slots[existing]?.detailed) {
      this.slots[existing] = slot;
    }
  }

  finish(): EntrySlot[] {
    const hasModules = this.slots.some((slot) => slot.source === "module");
    return hasModules ? this.slots.filter((slot) => !slot.bare) : [...this.slots];
  }

  private add(key: string, slot: EntrySlot): void {
    if (this.index.has(key)) return;
    this.index.set(key, this.slots.length);
    this.slots.push(slot);
  }
}

function synthesizeSlot(summary: Tallies | null, exitCode: number): EntrySlot {
  if (summary && summary.failed + summary.errored > 0) {
    const total = summary.failed + summary.errored;
    return {
      entry: {
        classification: "test-failure",
        message: `Test runner reported ${total} failing result(s) without per-test detail`,
      },
      source: "failed",
      detailed: false,
      bare: false,
    };
  }

  const message = summary
    ? `Test command exited with code ${exitCode} despite a passing summary`
    : `Test command exited with code ${exitCode} before reporting a summary`;
  return {
    entry: { classification: "other", message },
    source: "other",
    detailed: false,
    bare: false,
  };
}

// =============================================================================
// LINE MATCHING
// =============================================================================

function splitLines(stdout: string, stderr: string): string[] {
  return `${stdout}\n${stderr}`
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function matchMissingModule(line: string, patterns: RegExp[]): string | null {
  for (const pattern of patterns) {
    const moduleName = pattern.exec(line)?.groups?.module?.trim();
    if (moduleName) {
      return moduleName;
    }
  }
  return null;
}

function matchTestLine(line: string, patterns: RegExp[]): TestLineMatch | null {
  for (const pattern of patterns) {
    const groups = pattern.exec(line)?.groups;
    if (groups?.test) {
      const message = groups.message?.trim();
      return message ? { test: groups.test, message } : { test: groups.test };
    }
  }
  return null;
}

function matchSummary(line: string, patterns: RegExp[]): Tallies | null {
  for (const pattern of patterns) {
    const text = pattern.exec(line)?.groups?.tallies;
    if (text) {
      const tallies = parseTallies(text);
      if (tallies) return tallies;
    }
  }
  return null;
}

function parseTallies(text: string): Tallies | null {
  const tallies: Tallies = { passed: 0, failed: 0, errored: 0, warnings: 0 };
  if (/^no tests ran$/i.test(text.trim())) {
    return tallies;
  }

  let recognized = false;
  for (const part of text.split(",")) {
    const match = /^(\d+) (\w+)$/.exec(part.trim());
    if (!match) continue;
    recognized = true;

    const count = Number(match[1]);
    switch (match[2]) {
      case "passed":
        tallies.passed = count;
        break;
      case "failed":
        tallies.failed = count;
        break;
      case "error":
      case "errors":
        tallies.errored = count;
        break;
      case "warning":
      case "warnings":
        tallies.warnings = count;
        break;
      default:
        // skipped, deselected, xfailed, xpassed, rerun
        break;
    }
  }

  return recognized ? tallies : null;
}
