/**
 * Signature sets: the text patterns that teach the outcome parser one test
 * ecosystem's output. The defaults recognise pytest and Python import errors;
 * a project config can replace any list.
 *
 * Named groups carry the extracted values:
 * - moduleMissing: `module`
 * - failedLine / errorLine / passedLine: `test`, optional `message`
 * - summary: `tallies` (e.g. "1 failed, 5 passed, 2 warnings")
 */

import { ConfigError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type SignatureSet = {
  moduleMissing: RegExp[];
  failedLine: RegExp[];
  errorLine: RegExp[];
  passedLine: RegExp[];
  internalError: RegExp[];
  warning: RegExp[];
  summary: RegExp[];
};

export type SignatureKind = keyof SignatureSet;

export type SignatureSources = { [K in SignatureKind]: string[] };

export type SignatureOverrides = Partial<SignatureSources>;

const REQUIRED_GROUPS: Record<SignatureKind, string | null> = {
  moduleMissing: "module",
  failedLine: "test",
  errorLine: "test",
  passedLine: "test",
  internalError: null,
  warning: null,
  summary: "tallies",
};

// Import errors are matched case-insensitively; runner markers (FAILED, ERROR) are not.
const CASE_INSENSITIVE: ReadonlySet<SignatureKind> = new Set(["moduleMissing"]);

// =============================================================================
// DEFAULTS (pytest)
// =============================================================================

export const PYTEST_SIGNATURE_SOURCES: SignatureSources = {
  moduleMissing: [
    "ModuleNotFoundError: No module named '(?<module>[^']+)'",
    "ImportError: No module named '?(?<module>[\\w.]+)'?",
    "ImportError: .* from '(?<module>[^']+)'",
  ],
  failedLine: [
    "^FAILED (?<test>\\S+)(?: - (?<message>.*))?$",
    "^(?<test>\\S+::\\S+) FAILED\\b",
  ],
  errorLine: [
    "^ERROR (?<test>\\S+)(?: - (?<message>.*))?$",
    "^(?<test>\\S+::\\S+) ERROR\\b",
  ],
  passedLine: ["^(?<test>\\S+::\\S+) PASSED\\b"],
  internalError: ["^INTERNALERROR>"],
  warning: ["\\b[A-Z]\\w*Warning: "],
  summary: [
    "^=+ (?<tallies>.+?) in \\d+(?:\\.\\d+)?s(?: \\([^)]*\\))? =+$",
    "^(?<tallies>\\d+ \\w+(?:, \\d+ \\w+)*) in \\d+(?:\\.\\d+)?s(?: \\([^)]*\\))?$",
  ],
};

export const DEFAULT_SIGNATURES: SignatureSet = compileSignatureSet(PYTEST_SIGNATURE_SOURCES);

// =============================================================================
// COMPILATION
// =============================================================================

export function compileSignatureSet(sources: SignatureSources): SignatureSet {
  return {
    moduleMissing: compileList("moduleMissing", sources.moduleMissing),
    failedLine: compileList("failedLine", sources.failedLine),
    errorLine: compileList("errorLine", sources.errorLine),
    passedLine: compileList("passedLine", sources.passedLine),
    internalError: compileList("internalError", sources.internalError),
    warning: compileList("warning", sources.warning),
    summary: compileList("summary", sources.summary),
  };
}

export function resolveSignatureSet(overrides: SignatureOverrides = {}): SignatureSet {
  const hasOverrides = Object.values(overrides).some((list) => list !== undefined);
  if (!hasOverrides) {
    return DEFAULT_SIGNATURES;
  }

  const defaults = PYTEST_SIGNATURE_SOURCES;
  return compileSignatureSet({
    moduleMissing: overrides.moduleMissing ?? defaults.moduleMissing,
    failedLine: overrides.failedLine ?? defaults.failedLine,
    errorLine: overrides.errorLine ?? defaults.errorLine,
    passedLine: overrides.passedLine ?? defaults.passedLine,
    internalError: overrides.internalError ?? defaults.internalError,
    warning: overrides.warning ?? defaults.warning,
    summary: overrides.summary ?? defaults.summary,
  });
}

// Null when the pattern compiles and defines the group its kind requires.
export function signaturePatternProblem(kind: SignatureKind, source: string): string | null {
  try {
    new RegExp(source);
  } catch {
    return `Invalid ${kind} signature pattern: ${source}`;
  }

  const group = REQUIRED_GROUPS[kind];
  if (group && !source.includes(`(?<${group}>`)) {
    return `Signature pattern for ${kind} must define a named group "${group}": ${source}`;
  }
  return null;
}

function compileList(kind: SignatureKind, sources: string[]): RegExp[] {
  return sources.map((source) => {
    const problem = signaturePatternProblem(kind, source);
    if (problem) {
      throw new ConfigError(problem);
    }
    return new RegExp(source, CASE_INSENSITIVE.has(kind) ? "i" : "");
  });
}
