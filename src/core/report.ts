/**
 * Projections of an EvaluationRecord: the canonical results.json document,
 * a self-contained HTML page and the conclusion appended to the post log.
 * All functions are pure and leave the record untouched.
 */

import type { EvaluationRecord, VerdictReason } from "./aggregator.js";
import type { ErrorEntry, ValidationResult } from "./results.js";
import { truncateText } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type PhaseSummaryDocument = {
  status: string;
  reason: string;
  error_count: number;
  passed: number;
  failed: number;
  errored: number;
  warnings: number;
  remediation_attempts: number;
  installed_modules: string[];
  duration_ms: number;
  entries: EntryDocument[];
};

export type EntryDocument = {
  classification: string;
  module?: string;
  message: string;
};

export type ResultsDocument = {
  pre_errors: number;
  post_errors: number;
  tests_passing: boolean;
  change_applied: boolean;
  resolved: boolean;
  verdict_reason: VerdictReason;
  diff_path?: string;
  pre: PhaseSummaryDocument;
  post: PhaseSummaryDocument;
};

export type RenderedReport = {
  json: ResultsDocument;
  html: string;
};

const HTML_DIFF_LIMIT = 200_000;

export const CONCLUSION_HEADER = "--- FINAL CONCLUSION ---";

const CONCLUSIONS: Record<VerdictReason, string> = {
  resolved: "THE ERROR IS CORRECTED",
  "errors-remain": "ERRORS STILL PRESENT",
  "nothing-to-resolve": "NO ERRORS TO CORRECT - TESTS WERE ALREADY PASSING",
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function renderReport(record: EvaluationRecord): RenderedReport {
  const json = buildResultsDocument(record);
  return { json, html: renderHtml(record, json) };
}

export function buildResultsDocument(record: EvaluationRecord): ResultsDocument {
  const doc: ResultsDocument = {
    pre_errors: record.pre.final.errorCount,
    post_errors: record.post.final.errorCount,
    tests_passing: record.post.status === "clean",
    change_applied: record.diff.changeApplied,
    resolved: record.verdict.resolved,
    verdict_reason: record.verdict.reason,
    pre: summarizePhase(record.pre),
    post: summarizePhase(record.post),
  };

  if (record.diff.path !== undefined) {
    doc.diff_path = record.diff.path;
  }
  return doc;
}

export function renderConclusion(record: EvaluationRecord): string {
  return [
    "",
    CONCLUSION_HEADER,
    CONCLUSIONS[record.verdict.reason],
    "TASK COMPLETED",
    "",
  ].join("\n");
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

// =============================================================================
// INTERNALS
// =============================================================================

function summarizePhase(result: ValidationResult): PhaseSummaryDocument {
  const { final } = result;
  return {
    status: result.status,
    reason: result.reason,
    error_count: final.errorCount,
    passed: final.passed,
    failed: final.failed,
    errored: final.errored,
    warnings: final.warningCount,
    remediation_attempts: result.remediationAttempts,
    installed_modules: [...result.installedModules],
    duration_ms: result.durationMs,
    entries: final.entries.map(entryDocument),
  };
}

function entryDocument(entry: ErrorEntry): EntryDocument {
  if (entry.classification === "module-missing") {
    return { classification: entry.classification, module: entry.module, message: entry.message };
  }
  return { classification: entry.classification, message: entry.message };
}

function renderHtml(record: EvaluationRecord, doc: ResultsDocument): string {
  const verdictClass = doc.resolved ? "ok" : "bad";
  const diff = truncateText(record.diff.text, HTML_DIFF_LIMIT);

  return [
    "<!doctype html>",
    "<html>",
    "<head>",
    '  <meta charset="utf-8" />',
    "  <title>Patch evaluation report</title>",
    "  <style>",
    "    body { font-family: sans-serif; margin: 2rem; }",
    "    table { border-collapse: collapse; }",
    "    th, td { border: 1px solid #ccc; padding: 0.3rem 0.6rem; text-align: left; }",
    "    .ok { color: #1a7f37; }",
    "    .bad { color: #cf222e; }",
    "    pre { background: #f6f8fa; padding: 1rem; overflow-x: auto; }",
    "  </style>",
    "</head>",
    "<body>",
    "  <h1>Patch evaluation report</h1>",
    `  <p class="${verdictClass}">Verdict: <strong>${escapeHtml(CONCLUSIONS[doc.verdict_reason])}</strong></p>`,
    "  <table>",
    "    <tr><th></th><th>Pre</th><th>Post</th></tr>",
    phaseRow("Status", doc.pre.status, doc.post.status),
    phaseRow("Reason", doc.pre.reason, doc.post.reason),
    phaseRow("Errors", String(doc.pre_errors), String(doc.post_errors)),
    phaseRow("Passed", String(doc.pre.passed), String(doc.post.passed)),
    phaseRow("Remediation attempts", String(doc.pre.remediation_attempts), String(doc.post.remediation_attempts)),
    phaseRow("Reinstalled modules", listOrNone(doc.pre.installed_modules), listOrNone(doc.post.installed_modules)),
    "  </table>",
    `  <p>Tests passing: <code>${String(doc.tests_passing)}</code></p>`,
    `  <p>Change applied: <code>${String(doc.change_applied)}</code></p>`,
    ...entrySection("Pre-patch errors", doc.pre.entries),
    ...entrySection("Post-patch errors", doc.post.entries),
    "  <h2>Changes</h2>",
    doc.change_applied
      ? `  <pre>${escapeHtml(diff.text)}${diff.truncated ? "\n[diff truncated]" : ""}</pre>`
      : "  <p>No changes.</p>",
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

function phaseRow(label: string, pre: string, post: string): string {
  return `    <tr><th>${escapeHtml(label)}</th><td>${escapeHtml(pre)}</td><td>${escapeHtml(post)}</td></tr>`;
}

function listOrNone(items: string[]): string {
  return items.length > 0 ? items.join(", ") : "none";
}

function entrySection(title: string, entries: EntryDocument[]): string[] {
  if (entries.length === 0) return [];

  return [
    `  <h2>${escapeHtml(title)}</h2>`,
    "  <ul>",
    ...entries.map((entry) => {
      const label = entry.module ? `${entry.classification} (${entry.module})` : entry.classification;
      return `    <li><strong>${escapeHtml(label)}</strong>: <code>${escapeHtml(entry.message)}</code></li>`;
    }),
    "  </ul>",
  ];
}
