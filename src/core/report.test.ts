import { describe, expect, it } from "vitest";

import { aggregate } from "./aggregator.js";
import { escapeHtml, renderConclusion, renderReport } from "./report.js";
import { createTestOutcome, createValidationResult } from "./results.js";

const pre = createValidationResult({
  phase: "pre",
  status: "exhausted",
  reason: "remediation-failed",
  final: createTestOutcome({
    exitCode: 2,
    passed: 0,
    failed: 0,
    errored: 1,
    warningCount: 0,
    warnings: [],
    entries: [
      {
        classification: "module-missing",
        module: "foo",
        message: "E   ModuleNotFoundError: No module named 'foo'",
      },
    ],
    summaryFound: true,
  }),
  remediationAttempts: 1,
  installedModules: [],
  durationMs: 120,
});

const post = createValidationResult({
  phase: "post",
  status: "clean",
  reason: "no-errors",
  final: createTestOutcome({
    exitCode: 0,
    passed: 5,
    failed: 0,
    errored: 0,
    warningCount: 0,
    warnings: [],
    entries: [],
    summaryFound: true,
  }),
  remediationAttempts: 0,
  installedModules: [],
  durationMs: 80,
});

describe("renderReport", () => {
  it("projects the minimal result fields", () => {
    const record = aggregate(pre, post, { text: "-import foo\n+import bar\n" });

    const { json } = renderReport(record);

    expect(json).toMatchObject({
      pre_errors: 1,
      post_errors: 0,
      tests_passing: true,
      change_applied: true,
      resolved: true,
      verdict_reason: "resolved",
    });
    expect(json.pre.entries).toEqual([
      {
        classification: "module-missing",
        module: "foo",
        message: "E   ModuleNotFoundError: No module named 'foo'",
      },
    ]);
    expect(json.post.passed).toBe(5);
    expect("diff_path" in json).toBe(false);
  });

  it("escapes record content in the html page", () => {
    const record = aggregate(pre, post, { text: "+if a < b && c > d:\n" });

    const { html } = renderReport(record);
    const lines = html.split("\n");

    expect(lines).toContain('  <p class="ok">Verdict: <strong>THE ERROR IS CORRECTED</strong></p>');
    expect(lines).toContain("    <tr><th>Errors</th><td>1</td><td>0</td></tr>");
    expect(lines).toContain(
      "    <li><strong>module-missing (foo)</strong>: <code>E   ModuleNotFoundError: No module named &#39;foo&#39;</code></li>",
    );
    expect(lines).toContain("  <pre>+if a &lt; b &amp;&amp; c &gt; d:");
  });

  it("notes when nothing changed", () => {
    const record = aggregate(post, post, { text: "" });

    const { json, html } = renderReport(record);

    expect(json.change_applied).toBe(false);
    expect(html.split("\n")).toContain("  <p>No changes.</p>");
  });
});

describe("renderConclusion", () => {
  it("names the verdict and marks completion", () => {
    expect(renderConclusion(aggregate(pre, post, { text: "" }))).toBe(
      "\n--- FINAL CONCLUSION ---\nTHE ERROR IS CORRECTED\nTASK COMPLETED\n",
    );
    expect(renderConclusion(aggregate(pre, pre, { text: "" }))).toContain("ERRORS STILL PRESENT\n");
    expect(renderConclusion(aggregate(post, post, { text: "" }))).toContain(
      "NO ERRORS TO CORRECT - TESTS WERE ALREADY PASSING\n",
    );
  });
});

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;");
  });
});
