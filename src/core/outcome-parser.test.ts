import { describe, expect, it } from "vitest";

import { missingModules, parseOutcome } from "./outcome-parser.js";
import { resolveSignatureSet } from "./signatures.js";

const COLLECTION_ERROR = [
  "============================= test session starts ==============================",
  "collecting ... collected 0 items / 1 error",
  "",
  "==================================== ERRORS ====================================",
  "_____________________ ERROR collecting tests/test_app.py ______________________",
  "ImportError while importing test module '/testbed/tests/test_app.py'.",
  "tests/test_app.py:1: in <module>",
  "    import foo",
  "E   ModuleNotFoundError: No module named 'foo'",
  "=========================== short test summary info ============================",
  "ERROR tests/test_app.py",
  "!!!!!!!!!!!!!!!!!!!! Interrupted: 1 error during collection !!!!!!!!!!!!!!!!!!!!",
  "=============================== 1 error in 0.12s ===============================",
].join("\n");

const ALL_PASSING = [
  "tests/test_app.py::test_one PASSED                                       [ 50%]",
  "tests/test_app.py::test_two PASSED                                       [100%]",
  "",
  "============================== 2 passed in 0.03s ===============================",
].join("\n");

const ONE_FAILURE = [
  "tests/test_app.py::test_one PASSED                                       [ 50%]",
  "tests/test_app.py::test_two FAILED                                       [100%]",
  "",
  "=================================== FAILURES ===================================",
  "___________________________________ test_two ___________________________________",
  "",
  "    def test_two():",
  ">       assert add(1, 1) == 3",
  "E       assert 2 == 3",
  "",
  "tests/test_app.py:7: AssertionError",
  "=========================== short test summary info ============================",
  "FAILED tests/test_app.py::test_two - assert 2 == 3",
  "========================= 1 failed, 1 passed in 0.05s ==========================",
].join("\n");

describe("parseOutcome", () => {
  it("classifies a collection-time import error as one missing module", () => {
    const outcome = parseOutcome(COLLECTION_ERROR, "", 2);

    expect(outcome.errorCount).toBe(1);
    expect(outcome.errored).toBe(1);
    expect(outcome.passed).toBe(0);
    expect(outcome.summaryFound).toBe(true);
    expect(outcome.entries).toEqual([
      {
        classification: "module-missing",
        module: "foo",
        message: "E   ModuleNotFoundError: No module named 'foo'",
      },
    ]);
  });

  it("reports no entries for a passing run", () => {
    const outcome = parseOutcome(ALL_PASSING, "", 0);

    expect(outcome.passed).toBe(2);
    expect(outcome.errorCount).toBe(0);
    expect(outcome.entries).toEqual([]);
  });

  it("keeps the detailed summary line for a failing test", () => {
    const outcome = parseOutcome(ONE_FAILURE, "", 1);

    expect(outcome.failed).toBe(1);
    expect(outcome.passed).toBe(1);
    expect(outcome.errorCount).toBe(1);
    expect(outcome.entries).toEqual([
      {
        classification: "test-failure",
        message: "FAILED tests/test_app.py::test_two - assert 2 == 3",
      },
    ]);
  });

  it("covers a failure caused by an import error with the module entry", () => {
    const stdout = [
      "FAILED tests/test_x.py::test_a - ModuleNotFoundError: No module named 'bar'",
      "FAILED tests/test_x.py::test_b - assert 1 == 2",
      "============================== 2 failed in 0.10s ===============================",
    ].join("\n");

    const outcome = parseOutcome(stdout, "", 1);

    expect(outcome.errorCount).toBe(2);
    expect(outcome.entries.map((entry) => entry.classification)).toEqual([
      "module-missing",
      "test-failure",
    ]);
    expect(missingModules(outcome)).toEqual(["bar"]);
  });

  it("de-duplicates modules in first-seen order across stdout and stderr", () => {
    const stdout = [
      "E   ModuleNotFoundError: No module named 'foo'",
      "E   ModuleNotFoundError: No module named 'foo'",
    ].join("\n");
    const stderr = [
      "ImportError: cannot import name 'thing' from 'foo'",
      "ModuleNotFoundError: No module named 'baz'",
    ].join("\n");

    const outcome = parseOutcome(stdout, stderr, 1);

    expect(missingModules(outcome)).toEqual(["foo", "baz"]);
    expect(outcome.entries).toHaveLength(2);
  });

  it("keeps a bare error line when no module is missing", () => {
    const stdout = [
      "ERROR tests/test_db.py",
      "=============================== 1 error in 0.40s ===============================",
    ].join("\n");

    const outcome = parseOutcome(stdout, "", 1);

    expect(outcome.entries).toEqual([
      { classification: "test-failure", message: "ERROR tests/test_db.py" },
    ]);
  });

  it("records runner-internal errors as other", () => {
    const stderr = [
      "INTERNALERROR> Traceback (most recent call last):",
      "INTERNALERROR> KeyError: 'x'",
    ].join("\n");

    const outcome = parseOutcome("", stderr, 3);

    expect(outcome.summaryFound).toBe(false);
    expect(outcome.errored).toBe(2);
    expect(outcome.entries.every((entry) => entry.classification === "other")).toBe(true);
  });

  it("synthesizes an entry when the command fails without output", () => {
    const outcome = parseOutcome("", "", 1);

    expect(outcome.errorCount).toBe(1);
    expect(outcome.entries).toEqual([
      {
        classification: "other",
        message: "Test command exited with code 1 before reporting a summary",
      },
    ]);
  });

  it("treats a non-zero exit as failing even when the summary passes", () => {
    const stdout = "============================== 2 passed in 0.01s ===============================";

    const outcome = parseOutcome(stdout, "", 1);

    expect(outcome.passed).toBe(2);
    expect(outcome.errored).toBe(1);
    expect(outcome.entries).toEqual([
      {
        classification: "other",
        message: "Test command exited with code 1 despite a passing summary",
      },
    ]);
  });

  it("collects warnings and takes the warning count from the summary", () => {
    const stdout = [
      "  /testbed/app.py:3: DeprecationWarning: old api",
      "======================== 3 passed, 2 warnings in 0.10s =========================",
    ].join("\n");

    const outcome = parseOutcome(stdout, "", 0);

    expect(outcome.warnings).toEqual(["/testbed/app.py:3: DeprecationWarning: old api"]);
    expect(outcome.warningCount).toBe(2);
    expect(outcome.errorCount).toBe(0);
  });

  it("reads the quiet summary form", () => {
    const outcome = parseOutcome("1 failed, 4 passed in 0.21s", "", 1);

    expect(outcome.summaryFound).toBe(true);
    expect(outcome.failed).toBe(1);
    expect(outcome.passed).toBe(4);
    expect(outcome.entries).toEqual([
      {
        classification: "test-failure",
        message: "Test runner reported 1 failing result(s) without per-test detail",
      },
    ]);
  });

  it("uses configured signatures for other ecosystems", () => {
    const signatures = resolveSignatureSet({
      moduleMissing: ["Cannot find module '(?<module>[^']+)'"],
    });

    const outcome = parseOutcome("", "Error: Cannot find module 'left-pad'", 1, signatures);

    expect(missingModules(outcome)).toEqual(["left-pad"]);
    expect(outcome.errorCount).toBe(1);
  });

  it("returns frozen records", () => {
    const outcome = parseOutcome(ONE_FAILURE, "", 1);

    expect(Object.isFrozen(outcome)).toBe(true);
    expect(Object.isFrozen(outcome.entries)).toBe(true);
  });
});
