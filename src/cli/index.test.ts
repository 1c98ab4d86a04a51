import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createTempGitRepo } from "../__tests__/helpers/temp-git-repo.js";
import { main, resolveDebugFlagFromArgv } from "../index.js";

const PASSING_COMMAND = `"${process.execPath}" -e "console.log('=== 3 passed in 0.01s ===')"`;

let tmpDir = "";

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "patchproof-cli-"));
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("patchproof evaluate", () => {
  it("writes results for a suite that already passes", async () => {
    const artifactsDir = path.join(tmpDir, "artifacts");

    await main([
      "node",
      "patchproof",
      "evaluate",
      "--repo",
      tmpDir,
      "--test-command",
      PASSING_COMMAND,
      "--artifacts-dir",
      artifactsDir,
      "--fail-unresolved",
    ]);

    const results = JSON.parse(fs.readFileSync(path.join(artifactsDir, "results.json"), "utf8"));
    expect(results).toMatchObject({
      pre_errors: 0,
      post_errors: 0,
      tests_passing: true,
      change_applied: false,
      verdict_reason: "nothing-to-resolve",
    });
    expect(process.exitCode).toBe(2);
  });

  it("reads a relative --patch-file from the invocation directory", async () => {
    const repo = await createTempGitRepo();
    const originalCwd = process.cwd();
    try {
      await repo.writeFile("app.py", "print('old')\n");
      await repo.commit("initial");
      fs.writeFileSync(
        path.join(tmpDir, "fix.patch"),
        [
          "diff --git a/app.py b/app.py",
          "--- a/app.py",
          "+++ b/app.py",
          "@@ -1 +1 @@",
          "-print('old')",
          "+print('new')",
          "",
        ].join("\n"),
        "utf8",
      );
      const artifactsDir = path.join(tmpDir, "artifacts");
      process.chdir(tmpDir);

      await main([
        "node",
        "patchproof",
        "evaluate",
        "--repo",
        repo.repoDir,
        "--test-command",
        PASSING_COMMAND,
        "--artifacts-dir",
        artifactsDir,
        "--patch-file",
        "fix.patch",
      ]);

      expect(process.exitCode).toBeUndefined();
      expect(fs.readFileSync(path.join(repo.repoDir, "app.py"), "utf8")).toBe("print('new')\n");
      const results = JSON.parse(fs.readFileSync(path.join(artifactsDir, "results.json"), "utf8"));
      expect(results).toMatchObject({ change_applied: true });
    } finally {
      process.chdir(originalCwd);
      await repo.cleanup();
    }
  });
});

describe("patchproof validate", () => {
  it("reports a missing --phase as a usage error", async () => {
    await main(["node", "patchproof", "validate", "--repo", tmpDir]);

    expect(process.exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});

describe("patchproof aggregate", () => {
  it("explains which phase result is missing", async () => {
    await main(["node", "patchproof", "aggregate", "--artifacts-dir", tmpDir]);

    expect(process.exitCode).toBe(1);
    const output = String(vi.mocked(console.error).mock.calls[0]?.[0]);
    expect(output).toContain("Phase result missing.");
    expect(output).toContain(`Next: patchproof validate --phase pre --artifacts-dir ${tmpDir}`);
  });
});

describe("resolveDebugFlagFromArgv", () => {
  it("takes the last debug flag before --", () => {
    expect(resolveDebugFlagFromArgv(["--debug", "--no-debug"])).toBe(false);
    expect(resolveDebugFlagFromArgv(["evaluate", "--", "--debug"])).toBeUndefined();
    expect(resolveDebugFlagFromArgv(["--debug", "evaluate"])).toBe(true);
  });
});
