import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { EnvironmentError, ExecutionTimeout } from "./errors.js";
import { runTestCommand } from "./test-runner.js";

const node = `"${process.execPath}"`;

describe("runTestCommand", () => {
  it("returns output and exit code without throwing on failure", async () => {
    const result = await runTestCommand({
      command: `${node} -e "console.log('out'); console.error('err'); process.exit(3)"`,
      cwd: os.tmpdir(),
      timeoutSeconds: 30,
    });

    expect(result.exitCode).toBe(3);
    expect(result.stdout).toBe("out");
    expect(result.stderr).toBe("err");
  });

  it("names the phase in a timeout message", async () => {
    await expect(
      runTestCommand({
        command: `${node} -e "setTimeout(() => undefined, 3000)"`,
        cwd: os.tmpdir(),
        timeoutSeconds: 1,
        label: "post",
      }),
    ).rejects.toThrow(`[post] Test command timed out after 1s: ${node} -e`);
  });

  it("raises a timeout when the command runs too long", async () => {
    await expect(
      runTestCommand({
        command: `${node} -e "setTimeout(() => undefined, 3000)"`,
        cwd: os.tmpdir(),
        timeoutSeconds: 1,
      }),
    ).rejects.toBeInstanceOf(ExecutionTimeout);
  });

  it("raises an environment error when the command is not found", async () => {
    await expect(
      runTestCommand({
        command: "patchproof-no-such-test-runner --verbose",
        cwd: os.tmpdir(),
        timeoutSeconds: 30,
      }),
    ).rejects.toBeInstanceOf(EnvironmentError);
  });

  it("raises an environment error when the working directory is missing", async () => {
    await expect(
      runTestCommand({
        command: `${node} -e "process.exit(0)"`,
        cwd: path.join(os.tmpdir(), "patchproof-missing-dir", "repo"),
        timeoutSeconds: 30,
      }),
    ).rejects.toBeInstanceOf(EnvironmentError);
  });
});
