import { describe, expect, it } from "vitest";

import { EnvironmentError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

import { renderCliError } from "./error-format.js";

const nonTtyStream = { isTTY: false };

function buildConfigError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config invalid.",
    message: "Configuration from command-line flags is invalid.",
    hint: "Fix the config file (or the flags) and rerun.",
    next: "patchproof evaluate --repo . --test-command pytest",
  });
}

describe("renderCliError", () => {
  it("renders user-facing errors in short mode", () => {
    const output = renderCliError(buildConfigError(), { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Config invalid.",
        "Configuration from command-line flags is invalid.",
        "Hint: Fix the config file (or the flags) and rerun.",
        "Next: patchproof evaluate --repo . --test-command pytest",
      ].join("\n"),
    );
  });

  it("adds code, name, cause and an indented stack in debug mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.environment,
      title: "Test command could not be launched.",
      message: "pytest: not found",
      cause: new EnvironmentError("exit 127"),
    });
    error.stack = "UserFacingError: pytest: not found\nat fake:1:1";

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Test command could not be launched.",
        "pytest: not found",
        "Code: ENVIRONMENT_ERROR",
        "Name: UserFacingError",
        "Cause: exit 127",
        "Stack:",
        "  UserFacingError: pytest: not found",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("labels anything else as unexpected", () => {
    expect(renderCliError(new Error("boom"), { stream: nonTtyStream })).toBe(
      "Error: Unexpected error.\nboom",
    );
  });

  it("colors output only on a TTY", () => {
    const plain = renderCliError(buildConfigError(), { stream: nonTtyStream, useColor: true });
    const colored = renderCliError(buildConfigError(), { stream: { isTTY: true }, useColor: true });

    expect(plain).not.toContain("\x1b[");
    expect(colored.startsWith("\x1b[1m\x1b[31mError:\x1b[39m\x1b[22m")).toBe(true);
  });
});
