export class PatchproofError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "PatchproofError";
  }
}

export class ConfigError extends PatchproofError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class GitError extends PatchproofError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

export class PatchError extends PatchproofError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "PatchError";
  }
}

// The test command ran longer than its budget. Terminal for the phase, never retried.
export class ExecutionTimeout extends PatchproofError {
  constructor(
    message: string,
    public readonly timeoutSeconds: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ExecutionTimeout";
  }
}

// The test command could not be launched at all. Fatal for the whole evaluation.
export class EnvironmentError extends PatchproofError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "EnvironmentError";
  }
}

export class RemediationFailure extends PatchproofError {
  constructor(
    message: string,
    public readonly moduleName: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "RemediationFailure";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  environment: "ENVIRONMENT_ERROR",
  git: "GIT_ERROR",
  patch: "PATCH_ERROR",
  artifacts: "ARTIFACTS_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends PatchproofError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}
