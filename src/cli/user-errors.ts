import {
  EnvironmentError,
  GitError,
  PatchError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";

export function toUserFacingError(error: unknown): unknown {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof EnvironmentError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.environment,
      title: "Test command could not be launched.",
      message: error.message,
      hint: "Check that --repo exists and that the test command is installed in this environment.",
      cause: error,
    });
  }

  if (error instanceof PatchError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.patch,
      title: "Patch step failed.",
      message: error.message,
      hint: "The pre-phase result was saved; fix the patch and rerun, or apply it yourself and use `patchproof validate --phase post`.",
      cause: error,
    });
  }

  if (error instanceof GitError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.git,
      title: "Git command failed.",
      message: error.message,
      cause: error,
    });
  }

  return error;
}
