import { afterEach, beforeEach } from "vitest";

// =============================================================================
// ENVIRONMENT ISOLATION
// =============================================================================

let savedEnv: NodeJS.ProcessEnv = {};

beforeEach(() => {
  savedEnv = { ...process.env };
  // CLI error output is asserted as plain text.
  process.env.NO_COLOR = "1";
});

afterEach(() => {
  for (const key of Object.keys(process.env)) {
    if (!(key in savedEnv)) {
      delete process.env[key];
    }
  }
  Object.assign(process.env, savedEnv);
});
