import { InvalidArgumentError, type Command } from "commander";

import { resolveProjectConfig } from "../core/config-loader.js";
import type { ProjectConfig } from "../core/config.js";

// Options shared by every command that needs a project config.
export type ConfigFlags = {
  config?: string;
  repo?: string;
  testCommand?: string;
  timeout?: number;
  maxAttempts?: number;
  artifactsDir?: string;
  installCommand?: string;
  uninstallCommand?: string;
};

export function parseIntFlag(min: number): (value: string) => number {
  return (value) => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return parsed;
  };
}

export function addConfigFlags(command: Command): Command {
  return command
    .option("--config <path>", "YAML config file")
    .option("--repo <path>", "Repository to test (repo_path)")
    .option("--test-command <cmd>", "Test command (test_command)")
    .option("--timeout <seconds>", "Per-run timeout in seconds (timeout_seconds)", parseIntFlag(1))
    .option("--max-attempts <n>", "Remediation retry bound (remediation.max_attempts)", parseIntFlag(0))
    .option("--artifacts-dir <dir>", "Where logs and results are written (artifacts_dir)")
    .option("--install-command <cmd>", "Install template with {package} (remediation.install_command)")
    .option(
      "--uninstall-command <cmd>",
      "Uninstall template with {package}; enables reinstall (remediation.uninstall_command)",
    );
}

export function resolveConfigFromFlags(flags: ConfigFlags): ProjectConfig {
  return resolveProjectConfig({
    configPath: flags.config,
    overrides: {
      repo_path: flags.repo,
      test_command: flags.testCommand,
      timeout_seconds: flags.timeout,
      artifacts_dir: flags.artifactsDir,
      max_attempts: flags.maxAttempts,
      install_command: flags.installCommand,
      uninstall_command: flags.uninstallCommand,
    },
  });
}
