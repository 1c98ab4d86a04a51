import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import type { SignatureOverrides } from "./signatures.js";

// =============================================================================
// TYPES
// =============================================================================

// Values supplied on the command line. They win over the config file.
export type ConfigOverrides = {
  repo_path?: string;
  test_command?: string;
  timeout_seconds?: number;
  artifacts_dir?: string;
  max_attempts?: number;
  install_command?: string;
  uninstall_command?: string;
};

export type ResolveProjectConfigOptions = {
  configPath?: string;
  overrides?: ConfigOverrides;
  // Base for relative paths given on the command line.
  cwd?: string;
};

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// OVERRIDES
// =============================================================================

function applyOverrides(doc: unknown, overrides: ConfigOverrides): unknown {
  const base = doc === null || doc === undefined ? {} : doc;
  if (!isRecord(base)) {
    return base;
  }

  const config: Record<string, unknown> = { ...base };
  const { max_attempts, install_command, uninstall_command, ...topLevel } = overrides;

  for (const [key, value] of Object.entries(topLevel)) {
    if (value !== undefined) config[key] = value;
  }

  const remediationOverrides = { max_attempts, install_command, uninstall_command };
  const hasRemediation = Object.values(remediationOverrides).some((value) => value !== undefined);
  if (hasRemediation) {
    const remediation: Record<string, unknown> = isRecord(config.remediation)
      ? { ...config.remediation }
      : {};
    for (const [key, value] of Object.entries(remediationOverrides)) {
      if (value !== undefined) remediation[key] = value;
    }
    config.remediation = remediation;
  }

  return config;
}

function parseConfigDocument(
  doc: unknown,
  overrides: ConfigOverrides,
  source: string,
  baseDir: string,
): ProjectConfig {
  const parsed = ProjectConfigSchema.safeParse(applyOverrides(doc, overrides));
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new ConfigError(`Invalid configuration from ${source}:\n${details}`, parsed.error);
  }

  const cfg = parsed.data;
  return {
    ...cfg,
    repo_path: path.resolve(baseDir, cfg.repo_path),
    artifacts_dir: path.resolve(baseDir, cfg.artifacts_dir),
  };
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = "Check the --config path, or pass --repo and --test-command instead.";
const INVALID_CONFIG_HINT = "Fix the config file (or the flags) and rerun.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException) || !error.mark) {
    return null;
  }
  return { line: error.mark.line + 1, column: error.mark.column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config missing.",
    message: `Config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(source: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config invalid.",
    message: `Configuration from ${source} is invalid.`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown, source: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(source, error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadProjectConfig(configPath: string, overrides: ConfigOverrides = {}): ProjectConfig {
  return resolveProjectConfig({ configPath, overrides });
}

export function resolveProjectConfig(options: ResolveProjectConfigOptions = {}): ProjectConfig {
  const overrides = options.overrides ?? {};
  const cwd = path.resolve(options.cwd ?? process.cwd());

  if (!options.configPath) {
    try {
      return parseConfigDocument({}, overrides, "command-line flags", cwd);
    } catch (err) {
      throwNormalizedConfigError(err, "command-line flags");
    }
  }

  const absolutePath = path.resolve(cwd, options.configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`,
        err,
      );
    }

    const expanded = expandEnv(doc, { file: absolutePath, trail: [] });
    const config = parseConfigDocument(expanded, overrides, absolutePath, path.dirname(absolutePath));

    // Paths from flags are relative to where the command runs, not to the file.
    return {
      ...config,
      repo_path: overrides.repo_path ? path.resolve(cwd, overrides.repo_path) : config.repo_path,
      artifacts_dir: overrides.artifacts_dir
        ? path.resolve(cwd, overrides.artifacts_dir)
        : config.artifacts_dir,
    };
  } catch (err) {
    throwNormalizedConfigError(err, absolutePath);
  }
}

export function signatureOverridesFromConfig(config: ProjectConfig): SignatureOverrides {
  const { signatures } = config;
  return {
    moduleMissing: signatures.module_missing,
    failedLine: signatures.failed_line,
    errorLine: signatures.error_line,
    passedLine: signatures.passed_line,
    internalError: signatures.internal_error,
    warning: signatures.warning,
    summary: signatures.summary,
  };
}
