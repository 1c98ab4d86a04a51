import { formatErrorMessage } from "./error-format.js";
import { RemediationFailure } from "./errors.js";
import type { PackageInstaller } from "./installer.js";
import { silentLogger, type EventLogger, type Phase } from "./logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type RemediationFailureRecord = {
  module: string;
  packageName: string;
  reason: string;
};

export type RemediationReport = {
  // Module names whose package installed successfully, in request order.
  installed: string[];
  failures: RemediationFailureRecord[];
};

export type RemediationContext = {
  phase?: Phase;
  attempt?: number;
};

export type RemediationEngineOptions = {
  installer: PackageInstaller;
  packageMap?: Record<string, string>;
  logger?: EventLogger;
};

// Distribution names plus an optional extras suffix, e.g. "requests[socks]".
const PACKAGE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*(?:\[[A-Za-z0-9._,-]+\])?$/;

// =============================================================================
// ENGINE
// =============================================================================

export class RemediationEngine {
  private readonly installer: PackageInstaller;
  private readonly packageMap: Record<string, string>;
  private readonly logger: EventLogger;

  constructor(options: RemediationEngineOptions) {
    this.installer = options.installer;
    this.packageMap = options.packageMap ?? {};
    this.logger = options.logger ?? silentLogger;
  }

  resolvePackageName(moduleName: string): string {
    const mapped = this.packageMap[moduleName];
    if (mapped !== undefined) return mapped;

    // Importing "a.b.c" needs the distribution that provides "a".
    return moduleName.split(".")[0] ?? moduleName;
  }

  async remediate(
    moduleNames: readonly string[],
    context: RemediationContext = {},
  ): Promise<RemediationReport> {
    const report: RemediationReport = { installed: [], failures: [] };
    const seen = new Set<string>();

    for (const moduleName of moduleNames) {
      if (seen.has(moduleName)) continue;
      seen.add(moduleName);

      const packageName = this.resolvePackageName(moduleName);
      try {
        await this.reinstall(moduleName, packageName, context);
        report.installed.push(moduleName);
        this.logger.log({
          type: "remediation.install",
          phase: context.phase,
          attempt: context.attempt,
          payload: { module: moduleName, package: packageName, status: "installed" },
        });
      } catch (err) {
        if (!(err instanceof RemediationFailure)) throw err;

        report.failures.push({ module: moduleName, packageName, reason: err.message });
        this.logger.log({
          type: "remediation.install",
          phase: context.phase,
          attempt: context.attempt,
          payload: {
            module: moduleName,
            package: packageName,
            status: "failed",
            message: err.message,
          },
        });
      }
    }

    return report;
  }

  private async reinstall(
    moduleName: string,
    packageName: string,
    context: RemediationContext,
  ): Promise<void> {
    if (!PACKAGE_NAME_PATTERN.test(packageName)) {
      throw new RemediationFailure(`Refusing to install invalid package name "${packageName}"`, moduleName);
    }

    if (this.installer.uninstall) {
      try {
        await this.installer.uninstall(packageName, moduleName);
      } catch (err) {
        if (!(err instanceof RemediationFailure)) throw err;
        // A package that was never installed cannot be removed; the install decides.
        this.logger.log({
          type: "remediation.uninstall.skip",
          phase: context.phase,
          attempt: context.attempt,
          payload: { module: moduleName, package: packageName, message: formatErrorMessage(err) },
        });
      }
    }

    await this.installer.install(packageName, moduleName);
  }
}
