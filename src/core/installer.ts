import { execaCommand } from "execa";

import { RemediationFailure } from "./errors.js";
import { truncateText } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type PackageInstaller = {
  install: (packageName: string, moduleName: string) => Promise<void>;
  // Present when the installer reinstalls: uninstall first, then install.
  uninstall?: (packageName: string, moduleName: string) => Promise<void>;
};

export type CommandInstallerOptions = {
  installCommand: string;
  uninstallCommand?: string;
  cwd: string;
  timeoutSeconds: number;
  env?: NodeJS.ProcessEnv;
};

export const PACKAGE_PLACEHOLDER = "{package}";

const OUTPUT_TAIL_LIMIT = 2_000;

// =============================================================================
// PUBLIC API
// =============================================================================

export function createCommandInstaller(options: CommandInstallerOptions): PackageInstaller {
  const installer: PackageInstaller = {
    install: (packageName, moduleName) =>
      runInstallerCommand(options.installCommand, packageName, moduleName, options),
  };

  const uninstallCommand = options.uninstallCommand;
  if (uninstallCommand) {
    installer.uninstall = (packageName, moduleName) =>
      runInstallerCommand(uninstallCommand, packageName, moduleName, options);
  }

  return installer;
}

export function renderInstallerCommand(template: string, packageName: string): string {
  return template.split(PACKAGE_PLACEHOLDER).join(packageName);
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runInstallerCommand(
  template: string,
  packageName: string,
  moduleName: string,
  options: CommandInstallerOptions,
): Promise<void> {
  const command = renderInstallerCommand(template, packageName);
  const res = await execaCommand(command, {
    cwd: options.cwd,
    shell: true,
    reject: false,
    timeout: options.timeoutSeconds * 1000,
    stdio: "pipe",
    env: options.env ?? process.env,
  });

  if (res.timedOut) {
    throw new RemediationFailure(
      `"${command}" timed out after ${options.timeoutSeconds}s`,
      moduleName,
    );
  }

  const exitCode = res.exitCode ?? -1;
  if (exitCode !== 0) {
    const output = `${res.stdout}\n${res.stderr}`.trim();
    const tail = truncateText(output.slice(-OUTPUT_TAIL_LIMIT), OUTPUT_TAIL_LIMIT).text;
    throw new RemediationFailure(`"${command}" exited with ${exitCode}: ${tail}`, moduleName);
  }
}
