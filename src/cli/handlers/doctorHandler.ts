/**
 * Handler for the `redeploy doctor` CLI command.
 *
 * Read-only preflight for a host before the first deployment:
 * - Privileges
 * - Configuration
 * - Required tools (git, sudo, systemctl)
 * - Optional tools (journalctl, dependency tool, proxy binary)
 * - Application directory is a git checkout
 *
 * All checks run and are reported, even when earlier ones fail.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { loadDeployConfig, type ConfigOverrides, type DeployConfig } from "../../core/config/DeployConfigLoader.js";
import { DeployError } from "../../core/errors/errors.js";
import type { SystemProbe } from "../../core/system/SystemProbe.js";

// =============================================================================
// Types
// =============================================================================

export type DoctorStatus = "OK" | "WARN" | "ERROR";

export interface DoctorCheckResult {
  readonly name: string;
  readonly status: DoctorStatus;
  readonly details?: string;

  /** Actionable fix suggestion (for WARN/ERROR) */
  readonly fix?: string;
}

export interface DoctorResult {
  readonly checks: DoctorCheckResult[];

  /** True if any check has ERROR status */
  readonly hasErrors: boolean;
}

export interface DoctorRequest {
  readonly appDir: string;
  readonly configPath?: string;
  readonly overrides?: ConfigOverrides;
}

/**
 * Dependencies for the doctor handler, injected for testability.
 */
export interface DoctorDependencies {
  readonly probe: SystemProbe;

  /** Resolves when the path exists */
  readonly pathExists: (target: string) => Promise<boolean>;
}

// =============================================================================
// Check Implementations
// =============================================================================

function checkPrivileges(probe: SystemProbe): DoctorCheckResult {
  if (probe.isPrivileged()) {
    return { name: "Privileges", status: "OK", details: "running as root" };
  }
  return {
    name: "Privileges",
    status: "ERROR",
    details: "not running as root",
    fix: "Run deployments with sudo.",
  };
}

async function checkConfig(
  request: DoctorRequest,
): Promise<{ check: DoctorCheckResult; config?: DeployConfig }> {
  try {
    const config = await loadDeployConfig(request);
    return {
      config,
      check: {
        name: "Configuration",
        status: "OK",
        details: `${config.configPath ?? "command-line values"} (service ${config.service}, user ${config.serviceUser})`,
      },
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      check: {
        name: "Configuration",
        status: "ERROR",
        details: message,
        fix: error instanceof DeployError ? error.hint : undefined,
      },
    };
  }
}

async function checkTool(
  probe: SystemProbe,
  tool: string,
  missingStatus: DoctorStatus,
  fix: string,
): Promise<DoctorCheckResult> {
  try {
    if (await probe.hasCommand(tool)) {
      return { name: tool, status: "OK", details: "found" };
    }
    return { name: tool, status: missingStatus, details: "not found", fix };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { name: tool, status: missingStatus, details: `check failed: ${message}`, fix };
  }
}

async function checkGitCheckout(
  appDir: string,
  pathExists: (target: string) => Promise<boolean>,
): Promise<DoctorCheckResult> {
  if (await pathExists(path.join(appDir, ".git"))) {
    return { name: "Git checkout", status: "OK", details: appDir };
  }
  return {
    name: "Git checkout",
    status: "ERROR",
    details: `${appDir} is not a git working tree`,
    fix: "Point --dir at the cloned application repository.",
  };
}

// =============================================================================
// Handler Implementation
// =============================================================================

/**
 * Runs all diagnostic checks and returns the results.
 */
export async function handleDoctor(request: DoctorRequest, deps: DoctorDependencies): Promise<DoctorResult> {
  const { probe, pathExists } = deps;
  const checks: DoctorCheckResult[] = [];

  checks.push(checkPrivileges(probe));

  const { check: configCheck, config } = await checkConfig(request);
  checks.push(configCheck);

  checks.push(await checkTool(probe, "git", "ERROR", "Install git."));
  checks.push(await checkTool(probe, "sudo", "ERROR", "Install sudo; steps run as the service account through it."));
  checks.push(await checkTool(probe, "systemctl", "ERROR", "redeploy manages services through systemd."));
  checks.push(
    await checkTool(probe, "journalctl", "WARN", "Without journalctl the summary cannot show recent logs."),
  );

  if (config && config.dependencies !== false) {
    const { tool } = config.dependencies;
    checks.push(
      await checkTool(probe, tool, "WARN", `Install ${tool}, or set dependencies: false to skip the sync step.`),
    );
  }

  if (config && config.proxy !== false) {
    const binary = config.proxy.test[0];
    checks.push(
      await checkTool(probe, binary, "WARN", `Install ${binary}, or set proxy: false to skip the reload step.`),
    );
  }

  checks.push(await checkGitCheckout(request.appDir, pathExists));

  return {
    checks,
    hasErrors: checks.some((check) => check.status === "ERROR"),
  };
}

/**
 * Filesystem-backed `pathExists` for the CLI.
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

// =============================================================================
// Output Formatting
// =============================================================================

export function formatDoctorReport(result: DoctorResult): string[] {
  const lines: string[] = [];

  lines.push("redeploy doctor");
  lines.push("---------------");

  for (const check of result.checks) {
    const statusTag = `[${check.status}]`.padEnd(7);
    lines.push(`${statusTag} ${check.name}: ${check.details ?? ""}`);

    if (check.fix && check.status !== "OK") {
      lines.push(`        Fix: ${check.fix}`);
    }
  }

  return lines;
}
