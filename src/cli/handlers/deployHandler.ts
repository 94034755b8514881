/**
 * Handler for the `redeploy deploy` CLI command.
 *
 * Checks privileges, resolves the configuration and runs the deployment
 * pipeline. With `dryRun` it prints the planned commands instead and runs
 * nothing, which also means no privileges are needed.
 *
 * @module
 */

import { loadDeployConfig, type ConfigOverrides, type DeployConfig } from "../../core/config/DeployConfigLoader.js";
import { DeployError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";
import type { CommandExecutor } from "../../core/exec/CommandRunner.js";
import type { ContextualLogger } from "../../core/logging/ContextualLogger.js";
import { createExecutionContext } from "../../core/logging/ExecutionContext.js";
import { Step } from "../../core/logging/Step.js";
import { buildDeploySteps } from "../../core/pipeline/deploySteps.js";
import { PipelineRunner } from "../../core/pipeline/PipelineRunner.js";
import type { Criticality, PipelineResult } from "../../core/pipeline/types.js";
import type { SystemProbe } from "../../core/system/SystemProbe.js";
import type { CliSpinner } from "../ux/CliSpinner.js";
import type { CliUx } from "../ux/CliUx.js";

// =============================================================================
// Types
// =============================================================================

export interface DeployRequest {
  /** Absolute application directory */
  readonly appDir: string;

  readonly configPath?: string;

  readonly overrides?: ConfigOverrides;

  /** Print the plan without running anything */
  readonly dryRun?: boolean;
}

/**
 * Dependencies for the deploy handler, injected for testability.
 */
export interface DeployDependencies {
  readonly executor: CommandExecutor;
  readonly probe: SystemProbe;
  readonly ux: CliUx;
  readonly spinner: CliSpinner;

  /** Trace logger (a NullSink logger when tracing is off) */
  readonly logger: ContextualLogger;

  /** Clock for step durations */
  readonly now?: () => number;
}

export interface PlannedStep {
  readonly name: string;
  readonly criticality: Criticality;
  readonly commands: readonly string[];
}

export type DeployReport =
  | { readonly kind: "plan"; readonly config: DeployConfig; readonly plan: readonly PlannedStep[] }
  | {
      readonly kind: "deployed";
      readonly config: DeployConfig;
      readonly result: Extract<PipelineResult, { status: "success" }>;
      /** Wall time from the privilege check to the end of the summary */
      readonly elapsedMs: number;
    };

// =============================================================================
// Handler
// =============================================================================

/**
 * Runs a deployment, or plans one when `dryRun` is set.
 *
 * @throws DeployError PERMISSION_DENIED before anything runs when not root,
 *   CONFIG_* when the configuration cannot be resolved, and STEP_FAILED
 *   with the failing step's name when a critical step fails
 */
export async function handleDeploy(request: DeployRequest, deps: DeployDependencies): Promise<DeployReport> {
  const { appDir, dryRun = false } = request;
  const { probe, ux, logger } = deps;
  const now = deps.now ?? Date.now;

  const execution = createExecutionContext({ appDir, startedAt: new Date(now()) });
  const trace = logger.withContext({ correlationId: execution.correlationId, step: Step.PREFLIGHT });
  ux.debug(`Correlation ID: ${execution.correlationId}`);

  if (!dryRun && !probe.isPrivileged()) {
    const error = new DeployError(
      "redeploy must run as root",
      ErrorCode.PERMISSION_DENIED,
      { appDir },
      "Re-run with sudo, e.g. `sudo redeploy deploy`.",
    );
    trace.error("Privilege check failed", { error });
    throw error;
  }

  const config = await loadDeployConfig({
    appDir,
    configPath: request.configPath,
    overrides: request.overrides,
  });
  trace.info("Configuration resolved", {
    configPath: config.configPath,
    service: config.service,
    dryRun,
  });

  const steps = buildDeploySteps(config);

  ux.banner(`redeploy ${config.service}${dryRun ? " (dry run)" : ""}`);
  ux.detail(`Working directory: ${appDir}`);
  if (config.configPath) {
    ux.detail(`Config: ${config.configPath}`);
  }

  if (dryRun) {
    const plan = steps.map((step) => ({
      name: step.name,
      criticality: step.criticality,
      commands: step.describe(config),
    }));
    for (const line of formatPlan(plan)) {
      ux.detail(line);
    }
    return { kind: "plan", config, plan };
  }

  const runner = new PipelineRunner({ logger, now });
  const result = await runner.run(steps, {
    execution,
    config,
    executor: deps.executor,
    probe,
    ux,
    spinner: deps.spinner,
  });

  if (result.status === "failed") {
    throw result.error;
  }

  const elapsedMs = now() - execution.startedAt.getTime();
  ux.newline();
  ux.info(`Finished in ${(elapsedMs / 1000).toFixed(1)}s`);

  return { kind: "deployed", config, result, elapsedMs };
}

// =============================================================================
// Output Formatting
// =============================================================================

/**
 * Formats a dry-run plan, one block per step.
 */
export function formatPlan(plan: readonly PlannedStep[]): string[] {
  const lines: string[] = [""];

  plan.forEach((step, index) => {
    lines.push(`${index + 1}. ${step.name} [${step.criticality}]`);
    for (const command of step.commands) {
      lines.push(`     $ ${command}`);
    }
  });

  return lines;
}
