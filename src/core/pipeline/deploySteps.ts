/**
 * The update-deployment steps, in the order they run:
 *
 * 1. Fetch latest source (critical, as the service account)
 * 2. Sync dependencies (critical when the tool exists, skipped when absent)
 * 3. Restart service (critical)
 * 4. Verify service health after a settle delay (critical)
 * 5. Reload reverse proxy (advisory)
 * 6. Summary with recent service logs (advisory)
 *
 * @module
 */

import { hostname } from "node:os";
import type { DeployConfig, DependenciesConfig, ProxyConfig } from "../config/DeployConfigLoader.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { formatCommandLine, type CommandInvocation, type CommandResult } from "../exec/CommandRunner.js";
import { Step } from "../logging/Step.js";
import { failed, ok, skipped, type PipelineStep, type StepContext, type StepFailed } from "./types.js";

// =============================================================================
// Helpers
// =============================================================================

function invocation(
  ctx: StepContext,
  argv: readonly string[],
  options: { runAs?: string; quiet?: boolean } = {},
): CommandInvocation {
  const [command, ...args] = argv;
  return { command, args, cwd: ctx.execution.appDir, ...options };
}

function describeArgv(argv: readonly string[], runAs?: string): string {
  const [command, ...args] = argv;
  return formatCommandLine({ command, args, cwd: ".", runAs });
}

function commandFailure(message: string, result: CommandResult, hint?: string): StepFailed {
  return failed(message, {
    command: result.commandLine,
    exitCode: result.exitCode,
    output: result.output,
    hint,
  });
}

function journalHint(config: DeployConfig): string {
  return `Check logs with: journalctl -u ${config.service} -n ${config.healthCheck.journalHintLines}`;
}

function gitPullArgv(config: DeployConfig): string[] {
  return ["git", "pull", config.source.remote, config.source.branch];
}

function journalArgv(config: DeployConfig): string[] {
  return ["journalctl", "-u", config.service, "-n", String(config.summary.logLines), "--no-pager"];
}

// =============================================================================
// Steps
// =============================================================================

export const fetchSourceStep: PipelineStep = {
  id: Step.SOURCE_FETCH,
  name: "Fetch latest source",
  criticality: "critical",

  describe: (config) => [describeArgv(gitPullArgv(config), config.serviceUser)],

  async run(ctx) {
    const { config, executor } = ctx;
    const result = await executor.run(invocation(ctx, gitPullArgv(config), { runAs: config.serviceUser }));

    if (!result.success) {
      return commandFailure("Failed to pull source", result);
    }
    return ok(`Source updated from ${config.source.remote}/${config.source.branch}`);
  },
};

export function syncDependenciesStep(deps: DependenciesConfig): PipelineStep {
  const argv = [deps.tool, ...deps.args];

  return {
    id: Step.DEPENDENCIES_SYNC,
    name: "Sync dependencies",
    criticality: "critical",

    describe: (config) => [`${describeArgv(argv, config.serviceUser)}  (skipped if ${deps.tool} is not installed)`],

    async run(ctx) {
      const { config, executor, probe } = ctx;

      if (!(await probe.hasCommand(deps.tool))) {
        return skipped(`${deps.tool} not found, skipping dependency sync`, ErrorCode.TOOL_NOT_FOUND);
      }

      const result = await executor.run(invocation(ctx, argv, { runAs: config.serviceUser }));
      if (!result.success) {
        return commandFailure("Failed to sync dependencies", result);
      }
      return ok("Dependencies synced");
    },
  };
}

export const restartServiceStep: PipelineStep = {
  id: Step.SERVICE_RESTART,
  name: "Restart service",
  criticality: "critical",

  describe: (config) => [describeArgv(["systemctl", "restart", config.service])],

  async run(ctx) {
    const { config, executor } = ctx;
    const result = await executor.run(invocation(ctx, ["systemctl", "restart", config.service]));

    if (!result.success) {
      return commandFailure("Failed to restart service", result, journalHint(config));
    }
    return ok(`Service ${config.service} restarted`);
  },
};

export const verifyHealthStep: PipelineStep = {
  id: Step.SERVICE_HEALTH,
  name: "Verify service health",
  criticality: "critical",

  describe: (config) => [
    `wait ${config.healthCheck.settleDelayMs}ms`,
    describeArgv(["systemctl", "is-active", "--quiet", config.service]),
  ],

  async run(ctx) {
    const { config, executor, probe, spinner } = ctx;
    const delayMs = config.healthCheck.settleDelayMs;

    spinner.start(`Waiting ${delayMs}ms for ${config.service} to settle`);
    try {
      await probe.sleep(delayMs);
    } finally {
      spinner.stop();
    }

    const result = await executor.run(
      invocation(ctx, ["systemctl", "is-active", "--quiet", config.service]),
    );
    if (!result.success) {
      return commandFailure(`Service ${config.service} failed to start`, result, journalHint(config));
    }
    return ok(`Service ${config.service} is running`);
  },
};

export function reloadProxyStep(proxy: ProxyConfig): PipelineStep {
  return {
    id: Step.PROXY_RELOAD,
    name: "Reload reverse proxy",
    criticality: "advisory",

    describe: () => [describeArgv(proxy.test), describeArgv(proxy.reload)],

    async run(ctx) {
      const { executor } = ctx;

      // Only reload a configuration that passed its own test
      const test = await executor.run(invocation(ctx, proxy.test));
      if (!test.success) {
        return commandFailure("Proxy config test failed, but service is running", test);
      }

      const reload = await executor.run(invocation(ctx, proxy.reload));
      if (!reload.success) {
        return commandFailure("Proxy reload failed, but service is running", reload);
      }
      return ok("Proxy reloaded");
    },
  };
}

export const summaryStep: PipelineStep = {
  id: Step.SUMMARY,
  name: "Summary",
  criticality: "advisory",

  describe: (config) => [describeArgv(journalArgv(config))],

  async run(ctx) {
    const { config, executor, ux } = ctx;

    ux.header("Update deployment complete!");
    ux.detail(`Changes to ${config.service} have been deployed.`);
    ux.detail("The application should be reachable at:");
    ux.detail(config.summary.publicUrl ?? `http://${hostname()}/`);
    ux.newline();

    // Printed below, so not streamed as well
    const result = await executor.run(invocation(ctx, journalArgv(config), { quiet: true }));
    if (!result.success) {
      return commandFailure("Could not read recent service logs", result);
    }

    ux.info(`Recent logs (last ${config.summary.logLines} lines):`);
    for (const line of result.output.trimEnd().split("\n")) {
      if (line) ux.detail(line);
    }
    return ok();
  },
};

// =============================================================================
// Assembly
// =============================================================================

/**
 * Builds the ordered step list for a configuration.
 *
 * Dependency sync and proxy reload are left out when disabled in config.
 */
export function buildDeploySteps(config: DeployConfig): PipelineStep[] {
  const steps: PipelineStep[] = [fetchSourceStep];

  if (config.dependencies !== false) {
    steps.push(syncDependenciesStep(config.dependencies));
  }

  steps.push(restartServiceStep, verifyHealthStep);

  if (config.proxy !== false) {
    steps.push(reloadProxyStep(config.proxy));
  }

  steps.push(summaryStep);
  return steps;
}
