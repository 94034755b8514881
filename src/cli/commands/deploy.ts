/**
 * Deploy CLI command.
 *
 * Usage:
 *   redeploy deploy [--dir <path>] [--config <file>] [--service <unit>] [--user <account>] [--dry-run]
 *
 * Examples:
 *   sudo redeploy deploy --dir /srv/web-app
 *   sudo redeploy deploy --service web-app --user deploy
 *   redeploy deploy --dry-run
 *
 * @module
 */

import { Command } from "commander";
import { CommandRunner } from "../../core/exec/CommandRunner.js";
import { createLogger, NullSink, StderrJsonSink } from "../../core/logging/ContextualLogger.js";
import { HostSystemProbe } from "../../core/system/SystemProbe.js";
import { handleDeploy } from "../handlers/deployHandler.js";
import { createCliSpinner } from "../ux/CliSpinner.js";
import { getCliUx } from "../ux/CliUx.js";
import { resolveAppDir, toOverrides, type GlobalOptions, type TargetOptions } from "./options.js";

type DeployOptions = TargetOptions & {
  readonly dryRun: boolean;
};

/**
 * Builds the `deploy` command.
 */
export function buildDeployCommand(): Command {
  return new Command("deploy")
    .description("Pull, sync, restart and verify the service, then reload the reverse proxy")
    .option("--dir <path>", "Application directory (git checkout)", ".")
    .option("--config <file>", "Config file (default: redeploy.yaml in --dir)")
    .option("--service <unit>", "systemd unit to restart")
    .option("--user <account>", "Service account that owns the checkout")
    .option("--dry-run", "Print the planned commands without running them", false)
    .action(async (_options: DeployOptions, command: Command) => {
      const options = command.optsWithGlobals<DeployOptions & GlobalOptions>();
      const ux = getCliUx();

      // Command output is streamed at verbose level
      const executor = new CommandRunner({
        stdout: (line) => ux.verbose(line),
        stderr: (line) => ux.verbose(line),
      });

      const logger = createLogger({
        sink: options.trace ? new StderrJsonSink() : new NullSink(),
        minLevel: options.debug ? "debug" : "info",
        debug: options.debug,
      });

      const report = await handleDeploy(
        {
          appDir: resolveAppDir(options),
          configPath: options.config,
          overrides: toOverrides(options),
          dryRun: options.dryRun,
        },
        {
          executor,
          probe: new HostSystemProbe(),
          ux,
          spinner: createCliSpinner({ ux }),
          logger,
        },
      );

      if (report.kind === "deployed" && report.result.warnings > 0) {
        ux.newline();
        ux.warn(
          `Deployed with ${report.result.warnings} warning${report.result.warnings === 1 ? "" : "s"}`,
        );
      }
    });
}
