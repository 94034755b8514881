/**
 * Doctor CLI command: preflight checks for a deployment host.
 *
 * @module
 */

import { Command } from "commander";
import { HostSystemProbe } from "../../core/system/SystemProbe.js";
import { formatDoctorReport, handleDoctor, pathExists } from "../handlers/doctorHandler.js";
import { getCliUx } from "../ux/CliUx.js";
import { resolveAppDir, toOverrides, type TargetOptions } from "./options.js";

/**
 * Builds the `doctor` command.
 */
export function buildDoctorCommand(): Command {
  return new Command("doctor")
    .description("Check that this host can run deployments")
    .option("--dir <path>", "Application directory (git checkout)", ".")
    .option("--config <file>", "Config file (default: redeploy.yaml in --dir)")
    .option("--service <unit>", "systemd unit to restart")
    .option("--user <account>", "Service account that owns the checkout")
    .action(async (options: TargetOptions) => {
      const ux = getCliUx();

      try {
        const result = await handleDoctor(
          {
            appDir: resolveAppDir(options),
            configPath: options.config,
            overrides: toOverrides(options),
          },
          { probe: new HostSystemProbe(), pathExists },
        );

        for (const line of formatDoctorReport(result)) {
          process.stdout.write(line + "\n");
        }

        if (result.hasErrors) {
          process.exitCode = 1;
        }
      } catch (err) {
        // Doctor reports, it does not crash
        const message = err instanceof Error ? err.message : String(err);
        ux.error(`Error running diagnostics: ${message}`);
        process.exitCode = 1;
      }
    });
}
