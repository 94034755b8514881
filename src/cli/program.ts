/**
 * The redeploy command tree and its error boundary.
 *
 * @module
 */

import { Command } from "commander";
import { DeployError } from "../core/errors/errors.js";
import { getExitCode } from "../core/errors/ErrorCode.js";
import { buildDeployCommand } from "./commands/deploy.js";
import { buildDoctorCommand } from "./commands/doctor.js";
import type { GlobalOptions } from "./commands/options.js";
import { ErrorPresenter } from "./errors/ErrorPresenter.js";
import { createCliUx, parseLogLevel, setDefaultCliUx } from "./ux/CliUx.js";
import { CLI_VERSION } from "./version.js";

export function buildProgram(): Command {
  const program = new Command()
    .name("redeploy")
    .description("Fail-fast update deployments for a systemd service behind a reverse proxy")
    .version(CLI_VERSION)
    .option("--verbose", "Show command output as it runs", false)
    .option("--debug", "Show debug output and stack traces", false)
    .option("--silent", "Suppress all output except errors", false)
    .option("--trace", "Write JSON step trace events to stderr", false);

  // Set up CliUx before any command runs
  program.hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    setDefaultCliUx(createCliUx({ level: parseLogLevel(opts) }));
  });

  program.addCommand(buildDeployCommand());
  program.addCommand(buildDoctorCommand());

  return program;
}

/**
 * Parses `argv`, runs the selected command and returns the exit status.
 * Errors are presented on stderr, never rethrown.
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  const program = buildProgram();

  try {
    await program.parseAsync([...argv]);
    return typeof process.exitCode === "number" ? process.exitCode : 0;
  } catch (err) {
    new ErrorPresenter({ debug: program.opts<GlobalOptions>().debug }).present(err);
    return err instanceof DeployError ? getExitCode(err.code) : 1;
  }
}
