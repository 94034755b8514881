/**
 * Command Runner - Executes external tools for pipeline steps.
 *
 * Every collaborator of a deployment (git, the dependency tool, systemctl,
 * journalctl, the proxy binary) is invoked through this module as an opaque
 * process. Commands run without a shell, so arguments are never
 * re-interpreted.
 *
 * ## Behavior
 *
 * - Never throws on a non-zero exit; the caller decides what a failure means
 * - Streams stdout/stderr lines to the logger while the command runs,
 *   unless the invocation is `quiet`
 * - Captures combined output for failure diagnosis and for summaries
 * - Wraps the invocation in `sudo -u <user>` when `runAs` is set
 *
 * @module
 */

import { execa } from "execa";

// =============================================================================
// Types
// =============================================================================

/**
 * Logger interface for command execution.
 */
export interface CommandLogger {
  /** Log a line the command wrote to stdout */
  stdout?(line: string): void;

  /** Log a line the command wrote to stderr */
  stderr?(line: string): void;
}

/**
 * A single process invocation.
 */
export interface CommandInvocation {
  /** Executable name or path */
  readonly command: string;

  readonly args: readonly string[];

  /** Working directory for the process */
  readonly cwd: string;

  /** Account to run as through sudo */
  readonly runAs?: string;

  /** Capture output without streaming it to the logger */
  readonly quiet?: boolean;
}

/**
 * Result of a single command execution.
 */
export interface CommandResult {
  /** Printable command line that was executed */
  readonly commandLine: string;

  readonly success: boolean;

  /** Exit code (0 for success, 1 when the process never started) */
  readonly exitCode: number;

  readonly durationMs: number;

  /** Combined stdout + stderr */
  readonly output: string;
}

/**
 * Seam between pipeline steps and real processes.
 */
export interface CommandExecutor {
  run(invocation: CommandInvocation): Promise<CommandResult>;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Resolves the argv actually executed, applying the `runAs` wrapper.
 */
export function resolveArgv(invocation: CommandInvocation): [string, string[]] {
  if (invocation.runAs) {
    return ["sudo", ["-u", invocation.runAs, invocation.command, ...invocation.args]];
  }
  return [invocation.command, [...invocation.args]];
}

/**
 * Formats an invocation the way an operator would type it.
 */
export function formatCommandLine(invocation: CommandInvocation): string {
  const [file, args] = resolveArgv(invocation);
  return [file, ...args].map(quoteArg).join(" ");
}

function quoteArg(arg: string): string {
  if (arg.length > 0 && /^[\w@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

function forEachLine(chunk: Buffer | string, emit: (line: string) => void): void {
  for (const line of chunk.toString().split("\n")) {
    if (line.trim()) {
      emit(line);
    }
  }
}

// =============================================================================
// CommandRunner Class
// =============================================================================

/**
 * Runs commands with execa.
 *
 * @example
 * ```typescript
 * const runner = new CommandRunner({ stdout: (line) => ux.verbose(line) });
 *
 * const result = await runner.run({
 *   command: "git",
 *   args: ["pull", "origin", "main"],
 *   cwd: "/srv/web-app",
 *   runAs: "deploy",
 * });
 *
 * if (!result.success) {
 *   console.error(result.output);
 * }
 * ```
 */
export class CommandRunner implements CommandExecutor {
  constructor(private readonly logger: CommandLogger = {}) {}

  async run(invocation: CommandInvocation): Promise<CommandResult> {
    const [file, args] = resolveArgv(invocation);
    const commandLine = formatCommandLine(invocation);
    const startTime = Date.now();

    try {
      const subprocess = execa(file, args, {
        cwd: invocation.cwd,
        stdin: "ignore",
        stdout: "pipe",
        stderr: "pipe",
        all: true,
        // Non-zero exits are reported, not thrown
        reject: false,
      });

      const streams: CommandLogger = invocation.quiet ? {} : this.logger;
      const { stdout, stderr } = streams;
      if (stdout) {
        subprocess.stdout?.on("data", (chunk: Buffer) => forEachLine(chunk, stdout));
      }
      if (stderr) {
        subprocess.stderr?.on("data", (chunk: Buffer) => forEachLine(chunk, stderr));
      }

      const result = await subprocess;
      const durationMs = Date.now() - startTime;
      const exitCode = result.exitCode ?? (result.failed ? 1 : 0);

      const output = result.all ?? "";

      // A process that never spawned (ENOENT) has no output of its own
      const reason = result.failed ? (result.message ?? `exit code ${exitCode}`) : "";

      return {
        commandLine,
        success: !result.failed && exitCode === 0,
        exitCode,
        durationMs,
        output: output || reason,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      return {
        commandLine,
        success: false,
        exitCode: 1,
        durationMs: Date.now() - startTime,
        output: message,
      };
    }
  }
}
