/**
 * Host queries the orchestrator needs before and between steps.
 *
 * @module
 */

import { setTimeout as delay } from "node:timers/promises";
import { execa } from "execa";

/**
 * Read-only view of the host, injected so the pipeline can be exercised
 * without root or real binaries.
 */
export interface SystemProbe {
  /** True when running with an effective uid of 0 */
  isPrivileged(): boolean;

  /** True when `name` resolves to an executable on the PATH */
  hasCommand(name: string): Promise<boolean>;

  sleep(ms: number): Promise<void>;
}

/**
 * Probe backed by the real process and shell.
 */
export class HostSystemProbe implements SystemProbe {
  isPrivileged(): boolean {
    // No geteuid on Windows; there is no root to be
    return typeof process.geteuid === "function" && process.geteuid() === 0;
  }

  async hasCommand(name: string): Promise<boolean> {
    // The name is passed as $1, never spliced into the script
    const result = await execa("sh", ["-c", 'command -v "$1"', "sh", name], {
      stdin: "ignore",
      reject: false,
    });
    return result.exitCode === 0;
  }

  async sleep(ms: number): Promise<void> {
    await delay(ms);
  }
}
