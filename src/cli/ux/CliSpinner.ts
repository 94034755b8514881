/**
 * Spinner shown while the pipeline waits on something with no output,
 * such as the post-restart settle delay.
 *
 * In TTY mode it animates with @clack/prompts; otherwise (CI, pipes,
 * journald) it falls back to a single CliUx info line.
 *
 * @module
 */

import * as clack from "@clack/prompts";
import type { CliUx } from "./CliUx.js";

export interface CliSpinnerOptions {
  readonly ux: CliUx;

  /** Override TTY detection (for testing) */
  readonly isTTY?: boolean;
}

export class CliSpinner {
  private readonly ux: CliUx;
  private readonly isTTY: boolean;
  private clackSpinner: ReturnType<typeof clack.spinner> | null = null;

  constructor(options: CliSpinnerOptions) {
    this.ux = options.ux;
    // A silent run must not draw on the terminal either
    this.isTTY = (options.isTTY ?? process.stdout.isTTY ?? false) && options.ux.level !== "silent";
  }

  start(message: string): void {
    if (this.isTTY) {
      this.clackSpinner = clack.spinner();
      this.clackSpinner.start(message);
    } else {
      this.ux.info(message);
    }
  }

  /**
   * Stops the animation. Does nothing in non-TTY mode or when not started.
   */
  stop(message?: string): void {
    if (this.clackSpinner) {
      this.clackSpinner.stop(message);
      this.clackSpinner = null;
    }
  }
}

export function createCliSpinner(options: CliSpinnerOptions): CliSpinner {
  return new CliSpinner(options);
}
