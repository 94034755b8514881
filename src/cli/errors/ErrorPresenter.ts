/**
 * Error presentation for CLI output.
 *
 * Formats DeployError and unknown errors into the diagnostic printed when a
 * deployment aborts. Stack traces are only shown with `--debug`.
 *
 * @module
 */

import { DeployError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";

export interface FormatErrorOptions {
  /** Include stack traces and cause (default: false) */
  debug?: boolean;
}

export interface ErrorPresenterOptions {
  /** Output function (default: console.error) */
  output?: (line: string) => void;
  debug?: boolean;
}

export class ErrorPresenter {
  private readonly output: (line: string) => void;
  private readonly debug: boolean;

  constructor(options: ErrorPresenterOptions = {}) {
    this.output = options.output ?? console.error;
    this.debug = options.debug ?? false;
  }

  present(error: unknown): void {
    for (const line of formatError(error, { debug: this.debug }).split("\n")) {
      this.output(line);
    }
  }
}

/**
 * Formats an error for CLI output.
 *
 * ```text
 * Error [STEP_FAILED]: Failed to pull source
 *
 * Step: Fetch latest source
 * Command: sudo -u deploy git pull origin main
 * Exit Code: 1
 *
 * Hint:
 *   Run the command manually to debug: ...
 * ```
 */
export function formatError(error: unknown, options: FormatErrorOptions = {}): string {
  const { debug = false } = options;
  const deployError = normalizeError(error);
  const lines: string[] = [];

  lines.push(`Error [${deployError.code}]: ${deployError.message}`);
  lines.push("");

  const detailLines = deployError.details ? formatDetails(deployError.details) : [];
  if (detailLines.length > 0) {
    lines.push(...detailLines);
    lines.push("");
  }

  if (deployError.hint) {
    lines.push("Hint:");
    for (const hintLine of deployError.hint.split("\n")) {
      lines.push(`  ${hintLine}`);
    }
    lines.push("");
  }

  if (debug) {
    if (deployError.stack) {
      lines.push("Stack trace:");
      // First stack line repeats the message
      lines.push(...deployError.stack.split("\n").slice(1));
      lines.push("");
    }

    if (deployError.cause) {
      lines.push("Caused by:");
      lines.push(`  ${deployError.cause.message}`);
      lines.push("");
    }
  }

  return lines.join("\n").trimEnd();
}

function normalizeError(error: unknown): DeployError {
  if (error instanceof DeployError) {
    return error;
  }

  if (error instanceof Error) {
    const wrapped = new DeployError(error.message, ErrorCode.INTERNAL_ERROR, undefined, undefined, error);
    wrapped.stack = error.stack;
    return wrapped;
  }

  return new DeployError(String(error), ErrorCode.INTERNAL_ERROR);
}

function formatDetails(details: Record<string, unknown>): string[] {
  const lines: string[] = [];

  for (const [key, value] of Object.entries(details)) {
    if (value === undefined) {
      continue;
    }
    if (Array.isArray(value)) {
      if (value.length > 0) {
        lines.push(`${formatKey(key)}:`);
        for (const item of value) {
          lines.push(`  - ${String(item)}`);
        }
      }
    } else if (typeof value === "object" && value !== null) {
      lines.push(`${formatKey(key)}: ${JSON.stringify(value)}`);
    } else {
      lines.push(`${formatKey(key)}: ${String(value)}`);
    }
  }

  return lines;
}

/**
 * camelCase to Title Case.
 */
function formatKey(key: string): string {
  return key
    .replace(/([A-Z])/g, " $1")
    .replace(/^./, (str) => str.toUpperCase())
    .trim();
}
