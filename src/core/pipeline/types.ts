/**
 * Pipeline types shared by the runner and the deployment steps.
 *
 * @module
 */

import type { CliSpinner } from "../../cli/ux/CliSpinner.js";
import type { CliUx } from "../../cli/ux/CliUx.js";
import type { DeployConfig } from "../config/DeployConfigLoader.js";
import type { DeployError } from "../errors/errors.js";
import type { ErrorCode } from "../errors/ErrorCode.js";
import type { CommandExecutor } from "../exec/CommandRunner.js";
import type { ExecutionContext } from "../logging/ExecutionContext.js";
import type { Step } from "../logging/Step.js";
import type { SystemProbe } from "../system/SystemProbe.js";

// =============================================================================
// Step outcomes
// =============================================================================

/**
 * Whether a failing step halts the run (`critical`) or only warns (`advisory`).
 */
export type Criticality = "critical" | "advisory";

export interface StepOk {
  readonly status: "ok";
  /** Shown to the operator as a success line */
  readonly message?: string;
}

/**
 * The step chose not to act. Always a warning, never fatal.
 */
export interface StepSkipped {
  readonly status: "skipped";
  readonly reason: string;
  readonly code: ErrorCode;
}

export interface StepFailed {
  readonly status: "failed";
  readonly message: string;
  readonly hint?: string;
  /** Command line whose failure produced this outcome */
  readonly command?: string;
  readonly exitCode?: number;
  /** Captured command output for diagnosis */
  readonly output?: string;
}

export type StepOutcome = StepOk | StepSkipped | StepFailed;

export const ok = (message?: string): StepOk => ({ status: "ok", message });

export const skipped = (reason: string, code: ErrorCode): StepSkipped => ({
  status: "skipped",
  reason,
  code,
});

export const failed = (message: string, extra: Omit<StepFailed, "status" | "message"> = {}): StepFailed => ({
  status: "failed",
  message,
  ...extra,
});

// =============================================================================
// Steps
// =============================================================================

/**
 * Everything a step may touch while it runs.
 */
export interface StepContext {
  readonly execution: ExecutionContext;
  readonly config: DeployConfig;
  readonly executor: CommandExecutor;
  readonly probe: SystemProbe;
  readonly ux: CliUx;
  readonly spinner: CliSpinner;
}

export interface PipelineStep {
  readonly id: Step;

  /** Operator-facing name, also reported as the failed step */
  readonly name: string;

  readonly criticality: Criticality;

  /** Commands the step would run, for dry runs */
  describe(config: DeployConfig): string[];

  run(ctx: StepContext): Promise<StepOutcome>;
}

// =============================================================================
// Results
// =============================================================================

export interface StepRecord {
  readonly id: Step;
  readonly name: string;
  readonly criticality: Criticality;
  readonly outcome: StepOutcome;
  readonly durationMs: number;
}

/**
 * Terminal state of a run.
 */
export type PipelineResult =
  | {
      readonly status: "success";
      readonly steps: readonly StepRecord[];
      /** Count of skipped and advisory-failed steps */
      readonly warnings: number;
    }
  | {
      readonly status: "failed";
      /** Name of the critical step that aborted the run */
      readonly failedAt: string;
      readonly error: DeployError;
      readonly steps: readonly StepRecord[];
      readonly warnings: number;
    };
