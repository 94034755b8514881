/**
 * Pipeline Runner - folds over deployment steps in order.
 *
 * Each step runs to completion before the next one starts. The first
 * critical step that fails stops the fold; advisory failures and skipped
 * steps are reported as warnings and the run carries on.
 *
 * ## Difference from a plain loop
 *
 * - Every outcome is recorded with its duration, including the failing one
 * - A step that throws is treated as a failed outcome, not a crash
 * - `step.start` / `step.end` trace events are emitted through StepTimer
 *
 * @module
 */

import { DeployError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { ContextualLogger } from "../logging/ContextualLogger.js";
import { StepTimer } from "../logging/StepTimer.js";
import {
  failed,
  type PipelineResult,
  type PipelineStep,
  type StepContext,
  type StepFailed,
  type StepOutcome,
  type StepRecord,
} from "./types.js";

export interface PipelineRunnerOptions {
  /** Trace logger; step events are bound to the run's correlation ID */
  readonly logger: ContextualLogger;

  /** Clock for step durations (default: Date.now) */
  readonly now?: () => number;
}

/**
 * @example
 * ```typescript
 * const runner = new PipelineRunner({ logger });
 * const result = await runner.run(buildDeploySteps(config), ctx);
 *
 * if (result.status === "failed") {
 *   throw result.error;
 * }
 * ```
 */
export class PipelineRunner {
  private readonly logger: ContextualLogger;
  private readonly now: () => number;

  constructor(options: PipelineRunnerOptions) {
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  async run(steps: readonly PipelineStep[], ctx: StepContext): Promise<PipelineResult> {
    const { ux } = ctx;
    const timer = new StepTimer(
      this.logger.withContext({ correlationId: ctx.execution.correlationId }),
      this.now,
    );
    const records: StepRecord[] = [];
    let warnings = 0;

    for (let i = 0; i < steps.length; i++) {
      const step = steps[i];

      ux.newline();
      ux.step(i + 1, steps.length, step.name);
      timer.start(step.id, { name: step.name, criticality: step.criticality });

      const outcome = await this.runStep(step, ctx);

      if (outcome.status === "failed" && step.criticality === "critical") {
        const error = this.toStepError(step, outcome, ctx);
        const durationMs = timer.fail(step.id, error, { status: outcome.status });
        records.push({ id: step.id, name: step.name, criticality: step.criticality, outcome, durationMs });

        this.showOutput(outcome, ctx);
        return { status: "failed", failedAt: step.name, error, steps: records, warnings };
      }

      const warningCode = this.warningCodeOf(outcome);
      const durationMs = timer.end(step.id, { status: outcome.status, warningCode });
      records.push({ id: step.id, name: step.name, criticality: step.criticality, outcome, durationMs });

      switch (outcome.status) {
        case "ok":
          if (outcome.message) {
            ux.success(outcome.message);
          }
          break;
        case "skipped":
          warnings++;
          ux.warn(outcome.reason);
          break;
        case "failed":
          warnings++;
          ux.warn(outcome.message);
          if (outcome.output) {
            ux.verbose(outcome.output.trimEnd());
          }
          break;
      }
    }

    return { status: "success", steps: records, warnings };
  }

  private async runStep(step: PipelineStep, ctx: StepContext): Promise<StepOutcome> {
    try {
      return await step.run(ctx);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return failed(`${step.name} failed: ${message}`);
    }
  }

  private warningCodeOf(outcome: StepOutcome): ErrorCode | undefined {
    switch (outcome.status) {
      case "ok":
        return undefined;
      case "skipped":
        return outcome.code;
      case "failed":
        return ErrorCode.ADVISORY_STEP_FAILED;
    }
  }

  private toStepError(step: PipelineStep, outcome: StepFailed, ctx: StepContext): DeployError {
    const hint =
      outcome.hint ??
      (outcome.command
        ? `Run the command manually to debug: cd "${ctx.execution.appDir}" && ${outcome.command}`
        : undefined);

    return new DeployError(
      outcome.message,
      ErrorCode.STEP_FAILED,
      {
        step: step.name,
        command: outcome.command,
        exitCode: outcome.exitCode,
      },
      hint,
    );
  }

  private showOutput(outcome: StepFailed, ctx: StepContext): void {
    const output = outcome.output?.trimEnd();
    if (!output) {
      return;
    }
    ctx.ux.detail("--- Command Output ---");
    for (const line of output.split("\n")) {
      ctx.ux.detail(line);
    }
    ctx.ux.detail("--- End Output ---");
  }
}
