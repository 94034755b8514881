/**
 * Step Timer for pipeline instrumentation.
 *
 * Tracks step start/end times and emits `step.start` / `step.end` trace
 * events. `end` and `fail` return the measured duration so callers can
 * record it alongside the step outcome.
 *
 * @module
 */

import type { ContextualLogger } from "./ContextualLogger.js";
import type { Step } from "./Step.js";

interface StepTiming {
  step: Step;
  startTime: number;
}

/**
 * @example
 * ```typescript
 * const timer = new StepTimer(logger);
 *
 * timer.start(Step.SERVICE_RESTART, { unit: "web-app" });
 * const outcome = await restart();
 * const durationMs = timer.end(Step.SERVICE_RESTART, { status: outcome.status });
 * ```
 */
export class StepTimer {
  private readonly logger: ContextualLogger;
  private readonly timings: Map<Step, StepTiming> = new Map();
  private readonly now: () => number;

  constructor(logger: ContextualLogger, now: () => number = Date.now) {
    this.logger = logger;
    this.now = now;
  }

  start(step: Step, context?: Record<string, unknown>): void {
    this.timings.set(step, { step, startTime: this.now() });

    this.logger
      .withContext({ step })
      .info("Step started", { event: "step.start", ...context });
  }

  /**
   * Ends a step that completed (including advisory failures and skips).
   *
   * @returns Duration in milliseconds, or 0 if the step was never started
   */
  end(step: Step, context?: Record<string, unknown>): number {
    const durationMs = this.stop(step);
    if (durationMs === undefined) {
      return 0;
    }

    this.logger
      .withContext({ step })
      .info("Step completed", { event: "step.end", durationMs, ...context });
    return durationMs;
  }

  /**
   * Ends a step that aborted the pipeline.
   *
   * @returns Duration in milliseconds, or 0 if the step was never started
   */
  fail(step: Step, error: Error, context?: Record<string, unknown>): number {
    const durationMs = this.stop(step);
    if (durationMs === undefined) {
      return 0;
    }

    this.logger.withContext({ step }).error("Step failed", {
      event: "step.end",
      durationMs,
      error,
      ...context,
    });
    return durationMs;
  }

  private stop(step: Step): number | undefined {
    const timing = this.timings.get(step);
    if (!timing) {
      return undefined;
    }
    this.timings.delete(step);
    return this.now() - timing.startTime;
  }
}
