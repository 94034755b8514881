/**
 * Unit tests for PipelineRunner.
 *
 * Exercises the fold with hand-built steps: short-circuit on critical
 * failure, warnings for advisory failures and skips, timing and tracing.
 *
 * @module
 */

import { describe, it, expect } from "vitest";

import { createCliSpinner } from "../../src/cli/ux/CliSpinner.js";
import { ErrorCode } from "../../src/core/errors/ErrorCode.js";
import { createLogger } from "../../src/core/logging/ContextualLogger.js";
import { createExecutionContext } from "../../src/core/logging/ExecutionContext.js";
import { Step } from "../../src/core/logging/Step.js";
import { PipelineRunner } from "../../src/core/pipeline/PipelineRunner.js";
import {
  failed,
  ok,
  skipped,
  type Criticality,
  type PipelineStep,
  type StepContext,
  type StepOutcome,
} from "../../src/core/pipeline/types.js";
import {
  FakeExecutor,
  FakeProbe,
  InMemoryLogSink,
  createRecordingUx,
  steppingClock,
  testConfig,
  type RecordingUx,
} from "../helpers/deployFakes.js";

// =============================================================================
// Test Helpers
// =============================================================================

function createStep(
  id: Step,
  name: string,
  criticality: Criticality,
  outcome: StepOutcome | (() => never),
  ran: string[],
): PipelineStep {
  return {
    id,
    name,
    criticality,
    describe: () => [],
    async run() {
      ran.push(name);
      return typeof outcome === "function" ? outcome() : outcome;
    },
  };
}

function createContext(output: RecordingUx): StepContext {
  return {
    execution: createExecutionContext({ appDir: "/srv/web-app", correlationId: "run-1" }),
    config: testConfig(),
    executor: new FakeExecutor(),
    probe: new FakeProbe(),
    ux: output.ux,
    spinner: createCliSpinner({ ux: output.ux, isTTY: false }),
  };
}

function createRunner(sink = new InMemoryLogSink()): PipelineRunner {
  return new PipelineRunner({ logger: createLogger({ sink }), now: steppingClock() });
}

// =============================================================================
// Tests
// =============================================================================

describe("PipelineRunner", () => {
  describe("critical failures", () => {
    it("stops at the first failing critical step", async () => {
      const ran: string[] = [];
      const output = createRecordingUx();
      const steps = [
        createStep(Step.SOURCE_FETCH, "Fetch", "critical", ok("fetched"), ran),
        createStep(Step.SERVICE_RESTART, "Restart", "critical", failed("Failed to restart service"), ran),
        createStep(Step.SERVICE_HEALTH, "Health", "critical", ok(), ran),
      ];

      const result = await createRunner().run(steps, createContext(output));

      expect(ran).toEqual(["Fetch", "Restart"]);
      expect(result.status).toBe("failed");
      if (result.status !== "failed") return;
      expect(result.failedAt).toBe("Restart");
      expect(result.error.code).toBe(ErrorCode.STEP_FAILED);
      expect(result.error.message).toBe("Failed to restart service");
      expect(result.steps.map((s) => s.name)).toEqual(["Fetch", "Restart"]);
    });

    it("uses the step's own hint when it has one", async () => {
      const output = createRecordingUx();
      const steps = [
        createStep(
          Step.SERVICE_HEALTH,
          "Health",
          "critical",
          failed("down", { hint: "look at the journal", command: "systemctl is-active web-app" }),
          [],
        ),
      ];

      const result = await createRunner().run(steps, createContext(output));

      if (result.status !== "failed") throw new Error("expected failure");
      expect(result.error.hint).toBe("look at the journal");
    });

    it("builds a debugging hint from the failed command", async () => {
      const output = createRecordingUx();
      const steps = [
        createStep(Step.SOURCE_FETCH, "Fetch", "critical", failed("nope", { command: "git pull", exitCode: 128 }), []),
      ];

      const result = await createRunner().run(steps, createContext(output));

      if (result.status !== "failed") throw new Error("expected failure");
      expect(result.error.hint).toBe('Run the command manually to debug: cd "/srv/web-app" && git pull');
      expect(result.error.details).toEqual({ step: "Fetch", command: "git pull", exitCode: 128 });
    });

    it("treats a throwing step as a failure", async () => {
      const ran: string[] = [];
      const output = createRecordingUx();
      const steps = [
        createStep(
          Step.SERVICE_RESTART,
          "Restart",
          "critical",
          () => {
            throw new Error("boom");
          },
          ran,
        ),
        createStep(Step.SUMMARY, "Summary", "advisory", ok(), ran),
      ];

      const result = await createRunner().run(steps, createContext(output));

      expect(ran).toEqual(["Restart"]);
      if (result.status !== "failed") throw new Error("expected failure");
      expect(result.error.message).toBe("Restart failed: boom");
      expect(result.error.hint).toBeUndefined();
    });
  });

  describe("warnings", () => {
    it("continues past advisory failures and skipped steps", async () => {
      const ran: string[] = [];
      const output = createRecordingUx();
      const steps = [
        createStep(Step.DEPENDENCIES_SYNC, "Sync", "critical", skipped("uv not found", ErrorCode.TOOL_NOT_FOUND), ran),
        createStep(Step.PROXY_RELOAD, "Proxy", "advisory", failed("Proxy reload failed"), ran),
        createStep(Step.SUMMARY, "Summary", "advisory", ok(), ran),
      ];

      const result = await createRunner().run(steps, createContext(output));

      expect(ran).toEqual(["Sync", "Proxy", "Summary"]);
      expect(result.status).toBe("success");
      expect(result.warnings).toBe(2);
      expect(output.stderr()).toBe("⚠ uv not found\n⚠ Proxy reload failed\n");
    });

    it("shows advisory command output only at verbose level", async () => {
      const steps = [
        createStep(Step.PROXY_RELOAD, "Proxy", "advisory", failed("reload failed", { output: "emerg: bad config\n" }), []),
      ];

      const quiet = createRecordingUx("info");
      await createRunner().run(steps, createContext(quiet));
      expect(quiet.stdout()).not.toContain("emerg");

      const verbose = createRecordingUx("verbose");
      await createRunner().run(steps, createContext(verbose));
      expect(verbose.stdout()).toContain("  emerg: bad config\n");
    });
  });

  describe("progress output", () => {
    it("numbers each step and prints success messages", async () => {
      const output = createRecordingUx();
      const steps = [
        createStep(Step.SOURCE_FETCH, "Fetch", "critical", ok("Source updated"), []),
        createStep(Step.SUMMARY, "Summary", "advisory", ok(), []),
      ];

      await createRunner().run(steps, createContext(output));

      expect(output.stdout()).toBe("\n[1/2] Fetch\n✓ Source updated\n\n[2/2] Summary\n");
    });
  });

  describe("timing and tracing", () => {
    it("records a duration for every step that ran", async () => {
      const output = createRecordingUx();
      const steps = [
        createStep(Step.SOURCE_FETCH, "Fetch", "critical", ok(), []),
        createStep(Step.SERVICE_RESTART, "Restart", "critical", failed("down"), []),
      ];

      const result = await createRunner().run(steps, createContext(output));

      expect(result.steps.map((s) => s.durationMs)).toEqual([5, 5]);
    });

    it("emits start and end events bound to the correlation ID", async () => {
      const sink = new InMemoryLogSink();
      const output = createRecordingUx();
      const steps = [
        createStep(Step.SOURCE_FETCH, "Fetch", "critical", ok(), []),
        createStep(Step.SERVICE_RESTART, "Restart", "critical", failed("down"), []),
      ];

      await createRunner(sink).run(steps, createContext(output));

      expect(
        sink.entries.map((e) => [e.level, e.event, e.step, e.correlationId, e.status]),
      ).toEqual([
        ["info", "step.start", "source.fetch", "run-1", undefined],
        ["info", "step.end", "source.fetch", "run-1", "ok"],
        ["info", "step.start", "service.restart", "run-1", undefined],
        ["error", "step.end", "service.restart", "run-1", "failed"],
      ]);
      expect(sink.entries[3].errorCode).toBe("STEP_FAILED");
    });

    it("tags warning steps with their warning code", async () => {
      const sink = new InMemoryLogSink();
      const output = createRecordingUx();
      const steps = [
        createStep(Step.DEPENDENCIES_SYNC, "Sync", "critical", skipped("uv not found", ErrorCode.TOOL_NOT_FOUND), []),
        createStep(Step.PROXY_RELOAD, "Proxy", "advisory", failed("Proxy reload failed"), []),
        createStep(Step.SUMMARY, "Summary", "advisory", ok(), []),
      ];

      await createRunner(sink).run(steps, createContext(output));

      const ends = sink.entries.filter((e) => e.event === "step.end");
      expect(ends.map((e) => [e.step, e.status, e.warningCode])).toEqual([
        ["dependencies.sync", "skipped", "TOOL_NOT_FOUND"],
        ["proxy.reload", "failed", "ADVISORY_STEP_FAILED"],
        ["summary", "ok", undefined],
      ]);
    });
  });
});
