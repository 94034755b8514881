/**
 * In-process stand-ins for the host: a scripted command executor, a probe
 * with a configurable PATH and uid, and a CliUx that records its output.
 *
 * @module
 */

import type { DeployConfig } from "../../src/core/config/DeployConfigLoader.js";
import {
  formatCommandLine,
  type CommandExecutor,
  type CommandInvocation,
  type CommandResult,
} from "../../src/core/exec/CommandRunner.js";
import type { LogEntry, LogSink } from "../../src/core/logging/ContextualLogger.js";
import type { SystemProbe } from "../../src/core/system/SystemProbe.js";
import { createCliUx, type CliUx, type LogLevel } from "../../src/cli/ux/CliUx.js";

// =============================================================================
// Executor
// =============================================================================

export interface ScriptedResult {
  readonly exitCode?: number;
  readonly output?: string;
}

/**
 * Executor that answers from a script keyed by the printed command line.
 * Unscripted commands succeed with no output.
 */
export class FakeExecutor implements CommandExecutor {
  readonly calls: CommandInvocation[] = [];

  constructor(private readonly script: Record<string, ScriptedResult> = {}) {}

  /** Printed command lines, in call order */
  get commandLines(): string[] {
    return this.calls.map((call) => formatCommandLine(call));
  }

  async run(invocation: CommandInvocation): Promise<CommandResult> {
    this.calls.push(invocation);
    const commandLine = formatCommandLine(invocation);
    const scripted = this.script[commandLine] ?? {};
    const exitCode = scripted.exitCode ?? 0;

    return {
      commandLine,
      success: exitCode === 0,
      exitCode,
      durationMs: 1,
      output: scripted.output ?? "",
    };
  }
}

// =============================================================================
// Probe
// =============================================================================

export class FakeProbe implements SystemProbe {
  readonly sleeps: number[] = [];
  readonly lookups: string[] = [];
  private readonly tools: Set<string>;

  constructor(
    private readonly privileged: boolean = true,
    tools: readonly string[] = [],
  ) {
    this.tools = new Set(tools);
  }

  isPrivileged(): boolean {
    return this.privileged;
  }

  async hasCommand(name: string): Promise<boolean> {
    this.lookups.push(name);
    return this.tools.has(name);
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
  }
}

// =============================================================================
// Output
// =============================================================================

export interface RecordingUx {
  readonly ux: CliUx;
  stdout(): string;
  stderr(): string;
}

export function createRecordingUx(level: LogLevel = "info"): RecordingUx {
  const out: string[] = [];
  const err: string[] = [];
  const ux = createCliUx({
    level,
    colors: false,
    stdout: (msg) => out.push(msg),
    stderr: (msg) => err.push(msg),
  });
  return { ux, stdout: () => out.join(""), stderr: () => err.join("") };
}

export class InMemoryLogSink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

// =============================================================================
// Config
// =============================================================================

/**
 * A resolved configuration with every default applied.
 */
export function testConfig(overrides: Partial<DeployConfig> = {}): DeployConfig {
  return {
    service: "web-app",
    serviceUser: "deploy",
    source: { remote: "origin", branch: "main" },
    dependencies: { tool: "uv", args: ["sync"] },
    proxy: { test: ["nginx", "-t"], reload: ["systemctl", "reload", "nginx"] },
    healthCheck: { settleDelayMs: 2000, journalHintLines: 50 },
    summary: { logLines: 10 },
    ...overrides,
  };
}

/**
 * Clock that advances 5ms on every read.
 */
export function steppingClock(): () => number {
  let t = 0;
  return () => (t += 5);
}
