/**
 * Contextual Logger with structured output.
 *
 * Every entry is a single JSON object carrying the run's correlation ID and
 * the pipeline step it belongs to. Operator-facing text goes through CliUx;
 * this logger is the machine-readable trace enabled by `--trace`.
 *
 * @module
 */

import { DeployError } from "../errors/errors.js";
import type { Step } from "./Step.js";

// =============================================================================
// Types
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * A structured log entry.
 */
export interface LogEntry {
  /** ISO timestamp */
  ts: string;
  level: LogLevel;
  msg: string;
  correlationId?: string;
  step?: string;
  errorCode?: string;
  errorMessage?: string;
  /** Stack trace (debug mode only) */
  stack?: string;
  [key: string]: unknown;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

/**
 * Context that can be bound to a logger.
 */
export interface LogContext {
  correlationId?: string;
  step?: Step;
  [key: string]: unknown;
}

export interface CreateLoggerOptions {
  /** Output sink (default: JSON lines on stderr) */
  sink?: LogSink;

  /** Minimum log level (default: "info") */
  minLevel?: LogLevel;

  /** Include stack traces for logged errors */
  debug?: boolean;

  context?: LogContext;
}

// =============================================================================
// Sinks
// =============================================================================

/**
 * Writes JSON lines to stderr so stdout stays readable for the operator.
 */
export class StderrJsonSink implements LogSink {
  write(entry: LogEntry): void {
    process.stderr.write(JSON.stringify(entry) + "\n");
  }
}

/**
 * Drops every entry. Used when tracing is off.
 */
export class NullSink implements LogSink {
  write(_entry: LogEntry): void {}
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// =============================================================================
// ContextualLogger Class
// =============================================================================

/**
 * Logger with bound context.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ minLevel: "info" });
 * logger
 *   .withContext({ correlationId: ctx.correlationId, step: Step.SERVICE_RESTART })
 *   .info("Restarting unit", { unit: "web-app" });
 * ```
 */
export class ContextualLogger {
  private readonly sink: LogSink;
  private readonly minLevel: LogLevel;
  private readonly debugMode: boolean;
  private readonly context: LogContext;

  constructor(options: CreateLoggerOptions = {}) {
    this.sink = options.sink ?? new StderrJsonSink();
    this.minLevel = options.minLevel ?? "info";
    this.debugMode = options.debug ?? false;
    this.context = options.context ?? {};
  }

  /**
   * Creates a child logger sharing the sink, with merged context.
   */
  withContext(ctx: LogContext): ContextualLogger {
    return new ContextualLogger({
      sink: this.sink,
      minLevel: this.minLevel,
      debug: this.debugMode,
      context: { ...this.context, ...ctx },
    });
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.log("debug", msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.log("info", msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.log("warn", msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.log("error", msg, ctx);
  }

  private log(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      msg,
    };

    for (const [key, value] of Object.entries(this.context)) {
      if (value !== undefined) {
        entry[key] = value;
      }
    }

    if (ctx) {
      for (const [key, value] of Object.entries(ctx)) {
        if (key === "error" && value instanceof Error) {
          this.enrichWithError(entry, value);
        } else if (value !== undefined) {
          entry[key] = value;
        }
      }
    }

    this.sink.write(entry);
  }

  private enrichWithError(entry: LogEntry, error: Error): void {
    if (error instanceof DeployError) {
      entry.errorCode = error.code;
    }
    entry.errorMessage = error.message;

    if (this.debugMode && error.stack) {
      entry.stack = error.stack;
    }
  }
}

export function createLogger(options: CreateLoggerOptions = {}): ContextualLogger {
  return new ContextualLogger(options);
}
