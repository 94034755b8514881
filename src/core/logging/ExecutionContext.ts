/**
 * Execution context for a single deployment run.
 *
 * @module
 */

import { randomUUID } from "node:crypto";

/**
 * Identifiers and location shared by every step of one run.
 */
export interface ExecutionContext {
  /** Unique identifier enriched into every trace entry */
  readonly correlationId: string;

  /** Absolute application directory; every command runs here */
  readonly appDir: string;

  /** Wall-clock start of the run */
  readonly startedAt: Date;
}

export interface CreateExecutionContextOptions {
  /** Absolute application directory */
  appDir: string;

  /** Custom correlation ID (default: random UUID) */
  correlationId?: string;

  startedAt?: Date;
}

/**
 * Creates a new execution context.
 *
 * @example
 * ```typescript
 * const ctx = createExecutionContext({ appDir: "/srv/web-app" });
 * ctx.correlationId; // "a1b2c3d4-..."
 * ```
 */
export function createExecutionContext(options: CreateExecutionContextOptions): ExecutionContext {
  return {
    correlationId: options.correlationId ?? randomUUID(),
    appDir: options.appDir,
    startedAt: options.startedAt ?? new Date(),
  };
}
