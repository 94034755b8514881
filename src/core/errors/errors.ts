import type { ErrorCode } from "./ErrorCode.js";

export class DeployError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
    public readonly hint?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "DeployError";
  }
}
