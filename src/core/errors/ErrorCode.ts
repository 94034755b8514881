/**
 * Standardized error codes for redeploy.
 *
 * Error codes are stable public API contracts. They should be:
 * - SCREAMING_SNAKE_CASE
 * - Grouped by domain
 *
 * @module
 */

// =============================================================================
// Error Code Enum
// =============================================================================

/**
 * All redeploy error codes.
 *
 * Codes are grouped by domain:
 * - PERMISSION_* : Privilege requirements
 * - STEP_* / ADVISORY_* / TOOL_* : Pipeline step outcomes
 * - CONFIG_* : Deployment configuration
 * - INTERNAL_* : Internal errors
 */
export const ErrorCode = {
  // Privilege errors
  PERMISSION_DENIED: "PERMISSION_DENIED",

  // Pipeline errors
  STEP_FAILED: "STEP_FAILED",
  ADVISORY_STEP_FAILED: "ADVISORY_STEP_FAILED",
  TOOL_NOT_FOUND: "TOOL_NOT_FOUND",

  // Configuration errors
  CONFIG_NOT_FOUND: "CONFIG_NOT_FOUND",
  CONFIG_PARSE_FAILED: "CONFIG_PARSE_FAILED",
  CONFIG_INVALID: "CONFIG_INVALID",

  // Internal errors
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// Warnings
// =============================================================================

/**
 * Whether an error code is only ever reported as a warning.
 *
 * Warning codes never abort a deployment and never change the exit status.
 */
export function isWarningCode(code: ErrorCode): boolean {
  return code === ErrorCode.TOOL_NOT_FOUND || code === ErrorCode.ADVISORY_STEP_FAILED;
}

// =============================================================================
// Exit Codes
// =============================================================================

/**
 * Process exit status for an error code.
 *
 * Every fatal error exits with 1; warnings leave the run successful.
 */
export function getExitCode(code: ErrorCode): number {
  return isWarningCode(code) ? 0 : 1;
}
