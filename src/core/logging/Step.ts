/**
 * Pipeline step identifiers for structured logging.
 *
 * Steps follow a dotted naming convention: `<domain>.<action>`
 *
 * @module
 */

export const Step = {
  /** Privilege and configuration checks before any step runs */
  PREFLIGHT: "preflight",

  /** Pulling source changes */
  SOURCE_FETCH: "source.fetch",

  /** Syncing application dependencies */
  DEPENDENCIES_SYNC: "dependencies.sync",

  /** Restarting the service unit */
  SERVICE_RESTART: "service.restart",

  /** Settle delay and active check */
  SERVICE_HEALTH: "service.health",

  /** Reverse proxy config test and reload */
  PROXY_RELOAD: "proxy.reload",

  /** Completion banner and recent logs */
  SUMMARY: "summary",
} as const;

export type Step = (typeof Step)[keyof typeof Step];
