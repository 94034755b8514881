/**
 * Deployment configuration loading.
 *
 * Reads `redeploy.yaml` (or `redeploy.yml`) from the application directory,
 * or an explicit `--config` path, validates it with zod and merges CLI
 * overrides on top. Every field except the service unit and the service
 * account has a default, so a minimal file is two lines long:
 *
 * ```yaml
 * service: web-app
 * serviceUser: deploy
 * ```
 *
 * The file itself is optional when both required values come from flags.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { z } from "zod";
import { DeployError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * Config file names looked up in the application directory, in order.
 */
export const CONFIG_FILENAMES = ["redeploy.yaml", "redeploy.yml"] as const;

// =============================================================================
// Schema
// =============================================================================

const UNIT_NAME = /^[\w@:.\\-]+$/;
const ACCOUNT_NAME = /^[a-z_][a-z0-9_-]*\$?$/i;
const TOOL_NAME = /^[\w.+-]+$/;

/** Largest delay a Node timer honours; longer ones fire after 1ms */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Non-empty argv: executable followed by its arguments */
const ArgvSchema = z.array(z.string().min(1)).min(1);

const SourceSchema = z
  .object({
    remote: z.string().min(1).default("origin"),
    branch: z.string().min(1).default("main"),
  })
  .strict();

const DependenciesSchema = z
  .object({
    tool: z.string().regex(TOOL_NAME, "must be a bare executable name").default("uv"),
    args: z.array(z.string().min(1)).default(["sync"]),
  })
  .strict();

const ProxySchema = z
  .object({
    test: ArgvSchema.default(["nginx", "-t"]),
    reload: ArgvSchema.default(["systemctl", "reload", "nginx"]),
  })
  .strict();

const HealthCheckSchema = z
  .object({
    settleDelayMs: z.number().int().min(0).max(MAX_TIMER_DELAY_MS).default(2000),
    journalHintLines: z.number().int().positive().default(50),
  })
  .strict();

const SummarySchema = z
  .object({
    logLines: z.number().int().positive().default(10),
    publicUrl: z.string().url().optional(),
  })
  .strict();

const ConfigFileSchema = z
  .object({
    service: z.string().regex(UNIT_NAME, "must be a systemd unit name").optional(),
    serviceUser: z.string().regex(ACCOUNT_NAME, "must be a user account name").optional(),
    source: SourceSchema.default({}),
    /** `false` disables the dependency sync step */
    dependencies: z.union([z.literal(false), DependenciesSchema]).default({}),
    /** `false` disables the proxy reload step */
    proxy: z.union([z.literal(false), ProxySchema]).default({}),
    healthCheck: HealthCheckSchema.default({}),
    summary: SummarySchema.default({}),
  })
  .strict();

// =============================================================================
// Types
// =============================================================================

export type ConfigFileData = z.infer<typeof ConfigFileSchema>;

export type DependenciesConfig = z.infer<typeof DependenciesSchema>;

export type ProxyConfig = z.infer<typeof ProxySchema>;

/**
 * Fully resolved deployment configuration.
 */
export interface DeployConfig extends Omit<ConfigFileData, "service" | "serviceUser"> {
  /** systemd unit of the deployed application */
  readonly service: string;

  /** Non-privileged account that owns the source tree */
  readonly serviceUser: string;

  /** File the values came from, if any */
  readonly configPath?: string;
}

/**
 * Values supplied on the command line. They win over the file.
 */
export interface ConfigOverrides {
  readonly service?: string;
  readonly serviceUser?: string;
}

export interface LoadConfigParams {
  /** Absolute application directory */
  readonly appDir: string;

  /** Explicit config file; resolved against appDir when relative */
  readonly configPath?: string;

  readonly overrides?: ConfigOverrides;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Loads, validates and resolves the deployment configuration.
 *
 * @throws DeployError CONFIG_NOT_FOUND when an explicit file is missing,
 *   CONFIG_PARSE_FAILED on YAML syntax errors, CONFIG_INVALID on schema
 *   violations or when service/serviceUser are still unknown
 */
export async function loadDeployConfig(params: LoadConfigParams): Promise<DeployConfig> {
  const { appDir, overrides = {} } = params;

  const configPath = params.configPath
    ? path.resolve(appDir, params.configPath)
    : await findConfigFile(appDir);

  let raw: unknown = {};
  if (configPath) {
    const content = await readConfigFile(configPath, params.configPath !== undefined);
    raw = parseConfigYaml(content, configPath) ?? {};
  }

  const merged = mergeOverrides(raw, overrides);
  const data = validate(merged, configPath);

  const { service, serviceUser } = data;
  if (!service || !serviceUser) {
    const missing: string[] = [];
    if (!service) missing.push("service");
    if (!serviceUser) missing.push("serviceUser");
    throw new DeployError(
      `Missing required setting${missing.length === 1 ? "" : "s"}: ${missing.join(", ")}`,
      ErrorCode.CONFIG_INVALID,
      { configPath: configPath ?? "(none)", missing },
      `Set ${missing.join(" and ")} in ${configPath ?? path.join(appDir, CONFIG_FILENAMES[0])} ` +
        `or pass ${missing.map((m) => (m === "service" ? "--service" : "--user")).join(" and ")}.`,
    );
  }

  return { ...data, service, serviceUser, configPath };
}

async function findConfigFile(appDir: string): Promise<string | undefined> {
  for (const filename of CONFIG_FILENAMES) {
    const candidate = path.join(appDir, filename);
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      continue;
    }
  }
  return undefined;
}

async function readConfigFile(configPath: string, explicit: boolean): Promise<string> {
  try {
    return await fs.readFile(configPath, "utf-8");
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    const missing = isNotFound(error);
    throw new DeployError(
      missing ? "Config file not found" : "Failed to read config file",
      missing ? ErrorCode.CONFIG_NOT_FOUND : ErrorCode.CONFIG_INVALID,
      { configPath, reason: cause.message },
      missing && explicit
        ? `No file at ${configPath}. Check the --config path.`
        : `Could not read ${configPath}. ${cause.message}`,
      cause,
    );
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

function parseConfigYaml(content: string, configPath: string): unknown {
  try {
    return parseYaml(content);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    const details: Record<string, unknown> = { configPath };

    if (error instanceof YAMLParseError) {
      details.line = error.linePos?.[0]?.line;
      details.column = error.linePos?.[0]?.col;
    }

    throw new DeployError(
      "Invalid YAML syntax in config",
      ErrorCode.CONFIG_PARSE_FAILED,
      details,
      `Failed to parse ${path.basename(configPath)}: ${cause.message}`,
      cause,
    );
  }
}

function mergeOverrides(raw: unknown, overrides: ConfigOverrides): unknown {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    // Leave it to the schema to reject
    return raw;
  }
  const merged: Record<string, unknown> = { ...raw };
  if (overrides.service !== undefined) merged.service = overrides.service;
  if (overrides.serviceUser !== undefined) merged.serviceUser = overrides.serviceUser;
  return merged;
}

function validate(parsed: unknown, configPath: string | undefined): ConfigFileData {
  const result = ConfigFileSchema.safeParse(parsed);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const fieldPath = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${fieldPath}: ${issue.message}`;
    });

    throw new DeployError(
      "Invalid deployment config",
      ErrorCode.CONFIG_INVALID,
      { configPath: configPath ?? "(none)", issues },
      `Fix ${configPath ?? "the command-line values"}: ${issues.join("; ")}`,
    );
  }

  return result.data;
}
