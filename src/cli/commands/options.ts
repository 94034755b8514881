/**
 * Option shapes shared by the CLI commands.
 *
 * @module
 */

import * as path from "node:path";
import type { ConfigOverrides } from "../../core/config/DeployConfigLoader.js";

/**
 * Flags declared on the root program.
 */
export type GlobalOptions = {
  readonly verbose: boolean;
  readonly debug: boolean;
  readonly silent: boolean;
  readonly trace: boolean;
};

/**
 * Flags every command that reads the configuration accepts.
 */
export type TargetOptions = {
  readonly dir: string;
  readonly config?: string;
  readonly service?: string;
  readonly user?: string;
};

export function resolveAppDir(options: TargetOptions): string {
  return path.resolve(process.cwd(), options.dir);
}

export function toOverrides(options: TargetOptions): ConfigOverrides {
  return { service: options.service, serviceUser: options.user };
}
