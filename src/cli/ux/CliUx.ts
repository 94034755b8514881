/**
 * Operator-facing output for redeploy.
 *
 * Progress and success lines go to stdout, warnings and errors to stderr.
 * Colors are used only when stdout is a TTY unless forced either way.
 *
 * @module
 */

import pc from "picocolors";

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels from least to most verbose.
 */
export type LogLevel = "silent" | "info" | "verbose" | "debug";

export interface CliUxOptions {
  readonly level: LogLevel;

  /** Whether to use colors (auto-detected from TTY if not specified) */
  readonly colors?: boolean;

  /** Custom stdout writer (for testing) */
  readonly stdout?: (msg: string) => void;

  /** Custom stderr writer (for testing) */
  readonly stderr?: (msg: string) => void;
}

// =============================================================================
// Constants
// =============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  info: 1,
  verbose: 2,
  debug: 3,
};

const SYMBOLS = {
  success: "✓",
  error: "✗",
  warning: "⚠",
  info: "→",
};

// =============================================================================
// CliUx Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const ux = createCliUx({ level: "info" });
 *
 * ux.banner("redeploy web-app");
 * ux.step(1, 6, "Fetch latest source");
 * ux.success("Source updated from origin/main");
 * ux.warn("uv not found, skipping dependency sync");
 * ux.error("Error running diagnostics: spawn EACCES");
 * ```
 */
export class CliUx {
  readonly level: LogLevel;
  private readonly useColors: boolean;
  private readonly writeStdout: (msg: string) => void;
  private readonly writeStderr: (msg: string) => void;

  constructor(options: CliUxOptions) {
    this.level = options.level;
    this.useColors = options.colors ?? process.stdout.isTTY ?? false;
    this.writeStdout = options.stdout ?? ((msg) => process.stdout.write(msg));
    this.writeStderr = options.stderr ?? ((msg) => process.stderr.write(msg));
  }

  private canLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  private paint(color: (text: string) => string, text: string): string {
    return this.useColors ? color(text) : text;
  }

  // ===========================================================================
  // Output methods
  // ===========================================================================

  success(message: string): void {
    if (!this.canLog("info")) return;

    this.writeStdout(`${this.paint(pc.green, SYMBOLS.success)} ${message}\n`);
  }

  /**
   * Always shown, even when silent.
   */
  error(message: string): void {
    this.writeStderr(`${this.paint(pc.red, SYMBOLS.error)} ${message}\n`);
  }

  warn(message: string): void {
    if (!this.canLog("info")) return;

    this.writeStderr(`${this.paint(pc.yellow, SYMBOLS.warning)} ${message}\n`);
  }

  info(message: string): void {
    if (!this.canLog("info")) return;

    this.writeStdout(`${this.paint(pc.cyan, SYMBOLS.info)} ${message}\n`);
  }

  /**
   * Only shown at verbose level and above. Multi-line text is indented.
   */
  verbose(message: string): void {
    if (!this.canLog("verbose")) return;

    for (const line of message.split("\n")) {
      this.writeStdout(`  ${this.paint(pc.dim, line)}\n`);
    }
  }

  debug(message: string): void {
    if (!this.canLog("debug")) return;

    this.writeStdout(`  ${this.paint(pc.dim, `[debug] ${message}`)}\n`);
  }

  step(current: number, total: number, description: string): void {
    if (!this.canLog("info")) return;

    this.writeStdout(`${this.paint(pc.dim, `[${current}/${total}]`)} ${this.paint(pc.bold, description)}\n`);
  }

  detail(message: string): void {
    if (!this.canLog("info")) return;

    this.writeStdout(`  ${message}\n`);
  }

  newline(): void {
    if (!this.canLog("info")) return;

    this.writeStdout("\n");
  }

  header(title: string): void {
    if (!this.canLog("info")) return;

    this.writeStdout(`\n${this.paint(pc.bold, title)}\n`);
  }

  /**
   * Title underlined to its own width.
   */
  banner(title: string): void {
    if (!this.canLog("info")) return;

    this.writeStdout(`${this.paint(pc.bold, title)}\n${"=".repeat(title.length)}\n`);
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCliUx(options: CliUxOptions): CliUx {
  return new CliUx(options);
}

let defaultInstance: CliUx | null = null;

/**
 * Gets or creates the process-wide CliUx instance.
 */
export function getCliUx(): CliUx {
  if (!defaultInstance) {
    defaultInstance = createCliUx({ level: "info" });
  }
  return defaultInstance;
}

export function setDefaultCliUx(ux: CliUx): void {
  defaultInstance = ux;
}

// =============================================================================
// Log Level Parsing
// =============================================================================

export interface LogLevelFlags {
  readonly verbose: boolean;
  readonly debug: boolean;
  readonly silent: boolean;
}

/**
 * Parses log level from CLI flags.
 *
 * Priority: debug, then silent, then verbose, then info.
 */
export function parseLogLevel(flags: LogLevelFlags): LogLevel {
  if (flags.debug) {
    return "debug";
  }
  if (flags.silent) {
    return "silent";
  }
  if (flags.verbose) {
    return "verbose";
  }
  return "info";
}
