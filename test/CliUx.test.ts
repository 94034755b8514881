/**
 * Tests for CLI UX messaging module.
 *
 * Tests output routing, log levels, and flag parsing.
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import { getCliUx, parseLogLevel, setDefaultCliUx } from "../src/cli/ux/CliUx.js";
import { createRecordingUx } from "./helpers/deployFakes.js";

// =============================================================================
// Tests
// =============================================================================

describe("CliUx", () => {
  // ===========================================================================
  // Output formats
  // ===========================================================================

  describe("output formats", () => {
    it("underlines the banner to the title's width", () => {
      const { ux, stdout } = createRecordingUx();

      ux.banner("redeploy web-app");

      expect(stdout()).toBe("redeploy web-app\n================\n");
    });

    it("numbers steps", () => {
      const { ux, stdout } = createRecordingUx();

      ux.step(3, 6, "Restart service");

      expect(stdout()).toBe("[3/6] Restart service\n");
    });

    it("prints success lines", () => {
      const { ux, stdout } = createRecordingUx();

      ux.success("Service web-app restarted");

      expect(stdout()).toBe("✓ Service web-app restarted\n");
    });

    it("prints info, detail and header lines", () => {
      const { ux, stdout } = createRecordingUx();

      ux.info("Waiting 2000ms for web-app to settle");
      ux.detail("Changes to web-app have been deployed.");
      ux.header("Update deployment complete!");

      expect(stdout()).toBe(
        "→ Waiting 2000ms for web-app to settle\n" +
          "  Changes to web-app have been deployed.\n" +
          "\nUpdate deployment complete!\n",
      );
    });

    it("sends warnings and errors to stderr", () => {
      const { ux, stdout, stderr } = createRecordingUx();

      ux.warn("uv not found, skipping dependency sync");
      ux.error("Error running diagnostics: spawn EACCES");

      expect(stdout()).toBe("");
      expect(stderr()).toBe(
        "⚠ uv not found, skipping dependency sync\n" + "✗ Error running diagnostics: spawn EACCES\n",
      );
    });
  });

  // ===========================================================================
  // Log levels
  // ===========================================================================

  describe("log levels", () => {
    it("hides verbose and debug output at info level", () => {
      const { ux, stdout } = createRecordingUx("info");

      ux.verbose("git output");
      ux.debug("internal");

      expect(stdout()).toBe("");
    });

    it("indents every line of verbose output", () => {
      const { ux, stdout } = createRecordingUx("verbose");

      ux.verbose("Already up to date.\nFast-forward");
      ux.debug("internal");

      expect(stdout()).toBe("  Already up to date.\n  Fast-forward\n");
    });

    it("shows debug output at debug level", () => {
      const { ux, stdout } = createRecordingUx("debug");

      ux.debug("config loaded");

      expect(stdout()).toBe("  [debug] config loaded\n");
    });

    it("prints only errors when silent", () => {
      const { ux, stdout, stderr } = createRecordingUx("silent");

      ux.banner("redeploy web-app");
      ux.step(1, 6, "Fetch latest source");
      ux.success("ok");
      ux.warn("careful");
      ux.newline();
      ux.error("Failed to pull source");

      expect(stdout()).toBe("");
      expect(stderr()).toBe("✗ Failed to pull source\n");
    });
  });

  // ===========================================================================
  // Default instance
  // ===========================================================================

  describe("default instance", () => {
    it("returns the instance set by the CLI", () => {
      const { ux } = createRecordingUx("verbose");

      setDefaultCliUx(ux);

      expect(getCliUx()).toBe(ux);
    });
  });
});

describe("parseLogLevel", () => {
  it("returns info by default", () => {
    expect(parseLogLevel({ verbose: false, debug: false, silent: false })).toBe("info");
  });

  it("maps each flag to its level", () => {
    expect(parseLogLevel({ verbose: true, debug: false, silent: false })).toBe("verbose");
    expect(parseLogLevel({ verbose: false, debug: false, silent: true })).toBe("silent");
    expect(parseLogLevel({ verbose: false, debug: true, silent: false })).toBe("debug");
  });

  it("lets debug win over silent, and silent over verbose", () => {
    expect(parseLogLevel({ verbose: true, debug: true, silent: true })).toBe("debug");
    expect(parseLogLevel({ verbose: true, debug: false, silent: true })).toBe("silent");
  });
});
