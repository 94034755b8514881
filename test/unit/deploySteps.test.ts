/**
 * Unit tests for the deployment step list.
 *
 * @module
 */

import { describe, it, expect } from "vitest";

import { buildDeploySteps } from "../../src/core/pipeline/deploySteps.js";
import { testConfig } from "../helpers/deployFakes.js";

describe("buildDeploySteps", () => {
  it("orders every step with its criticality", () => {
    const steps = buildDeploySteps(testConfig());

    expect(steps.map((s) => [s.id, s.criticality])).toEqual([
      ["source.fetch", "critical"],
      ["dependencies.sync", "critical"],
      ["service.restart", "critical"],
      ["service.health", "critical"],
      ["proxy.reload", "advisory"],
      ["summary", "advisory"],
    ]);
  });

  it("leaves out disabled optional steps", () => {
    const steps = buildDeploySteps(testConfig({ dependencies: false, proxy: false }));

    expect(steps.map((s) => s.name)).toEqual([
      "Fetch latest source",
      "Restart service",
      "Verify service health",
      "Summary",
    ]);
  });

  it("describes the commands each step runs", () => {
    const config = testConfig({ source: { remote: "upstream", branch: "release" } });

    expect(buildDeploySteps(config).map((s) => s.describe(config))).toEqual([
      ["sudo -u deploy git pull upstream release"],
      ["sudo -u deploy uv sync  (skipped if uv is not installed)"],
      ["systemctl restart web-app"],
      ["wait 2000ms", "systemctl is-active --quiet web-app"],
      ["nginx -t", "systemctl reload nginx"],
      ["journalctl -u web-app -n 10 --no-pager"],
    ]);
  });
});
