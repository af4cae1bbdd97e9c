import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ConfigError, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    assert.deepEqual(loadConfig({}), {
      checkpointDir: "data/checkpoints",
      reportDir: "data/reports",
      callTimeoutMs: 900_000,
      maxCleaningPasses: 1,
      workers: 1,
      operatorInitials: "OP",
      progressWindow: 10,
      driverCommand: undefined,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      CAMPAIGN_CHECKPOINT_DIR: "/var/campaign/checkpoints",
      CAMPAIGN_CALL_TIMEOUT_SECONDS: "60",
      CAMPAIGN_MAX_CLEANING_PASSES: "0",
      CAMPAIGN_WORKERS: " 3 ",
      CAMPAIGN_OPERATOR_INITIALS: "jd",
      CAMPAIGN_DRIVER_COMMAND: "./driver.sh",
    });
    assert.equal(config.checkpointDir, "/var/campaign/checkpoints");
    assert.equal(config.callTimeoutMs, 60_000);
    assert.equal(config.maxCleaningPasses, 0);
    assert.equal(config.workers, 3);
    assert.equal(config.operatorInitials, "JD");
    assert.equal(config.driverCommand, "./driver.sh");
  });

  it("treats empty values as unset", () => {
    assert.equal(loadConfig({ CAMPAIGN_WORKERS: "", CAMPAIGN_REPORT_DIR: "  " }).workers, 1);
    assert.equal(loadConfig({ CAMPAIGN_REPORT_DIR: "  " }).reportDir, "data/reports");
  });

  it("rejects invalid values", () => {
    assert.throws(() => loadConfig({ CAMPAIGN_WORKERS: "zero" }), {
      name: "ConfigError",
      message: /^Invalid configuration: CAMPAIGN_WORKERS: /,
    });
    assert.throws(() => loadConfig({ CAMPAIGN_OPERATOR_INITIALS: "TOOLONG" }), ConfigError);
    assert.throws(() => loadConfig({ CAMPAIGN_PROGRESS_WINDOW: "0" }), ConfigError);
  });
});
