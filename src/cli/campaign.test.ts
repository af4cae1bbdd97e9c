import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";

import { RecordingLogger } from "../logger.js";
import { ScriptedService, succeedAll, withTempDir } from "../testing/fixtures.js";
import {
  UsageError,
  defaultSessionId,
  parseRunFlags,
  runCampaignCommand,
  type CliDeps,
} from "./campaign.js";

const SETS = `
templates:
  desktop: 1001
  ios: 2002
campaign_sets:
  - name: Gardening
    variants: [desktop, ios]
    creatives: { source: gardening.csv, ids: [77, 88] }
`;

async function setup(dir: string, yaml = SETS) {
  const file = join(dir, "sets.yaml");
  await writeFile(file, yaml, "utf-8");
  const logger = new RecordingLogger();
  const deps = (service?: ScriptedService): CliDeps => ({
    env: {
      CAMPAIGN_CHECKPOINT_DIR: join(dir, "checkpoints"),
      CAMPAIGN_REPORT_DIR: join(dir, "reports"),
    },
    logger,
    signal: new AbortController().signal,
    serviceFactory: service ? () => service : undefined,
  });
  return { file, logger, deps };
}

describe("parseRunFlags", () => {
  it("reads the file and flags", () => {
    assert.deepEqual(parseRunFlags(["sets.yaml", "--workers", "3", "--retry-failed", "--dry-run"]), {
      file: "sets.yaml",
      retryFailed: true,
      fresh: false,
      dryRun: true,
      workers: 3,
    });
  });

  it("accepts --session and --resume naming the same session", () => {
    const flags = parseRunFlags(["sets.yaml", "--session", "s1", "--resume", "s1", "--timeout", "120"]);
    assert.equal(flags.resume, "s1");
    assert.equal(flags.timeoutSeconds, 120);
  });

  const errors: Array<[string[], string]> = [
    [["a.yaml", "--workers", "0"], '--workers expects a positive integer, got "0"'],
    [["a.yaml", "--session"], "--session needs a value"],
    [["a.yaml", "--bogus"], "Unknown option --bogus"],
    [["a.yaml", "--resume", "s1", "--fresh"], "--resume and --fresh cannot be combined"],
    [["a.yaml", "--driver", "./d.sh", "--dry-run"], "--driver and --dry-run cannot be combined"],
    [["a.yaml", "--session", "s1", "--resume", "s2"], "--session and --resume name different sessions"],
  ];
  for (const [args, message] of errors) {
    it(`rejects ${args.slice(1).join(" ")}`, () => {
      assert.throws(() => parseRunFlags(args), { name: "UsageError", message });
    });
  }

  it("requires exactly one file", () => {
    assert.throws(() => parseRunFlags([]), UsageError);
    assert.throws(() => parseRunFlags(["a.yaml", "b.yaml"]), UsageError);
  });
});

describe("defaultSessionId", () => {
  it("stamps the start time", () => {
    assert.equal(defaultSessionId(new Date("2026-03-01T09:05:07.123Z")), "20260301_090507");
  });
});

describe("runCampaignCommand", () => {
  it("runs a batch, writes the report and exits 0", async () => {
    await withTempDir(async (dir) => {
      const { file, logger, deps } = await setup(dir);
      const service = new ScriptedService(succeedAll());

      const code = await runCampaignCommand(["run", file, "--session", "s1"], deps(service));

      assert.equal(code, 0);
      assert.equal(service.calls.length, 2);
      const reportPath = join(dir, "reports", "campaign-report-s1.yaml");
      const report: unknown = parseYaml(await readFile(reportPath, "utf-8"));
      assert.deepEqual(
        typeof report === "object" && report !== null && "totals" in report ? report.totals : null,
        { tasks: 2, succeeded: 2, failed: 0, skipped: 0, unfinished: 0 },
      );
      assert.ok(logger.textAt("log").includes(`Report: ${reportPath}`));
    });
  });

  it("exits 2 when a variant fails", async () => {
    await withTempDir(async (dir) => {
      const { file, logger, deps } = await setup(dir);
      const service = new ScriptedService(() => ({
        kind: "fatal_failure",
        errorText: "Session expired",
      }));

      assert.equal(await runCampaignCommand(["run", file, "--session", "s1"], deps(service)), 2);
      assert.ok(
        logger
          .textAt("log")
          .includes(`Retry failures with: campaign run ${file} --resume s1 --retry-failed`),
      );
    });
  });

  it("exits 1 on an invalid campaign-set file", async () => {
    await withTempDir(async (dir) => {
      const { file, logger, deps } = await setup(dir, "templates: { desktop: 1 }\n");
      assert.equal(await runCampaignCommand(["run", file], deps(new ScriptedService(succeedAll()))), 1);
      assert.deepEqual(logger.textAt("error"), [
        "Invalid campaign definition: Must have at least one campaign set",
      ]);
    });
  });

  it("exits 1 when resuming a session that does not exist", async () => {
    await withTempDir(async (dir) => {
      const { file, logger, deps } = await setup(dir);
      assert.equal(await runCampaignCommand(["run", file, "--resume", "ghost"], deps()), 1);
      assert.deepEqual(logger.textAt("error"), [
        `No checkpoint found for session ghost in ${join(dir, "checkpoints")}`,
      ]);
    });
  });

  it("needs a driver unless it is a dry run", async () => {
    await withTempDir(async (dir) => {
      const { file, logger, deps } = await setup(dir);
      assert.equal(await runCampaignCommand(["run", file], deps()), 1);
      assert.deepEqual(logger.textAt("error"), [
        "No driver configured: pass --driver <command>, set CAMPAIGN_DRIVER_COMMAND, or use --dry-run",
      ]);

      assert.equal(await runCampaignCommand(["run", file, "--session", "dry", "--dry-run"], deps()), 0);
      assert.ok(
        logger
          .textAt("log")
          .includes("[dry-run] Would create US_EN_NATIVE_CPA_ALL_KEY-Broad_DESK_M_OP from template 1001 with 2 creatives"),
      );
    });
  });

  it("shows a session's status", async () => {
    await withTempDir(async (dir) => {
      const { file, logger, deps } = await setup(dir);
      const service = new ScriptedService((request) => ({
        kind: "success",
        entityId: `E-${request.variant}`,
        artifactsCount: 2,
      }));
      await runCampaignCommand(["run", file, "--session", "s1"], deps(service));
      logger.lines.length = 0;

      assert.equal(await runCampaignCommand(["status", "s1"], deps()), 0);
      const lines = logger.textAt("log");
      assert.equal(lines[0], "Session: s1");
      assert.ok(lines.includes("Gardening:"));
      assert.ok(lines.includes("  ✓ desktop succeeded ID: E-desktop (attempts: 1)"));
      assert.ok(lines.includes("  ✓ ios succeeded ID: E-ios (attempts: 1)"));
      assert.match(lines[lines.length - 1] ?? "", /^Elapsed: \d+s \| Tasks: 2\/2 succeeded$/);

      assert.equal(await runCampaignCommand(["status", "nope"], deps()), 1);
      assert.equal(await runCampaignCommand(["status"], deps()), 1);
    });
  });

  it("lists sessions", async () => {
    await withTempDir(async (dir) => {
      const { file, logger, deps } = await setup(dir);
      assert.equal(await runCampaignCommand(["list"], deps()), 0);
      assert.deepEqual(logger.textAt("log"), ["No campaign sessions found."]);

      await runCampaignCommand(["run", file, "--session", "s1"], deps(new ScriptedService(succeedAll())));
      logger.lines.length = 0;

      assert.equal(await runCampaignCommand(["list"], deps()), 0);
      const [line] = logger.textAt("log");
      assert.ok(line?.startsWith(`${"s1".padEnd(24)}  ${"2/2 ok".padEnd(22)}  `));
    });
  });

  it("prints help and rejects unknown commands", async () => {
    const logger = new RecordingLogger();
    assert.equal(await runCampaignCommand(["help"], { logger }), 0);
    assert.equal(logger.textAt("log")[0], "Usage: campaign <command> [options]");

    assert.equal(await runCampaignCommand(["frobnicate"], { logger }), 1);
    assert.deepEqual(logger.textAt("error"), ["Unknown command: frobnicate"]);
  });
});
