/**
 * Run Report
 *
 * Final summary of a batch for the operator: a YAML file per session with
 * one entry per campaign set and variant, plus a console summary. Every
 * failure carries its error text and stripped creative ids so it can be
 * fixed on the platform and re-run with --retry-failed.
 */

import { mkdir, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { stringify as stringifyYaml } from "yaml";

import { consoleLogger, type Logger } from "../logger.js";
import { formatDuration } from "./progress-tracker.js";
import type { BatchResult, TaskResult } from "../workflows/campaign-orchestrator.js";
import { isTerminal } from "../workflows/work-items.js";

export interface ReportVariant {
  variant: string;
  status: string;
  previous_status?: string;
  entity_id: string | null;
  artifacts_count: number;
  attempts: number;
  error?: string;
  failure_reason?: string;
  stripped_creatives?: string[];
}

export interface ReportSet {
  name: string;
  variants: ReportVariant[];
}

export interface RunReport {
  session_id: string;
  status: BatchResult["status"];
  interrupted: boolean;
  started_at: string;
  finished_at: string;
  elapsed_seconds: number;
  remote_calls: number;
  totals: {
    tasks: number;
    succeeded: number;
    failed: number;
    skipped: number;
    unfinished: number;
  };
  campaign_sets: ReportSet[];
}

function toVariant(task: TaskResult): ReportVariant {
  const entry: ReportVariant = {
    variant: task.variant,
    status: task.status,
    entity_id: task.remoteEntityId,
    artifacts_count: task.artifactsCount,
    attempts: task.attemptCount,
  };
  if (task.priorStatus) entry.previous_status = task.priorStatus;
  if (task.error) {
    entry.failure_reason = task.error.reason;
    entry.error = task.error.message;
    if (task.error.strippedIds.length > 0) {
      entry.stripped_creatives = [...task.error.strippedIds];
    }
  }
  return entry;
}

export function buildRunReport(result: BatchResult): RunReport {
  const sets = new Map<string, ReportVariant[]>();
  for (const task of result.tasks) {
    const list = sets.get(task.setName) ?? [];
    list.push(toVariant(task));
    sets.set(task.setName, list);
  }

  const count = (status: TaskResult["status"]) =>
    result.tasks.filter((t) => t.status === status).length;

  return {
    session_id: result.sessionId,
    status: result.status,
    interrupted: result.interrupted,
    started_at: result.startedAt,
    finished_at: result.finishedAt,
    elapsed_seconds: Math.round(result.elapsedMs / 1000),
    remote_calls: result.remoteCalls,
    totals: {
      tasks: result.tasks.length,
      succeeded: count("succeeded"),
      failed: count("failed"),
      skipped: count("skipped"),
      unfinished: result.tasks.filter((t) => !isTerminal(t.status)).length,
    },
    campaign_sets: [...sets].map(([name, variants]) => ({ name, variants })),
  };
}

/**
 * Write `campaign-report-<session>.yaml` into `dir` (temp file + rename).
 * Returns the report path.
 */
export async function writeRunReport(report: RunReport, dir: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const file = join(dir, `campaign-report-${report.session_id}.yaml`);
  const tmp = `${file}.${process.pid}.tmp`;
  await writeFile(tmp, stringifyYaml(report), "utf-8");
  await rename(tmp, file);
  return file;
}

/** Human-readable summary, one line per log call. */
export function printRunSummary(report: RunReport, logger: Logger = consoleLogger): void {
  const rule = "=".repeat(65);
  const t = report.totals;

  logger.log("");
  logger.log(rule);
  logger.log("CAMPAIGN CREATION SUMMARY");
  logger.log(rule);
  logger.log(`Session: ${report.session_id} | Status: ${report.status}${report.interrupted ? " (interrupted)" : ""}`);
  logger.log(`Total time: ${formatDuration(report.elapsed_seconds)}`);
  logger.log(`Variant tasks: ${t.tasks}`);
  logger.log(`  ✓ Created: ${t.succeeded}`);
  if (t.failed > 0) logger.log(`  ✗ Failed: ${t.failed}`);
  if (t.skipped > 0) logger.log(`  ⊗ Skipped: ${t.skipped}`);
  if (t.unfinished > 0) logger.log(`  … Unfinished: ${t.unfinished} (resume to continue)`);

  const failed = report.campaign_sets.flatMap((s) =>
    s.variants.filter((v) => v.status === "failed").map((v) => ({ set: s.name, v })),
  );
  if (failed.length > 0) {
    logger.log("");
    logger.log("FAILED");
    for (const { set, v } of failed) {
      logger.log(`  ${set} (${v.variant}) [${v.failure_reason ?? "unknown"}]`);
      logger.log(`    Error: ${(v.error ?? "").slice(0, 300)}`);
      if (v.stripped_creatives) {
        logger.log(`    Stripped creatives: ${v.stripped_creatives.join(", ")}`);
      }
    }
  }

  const created = report.campaign_sets.flatMap((s) =>
    s.variants.filter((v) => v.status === "succeeded").map((v) => ({ set: s.name, v })),
  );
  if (created.length > 0) {
    logger.log("");
    logger.log("CREATED");
    for (const { set, v } of created) {
      logger.log(`  ✓ ${set} (${v.variant}) ID: ${v.entity_id ?? "?"} | ${v.artifacts_count} ads`);
    }
  }
  logger.log(rule);
}
