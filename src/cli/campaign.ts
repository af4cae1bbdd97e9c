/**
 * Campaign CLI Commands
 *
 * Subcommands: run, status, list, help.
 *
 * Every command returns its exit code instead of calling process.exit, so
 * the whole surface can be driven from tests:
 *   0  nothing failed (an interrupted run with unfinished tasks included)
 *   1  bad invocation, configuration or campaign-set file
 *   2  the run finished with at least one failed variant task
 */

import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import { ConfigError, loadConfig, type OrchestratorConfig } from "../config.js";
import {
  CheckpointStore,
  parseTaskKey,
  type CheckpointRecord,
} from "../extensions/checkpoint-store.js";
import { formatDuration } from "../extensions/progress-tracker.js";
import {
  CommandCampaignService,
  DryRunCampaignService,
  type RemoteSessionFactory,
} from "../extensions/remote-campaign-service.js";
import { buildRunReport, printRunSummary, writeRunReport } from "../extensions/run-report.js";
import { consoleLogger, describeError, type Logger } from "../logger.js";
import { runBatch } from "../workflows/campaign-orchestrator.js";
import { parseCampaignSetFile } from "../workflows/campaign-set-parser.js";
import { InvalidDefinitionError, type TaskStatus } from "../workflows/work-items.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CliDeps {
  env?: Record<string, string | undefined>;
  logger?: Logger;
  /** Replaces the SIGINT/SIGTERM handlers. */
  signal?: AbortSignal;
  /** Replaces the --driver / --dry-run service selection. */
  serviceFactory?: RemoteSessionFactory;
  now?: () => number;
}

export interface RunFlags {
  file: string;
  session?: string;
  resume?: string;
  retryFailed: boolean;
  fresh: boolean;
  workers?: number;
  driver?: string;
  dryRun: boolean;
  timeoutSeconds?: number;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const RUN_USAGE =
  "Usage: campaign run <sets.yaml> [--session <id>] [--resume <id>] [--retry-failed] " +
  "[--fresh] [--workers <n>] [--driver <cmd>] [--dry-run] [--timeout <seconds>]";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

/** Session id from the start time, e.g. `20261018_142530`. */
export function defaultSessionId(at: Date): string {
  return at.toISOString().slice(0, 19).replace(/[-:]/g, "").replace("T", "_");
}

function statusIcon(status: TaskStatus): string {
  switch (status) {
    case "succeeded":
      return "✓";
    case "failed":
      return "✗";
    case "in_progress":
      return "◷";
    case "skipped":
      return "⊗";
    case "pending":
      return "·";
  }
}

function positiveInt(flag: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || !Number.isInteger(value) || value < 1) {
    throw new UsageError(`${flag} expects a positive integer, got "${raw ?? ""}"`);
  }
  return value;
}

/**
 * Hand-rolled flag parsing; `args` excludes the subcommand.
 *
 * @throws UsageError on an unknown flag, a missing value or a conflict
 */
export function parseRunFlags(args: string[]): RunFlags {
  const flags: RunFlags = { file: "", retryFailed: false, fresh: false, dryRun: false };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    const value = (): string => {
      const next = args[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new UsageError(`${arg} needs a value`);
      }
      i++;
      return next;
    };

    switch (arg) {
      case "--session":
        flags.session = value();
        break;
      case "--resume":
        flags.resume = value();
        break;
      case "--retry-failed":
        flags.retryFailed = true;
        break;
      case "--fresh":
        flags.fresh = true;
        break;
      case "--workers":
        flags.workers = positiveInt(arg, value());
        break;
      case "--driver":
        flags.driver = value();
        break;
      case "--dry-run":
        flags.dryRun = true;
        break;
      case "--timeout":
        flags.timeoutSeconds = positiveInt(arg, value());
        break;
      default:
        if (arg.startsWith("--")) throw new UsageError(`Unknown option ${arg}`);
        positional.push(arg);
    }
  }

  if (positional.length !== 1 || !positional[0]) {
    throw new UsageError(RUN_USAGE);
  }
  flags.file = positional[0];

  if (flags.resume && flags.session && flags.resume !== flags.session) {
    throw new UsageError("--session and --resume name different sessions");
  }
  if (flags.resume && flags.fresh) {
    throw new UsageError("--resume and --fresh cannot be combined");
  }
  if (flags.driver && flags.dryRun) {
    throw new UsageError("--driver and --dry-run cannot be combined");
  }
  return flags;
}

function serviceFactoryFor(
  flags: RunFlags,
  config: OrchestratorConfig,
  logger: Logger,
): RemoteSessionFactory {
  if (flags.dryRun) {
    return (workerId) => new DryRunCampaignService(workerId, logger);
  }
  const command = flags.driver ?? config.driverCommand;
  if (!command) {
    throw new UsageError(
      "No driver configured: pass --driver <command>, set CAMPAIGN_DRIVER_COMMAND, or use --dry-run",
    );
  }
  return (workerId) => new CommandCampaignService(command, workerId, logger);
}

/**
 * Abort on SIGINT/SIGTERM. A second signal is left to Node's default
 * handling once the handlers are removed.
 */
function installSignalHandlers(logger: Logger): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSignal = (name: string) => () => {
    logger.warn(`\n${name} received: finishing the current call, then stopping`);
    controller.abort();
    dispose();
  };
  const onInt = onSignal("SIGINT");
  const onTerm = onSignal("SIGTERM");
  const dispose = () => {
    process.off("SIGINT", onInt);
    process.off("SIGTERM", onTerm);
  };
  process.on("SIGINT", onInt);
  process.on("SIGTERM", onTerm);
  return { signal: controller.signal, dispose };
}

// ---------------------------------------------------------------------------
// campaign run
// ---------------------------------------------------------------------------

async function campaignRun(args: string[], deps: CliDeps, logger: Logger): Promise<number> {
  const now = deps.now ?? Date.now;
  const config = loadConfig(deps.env);
  const flags = parseRunFlags(args);

  const path = resolve(flags.file);
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    logger.error(`Cannot read campaign-set file ${flags.file}: ${describeError(error, 300)}`);
    return 1;
  }
  const file = parseCampaignSetFile(content, dirname(path));

  const store = new CheckpointStore(config.checkpointDir, logger);
  const sessionId =
    flags.resume ?? flags.session ?? file.session ?? defaultSessionId(new Date(now()));
  if (flags.resume && !(await store.loadMerged(flags.resume))) {
    logger.error(`No checkpoint found for session ${flags.resume} in ${config.checkpointDir}`);
    return 1;
  }

  const serviceFactory = deps.serviceFactory ?? serviceFactoryFor(flags, config, logger);
  const handlers = deps.signal ? null : installSignalHandlers(logger);

  try {
    const result = await runBatch({
      sessionId,
      campaignSets: file.campaignSets,
      templates: file.templates,
      store,
      serviceFactory,
      options: {
        retryFailed: flags.retryFailed,
        maxCleaningPasses: config.maxCleaningPasses,
        callTimeoutMs: (flags.timeoutSeconds ?? config.callTimeoutMs / 1000) * 1000,
        workers: flags.workers ?? config.workers,
        operatorInitials: config.operatorInitials,
        progressWindow: config.progressWindow,
      },
      fresh: flags.fresh,
      logger,
      signal: deps.signal ?? handlers?.signal,
      now,
    });

    const report = buildRunReport(result);
    printRunSummary(report, logger);
    const reportPath = await writeRunReport(report, config.reportDir);
    logger.log(`Report: ${reportPath}`);
    if (result.interrupted || report.totals.unfinished > 0) {
      logger.log(`Resume with: campaign run ${flags.file} --resume ${sessionId}`);
    } else if (report.totals.failed > 0) {
      logger.log(`Retry failures with: campaign run ${flags.file} --resume ${sessionId} --retry-failed`);
    }
    return report.totals.failed > 0 ? 2 : 0;
  } finally {
    handlers?.dispose();
  }
}

// ---------------------------------------------------------------------------
// campaign status
// ---------------------------------------------------------------------------

function printRecord(record: CheckpointRecord, logger: Logger): void {
  const bySet = new Map<string, string[]>();
  for (const [key, task] of Object.entries(record.tasks)) {
    const { setName } = parseTaskKey(key);
    const id = task.remoteEntityId ? ` ID: ${task.remoteEntityId}` : "";
    const attempts = task.attemptCount > 0 ? ` (attempts: ${task.attemptCount})` : "";
    const lines = bySet.get(setName) ?? [];
    lines.push(`  ${statusIcon(task.status)} ${task.variant} ${task.status}${id}${attempts}`);
    if (task.error) {
      lines.push(`      [${task.error.reason}] ${task.error.message.slice(0, 300)}`);
    }
    bySet.set(setName, lines);
  }
  for (const [setName, lines] of bySet) {
    logger.log(`${setName}:`);
    for (const line of lines) logger.log(line);
  }
}

async function campaignStatus(args: string[], deps: CliDeps, logger: Logger): Promise<number> {
  const sessionId = args[0];
  if (!sessionId) {
    throw new UsageError("Usage: campaign status <session-id>");
  }
  const config = loadConfig(deps.env);
  const store = new CheckpointStore(config.checkpointDir, logger);
  const record = await store.loadMerged(sessionId);
  if (!record) {
    logger.error(`No checkpoint found for session ${sessionId} in ${config.checkpointDir}`);
    return 1;
  }

  const tasks = Object.values(record.tasks);
  const count = (status: TaskStatus) => tasks.filter((t) => t.status === status).length;
  const elapsed =
    (new Date(record.lastUpdatedAt).getTime() - new Date(record.startedAt).getTime()) / 1000;

  logger.log(`Session: ${record.sessionId}`);
  logger.log(`Started: ${formatTimestamp(new Date(record.startedAt))}`);
  logger.log(`Updated: ${formatTimestamp(new Date(record.lastUpdatedAt))}`);
  logger.log("");
  printRecord(record, logger);
  logger.log("");
  logger.log(
    `Elapsed: ${formatDuration(Math.max(0, elapsed))} | ` +
      `Tasks: ${count("succeeded")}/${tasks.length} succeeded` +
      (count("failed") > 0 ? `, ${count("failed")} failed` : "") +
      (count("in_progress") > 0 ? `, ${count("in_progress")} interrupted` : "") +
      (count("pending") > 0 ? `, ${count("pending")} pending` : ""),
  );
  return 0;
}

// ---------------------------------------------------------------------------
// campaign list
// ---------------------------------------------------------------------------

async function campaignList(deps: CliDeps, logger: Logger): Promise<number> {
  const config = loadConfig(deps.env);
  const store = new CheckpointStore(config.checkpointDir, logger);
  const sessions = await store.list();

  if (sessions.length === 0) {
    logger.log("No campaign sessions found.");
    return 0;
  }

  for (const s of sessions) {
    const total = Object.values(s.counts).reduce((sum, n) => sum + n, 0);
    const progress = `${s.counts.succeeded}/${total} ok`;
    const failed = s.counts.failed > 0 ? `, ${s.counts.failed} failed` : "";
    logger.log(
      `${s.sessionId.padEnd(24)}  ${(progress + failed).padEnd(22)}  ` +
        `${formatTimestamp(new Date(s.lastUpdatedAt))}`,
    );
  }
  return 0;
}

// ---------------------------------------------------------------------------
// Help
// ---------------------------------------------------------------------------

function showHelp(logger: Logger): void {
  logger.log("Usage: campaign <command> [options]");
  logger.log("");
  logger.log("Commands:");
  logger.log("  run <sets.yaml> [options]    Create every requested variant");
  logger.log("  status <session-id>          Show a session's checkpoint");
  logger.log("  list                         List sessions with checkpoints");
  logger.log("  help                         Show this help");
  logger.log("");
  logger.log("Run options:");
  logger.log("  --session <id>      Session id (default: from the file, else the start time)");
  logger.log("  --resume <id>       Continue an existing session");
  logger.log("  --retry-failed      Re-attempt tasks that failed in an earlier run");
  logger.log("  --fresh             Discard the session's checkpoint first");
  logger.log("  --workers <n>       Parallel workers (default: CAMPAIGN_WORKERS or 1)");
  logger.log("  --driver <cmd>      Driver command run once per variant");
  logger.log("  --dry-run           Preview without touching the platform");
  logger.log("  --timeout <s>       Per-call timeout in seconds");
}

// ---------------------------------------------------------------------------
// Main entry point
// ---------------------------------------------------------------------------

export async function runCampaignCommand(args: string[], deps: CliDeps = {}): Promise<number> {
  const logger = deps.logger ?? consoleLogger;
  const subcommand = args[0];
  const rest = args.slice(1);

  try {
    switch (subcommand) {
      case "run":
        return await campaignRun(rest, deps, logger);
      case "status":
        return await campaignStatus(rest, deps, logger);
      case "list":
        return await campaignList(deps, logger);
      case undefined:
      case "help":
      case "--help":
        showHelp(logger);
        return 0;
      default:
        logger.error(`Unknown command: ${subcommand}`);
        showHelp(logger);
        return 1;
    }
  } catch (error) {
    if (
      error instanceof UsageError ||
      error instanceof ConfigError ||
      error instanceof InvalidDefinitionError
    ) {
      logger.error(error.message);
      return 1;
    }
    logger.error(`campaign ${subcommand ?? ""} failed: ${describeError(error)}`);
    return 1;
  }
}
