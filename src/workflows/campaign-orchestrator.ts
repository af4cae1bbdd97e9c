/**
 * Campaign Orchestrator
 *
 * Drives every campaign set through its variants against the Remote
 * Campaign Service: desktop and ios clone fixed templates, android clones
 * the ios entity of the same set. Progress is checkpointed after every
 * transition so a multi-hour batch resumes where it stopped.
 *
 * Key design:
 * - Per task: Pending → InProgress → Succeeded | Failed, or Pending →
 *   Skipped when the checkpoint says the work is already settled
 * - A failed ios makes its android fail with PredecessorFailed, without a
 *   remote call
 * - Validation failures run a bounded cleaning loop: strip the creative
 *   ids the error names, call again
 * - Any one task's failure is local; the batch always carries on
 * - Workers partition the sets round-robin, each with its own service
 *   session and its own checkpoint shard
 * - All state lives in an explicit OrchestratorContext
 */

import type {
  CheckpointSession,
  CheckpointStore,
  CheckpointRecord,
  VariantTaskSnapshot,
} from "../extensions/checkpoint-store.js";
import { ProgressTracker, formatDuration, type ProgressStats } from "../extensions/progress-tracker.js";
import {
  invokeConfigure,
  type CloneSource,
  type ConfigureRequest,
  type RemoteCampaignService,
  type RemoteSessionFactory,
} from "../extensions/remote-campaign-service.js";
import { extractInvalidEntityIds } from "../extensions/validation-errors.js";
import { consoleLogger, describeError, withPrefix, type Logger } from "../logger.js";
import { campaignNameFor } from "./campaign-naming.js";
import type { TemplateIds } from "./campaign-set-parser.js";
import {
  assertNever,
  expandCampaignSets,
  groupBySet,
  type CampaignSet,
  type TaskFailure,
  type TaskKey,
  type TaskStatus,
  type VariantTask,
  type VariantTaskState,
} from "./work-items.js";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface OrchestratorOptions {
  /** Re-attempt tasks the checkpoint records as Failed. */
  retryFailed: boolean;
  /** Cleaning passes allowed after the first validation failure. */
  maxCleaningPasses: number;
  callTimeoutMs: number;
  workers: number;
  operatorInitials: string;
  progressWindow: number;
}

export const DEFAULT_ORCHESTRATOR_OPTIONS: OrchestratorOptions = {
  retryFailed: false,
  maxCleaningPasses: 1,
  callTimeoutMs: 15 * 60_000,
  workers: 1,
  operatorInitials: "OP",
  progressWindow: 10,
};

/** Everything one worker needs; passed explicitly, never held globally. */
export interface OrchestratorContext {
  workerId: number;
  checkpoint: CheckpointSession;
  progress: ProgressTracker;
  service: RemoteCampaignService;
  templates: TemplateIds;
  logger: Logger;
  options: OrchestratorOptions;
  signal?: AbortSignal;
  now: () => number;
}

export interface TaskResult {
  key: TaskKey;
  setName: string;
  variant: VariantTask["variant"];
  implicit: boolean;
  /** Outcome of this run; in_progress means interrupted mid-call. */
  status: TaskStatus;
  /** What the checkpoint held before a skip. */
  priorStatus: TaskStatus | null;
  remoteEntityId: string | null;
  artifactsCount: number;
  attemptCount: number;
  error: TaskFailure | null;
  remoteCalls: number;
  durationMs: number;
  workerId: number;
}

export interface BatchInput {
  sessionId: string;
  campaignSets: CampaignSet[];
  templates: TemplateIds;
  store: CheckpointStore;
  serviceFactory: RemoteSessionFactory;
  options?: Partial<OrchestratorOptions>;
  /** Discard any existing checkpoint for the session first. */
  fresh?: boolean;
  logger?: Logger;
  signal?: AbortSignal;
  now?: () => number;
}

export interface BatchResult {
  sessionId: string;
  status: "completed" | "partial" | "failed";
  interrupted: boolean;
  tasks: TaskResult[];
  remoteCalls: number;
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
  progress: ProgressStats;
}

// ---------------------------------------------------------------------------
// Single task
// ---------------------------------------------------------------------------

function stateFrom(snapshot: VariantTaskSnapshot, status = snapshot.status): VariantTaskState {
  return {
    status,
    remoteEntityId: snapshot.remoteEntityId,
    error: snapshot.error,
    attemptCount: snapshot.attemptCount,
    artifactsCount: snapshot.artifactsCount,
    createdAt: snapshot.createdAt,
    updatedAt: snapshot.updatedAt,
  };
}

function label(task: VariantTask): string {
  return `${task.campaignSet.name}/${task.variant}`;
}

/**
 * Run one variant task to a terminal state (or leave it InProgress when the
 * run is interrupted mid-call). Never throws for remote failures; only a
 * checkpoint write failure propagates.
 */
export async function runVariantTask(
  task: VariantTask,
  ctx: OrchestratorContext,
): Promise<TaskResult> {
  const { checkpoint, progress, logger, options } = ctx;
  const started = ctx.now();
  let remoteCalls = 0;

  const result = (priorStatus: TaskStatus | null = null): TaskResult => ({
    key: task.key,
    setName: task.campaignSet.name,
    variant: task.variant,
    implicit: task.implicit,
    status: task.state.status,
    priorStatus,
    remoteEntityId: task.state.remoteEntityId,
    artifactsCount: task.state.artifactsCount,
    attemptCount: task.state.attemptCount,
    error: task.state.error,
    remoteCalls,
    durationMs: ctx.now() - started,
    workerId: ctx.workerId,
  });

  // --- 1. Already settled? ---
  const existing = checkpoint.snapshot(task.key);
  if (existing && checkpoint.shouldSkip(task.key, options.retryFailed)) {
    task.state = stateFrom(existing, "skipped");
    progress.recordSkip();
    logger.log(
      existing.status === "succeeded"
        ? `⊗ Skipped ${label(task)}: already created (ID: ${existing.remoteEntityId ?? "?"})`
        : `⊗ Skipped ${label(task)}: failed in an earlier run (use --retry-failed)`,
    );
    return result(existing.status);
  }

  // --- 2. InProgress ---
  task.state = stateFrom(await checkpoint.markStarted(task.key));
  logger.log(`Creating ${label(task)} (attempt ${task.state.attemptCount})`);

  const fail = async (failure: TaskFailure, timed: boolean): Promise<TaskResult> => {
    task.state = stateFrom(await checkpoint.markFailed(task.key, failure));
    progress.recordCompletion(ctx.now() - started, timed);
    logger.log(`✗ Failed ${label(task)} [${failure.reason}]: ${failure.message.slice(0, 300)}`);
    if (failure.strippedIds.length > 0) {
      logger.log(`  Stripped creatives: ${failure.strippedIds.join(", ")}`);
    }
    logger.log(progress.formatProgressLine());
    return result();
  };

  // --- 3. Clone source ---
  let cloneFrom: CloneSource;
  if (task.predecessor) {
    const pred = checkpoint.snapshot(task.predecessor);
    if (pred?.status !== "succeeded" || !pred.remoteEntityId) {
      return fail(
        {
          reason: "PredecessorFailed",
          message: `${task.predecessor} did not succeed (status: ${pred?.status ?? "missing"}); nothing to clone from`,
          strippedIds: [],
        },
        false,
      );
    }
    cloneFrom = { kind: "predecessor", entityId: pred.remoteEntityId };
  } else {
    const templateId =
      task.variant === "android" ? undefined : ctx.templates[task.variant];
    if (!templateId) {
      return fail(
        {
          reason: "FatalFailure",
          message: `No template id configured for variant "${task.variant}"`,
          strippedIds: [],
        },
        false,
      );
    }
    cloneFrom = { kind: "template", templateId };
  }

  // --- 4/5. Configure, with the cleaning loop ---
  // Private copy: only this loop ever edits the creative list.
  let creatives = [...task.campaignSet.creatives.creativeIds];
  const stripped: string[] = [];
  const campaignName = campaignNameFor(task.campaignSet, task.variant, options.operatorInitials);

  for (let pass = 1; ; pass++) {
    if (creatives.length === 0) {
      return fail(
        {
          reason: "NoArtifacts",
          message:
            stripped.length > 0
              ? "Every creative was rejected by validation; nothing left to upload"
              : `Creative source ${task.campaignSet.creatives.source} has no creatives`,
          strippedIds: stripped,
        },
        remoteCalls > 0,
      );
    }

    const request: ConfigureRequest = {
      taskKey: task.key,
      setName: task.campaignSet.name,
      variant: task.variant,
      campaignName,
      cloneFrom,
      predecessorEntityId: cloneFrom.kind === "predecessor" ? cloneFrom.entityId : null,
      settings: task.campaignSet.settings,
      creativeSource: { source: task.campaignSet.creatives.source, creativeIds: [...creatives] },
      pass,
    };

    remoteCalls += 1;
    const outcome = await invokeConfigure(ctx.service, request, {
      timeoutMs: options.callTimeoutMs,
      signal: ctx.signal,
    });

    switch (outcome.kind) {
      case "interrupted":
        // Left InProgress on disk: the next --resume re-attempts it.
        logger.warn(`Interrupted during ${label(task)}; it will be re-attempted on resume`);
        return result();

      case "success": {
        task.state = stateFrom(
          await checkpoint.markSucceeded(task.key, outcome.entityId, outcome.artifactsCount),
        );
        progress.recordCompletion(ctx.now() - started);
        logger.log(`✓ Created ${campaignName} (ID: ${outcome.entityId})`);
        logger.log(
          `  Uploaded ${outcome.artifactsCount} ads | ${formatDuration((ctx.now() - started) / 1000)}`,
        );
        logger.log(progress.formatProgressLine());
        return result();
      }

      case "fatal_failure":
        return fail(
          { reason: "FatalFailure", message: outcome.errorText, strippedIds: stripped },
          true,
        );

      case "validation_failure": {
        const named = extractInvalidEntityIds(outcome.errorText);
        const present = creatives.filter((id) => named.has(id));

        if (named.size === 0) {
          return fail(
            {
              reason: "ValidationFailure",
              message: `${outcome.errorText} (no creative ids recognized in the error)`,
              strippedIds: stripped,
            },
            true,
          );
        }
        if (present.length === 0) {
          return fail(
            {
              reason: "ValidationFailure",
              message: `${outcome.errorText} (named ids ${[...named].join(", ")} are not in the creative source)`,
              strippedIds: stripped,
            },
            true,
          );
        }
        if (pass > options.maxCleaningPasses) {
          return fail(
            {
              reason: "ValidationFailure",
              message: `${outcome.errorText} (retry budget of ${options.maxCleaningPasses} cleaning pass(es) exhausted; still rejected: ${present.join(", ")})`,
              strippedIds: stripped,
            },
            true,
          );
        }

        stripped.push(...present);
        creatives = creatives.filter((id) => !named.has(id));
        logger.log(
          `  Validation rejected ${present.length} creative(s) for ${label(task)}: ${present.join(", ")}; retrying with ${creatives.length}`,
        );
        break;
      }

      default:
        return assertNever(outcome);
    }
  }
}

// ---------------------------------------------------------------------------
// Campaign set
// ---------------------------------------------------------------------------

/**
 * Run one set's tasks in order. Stops early only when the run is aborted;
 * tasks not reached keep their Pending status.
 */
export async function runCampaignSet(
  tasks: VariantTask[],
  ctx: OrchestratorContext,
): Promise<TaskResult[]> {
  const results: TaskResult[] = [];
  const first = tasks[0];
  if (!first) return results;

  ctx.logger.log(
    `=== Campaign set: ${first.campaignSet.name} (${tasks.map((t) => t.variant).join(", ")}) ===`,
  );
  for (const task of tasks) {
    if (ctx.signal?.aborted) break;
    results.push(await runVariantTask(task, ctx));
  }
  return results;
}

// ---------------------------------------------------------------------------
// Batch
// ---------------------------------------------------------------------------

/** Round-robin partition of campaign set names across workers. */
export function partitionSets(setNames: string[], workers: number): string[][] {
  const count = Math.max(1, Math.min(workers, setNames.length));
  const partitions: string[][] = Array.from({ length: count }, () => []);
  setNames.forEach((name, i) => {
    partitions[i % count]?.push(name);
  });
  return partitions;
}

function seedFor(
  prior: CheckpointRecord | null,
  keys: Set<string>,
): CheckpointRecord | undefined {
  if (!prior) return undefined;
  const tasks: CheckpointRecord["tasks"] = {};
  for (const [key, snapshot] of Object.entries(prior.tasks)) {
    if (keys.has(key)) tasks[key] = snapshot;
  }
  return { ...prior, tasks };
}

function unstartedResult(task: VariantTask, workerId: number): TaskResult {
  return {
    key: task.key,
    setName: task.campaignSet.name,
    variant: task.variant,
    implicit: task.implicit,
    status: task.state.status,
    priorStatus: null,
    remoteEntityId: task.state.remoteEntityId,
    artifactsCount: task.state.artifactsCount,
    attemptCount: task.state.attemptCount,
    error: task.state.error,
    remoteCalls: 0,
    durationMs: 0,
    workerId,
  };
}

/**
 * Expand, resume and run a whole batch.
 *
 * @throws InvalidDefinitionError before any checkpoint or remote work when
 *   the campaign sets are unusable
 */
export async function runBatch(input: BatchInput): Promise<BatchResult> {
  const now = input.now ?? Date.now;
  const options: OrchestratorOptions = { ...DEFAULT_ORCHESTRATOR_OPTIONS, ...input.options };
  const logger = withPrefix(input.logger ?? consoleLogger, "campaign");
  const { store, sessionId } = input;
  const startedAt = now();

  const tasks = expandCampaignSets(input.campaignSets);
  const groups = groupBySet(tasks);

  if (input.fresh) {
    await store.discard(sessionId);
  }
  const prior = await store.loadMerged(sessionId);
  if (prior) {
    logger.log(`Resuming session ${sessionId} (checkpoint from ${prior.lastUpdatedAt})`);
  } else {
    logger.log(`Starting session ${sessionId}`);
  }

  const partitions = partitionSets([...groups.keys()], options.workers);
  const parallel = partitions.length > 1;
  const progress = new ProgressTracker(tasks.length, {
    windowSize: options.progressWindow,
    now,
  });

  logger.log(
    `${groups.size} campaign set(s), ${tasks.length} variant task(s), ${partitions.length} worker(s)`,
  );

  const resultsByKey = new Map<TaskKey, TaskResult>();

  const runWorker = async (setNames: string[], index: number): Promise<void> => {
    const workerId = index + 1;
    const workerTasks = setNames.flatMap((name) => groups.get(name) ?? []);
    const keys = new Set<string>(workerTasks.map((t) => t.key));
    const checkpoint = await store.open(sessionId, {
      shard: parallel ? workerId : undefined,
      // A sequential run keeps every prior task in the main file; a shard
      // only carries the sets its worker owns.
      seed: parallel ? seedFor(prior, keys) : prior ?? undefined,
    });
    await checkpoint.registerTasks(workerTasks.map((t) => t.key));

    const service = await input.serviceFactory(workerId);
    const ctx: OrchestratorContext = {
      workerId,
      checkpoint,
      progress,
      service,
      templates: input.templates,
      logger: parallel ? withPrefix(logger, `w${workerId}`) : logger,
      options,
      signal: input.signal,
      now,
    };

    try {
      for (const name of setNames) {
        if (input.signal?.aborted) break;
        const setResults = await runCampaignSet(groups.get(name) ?? [], ctx);
        for (const r of setResults) resultsByKey.set(r.key, r);
      }
    } finally {
      await service.close?.();
    }
  };

  const settled = await Promise.allSettled(partitions.map(runWorker));
  const failures = settled.filter(
    (s): s is PromiseRejectedResult => s.status === "rejected",
  );
  for (const f of failures) {
    logger.error(`Worker stopped: ${describeError(f.reason, 500)}`);
  }
  if (failures[0]) {
    throw failures[0].reason;
  }

  const workerOf = new Map<string, number>();
  partitions.forEach((names, i) => names.forEach((n) => workerOf.set(n, i + 1)));

  const results = tasks.map(
    (task) =>
      resultsByKey.get(task.key) ??
      unstartedResult(task, workerOf.get(task.campaignSet.name.trim()) ?? 1),
  );

  const succeeded = results.filter(
    (r) => r.status === "succeeded" || (r.status === "skipped" && r.priorStatus === "succeeded"),
  ).length;
  const status: BatchResult["status"] =
    succeeded === results.length ? "completed" : succeeded > 0 ? "partial" : "failed";

  const finishedAt = now();
  const interrupted = input.signal?.aborted ?? false;
  logger.log(
    `Session ${sessionId} finished: ${status}${interrupted ? " (interrupted)" : ""} in ${formatDuration((finishedAt - startedAt) / 1000)}`,
  );

  return {
    sessionId,
    status,
    interrupted,
    tasks: results,
    remoteCalls: results.reduce((sum, r) => sum + r.remoteCalls, 0),
    startedAt: new Date(startedAt).toISOString(),
    finishedAt: new Date(finishedAt).toISOString(),
    elapsedMs: finishedAt - startedAt,
    progress: progress.stats(),
  };
}
