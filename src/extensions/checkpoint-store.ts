/**
 * Checkpoint Store
 *
 * Durable per-session record of every variant task's status, so a
 * multi-hour batch can be resumed after a crash or an operator abort.
 *
 * - One JSON file per session: `checkpoint_<session>.json`
 * - Parallel workers each write their own shard: `checkpoint_<session>.w<N>.json`
 * - Every write goes to a temp file in the same directory and is renamed
 *   over the target, so a reader sees either the old or the new record
 * - A file that fails to parse is renamed aside (`.corrupt-<stamp>`) and
 *   the session starts fresh; the bad file is kept for inspection
 */

import { mkdir, readFile, readdir, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";

import { consoleLogger, describeError, withPrefix, type Logger } from "../logger.js";
import {
  FAILURE_REASONS,
  TASK_STATUSES,
  VARIANT_KINDS,
  type TaskFailure,
  type TaskKey,
  type TaskStatus,
  type VariantKind,
} from "../workflows/work-items.js";

// ---------------------------------------------------------------------------
// Record shape
// ---------------------------------------------------------------------------

export interface VariantTaskSnapshot {
  setName: string;
  variant: VariantKind;
  status: TaskStatus;
  remoteEntityId: string | null;
  error: TaskFailure | null;
  attemptCount: number;
  artifactsCount: number;
  createdAt: string;
  updatedAt: string;
}

export interface CheckpointRecord {
  sessionId: string;
  startedAt: string;
  lastUpdatedAt: string;
  tasks: Record<string, VariantTaskSnapshot>;
}

const TaskFailureSchema = z.object({
  reason: z.enum(FAILURE_REASONS),
  message: z.string(),
  strippedIds: z.array(z.string()).default([]),
});

const SnapshotSchema = z.object({
  setName: z.string().min(1),
  variant: z.enum(VARIANT_KINDS),
  status: z.enum(TASK_STATUSES),
  remoteEntityId: z.string().nullable().default(null),
  error: TaskFailureSchema.nullable().default(null),
  attemptCount: z.number().int().min(0).default(0),
  artifactsCount: z.number().int().min(0).default(0),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const RecordSchema = z.object({
  sessionId: z.string().min(1),
  startedAt: z.string(),
  lastUpdatedAt: z.string(),
  tasks: z.record(SnapshotSchema),
});

export const SESSION_ID_RE = /^[a-zA-Z0-9_-]+$/;
const CHECKPOINT_FILE_RE = /^checkpoint_([a-zA-Z0-9_-]+)(?:\.w(\d+))?\.json$/;

export class CheckpointError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CheckpointError";
  }
}

export function parseTaskKey(key: string): { setName: string; variant: VariantKind } {
  const at = key.lastIndexOf("::");
  const setName = at > 0 ? key.slice(0, at) : "";
  const variant = VARIANT_KINDS.find((v) => v === key.slice(at + 2));
  if (!setName || !variant) {
    throw new CheckpointError(`Malformed task key: "${key}"`);
  }
  return { setName, variant };
}

export interface CheckpointSummary {
  sessionId: string;
  startedAt: string;
  lastUpdatedAt: string;
  shards: number;
  counts: Record<TaskStatus, number>;
}

type ReadResult =
  | { kind: "missing" }
  | { kind: "corrupt"; reason: string }
  | { kind: "ok"; record: CheckpointRecord };

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class CheckpointStore {
  private readonly logger: Logger;

  constructor(
    readonly dir: string,
    logger: Logger = consoleLogger,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.logger = withPrefix(logger, "checkpoint");
  }

  fileFor(sessionId: string, shard?: number): string {
    if (!SESSION_ID_RE.test(sessionId)) {
      throw new CheckpointError(
        `Invalid session id "${sessionId}" (must match ${SESSION_ID_RE.source})`,
      );
    }
    const suffix = shard === undefined ? "" : `.w${shard}`;
    return join(this.dir, `checkpoint_${sessionId}${suffix}.json`);
  }

  /** A fresh, empty record for a session. */
  createRecord(sessionId: string): CheckpointRecord {
    const stamp = this.now().toISOString();
    return { sessionId, startedAt: stamp, lastUpdatedAt: stamp, tasks: {} };
  }

  /**
   * Load one checkpoint file. Returns null when it does not exist, or when
   * it was corrupt (after moving it aside).
   */
  async load(sessionId: string, shard?: number): Promise<CheckpointRecord | null> {
    const file = this.fileFor(sessionId, shard);
    const result = await this.read(file);
    switch (result.kind) {
      case "missing":
        return null;
      case "ok":
        return result.record;
      case "corrupt":
        await this.quarantine(file, result.reason);
        return null;
    }
  }

  /**
   * Load the session's main file and every worker shard, keeping the most
   * recently updated snapshot of each task.
   */
  async loadMerged(sessionId: string): Promise<CheckpointRecord | null> {
    const shards = await this.shardsOf(sessionId);
    const records: CheckpointRecord[] = [];
    for (const shard of shards) {
      const record = await this.load(sessionId, shard ?? undefined);
      if (record) records.push(record);
    }
    if (records.length === 0) return null;
    return mergeRecords(sessionId, records);
  }

  /**
   * Write a record atomically: temp file in the same directory, then rename.
   */
  async save(record: CheckpointRecord, shard?: number): Promise<void> {
    const file = this.fileFor(record.sessionId, shard);
    const tmp = `${file}.${process.pid}.tmp`;
    await mkdir(this.dir, { recursive: true });
    try {
      await writeFile(tmp, JSON.stringify(record, null, 2), "utf-8");
      await rename(tmp, file);
    } catch (error) {
      await rm(tmp, { force: true });
      throw new CheckpointError(
        `Failed to write checkpoint ${file}: ${describeError(error, 500)}`,
      );
    }
  }

  /**
   * Remove a session's main file and all of its shards. Quarantined files
   * are left alone. Returns the number of files removed.
   */
  async discard(sessionId: string): Promise<number> {
    const shards = await this.shardsOf(sessionId);
    for (const shard of shards) {
      await rm(this.fileFor(sessionId, shard ?? undefined), { force: true });
    }
    if (shards.length > 0) {
      this.logger.log(`Discarded ${shards.length} checkpoint file(s) for ${sessionId}`);
    }
    return shards.length;
  }

  /** Sessions with a readable checkpoint, newest first. Read-only. */
  async list(): Promise<CheckpointSummary[]> {
    const sessions = new Map<string, CheckpointRecord[]>();
    for (const name of await this.fileNames()) {
      const match = CHECKPOINT_FILE_RE.exec(name);
      if (!match?.[1]) continue;
      const result = await this.read(join(this.dir, name));
      if (result.kind !== "ok") continue;
      const list = sessions.get(match[1]) ?? [];
      list.push(result.record);
      sessions.set(match[1], list);
    }

    const summaries: CheckpointSummary[] = [];
    for (const [sessionId, records] of sessions) {
      const merged = mergeRecords(sessionId, records);
      summaries.push({
        sessionId,
        startedAt: merged.startedAt,
        lastUpdatedAt: merged.lastUpdatedAt,
        shards: records.length,
        counts: countStatuses(merged),
      });
    }
    return summaries.sort((a, b) => b.lastUpdatedAt.localeCompare(a.lastUpdatedAt));
  }

  /**
   * Open a writable session bound to one file (the main file, or a worker
   * shard). `seed` replaces whatever is on disk for that file.
   */
  async open(
    sessionId: string,
    options: { shard?: number; seed?: CheckpointRecord } = {},
  ): Promise<CheckpointSession> {
    const record =
      options.seed ??
      (await this.load(sessionId, options.shard)) ??
      this.createRecord(sessionId);
    const session = new CheckpointSession(
      this,
      structuredClone(record),
      options.shard,
      this.now,
    );
    await this.save(record, options.shard);
    return session;
  }

  // --- internals ---

  private async fileNames(): Promise<string[]> {
    try {
      return await readdir(this.dir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }

  /** Shard numbers on disk for a session; null stands for the main file. */
  private async shardsOf(sessionId: string): Promise<Array<number | null>> {
    const shards: Array<number | null> = [];
    for (const name of await this.fileNames()) {
      const match = CHECKPOINT_FILE_RE.exec(name);
      if (!match || match[1] !== sessionId) continue;
      shards.push(match[2] === undefined ? null : Number(match[2]));
    }
    return shards.sort((a, b) => (a ?? -1) - (b ?? -1));
  }

  private async read(file: string): Promise<ReadResult> {
    let content: string;
    try {
      content = await readFile(file, "utf-8");
    } catch (error) {
      if (isNotFound(error)) return { kind: "missing" };
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      return { kind: "corrupt", reason: describeError(error, 200) };
    }

    const parsed = RecordSchema.safeParse(json);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      return {
        kind: "corrupt",
        reason: first ? `${first.path.join(".")}: ${first.message}` : "schema mismatch",
      };
    }
    return { kind: "ok", record: parsed.data };
  }

  private async quarantine(file: string, reason: string): Promise<void> {
    const stamp = this.now().toISOString().replace(/[:.]/g, "-");
    const aside = `${file}.corrupt-${stamp}`;
    await rename(file, aside);
    this.logger.warn(
      `Corrupt checkpoint ${file} (${reason}) moved to ${aside}; starting a fresh record`,
    );
  }
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

/**
 * A writable view of one checkpoint file. Every mutator is
 * load-modify-save under a process-local lock, so concurrent callers in
 * one process never interleave writes to the same file.
 */
export class CheckpointSession {
  private lock: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly store: CheckpointStore,
    private readonly current: CheckpointRecord,
    readonly shard: number | undefined,
    private readonly now: () => Date,
  ) {}

  /** Deep copy of the record as last written. */
  get record(): CheckpointRecord {
    return structuredClone(this.current);
  }

  snapshot(key: TaskKey): VariantTaskSnapshot | undefined {
    const task = this.current.tasks[key];
    return task ? structuredClone(task) : undefined;
  }

  /**
   * Whether the task can be left alone this run. In-progress tasks come
   * from an interrupted run and are always re-attempted.
   */
  shouldSkip(key: TaskKey, retryFailed: boolean): boolean {
    const status = this.current.tasks[key]?.status;
    switch (status) {
      case "succeeded":
        return true;
      case "failed":
        return !retryFailed;
      case undefined:
      case "pending":
      case "in_progress":
      case "skipped":
        return false;
    }
  }

  markStarted(key: TaskKey): Promise<VariantTaskSnapshot> {
    return this.mutate(key, (task) => {
      task.status = "in_progress";
      task.attemptCount += 1;
      task.remoteEntityId = null;
      task.error = null;
      task.artifactsCount = 0;
    });
  }

  markSucceeded(
    key: TaskKey,
    remoteEntityId: string,
    artifactsCount: number,
  ): Promise<VariantTaskSnapshot> {
    return this.mutate(key, (task) => {
      task.status = "succeeded";
      task.remoteEntityId = remoteEntityId;
      task.artifactsCount = artifactsCount;
      task.error = null;
    });
  }

  markFailed(key: TaskKey, failure: TaskFailure): Promise<VariantTaskSnapshot> {
    return this.mutate(key, (task) => {
      task.status = "failed";
      task.error = {
        ...failure,
        message: failure.message.slice(0, 2000),
        strippedIds: [...failure.strippedIds],
      };
    });
  }

  /**
   * Add a pending snapshot for every key the record does not know yet, in
   * one write. Existing snapshots are left untouched.
   */
  registerTasks(keys: TaskKey[]): Promise<number> {
    return this.withLock(async () => {
      const missing = keys.filter((key) => !this.current.tasks[key]);
      if (missing.length === 0) return 0;

      const stamp = this.now().toISOString();
      const tasks = { ...this.current.tasks };
      for (const key of missing) {
        tasks[key] = pendingSnapshot(key, stamp);
      }
      await this.store.save(
        { ...this.current, lastUpdatedAt: stamp, tasks },
        this.shard,
      );
      this.current.lastUpdatedAt = stamp;
      this.current.tasks = tasks;
      return missing.length;
    });
  }

  private mutate(
    key: TaskKey,
    apply: (task: VariantTaskSnapshot) => void,
  ): Promise<VariantTaskSnapshot> {
    return this.withLock(async () => {
      const stamp = this.now().toISOString();
      const existing = this.current.tasks[key];
      const task = existing ? structuredClone(existing) : pendingSnapshot(key, stamp);
      apply(task);
      task.updatedAt = stamp;

      const next: CheckpointRecord = {
        ...this.current,
        lastUpdatedAt: stamp,
        tasks: { ...this.current.tasks, [key]: task },
      };
      await this.store.save(next, this.shard);
      // Only adopt the new state once it is on disk.
      this.current.lastUpdatedAt = next.lastUpdatedAt;
      this.current.tasks = next.tasks;
      return structuredClone(task);
    });
  }

  private withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.lock.then(fn, fn);
    // The caller receives run's rejection; the chain only needs ordering.
    this.lock = run.catch(() => undefined);
    return run;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function pendingSnapshot(key: TaskKey, stamp: string): VariantTaskSnapshot {
  return {
    ...parseTaskKey(key),
    status: "pending",
    remoteEntityId: null,
    error: null,
    attemptCount: 0,
    artifactsCount: 0,
    createdAt: stamp,
    updatedAt: stamp,
  };
}

export function mergeRecords(
  sessionId: string,
  records: CheckpointRecord[],
): CheckpointRecord {
  const tasks: Record<string, VariantTaskSnapshot> = {};
  let startedAt = "";
  let lastUpdatedAt = "";
  for (const record of records) {
    if (!startedAt || record.startedAt < startedAt) startedAt = record.startedAt;
    if (record.lastUpdatedAt > lastUpdatedAt) lastUpdatedAt = record.lastUpdatedAt;
    for (const [key, task] of Object.entries(record.tasks)) {
      const seen = tasks[key];
      if (!seen || task.updatedAt > seen.updatedAt) {
        tasks[key] = structuredClone(task);
      }
    }
  }
  return { sessionId, startedAt, lastUpdatedAt, tasks };
}

export function countStatuses(record: CheckpointRecord): Record<TaskStatus, number> {
  const counts: Record<TaskStatus, number> = {
    pending: 0,
    in_progress: 0,
    succeeded: 0,
    failed: 0,
    skipped: 0,
  };
  for (const task of Object.values(record.tasks)) {
    counts[task.status] += 1;
  }
  return counts;
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
