import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { RecordingLogger } from "../logger.js";
import { tickingClock, withTempDir } from "../testing/fixtures.js";
import {
  CheckpointError,
  CheckpointStore,
  parseTaskKey,
  type CheckpointRecord,
  type VariantTaskSnapshot,
} from "./checkpoint-store.js";

function snapshot(
  setName: string,
  variant: VariantTaskSnapshot["variant"],
  status: VariantTaskSnapshot["status"],
  updatedAt: string,
): VariantTaskSnapshot {
  return {
    setName,
    variant,
    status,
    remoteEntityId: status === "succeeded" ? `E-${setName}-${variant}` : null,
    error: null,
    attemptCount: status === "pending" ? 0 : 1,
    artifactsCount: 0,
    createdAt: "2026-03-01T09:00:00.000Z",
    updatedAt,
  };
}

describe("CheckpointStore", () => {
  it("registers tasks and persists transitions", async () => {
    await withTempDir(async (dir) => {
      const store = new CheckpointStore(dir, new RecordingLogger(), tickingClock());
      const session = await store.open("s1");

      assert.equal(await session.registerTasks(["Gardening::desktop", "Gardening::ios"]), 2);
      assert.equal(await session.registerTasks(["Gardening::desktop"]), 0);

      const started = await session.markStarted("Gardening::desktop");
      assert.equal(started.status, "in_progress");
      assert.equal(started.attemptCount, 1);
      await session.markSucceeded("Gardening::desktop", "5001", 3);

      const onDisk = await store.load("s1");
      assert.deepEqual(onDisk?.tasks["Gardening::desktop"], {
        setName: "Gardening",
        variant: "desktop",
        status: "succeeded",
        remoteEntityId: "5001",
        error: null,
        attemptCount: 1,
        artifactsCount: 3,
        createdAt: "2026-03-01T10:00:01.000Z",
        updatedAt: "2026-03-01T10:00:03.000Z",
      });
      assert.equal(onDisk?.tasks["Gardening::ios"]?.status, "pending");
      assert.deepEqual(await readdir(dir), ["checkpoint_s1.json"]);
    });
  });

  it("decides what a run may skip", async () => {
    await withTempDir(async (dir) => {
      const session = await new CheckpointStore(dir, new RecordingLogger()).open("s1");
      await session.registerTasks(["A::desktop", "A::ios", "A::android", "A::all_mobile"]);
      await session.markSucceeded("A::desktop", "1", 1);
      await session.markFailed("A::ios", { reason: "FatalFailure", message: "x", strippedIds: [] });
      await session.markStarted("A::android");

      assert.equal(session.shouldSkip("A::desktop", false), true);
      assert.equal(session.shouldSkip("A::ios", false), true);
      assert.equal(session.shouldSkip("A::ios", true), false);
      assert.equal(session.shouldSkip("A::android", false), false);
      assert.equal(session.shouldSkip("A::all_mobile", false), false);
      assert.equal(session.shouldSkip("B::desktop", false), false);
    });
  });

  it("starts a new attempt from a clean slate", async () => {
    await withTempDir(async (dir) => {
      const session = await new CheckpointStore(dir, new RecordingLogger()).open("s1");
      await session.markFailed("A::ios", {
        reason: "ValidationFailure",
        message: "x".repeat(2500),
        strippedIds: ["77"],
      });
      const failed = session.snapshot("A::ios");
      assert.equal(failed?.error?.message.length, 2000);
      assert.deepEqual(failed?.error?.strippedIds, ["77"]);

      const restarted = await session.markStarted("A::ios");
      assert.equal(restarted.error, null);
      assert.equal(restarted.attemptCount, 1);
      assert.equal(restarted.status, "in_progress");
    });
  });

  it("ignores a stray temp file from an interrupted write", async () => {
    await withTempDir(async (dir) => {
      const store = new CheckpointStore(dir, new RecordingLogger());
      const session = await store.open("s1");
      await session.markSucceeded("A::desktop", "5001", 2);
      await writeFile(`${store.fileFor("s1")}.4242.tmp`, '{"sessionId": "s1", "tas', "utf-8");

      const reloaded = await store.load("s1");
      assert.equal(reloaded?.tasks["A::desktop"]?.status, "succeeded");
      assert.deepEqual(
        (await store.list()).map((s) => s.sessionId),
        ["s1"],
      );
    });
  });

  it("keeps the old record and state when a write fails", async () => {
    await withTempDir(async (dir) => {
      const store = new CheckpointStore(dir, new RecordingLogger());
      const session = await store.open("s2");
      await session.registerTasks(["A::desktop"]);

      // A directory in place of the file makes the final rename fail.
      const file = store.fileFor("s2");
      await rm(file);
      await mkdir(join(file, "blocker"), { recursive: true });

      await assert.rejects(session.markSucceeded("A::desktop", "1", 1), {
        name: "CheckpointError",
        message: /^Failed to write checkpoint /,
      });
      assert.equal(session.snapshot("A::desktop")?.status, "pending");
      assert.deepEqual(await readdir(dir), ["checkpoint_s2.json"]);
    });
  });

  it("moves a corrupt checkpoint aside and starts fresh", async () => {
    await withTempDir(async (dir) => {
      const logger = new RecordingLogger();
      const store = new CheckpointStore(
        dir,
        logger,
        () => new Date("2026-03-01T10:00:00.000Z"),
      );
      await writeFile(store.fileFor("s1"), "{not json", "utf-8");

      assert.equal(await store.load("s1"), null);
      assert.deepEqual(await readdir(dir), [
        "checkpoint_s1.json.corrupt-2026-03-01T10-00-00-000Z",
      ]);
      const [warning] = logger.textAt("warn");
      assert.match(
        warning ?? "",
        /^\[checkpoint\] Corrupt checkpoint .*checkpoint_s1\.json \(.+\) moved to .*checkpoint_s1\.json\.corrupt-2026-03-01T10-00-00-000Z; starting a fresh record$/,
      );
    });
  });

  it("treats a schema mismatch as corruption", async () => {
    await withTempDir(async (dir) => {
      const logger = new RecordingLogger();
      const store = new CheckpointStore(dir, logger);
      await writeFile(store.fileFor("s1"), JSON.stringify({ sessionId: "s1" }), "utf-8");

      const session = await store.open("s1");
      assert.deepEqual(session.record.tasks, {});
      assert.match(logger.textAt("warn")[0] ?? "", /\(startedAt: Required\)/);
    });
  });

  it("merges worker shards, newest snapshot first", async () => {
    await withTempDir(async (dir) => {
      const store = new CheckpointStore(dir, new RecordingLogger());
      const main: CheckpointRecord = {
        sessionId: "s1",
        startedAt: "2026-03-01T09:00:00.000Z",
        lastUpdatedAt: "2026-03-01T09:10:00.000Z",
        tasks: {
          "A::ios": snapshot("A", "ios", "pending", "2026-03-01T09:10:00.000Z"),
          "B::desktop": snapshot("B", "desktop", "failed", "2026-03-01T09:05:00.000Z"),
        },
      };
      const shard: CheckpointRecord = {
        sessionId: "s1",
        startedAt: "2026-03-01T09:30:00.000Z",
        lastUpdatedAt: "2026-03-01T09:40:00.000Z",
        tasks: {
          "A::ios": snapshot("A", "ios", "succeeded", "2026-03-01T09:40:00.000Z"),
        },
      };
      await store.save(main);
      await store.save(shard, 1);

      const merged = await store.loadMerged("s1");
      assert.equal(merged?.startedAt, "2026-03-01T09:00:00.000Z");
      assert.equal(merged?.lastUpdatedAt, "2026-03-01T09:40:00.000Z");
      assert.equal(merged?.tasks["A::ios"]?.status, "succeeded");
      assert.equal(merged?.tasks["B::desktop"]?.status, "failed");
    });
  });

  it("discards every file of a session", async () => {
    await withTempDir(async (dir) => {
      const logger = new RecordingLogger();
      const store = new CheckpointStore(dir, logger);
      await (await store.open("s1")).registerTasks(["A::desktop"]);
      await store.open("s1", { shard: 1 });
      await store.open("s1", { shard: 2 });
      await store.open("other");

      assert.equal(await store.discard("s1"), 3);
      assert.equal(await store.loadMerged("s1"), null);
      assert.deepEqual(await readdir(dir), ["checkpoint_other.json"]);
      assert.deepEqual(logger.textAt("log"), [
        "[checkpoint] Discarded 3 checkpoint file(s) for s1",
      ]);
    });
  });

  it("lists sessions newest first", async () => {
    await withTempDir(async (dir) => {
      const store = new CheckpointStore(dir, new RecordingLogger(), tickingClock());
      const older = await store.open("older");
      await older.registerTasks(["A::desktop", "A::ios"]);
      await older.markSucceeded("A::desktop", "1", 1);
      await store.open("newer");

      const sessions = await store.list();
      assert.deepEqual(
        sessions.map((s) => [s.sessionId, s.shards, s.counts.succeeded, s.counts.pending]),
        [
          ["newer", 1, 0, 0],
          ["older", 1, 1, 1],
        ],
      );
    });
  });

  it("lists nothing when the directory does not exist", async () => {
    await withTempDir(async (dir) => {
      const store = new CheckpointStore(join(dir, "missing"), new RecordingLogger());
      assert.deepEqual(await store.list(), []);
      assert.equal(await store.loadMerged("s1"), null);
    });
  });

  it("refuses session ids that could escape the directory", () => {
    const store = new CheckpointStore("/tmp/none", new RecordingLogger());
    assert.throws(() => store.fileFor("../etc"), CheckpointError);
  });

  it("writes pretty-printed JSON", async () => {
    await withTempDir(async (dir) => {
      const store = new CheckpointStore(dir, new RecordingLogger());
      await store.open("s1");
      const text = await readFile(store.fileFor("s1"), "utf-8");
      assert.equal(text.split("\n")[1], '  "sessionId": "s1",');
    });
  });
});

describe("parseTaskKey", () => {
  it("splits at the last separator", () => {
    assert.deepEqual(parseTaskKey("Gardening::android"), {
      setName: "Gardening",
      variant: "android",
    });
  });

  it("rejects malformed keys", () => {
    assert.throws(() => parseTaskKey("Gardening::tablet"), {
      message: 'Malformed task key: "Gardening::tablet"',
    });
    assert.throws(() => parseTaskKey("::ios"), CheckpointError);
  });
});
