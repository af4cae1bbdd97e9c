/**
 * Remote Campaign Service
 *
 * The seam between the orchestrator and whatever drives the ad platform.
 * One logical operation per variant: clone-or-create, apply targeting and
 * budget, upload the creatives. The orchestrator only sees the result.
 *
 * Drivers:
 * - DryRunCampaignService: previews a run, creates nothing
 * - CommandCampaignService: runs an external driver command per task
 *   (request as JSON on stdin, YAML/JSON result on stdout)
 */

import { exec } from "node:child_process";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { consoleLogger, describeError, withPrefix, type Logger } from "../logger.js";
import { formatDuration } from "./progress-tracker.js";
import type {
  CampaignSettings,
  CreativeSource,
  TaskKey,
  VariantKind,
} from "../workflows/work-items.js";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export type CloneSource =
  | { kind: "template"; templateId: string }
  | { kind: "predecessor"; entityId: string };

export interface ConfigureRequest {
  taskKey: TaskKey;
  setName: string;
  variant: VariantKind;
  campaignName: string;
  cloneFrom: CloneSource;
  /** Set only for variants that clone another variant's entity. */
  predecessorEntityId: string | null;
  settings: CampaignSettings;
  creativeSource: CreativeSource;
  /** 1 for the first call of a task run, 2 after one cleaning pass, ... */
  pass: number;
}

export type ConfigureResult =
  | { kind: "success"; entityId: string; artifactsCount: number }
  | { kind: "validation_failure"; errorText: string }
  | { kind: "fatal_failure"; errorText: string };

export interface RemoteCampaignService {
  configure(request: ConfigureRequest, signal: AbortSignal): Promise<ConfigureResult>;
  close?(): Promise<void>;
}

/** One service session per worker; sessions are never shared. */
export type RemoteSessionFactory = (
  workerId: number,
) => RemoteCampaignService | Promise<RemoteCampaignService>;

export type CallOutcome = ConfigureResult | { kind: "interrupted" };

// ---------------------------------------------------------------------------
// Bounded invocation
// ---------------------------------------------------------------------------

/**
 * Call `configure` with a deadline. A timeout or a thrown error becomes a
 * fatal failure; an abort of `signal` while the call is in flight becomes
 * "interrupted" and the service is asked to stop through its own signal.
 */
export async function invokeConfigure(
  service: RemoteCampaignService,
  request: ConfigureRequest,
  options: { timeoutMs: number; signal?: AbortSignal },
): Promise<CallOutcome> {
  const { timeoutMs, signal } = options;
  if (signal?.aborted) return { kind: "interrupted" };

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const guard = new Promise<CallOutcome>((resolve) => {
    // Settle before aborting so a service that resolves on abort loses the race.
    timer = setTimeout(() => {
      resolve({
        kind: "fatal_failure",
        errorText: `Configure timed out after ${formatDuration(timeoutMs / 1000)}`,
      });
      controller.abort();
    }, timeoutMs);
    onAbort = () => {
      resolve({ kind: "interrupted" });
      controller.abort();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });

  const call = service.configure(request, controller.signal).then(
    (result): CallOutcome => result,
    (error: unknown): CallOutcome => ({
      kind: "fatal_failure",
      errorText: describeError(error),
    }),
  );

  try {
    return await Promise.race([call, guard]);
  } finally {
    clearTimeout(timer);
    if (onAbort) signal?.removeEventListener("abort", onAbort);
  }
}

// ---------------------------------------------------------------------------
// Dry run
// ---------------------------------------------------------------------------

/**
 * Pretends every call succeeds and every creative uploads. Entity ids are
 * `dry-<worker>-<n>` so dependent variants still get a clone source.
 */
export class DryRunCampaignService implements RemoteCampaignService {
  private created = 0;
  private readonly logger: Logger;

  constructor(
    private readonly workerId = 1,
    logger: Logger = consoleLogger,
  ) {
    this.logger = withPrefix(logger, "dry-run");
  }

  async configure(request: ConfigureRequest): Promise<ConfigureResult> {
    this.created += 1;
    const source =
      request.cloneFrom.kind === "template"
        ? `template ${request.cloneFrom.templateId}`
        : `entity ${request.cloneFrom.entityId}`;
    this.logger.log(
      `Would create ${request.campaignName} from ${source} with ${request.creativeSource.creativeIds.length} creatives`,
    );
    return {
      kind: "success",
      entityId: `dry-${this.workerId}-${this.created}`,
      artifactsCount: request.creativeSource.creativeIds.length,
    };
  }
}

// ---------------------------------------------------------------------------
// External driver command
// ---------------------------------------------------------------------------

const DriverResultSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("success"),
    entity_id: z.union([z.string().min(1), z.bigint()]).transform(String),
    artifacts_count: z.bigint().nonnegative().transform(Number),
  }),
  z.object({ status: z.literal("validation_failure"), error: z.string() }),
  z.object({ status: z.literal("fatal_failure"), error: z.string() }),
]);

/**
 * Parse a driver's stdout. Drivers may print progress first; only the last
 * YAML document is the result.
 */
export function parseDriverOutput(stdout: string): ConfigureResult {
  const documents = stdout.split(/^---\s*$/m).filter((d) => d.trim().length > 0);
  const last = documents[documents.length - 1];
  if (last === undefined) {
    return { kind: "fatal_failure", errorText: "Driver produced no output" };
  }

  let raw: unknown;
  try {
    // Integers come back as bigint so long entity ids stay exact.
    raw = parseYaml(last, { intAsBigInt: true });
  } catch (error) {
    return {
      kind: "fatal_failure",
      errorText: `Driver output is not YAML/JSON: ${describeError(error, 300)}`,
    };
  }

  const parsed = DriverResultSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    return {
      kind: "fatal_failure",
      errorText: `Unexpected driver result${first ? ` (${first.path.join(".") || "root"}: ${first.message})` : ""}`,
    };
  }

  const result = parsed.data;
  switch (result.status) {
    case "success":
      return {
        kind: "success",
        entityId: result.entity_id,
        artifactsCount: result.artifacts_count,
      };
    case "validation_failure":
      return { kind: "validation_failure", errorText: result.error };
    case "fatal_failure":
      return { kind: "fatal_failure", errorText: result.error };
  }
}

/**
 * Runs `command` once per configure call through the shell. The request is
 * written to stdin as JSON and `CAMPAIGN_WORKER_ID` is set, so a browser
 * driver can keep one logged-in profile per worker.
 */
export class CommandCampaignService implements RemoteCampaignService {
  private readonly logger: Logger;

  constructor(
    private readonly command: string,
    private readonly workerId = 1,
    logger: Logger = consoleLogger,
  ) {
    this.logger = withPrefix(logger, `driver:w${workerId}`);
  }

  configure(request: ConfigureRequest, signal: AbortSignal): Promise<ConfigureResult> {
    return new Promise((resolve) => {
      const child = exec(
        this.command,
        {
          maxBuffer: 10 * 1024 * 1024,
          signal,
          env: { ...process.env, CAMPAIGN_WORKER_ID: String(this.workerId) },
        },
        (error, stdout, stderr) => {
          if (error) {
            const msg = (stderr || error.message || "unknown error").slice(0, 2000);
            this.logger.warn(`${request.taskKey} driver exited with an error`);
            resolve({
              kind: "fatal_failure",
              errorText: `Driver failed (code ${error.code ?? "?"}): ${msg}`,
            });
            return;
          }
          resolve(parseDriverOutput(stdout));
        },
      );
      child.stdin?.on("error", (error) => {
        this.logger.warn(`${request.taskKey} driver stdin closed: ${describeError(error, 200)}`);
      });
      child.stdin?.end(JSON.stringify(request));
    });
  }
}
