/**
 * Shared builders and fakes for the test suites.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type {
  ConfigureRequest,
  ConfigureResult,
  RemoteCampaignService,
} from "../extensions/remote-campaign-service.js";
import { DEFAULT_SETTINGS } from "../workflows/campaign-set-parser.js";
import type { CampaignSet, CampaignSettings } from "../workflows/work-items.js";

export function campaignSet(
  name: string,
  variants: string[],
  overrides: {
    creativeIds?: string[];
    settings?: Partial<CampaignSettings>;
    enabled?: boolean;
  } = {},
): CampaignSet {
  return {
    name,
    variants,
    settings: { ...DEFAULT_SETTINGS, ...overrides.settings },
    creatives: {
      source: `/creatives/${name.toLowerCase()}.csv`,
      creativeIds: overrides.creativeIds ?? ["101", "102"],
    },
    enabled: overrides.enabled ?? true,
  };
}

type Responder = (
  request: ConfigureRequest,
  call: number,
  signal: AbortSignal,
) => ConfigureResult | Promise<ConfigureResult>;

/** Records every request and answers from a script. */
export class ScriptedService implements RemoteCampaignService {
  readonly calls: ConfigureRequest[] = [];
  closed = false;

  constructor(private readonly respond: Responder) {}

  async configure(request: ConfigureRequest, signal: AbortSignal): Promise<ConfigureResult> {
    this.calls.push(structuredClone(request));
    return this.respond(request, this.calls.length, signal);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

let entitySeq = 5000;

/** Every call succeeds and uploads every creative it was given. */
export function succeedAll(): Responder {
  return (request) => ({
    kind: "success",
    entityId: String(++entitySeq),
    artifactsCount: request.creativeSource.creativeIds.length,
  });
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), "campaign-test-"));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/** Clock that advances one second per reading. */
export function tickingClock(start = "2026-03-01T10:00:00.000Z"): () => Date {
  let ms = new Date(start).getTime();
  return () => {
    const at = new Date(ms);
    ms += 1000;
    return at;
  };
}
