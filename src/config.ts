/**
 * Runtime configuration, read once from the environment.
 *
 * CLI flags override these per run (see cli/campaign.ts).
 */

import { z } from "zod";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  CAMPAIGN_CHECKPOINT_DIR: z.string().min(1).default("data/checkpoints"),
  CAMPAIGN_REPORT_DIR: z.string().min(1).default("data/reports"),
  /** Upper bound on a single Configure call (clone + settings + upload). */
  CAMPAIGN_CALL_TIMEOUT_SECONDS: positiveInt(900),
  CAMPAIGN_MAX_CLEANING_PASSES: z.coerce.number().int().min(0).default(1),
  CAMPAIGN_WORKERS: positiveInt(1),
  CAMPAIGN_OPERATOR_INITIALS: z
    .string()
    .regex(/^[A-Za-z]{1,4}$/)
    .default("OP"),
  CAMPAIGN_PROGRESS_WINDOW: positiveInt(10),
  /** Driver run once per variant task when --driver is not given. */
  CAMPAIGN_DRIVER_COMMAND: z.string().min(1).optional(),
});

export interface OrchestratorConfig {
  checkpointDir: string;
  reportDir: string;
  callTimeoutMs: number;
  maxCleaningPasses: number;
  workers: number;
  operatorInitials: string;
  progressWindow: number;
  driverCommand: string | undefined;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = "ConfigError";
  }
}

/**
 * Build the configuration from an environment map. Empty strings count
 * as unset so `FOO= campaign run ...` falls back to the default.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): OrchestratorConfig {
  const cleaned: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(issues);
  }

  const e = parsed.data;
  return {
    checkpointDir: e.CAMPAIGN_CHECKPOINT_DIR,
    reportDir: e.CAMPAIGN_REPORT_DIR,
    callTimeoutMs: e.CAMPAIGN_CALL_TIMEOUT_SECONDS * 1000,
    maxCleaningPasses: e.CAMPAIGN_MAX_CLEANING_PASSES,
    workers: e.CAMPAIGN_WORKERS,
    operatorInitials: e.CAMPAIGN_OPERATOR_INITIALS.toUpperCase(),
    progressWindow: e.CAMPAIGN_PROGRESS_WINDOW,
    driverCommand: e.CAMPAIGN_DRIVER_COMMAND,
  };
}
