/**
 * Work-Item Model
 *
 * Typed campaign sets and the variant tasks they expand into. Pure data,
 * no I/O. Expansion is deterministic: the same campaign sets always give
 * the same ordered task list, which is what lets a resumed run line its
 * tasks up against a checkpoint written by an earlier run.
 */

// ---------------------------------------------------------------------------
// Variants
// ---------------------------------------------------------------------------

export const VARIANT_KINDS = ["desktop", "ios", "android", "all_mobile"] as const;

export type VariantKind = (typeof VARIANT_KINDS)[number];

/** Variants that clone from a fixed template rather than another variant. */
export type TemplateVariant = Exclude<VariantKind, "android">;

const VARIANT_ALIASES: Record<string, VariantKind> = {
  desktop: "desktop",
  desk: "desktop",
  ios: "ios",
  android: "android",
  and: "android",
  all_mobile: "all_mobile",
  mobile: "all_mobile",
  mob_all: "all_mobile",
};

/**
 * Normalize a requested variant name ("iOS", "All Mobile", "all-mobile").
 * Returns null for anything unrecognized.
 */
export function parseVariantKind(raw: string): VariantKind | null {
  const normalized = raw.trim().toLowerCase().replace(/[\s-]+/g, "_");
  return VARIANT_ALIASES[normalized] ?? null;
}

/** The variant whose remote entity this one clones, if any. */
export function predecessorOf(variant: VariantKind): VariantKind | null {
  return variant === "android" ? "ios" : null;
}

// ---------------------------------------------------------------------------
// Campaign sets
// ---------------------------------------------------------------------------

export type MatchType = "broad" | "exact";

export interface Keyword {
  name: string;
  matchType: MatchType;
}

export type OsVersionConstraint =
  | { operator: "all" }
  | { operator: "newer_than" | "older_than" | "equal"; version: string };

export interface CampaignSettings {
  geo: string[];
  keywords: Keyword[];
  language: string;
  source: string;
  targetCpa: number;
  perSourceBudget: number;
  maxBid: number;
  frequencyCap: number;
  maxDailyBudget: number;
  gender: "male" | "female" | "all";
  bidType: "CPA" | "CPM";
  adFormat: "NATIVE" | "INSTREAM";
  campaignType: "Standard" | "Remarketing";
  iosVersion: OsVersionConstraint;
  androidVersion: OsVersionConstraint;
  testNumber?: string;
}

/** Where the ads come from, and the creative ids to upload. */
export interface CreativeSource {
  source: string;
  creativeIds: string[];
}

export interface CampaignSet {
  name: string;
  /** As requested, before normalization. Validated by expandCampaignSets. */
  variants: string[];
  settings: CampaignSettings;
  creatives: CreativeSource;
  enabled: boolean;
}

// ---------------------------------------------------------------------------
// Tasks
// ---------------------------------------------------------------------------

export type TaskKey = `${string}::${VariantKind}`;

export const TASK_STATUSES = [
  "pending",
  "in_progress",
  "succeeded",
  "failed",
  "skipped",
] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export const FAILURE_REASONS = [
  "PredecessorFailed",
  "ValidationFailure",
  "FatalFailure",
  "NoArtifacts",
] as const;

export type FailureReason = (typeof FAILURE_REASONS)[number];

export interface TaskFailure {
  reason: FailureReason;
  message: string;
  /** Creative ids removed by validation retries, across all passes. */
  strippedIds: string[];
}

export interface VariantTaskState {
  status: TaskStatus;
  remoteEntityId: string | null;
  error: TaskFailure | null;
  attemptCount: number;
  artifactsCount: number;
  createdAt: string | null;
  updatedAt: string | null;
}

export interface VariantTask {
  readonly key: TaskKey;
  readonly campaignSet: CampaignSet;
  readonly variant: VariantKind;
  readonly predecessor: TaskKey | null;
  /** True when the task was added to satisfy a dependency, not requested. */
  readonly implicit: boolean;
  state: VariantTaskState;
}

export function taskKey(setName: string, variant: VariantKind): TaskKey {
  return `${setName}::${variant}`;
}

export function isTerminal(status: TaskStatus): boolean {
  switch (status) {
    case "succeeded":
    case "failed":
    case "skipped":
      return true;
    case "pending":
    case "in_progress":
      return false;
    default:
      return assertNever(status);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${String(value)}`);
}

export function pendingState(): VariantTaskState {
  return {
    status: "pending",
    remoteEntityId: null,
    error: null,
    attemptCount: 0,
    artifactsCount: 0,
    createdAt: null,
    updatedAt: null,
  };
}

// ---------------------------------------------------------------------------
// Expansion
// ---------------------------------------------------------------------------

export class InvalidDefinitionError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(
      issues.length === 1
        ? `Invalid campaign definition: ${issues[0]}`
        : `Invalid campaign definition (${issues.length} issues):\n  - ${issues.join("\n  - ")}`,
    );
    this.name = "InvalidDefinitionError";
    this.issues = issues;
  }
}

const MAX_SET_NAME_LENGTH = 64;

/**
 * Expand campaign sets into variant tasks, in dependency order.
 *
 * Disabled sets produce nothing. A requested android variant guarantees an
 * ios task for the same set, listed before it. All problems across all
 * sets are collected and thrown together.
 *
 * @throws InvalidDefinitionError on an enabled set without variants, an
 *   unknown variant name, or a duplicate (set, variant) pair
 */
export function expandCampaignSets(campaignSets: CampaignSet[]): VariantTask[] {
  const issues: string[] = [];
  const tasks: VariantTask[] = [];
  const seenNames = new Map<string, number>();

  campaignSets.forEach((set, index) => {
    const label = `campaign set ${index + 1} ("${set.name}")`;

    const name = set.name.trim();
    if (!name || name.length > MAX_SET_NAME_LENGTH) {
      issues.push(`${label}: name must be 1-${MAX_SET_NAME_LENGTH} characters`);
      return;
    }
    if (name.includes("::")) {
      issues.push(`${label}: name must not contain "::"`);
      return;
    }

    const firstIndex = seenNames.get(name);
    if (firstIndex !== undefined) {
      issues.push(
        `${label}: duplicate campaign set name (first defined as campaign set ${firstIndex + 1})`,
      );
      return;
    }
    seenNames.set(name, index);

    if (!set.enabled) return;

    if (set.variants.length === 0) {
      issues.push(`${label}: no variants requested`);
      return;
    }

    const requested: VariantKind[] = [];
    for (const raw of set.variants) {
      const kind = parseVariantKind(raw);
      if (!kind) {
        issues.push(
          `${label}: invalid variant "${raw}" (expected one of ${VARIANT_KINDS.join(", ")})`,
        );
        continue;
      }
      if (requested.includes(kind)) {
        issues.push(`${label}: variant "${kind}" requested more than once`);
        continue;
      }
      requested.push(kind);
    }

    const emitted = new Set<VariantKind>();
    const emit = (variant: VariantKind, implicit: boolean) => {
      const pred = predecessorOf(variant);
      tasks.push({
        key: taskKey(name, variant),
        campaignSet: set,
        variant,
        predecessor: pred ? taskKey(name, pred) : null,
        implicit,
        state: pendingState(),
      });
      emitted.add(variant);
    };

    for (const variant of requested) {
      if (emitted.has(variant)) continue;
      if (variant === "android" && !emitted.has("ios")) {
        emit("ios", !requested.includes("ios"));
      }
      emit(variant, false);
    }
  });

  if (issues.length > 0) {
    throw new InvalidDefinitionError(issues);
  }
  return tasks;
}

/** Group tasks by campaign set name, preserving task order. */
export function groupBySet(tasks: VariantTask[]): Map<string, VariantTask[]> {
  const groups = new Map<string, VariantTask[]>();
  for (const task of tasks) {
    const name = task.campaignSet.name.trim();
    const group = groups.get(name);
    if (group) {
      group.push(task);
    } else {
      groups.set(name, [task]);
    }
  }
  return groups;
}
