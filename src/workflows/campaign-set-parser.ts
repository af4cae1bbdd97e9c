/**
 * Campaign Set Parser
 *
 * Parses a campaign-set YAML file into typed CampaignSets plus the template
 * ids the template-based variants clone from. Resolves relative creative
 * sources against the file's directory and validates required fields.
 *
 * Variant names are only checked here against the templates they need;
 * expandCampaignSets owns variant validation.
 */

import { parse as parseYaml } from "yaml";
import { join, isAbsolute } from "node:path";

import { SESSION_ID_RE } from "../extensions/checkpoint-store.js";
import { describeError } from "../logger.js";

import {
  InvalidDefinitionError,
  parseVariantKind,
  predecessorOf,
  type CampaignSet,
  type CampaignSettings,
  type Keyword,
  type OsVersionConstraint,
  type TemplateVariant,
} from "./work-items.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TemplateIds = Partial<Record<TemplateVariant, string>>;

export interface CampaignSetFile {
  /** Default session id for runs of this file. */
  session?: string;
  templates: TemplateIds;
  campaignSets: CampaignSet[];
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_SETTINGS: CampaignSettings = {
  geo: ["US"],
  keywords: [],
  language: "EN",
  source: "ALL",
  targetCpa: 50,
  perSourceBudget: 200,
  maxBid: 10,
  frequencyCap: 2,
  maxDailyBudget: 250,
  gender: "male",
  bidType: "CPA",
  adFormat: "NATIVE",
  campaignType: "Standard",
  iosVersion: { operator: "all" },
  androidVersion: { operator: "all" },
};

const VALID_GENDERS = ["male", "female", "all"] as const;
const VALID_BID_TYPES = ["CPA", "CPM"] as const;
const VALID_AD_FORMATS = ["NATIVE", "INSTREAM"] as const;
const VALID_CAMPAIGN_TYPES = ["Standard", "Remarketing"] as const;
const TEMPLATE_VARIANTS: readonly TemplateVariant[] = [
  "desktop",
  "ios",
  "all_mobile",
];

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function validateRequired(obj: RawObject, field: string, context: string): void {
  if (obj[field] === undefined || obj[field] === null || obj[field] === "") {
    throw new InvalidDefinitionError([
      `Missing required field "${field}" in ${context}`,
    ]);
  }
}

/**
 * Dual-convention accessor: accepts snake_case keys and their camelCase
 * spelling, since both turn up in hand-written files.
 */
function getField(obj: RawObject, snakeKey: string): unknown {
  if (obj[snakeKey] !== undefined) return obj[snakeKey];
  const camelKey = snakeKey.replace(/_([a-z])/g, (_, l: string) =>
    l.toUpperCase(),
  );
  return obj[camelKey];
}

function pickOne<T extends string>(
  value: unknown,
  allowed: readonly T[],
  fallback: T,
  context: string,
  issues: string[],
): T {
  if (value === undefined || value === null || value === "") return fallback;
  const text = String(value).trim();
  const match = allowed.find((a) => a.toLowerCase() === text.toLowerCase());
  if (!match) {
    issues.push(`${context}: "${text}" is not one of ${allowed.join(", ")}`);
    return fallback;
  }
  return match;
}

function positiveNumber(
  value: unknown,
  fallback: number,
  context: string,
  issues: string[],
): number {
  if (value === undefined || value === null || value === "") return fallback;
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    issues.push(`${context}: must be a positive number (got ${String(value)})`);
    return fallback;
  }
  return n;
}

function stringList(value: unknown): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  const items = Array.isArray(value) ? value : String(value).split(",");
  return items.map((v) => String(v).trim()).filter((v) => v.length > 0);
}

// ---------------------------------------------------------------------------
// Field parsers
// ---------------------------------------------------------------------------

/**
 * Parse an OS version constraint: "all", ">18.4", "<11", "=12.0".
 * A bare version means "newer than".
 */
export function parseOsVersion(value: unknown): OsVersionConstraint {
  if (value === undefined || value === null) return { operator: "all" };
  const text = String(value).trim();
  if (!text || text.toLowerCase() === "all" || text.toLowerCase() === "all versions") {
    return { operator: "all" };
  }
  const head = text.charAt(0);
  const rest = text.slice(1).trim();
  if (head === ">") return { operator: "newer_than", version: rest };
  if (head === "<") return { operator: "older_than", version: rest };
  if (head === "=") return { operator: "equal", version: rest };
  return { operator: "newer_than", version: text };
}

function parseKeywords(value: unknown, context: string, issues: string[]): Keyword[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    return (stringList(value) ?? []).map((name): Keyword => ({ name, matchType: "broad" }));
  }
  const keywords: Keyword[] = [];
  value.forEach((item, i) => {
    if (isObject(item)) {
      const name = String(item.name ?? "").trim();
      if (!name) {
        issues.push(`${context}[${i}]: keyword name is empty`);
        return;
      }
      const matchType = pickOne(
        getField(item, "match_type"),
        ["broad", "exact"] as const,
        "broad",
        `${context}[${i}].match_type`,
        issues,
      );
      keywords.push({ name, matchType });
      return;
    }
    const name = String(item).trim();
    if (name) keywords.push({ name, matchType: "broad" });
  });
  return keywords;
}

function parseSettings(
  raw: RawObject,
  base: CampaignSettings,
  context: string,
  issues: string[],
): CampaignSettings {
  const frequencyCap = positiveNumber(
    getField(raw, "frequency_cap"),
    base.frequencyCap,
    `${context}.frequency_cap`,
    issues,
  );
  if (!Number.isInteger(frequencyCap) || frequencyCap > 99) {
    issues.push(`${context}.frequency_cap: must be an integer between 1 and 99`);
  }

  const testNumber = getField(raw, "test_number");

  return {
    geo: stringList(raw.geo)?.map((g) => g.toUpperCase()) ?? base.geo,
    keywords:
      raw.keywords !== undefined
        ? parseKeywords(raw.keywords, `${context}.keywords`, issues)
        : base.keywords,
    language: raw.language ? String(raw.language).toUpperCase() : base.language,
    source: raw.source ? String(raw.source).toUpperCase() : base.source,
    targetCpa: positiveNumber(getField(raw, "target_cpa"), base.targetCpa, `${context}.target_cpa`, issues),
    perSourceBudget: positiveNumber(
      getField(raw, "per_source_budget"),
      base.perSourceBudget,
      `${context}.per_source_budget`,
      issues,
    ),
    maxBid: positiveNumber(getField(raw, "max_bid"), base.maxBid, `${context}.max_bid`, issues),
    frequencyCap,
    maxDailyBudget: positiveNumber(
      getField(raw, "max_daily_budget"),
      base.maxDailyBudget,
      `${context}.max_daily_budget`,
      issues,
    ),
    gender: pickOne(raw.gender, VALID_GENDERS, base.gender, `${context}.gender`, issues),
    bidType: pickOne(getField(raw, "bid_type"), VALID_BID_TYPES, base.bidType, `${context}.bid_type`, issues),
    adFormat: pickOne(getField(raw, "ad_format"), VALID_AD_FORMATS, base.adFormat, `${context}.ad_format`, issues),
    campaignType: pickOne(
      getField(raw, "campaign_type"),
      VALID_CAMPAIGN_TYPES,
      base.campaignType,
      `${context}.campaign_type`,
      issues,
    ),
    iosVersion:
      getField(raw, "ios_version") !== undefined
        ? parseOsVersion(getField(raw, "ios_version"))
        : base.iosVersion,
    androidVersion:
      getField(raw, "android_version") !== undefined
        ? parseOsVersion(getField(raw, "android_version"))
        : base.androidVersion,
    testNumber:
      testNumber !== undefined && testNumber !== null && testNumber !== ""
        ? String(testNumber)
        : base.testNumber,
  };
}

/**
 * Resolve a path relative to the campaign-set file's directory.
 * Absolute paths are returned as-is.
 */
function resolvePath(path: string, baseDir: string): string {
  if (isAbsolute(path)) return path;
  return join(baseDir, path);
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Parse a campaign-set YAML string.
 *
 * @param yamlContent - Raw YAML
 * @param baseDir - Directory relative creative sources resolve against
 * @throws InvalidDefinitionError if the file is structurally unusable,
 *   a setting is out of range, or a requested variant has no template
 */
export function parseCampaignSetFile(
  yamlContent: string,
  baseDir: string,
): CampaignSetFile {
  let raw: unknown;
  try {
    // Creative and template ids can exceed 2^53; keep integers exact.
    raw = parseYaml(yamlContent, { intAsBigInt: true });
  } catch (error) {
    throw new InvalidDefinitionError([
      `YAML syntax error: ${describeError(error).split("\n")[0]}`,
    ]);
  }
  if (!isObject(raw)) {
    throw new InvalidDefinitionError(["YAML content is not a valid object"]);
  }

  const issues: string[] = [];

  // --- Session ---
  let session: string | undefined;
  if (raw.session !== undefined && raw.session !== null) {
    session = String(raw.session);
    if (!SESSION_ID_RE.test(session)) {
      issues.push(`session "${session}" must match ${SESSION_ID_RE.source}`);
    }
  }

  // --- Templates ---
  const templates: TemplateIds = {};
  const rawTemplates = raw.templates;
  if (rawTemplates !== undefined && !isObject(rawTemplates)) {
    issues.push("templates must be a mapping of variant to template id");
  } else if (rawTemplates) {
    for (const [name, id] of Object.entries(rawTemplates)) {
      const kind = parseVariantKind(name);
      if (!kind || kind === "android") {
        issues.push(
          `templates.${name}: not a template variant (expected ${TEMPLATE_VARIANTS.join(", ")})`,
        );
        continue;
      }
      if (id === undefined || id === null || String(id).trim() === "") {
        issues.push(`templates.${name}: template id is empty`);
        continue;
      }
      templates[kind] = String(id).trim();
    }
  }

  // --- Shared defaults ---
  const rawDefaults = raw.defaults;
  const defaults = isObject(rawDefaults)
    ? parseSettings(rawDefaults, DEFAULT_SETTINGS, "defaults", issues)
    : DEFAULT_SETTINGS;

  // --- Campaign sets ---
  const rawSets = getField(raw, "campaign_sets");
  if (!Array.isArray(rawSets) || rawSets.length === 0) {
    throw new InvalidDefinitionError(["Must have at least one campaign set"]);
  }

  const campaignSets: CampaignSet[] = rawSets.map((entry: unknown, i) => {
    const context = `campaign_sets[${i}]`;
    if (!isObject(entry)) {
      throw new InvalidDefinitionError([`${context} must be a mapping`]);
    }
    validateRequired(entry, "name", context);
    validateRequired(entry, "variants", context);

    const rawSettings = entry.settings;
    const merged: RawObject = {
      ...(isObject(rawSettings) ? rawSettings : {}),
      // geo and keywords may sit at the top level of the entry
      ...(entry.geo !== undefined ? { geo: entry.geo } : {}),
      ...(entry.keywords !== undefined ? { keywords: entry.keywords } : {}),
    };
    const settings = parseSettings(merged, defaults, context, issues);

    const rawCreatives = entry.creatives;
    if (!isObject(rawCreatives)) {
      throw new InvalidDefinitionError([
        `Missing required field "creatives" in ${context}`,
      ]);
    }
    validateRequired(rawCreatives, "source", `${context}.creatives`);
    const ids = rawCreatives.ids;
    const creativeIds = stringList(ids) ?? [];
    if (new Set(creativeIds).size !== creativeIds.length) {
      issues.push(`${context}.creatives.ids: contains duplicate ids`);
    }

    return {
      name: String(entry.name).trim(),
      variants: stringList(entry.variants) ?? [],
      settings,
      creatives: {
        source: resolvePath(String(rawCreatives.source), baseDir),
        creativeIds,
      },
      enabled: entry.enabled !== false,
    };
  });

  // --- Templates needed by requested variants ---
  campaignSets.forEach((set, i) => {
    if (!set.enabled) return;
    for (const name of set.variants) {
      const kind = parseVariantKind(name);
      if (!kind) continue;
      const templateVariant = predecessorOf(kind) ?? kind;
      if (templateVariant !== "android" && !templates[templateVariant]) {
        issues.push(
          `campaign_sets[${i}] ("${set.name}"): variant "${kind}" needs a "${templateVariant}" template id`,
        );
      }
    }
  });

  if (issues.length > 0) {
    throw new InvalidDefinitionError([...new Set(issues)]);
  }

  return { session, templates, campaignSets };
}
