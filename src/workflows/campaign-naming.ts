/**
 * Campaign names on the ad platform follow a fixed convention:
 *
 *   {GEO}_{LANG}_{FORMAT}_{BID}_{SOURCE}_{KEY|RMK}-{Keyword}_{DEVICE}_{GENDER}_{INITIALS}[_T-{n}]
 *
 * The name is what lets a re-attempted task recognize an entity that an
 * interrupted run already created.
 */

import type { CampaignSet, VariantKind } from "./work-items.js";

const DEVICE_CODES: Record<VariantKind, string> = {
  desktop: "DESK",
  ios: "iOS",
  android: "AND",
  all_mobile: "MOB_ALL",
};

const GENDER_CODES = { male: "M", female: "F", all: "MF" } as const;

function keywordTitle(keyword: string | undefined): string {
  if (!keyword || !keyword.trim() || keyword.trim().toLowerCase() === "unknown") {
    return "Broad";
  }
  return keyword
    .trim()
    .split(/\s+/)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join("");
}

export function campaignNameFor(
  set: CampaignSet,
  variant: VariantKind,
  operatorInitials: string,
): string {
  const s = set.settings;
  const remarketing = s.campaignType === "Remarketing";
  // Remarketing campaigns have no keywords; the set name stands in.
  const keyword = remarketing ? set.name : s.keywords[0]?.name;

  const base = [
    s.geo.join("-"),
    s.language,
    s.adFormat === "INSTREAM" ? "PREROLL" : s.adFormat,
    s.bidType,
    s.source,
    `${remarketing ? "RMK" : "KEY"}-${keywordTitle(keyword)}`,
    DEVICE_CODES[variant],
    GENDER_CODES[s.gender],
    operatorInitials,
  ].join("_");

  return s.testNumber ? `${base}_T-${s.testNumber}` : base;
}
