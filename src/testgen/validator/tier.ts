/**
 * Quality tier rules
 */

import { QUALITY_TIERS } from "./types.js";

import type { QualityTier, ValidationReport } from "./types.js";

/**
 * No issues and both flags set is high; at most two issues while
 * compiling is medium; everything else is low
 */
export function computeQuality(report: Pick<ValidationReport, "issues" | "compiles" | "realistic">): QualityTier {
  if (report.issues.length === 0 && report.compiles && report.realistic) {
    return "high";
  }
  if (report.issues.length <= 2 && report.compiles) {
    return "medium";
  }
  return "low";
}

export function tierRank(tier: QualityTier): number {
  return QUALITY_TIERS.indexOf(tier);
}

export function meetsThreshold(tier: QualityTier, threshold: QualityTier): boolean {
  return tierRank(tier) >= tierRank(threshold);
}

/** "high" -> "High" */
export function formatTier(tier: QualityTier): string {
  return `${tier.charAt(0).toUpperCase()}${tier.slice(1)}`;
}
