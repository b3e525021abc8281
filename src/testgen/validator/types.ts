/**
 * Static validator types
 */

import type { FileAnalysis } from "../../indexer/types.js";
import type { StubTarget } from "../context.js";

/** Ordinal quality classification, low < medium < high */
export type QualityTier = "low" | "medium" | "high";

export const QUALITY_TIERS: readonly QualityTier[] = ["low", "medium", "high"];

export interface ValidationReport {
  /** Subject file id (test file name) */
  file: string;
  compiles: boolean;
  realistic: boolean;
  quality: QualityTier;
  /** Issues in check order */
  issues: string[];
}

export interface CheckInput {
  /** Normalized test text */
  testCode: string;
  /** Facts of the source under test */
  analysis: FileAnalysis;
  /** Cross-file symbols the test was asked to stub */
  stubTargets: readonly StubTarget[];
}

/**
 * What a check found. Flags are only ever lowered.
 */
export interface CheckOutcome {
  issues: string[];
  compiles?: false;
  realistic?: false;
}

export type CheckConcern = "compilation" | "reality" | "quality" | "consistency" | "domain-feature";

export interface ValidationCheck {
  id: string;
  concern: CheckConcern;
  description: string;
  run(input: CheckInput): CheckOutcome;
}
