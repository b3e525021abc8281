/**
 * Static validator
 *
 * Inspects a normalized test file against facts of its source and folds
 * the results of independent checks into a single report and tier.
 */

import { readFile } from "fs/promises";
import { basename } from "path";

import { analyzeSource } from "../../indexer/indexer.js";
import { ContextBuildError } from "../../lib/errors.js";

import { runChecks, DEFAULT_CHECKS } from "./registry.js";

import type { FileAnalysis } from "../../indexer/types.js";
import type { StubTarget } from "../context.js";
import type { ValidationCheck, ValidationReport } from "./types.js";

export interface ValidateOptions {
  /** Report subject; defaults to "test_<source>.c" */
  file?: string;
  stubTargets?: readonly StubTarget[];
  checks?: readonly ValidationCheck[];
}

/**
 * Validate test text against an analyzed source file
 */
export function validateTestCode(
  testCode: string,
  analysis: FileAnalysis,
  options: ValidateOptions = {}
): ValidationReport {
  const file = options.file ?? `test_${basename(analysis.filePath)}`;
  return runChecks(
    file,
    { testCode, analysis, stubTargets: options.stubTargets ?? [] },
    options.checks ?? DEFAULT_CHECKS
  );
}

/**
 * Validate an existing test file on disk against its source file
 * @throws ContextBuildError when either file cannot be read
 */
export async function validateTestFile(testPath: string, sourcePath: string): Promise<ValidationReport> {
  const read = async (path: string): Promise<string> => {
    try {
      return await readFile(path, "utf-8");
    } catch (error) {
      throw new ContextBuildError(
        `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`,
        path,
        { cause: error }
      );
    }
  };

  const [testCode, source] = await Promise.all([read(testPath), read(sourcePath)]);
  return validateTestCode(testCode, analyzeSource(sourcePath, source), { file: basename(testPath) });
}

export { runChecks, getCheck, DEFAULT_CHECKS } from "./registry.js";
export { computeQuality, meetsThreshold, tierRank, formatTier } from "./tier.js";
export { COMPILATION_CHECKS } from "./compilation.js";
export { REALITY_CHECKS } from "./reality.js";
export { QUALITY_CHECKS } from "./quality.js";
export { CONSISTENCY_CHECKS } from "./consistency.js";
export { FEATURE_CHECKS, featureCheck } from "./features.js";
export { QUALITY_TIERS } from "./types.js";
export type {
  QualityTier,
  ValidationReport,
  ValidationCheck,
  CheckInput,
  CheckOutcome,
  CheckConcern,
} from "./types.js";
