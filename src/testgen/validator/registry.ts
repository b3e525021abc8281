/**
 * Check registry and runner
 */

import { ValidationCheckError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";

import { COMPILATION_CHECKS } from "./compilation.js";
import { CONSISTENCY_CHECKS } from "./consistency.js";
import { FEATURE_CHECKS } from "./features.js";
import { QUALITY_CHECKS } from "./quality.js";
import { REALITY_CHECKS } from "./reality.js";
import { computeQuality } from "./tier.js";

import type { CheckInput, ValidationCheck, ValidationReport } from "./types.js";

const log = logger.child("[validator]");

/** Every check in run order */
export const DEFAULT_CHECKS: readonly ValidationCheck[] = [
  ...COMPILATION_CHECKS,
  ...REALITY_CHECKS,
  ...QUALITY_CHECKS,
  ...CONSISTENCY_CHECKS,
  ...FEATURE_CHECKS,
];

export function getCheck(id: string): ValidationCheck | undefined {
  return DEFAULT_CHECKS.find((check) => check.id === id);
}

/**
 * Run checks in order and fold their outcomes into a report.
 * A check that throws adds one synthetic issue and clears `compiles`,
 * which forces the low tier.
 */
export function runChecks(
  file: string,
  input: CheckInput,
  checks: readonly ValidationCheck[] = DEFAULT_CHECKS
): ValidationReport {
  const issues: string[] = [];
  let compiles = true;
  let realistic = true;

  for (const check of checks) {
    try {
      const outcome = check.run(input);
      issues.push(...outcome.issues);
      if (outcome.compiles === false) compiles = false;
      if (outcome.realistic === false) realistic = false;
    } catch (error) {
      const failure = new ValidationCheckError(
        `Validation check "${check.id}" failed: ${error instanceof Error ? error.message : String(error)}`,
        check.id,
        { cause: error }
      );
      log.debug(failure.message);
      issues.push(failure.message);
      compiles = false;
    }
  }

  return { file, compiles, realistic, quality: computeQuality({ issues, compiles, realistic }), issues };
}
