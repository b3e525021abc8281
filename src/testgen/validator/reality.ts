/**
 * Reality checks: physically impossible or out-of-domain test values
 */

import { blankComments } from "../../indexer/c-parser.js";
import { describeRange, isCounterTarget, isWithin, RAW_COUNTER, STUB_RETURN_SITE, TEMPERATURE } from "../domain.js";

import type { BoundedQuantity } from "../domain.js";
import type { ValidationCheck } from "./types.js";

interface ImpossiblePattern {
  pattern: RegExp;
  description: string;
  /** Extra predicate on the match */
  accept?: (match: RegExpExecArray) => boolean;
}

const IMPOSSIBLE_PATTERNS: readonly ImpossiblePattern[] = [
  {
    pattern: /-?273\.15f?/,
    description: "Absolute zero temperature test - physically impossible",
  },
  {
    pattern: /\b\d+(?:\.\d*)?[eE]\+?(\d+)/,
    description: "Extremely large values that may cause overflow",
    accept: (match) => Number.parseInt(match[1] ?? "0", 10) >= 10,
  },
];

const NUMBER = String.raw`(-?\d+(?:\.\d+)?)f?`;

/** Literals that stand for a temperature wherever they appear */
const TEMPERATURE_SITES: readonly RegExp[] = [
  // expected operand; the actual operand may be any expression
  new RegExp(String.raw`\bTEST_ASSERT_FLOAT_WITHIN\s*\([^,]+,\s*${NUMBER}(?![\w.])`, "g"),
  new RegExp(String.raw`\bset_\w*(?:temp|celsius)\w*\s*\(\s*${NUMBER}(?![\w.])`, "gi"),
];

function rangeIssue(value: number, quantity: BoundedQuantity): string | undefined {
  if (isWithin(value, quantity)) return undefined;
  const side = value > quantity.max ? "high" : "low";
  return `${quantity.label} value ${value} seems unreasonably ${side} (valid range: ${describeRange(quantity)})`;
}

export const floatEqualityCheck: ValidationCheck = {
  id: "float-equality",
  concern: "reality",
  description: "floats are never compared exactly",
  run({ testCode }) {
    if (!/\bTEST_ASSERT_EQUAL_FLOAT\s*\(/.test(blankComments(testCode))) {
      return { issues: [] };
    }
    return {
      issues: ["TEST_ASSERT_EQUAL_FLOAT used - will fail due to precision. Use TEST_ASSERT_FLOAT_WITHIN instead"],
      realistic: false,
    };
  },
};

export const impossibleLiteralsCheck: ValidationCheck = {
  id: "impossible-literals",
  concern: "reality",
  description: "no absolute-zero or overflow-sized literals",
  run({ testCode }) {
    const issues: string[] = [];
    blankComments(testCode)
      .split("\n")
      .forEach((line, index) => {
        for (const { pattern, description, accept } of IMPOSSIBLE_PATTERNS) {
          const match = pattern.exec(line);
          if (match && (accept === undefined || accept(match))) {
            issues.push(`Line ${index + 1}: ${description} - unrealistic test scenario`);
          }
        }
      });
    return issues.length > 0 ? { issues, realistic: false } : { issues };
  },
};

export const domainRangesCheck: ValidationCheck = {
  id: "domain-ranges",
  concern: "reality",
  description: "temperature and raw counter literals stay inside their domains",
  run({ testCode }) {
    const issues = new Set<string>();
    const code = blankComments(testCode);
    const mentionsTemperature = /temp|celsius/i.test(code);
    const add = (issue: string | undefined): void => {
      if (issue !== undefined) issues.add(issue);
    };

    for (const line of code.split("\n")) {
      for (const [, target = "", literal = "0"] of line.matchAll(STUB_RETURN_SITE)) {
        const value = Number.parseFloat(literal);
        if (isCounterTarget(target)) {
          add(rangeIssue(value, RAW_COUNTER));
        } else if (mentionsTemperature) {
          add(rangeIssue(value, TEMPERATURE));
        }
      }

      if (!mentionsTemperature) continue;
      for (const site of TEMPERATURE_SITES) {
        for (const match of line.matchAll(site)) {
          add(rangeIssue(Number.parseFloat(match[1] ?? "0"), TEMPERATURE));
        }
      }
    }

    return issues.size > 0 ? { issues: [...issues], realistic: false } : { issues: [] };
  },
};

export const REALITY_CHECKS: readonly ValidationCheck[] = [
  floatEqualityCheck,
  impossibleLiteralsCheck,
  domainRangesCheck,
];
