/**
 * Logical-consistency checks
 */

import { findCalls, testFunctionDefinitions } from "../unity-syntax.js";

import type { ValidationCheck } from "./types.js";

/** Integer equality macros whose literal operands are compared */
const INTEGER_EQUALITY = String.raw`TEST_ASSERT_EQUAL(?:_U?INT(?:8|16|32|64)?)?`;

/** Literal operands further apart than this are implausible */
const IMPLAUSIBLE_DIFFERENCE = 1000;

function firstArguments(body: string, macro: string): Set<string> {
  const values = new Set<string>();
  for (const call of findCalls(body, macro)) {
    const first = call.args[0];
    if (first !== undefined && first.length > 0) values.add(first.replace(/\s+/g, " "));
  }
  return values;
}

export const contradictoryAssertionsCheck: ValidationCheck = {
  id: "contradictory-assertions",
  concern: "consistency",
  description: "no expression is asserted both true and false in one test",
  run({ testCode }) {
    const issues: string[] = [];
    for (const test of testFunctionDefinitions(testCode)) {
      const asserted = firstArguments(test.body, "TEST_ASSERT_TRUE");
      const denied = firstArguments(test.body, "TEST_ASSERT_FALSE");
      const common = [...asserted].filter((value) => denied.has(value));
      if (common.length > 0) {
        issues.push(`Test ${test.name}: contradictory assertions for ${common.join(", ")}`);
      }
    }
    return { issues };
  },
};

export const implausibleEqualityCheck: ValidationCheck = {
  id: "implausible-equality",
  concern: "consistency",
  description: "integer equality literals are not wildly apart",
  run({ testCode }) {
    const issues: string[] = [];
    for (const call of findCalls(testCode, INTEGER_EQUALITY)) {
      const [expected, actual] = call.args;
      if (call.args.length !== 2 || expected === undefined || actual === undefined) continue;
      if (!/^-?\d+$/.test(expected) || !/^-?\d+$/.test(actual)) continue;

      const a = Number.parseInt(expected, 10);
      const b = Number.parseInt(actual, 10);
      if (Math.abs(a - b) > IMPLAUSIBLE_DIFFERENCE) {
        issues.push(`Unreasonable assertion: TEST_ASSERT_EQUAL(${a}, ${b})`);
      }
    }
    return { issues };
  },
};

export const CONSISTENCY_CHECKS: readonly ValidationCheck[] = [
  contradictoryAssertionsCheck,
  implausibleEqualityCheck,
];
