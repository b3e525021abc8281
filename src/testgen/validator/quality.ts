/**
 * Test-quality heuristics
 */

import { blankComments, extractFunctionDefinitions } from "../../indexer/c-parser.js";
import { testFunctionNames } from "../unity-syntax.js";

import type { ValidationCheck } from "./types.js";

const EDGE_CASE_WORDS = ["min", "max", "zero", "negative", "boundary", "edge", "limit"];

/** File-scope mutable stub state, e.g. `static int g_calls;` or `static stub_t stub_read = {0};` */
const STUB_STATE = /^[ \t]*static\s+(?!const\b)[\w\s*]*?\b(?:g_\w+|stub_\w+)\s*(?:=|;|\[)/m;

const RESET_PATTERNS: readonly RegExp[] = [
  /\bmemset\s*\(/,
  /\b\w*reset\w*\s*\(/i,
  /\w+\s*=\s*(?:0|0\.0f?|NULL|false)\s*;/,
];

export const edgeCaseCoverageCheck: ValidationCheck = {
  id: "edge-case-coverage",
  concern: "quality",
  description: "with several tests, at least one is named after a boundary",
  run({ testCode }) {
    const names = testFunctionNames(testCode);
    const hasEdgeCase = names.some((name) => EDGE_CASE_WORDS.some((word) => name.toLowerCase().includes(word)));
    if (names.length <= 1 || hasEdgeCase) {
      return { issues: [] };
    }
    return { issues: ["Missing edge case tests (min/max values, boundaries)"] };
  },
};

export const teardownResetsStubsCheck: ValidationCheck = {
  id: "teardown-resets-stubs",
  concern: "quality",
  description: "tearDown() resets stateful stubs",
  run({ testCode }) {
    if (!STUB_STATE.test(blankComments(testCode, { strings: true }))) {
      return { issues: [] };
    }
    const teardown = extractFunctionDefinitions(testCode).find((def) => def.name === "tearDown");
    if (teardown && RESET_PATTERNS.some((pattern) => pattern.test(teardown.body))) {
      return { issues: [] };
    }
    return { issues: ["tearDown() function should reset stub variables (call counts and return values)"] };
  },
};

export const testPresenceCheck: ValidationCheck = {
  id: "test-presence",
  concern: "quality",
  description: "at least one test function exists",
  run({ testCode }) {
    if (testFunctionNames(testCode).length > 0) {
      return { issues: [] };
    }
    return { issues: ["No test functions found (functions should start with 'test_')"] };
  },
};

export const testIsolationCheck: ValidationCheck = {
  id: "test-isolation",
  concern: "quality",
  description: "several tests come with setUp() and tearDown()",
  run({ testCode }) {
    const defined = new Set(extractFunctionDefinitions(testCode).map((def) => def.name));
    if (testFunctionNames(testCode).length <= 1 || (defined.has("setUp") && defined.has("tearDown"))) {
      return { issues: [] };
    }
    return { issues: ["Multiple tests without setUp/tearDown - may not be properly isolated"] };
  },
};

export const QUALITY_CHECKS: readonly ValidationCheck[] = [
  edgeCaseCoverageCheck,
  teardownResetsStubsCheck,
  testPresenceCheck,
  testIsolationCheck,
];
