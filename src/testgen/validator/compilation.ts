/**
 * Compilation-safety checks
 */

import { blankComments, extractFunctionDefinitions } from "../../indexer/c-parser.js";
import {
  hasExternMain,
  INCLUDE_LINE_PATTERN,
  isEntryPointCall,
  isUnityRunner,
  STANDARD_HEADERS,
  UNITY_HEADER,
} from "../unity-syntax.js";

import type { ValidationCheck } from "./types.js";

/** Test-file functions that never stand in for source functions */
const FRAMEWORK_FUNCTIONS = new Set(["setUp", "tearDown", "main", "suiteSetUp", "suiteTearDown"]);

function includedHeaders(text: string): string[] {
  const headers: string[] = [];
  for (const match of blankComments(text).matchAll(INCLUDE_LINE_PATTERN)) {
    if (match[1] !== undefined) headers.push(match[1].trim());
  }
  return headers;
}

export const frameworkIncludeCheck: ValidationCheck = {
  id: "framework-include",
  concern: "compilation",
  description: "unity.h is included",
  run({ testCode }) {
    if (includedHeaders(testCode).includes(UNITY_HEADER)) {
      return { issues: [] };
    }
    return { issues: ['Missing required Unity include: #include "unity.h"'], compiles: false };
  },
};

export const formattingMarkersCheck: ValidationCheck = {
  id: "formatting-markers",
  concern: "compilation",
  description: "no leftover markdown fences",
  run({ testCode }) {
    if (!testCode.includes("```")) {
      return { issues: [] };
    }
    return { issues: ["Found markdown code block markers (```) - should be removed"], compiles: false };
  },
};

export const includeAllowListCheck: ValidationCheck = {
  id: "include-allow-list",
  concern: "compilation",
  description: "only unity.h, source headers and standard headers are included",
  run({ testCode, analysis }) {
    const allowed = new Set([UNITY_HEADER, ...analysis.includes]);
    const invalid = [...new Set(includedHeaders(testCode))].filter(
      (header) => !allowed.has(header) && !STANDARD_HEADERS.has(header)
    );
    if (invalid.length === 0) {
      return { issues: [] };
    }
    return { issues: [`Invalid includes for non-existent headers: ${invalid.join(", ")}`], compiles: false };
  },
};

export const duplicateDefinitionsCheck: ValidationCheck = {
  id: "duplicate-definitions",
  concern: "compilation",
  description: "no function is defined twice",
  run({ testCode }) {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const def of extractFunctionDefinitions(testCode)) {
      if (seen.has(def.name)) duplicates.add(def.name);
      seen.add(def.name);
    }
    if (duplicates.size === 0) {
      return { issues: [] };
    }
    return { issues: [`Duplicate function definitions: ${[...duplicates].join(", ")}`], compiles: false };
  },
};

export const stubSignaturesCheck: ValidationCheck = {
  id: "stub-signatures",
  concern: "compilation",
  description: "stub return types match the real definitions",
  run({ testCode, analysis, stubTargets }) {
    const expected = new Map<string, string>();
    for (const fn of analysis.functions) expected.set(fn.name, fn.returnType);
    for (const stub of stubTargets) expected.set(stub.name, stub.returnType);

    const issues: string[] = [];
    for (const def of extractFunctionDefinitions(testCode)) {
      if (FRAMEWORK_FUNCTIONS.has(def.name) || def.name.startsWith("test_")) continue;
      const returnType = expected.get(def.name);
      if (returnType !== undefined && returnType !== def.returnType) {
        issues.push(`Stub function ${def.name} return type mismatch: ${def.returnType} vs ${returnType}`);
      }
    }
    return issues.length > 0 ? { issues, compiles: false } : { issues };
  },
};

export const entryPointCheck: ValidationCheck = {
  id: "entry-point",
  concern: "compilation",
  description: "main() is only called through an extern declaration and never redefined",
  run({ testCode }) {
    const issues: string[] = [];
    const code = blankComments(testCode, { strings: true });

    if (!hasExternMain(testCode) && code.split("\n").some((line) => isEntryPointCall(line))) {
      issues.push("Invalid call to main() function - not suitable for unit testing");
    }
    if (extractFunctionDefinitions(testCode).some((def) => def.name === "main" && !isUnityRunner(def))) {
      issues.push("main() is redefined outside the Unity test runner");
    }
    return issues.length > 0 ? { issues, compiles: false } : { issues };
  },
};

export const COMPILATION_CHECKS: readonly ValidationCheck[] = [
  frameworkIncludeCheck,
  formattingMarkersCheck,
  includeAllowListCheck,
  duplicateDefinitionsCheck,
  stubSignaturesCheck,
  entryPointCheck,
];
