/**
 * Output normalizer
 *
 * Deterministic cleanup of raw generated text into a self-contained test
 * candidate. Steps only remove or rewrite what they match and the
 * pipeline is repeated until stable, so `normalize(normalize(t))`
 * equals `normalize(t)`.
 *
 * The framework include is deliberately not inserted: a missing
 * `#include "unity.h"` is reported by the validator and fed back to the
 * next attempt instead.
 */

import { blankComments, extractFunctionDefinitions } from "../indexer/c-parser.js";
import { NormalizationError } from "../lib/errors.js";

import {
  ABSOLUTE_ZERO_C,
  clampTo,
  DEFAULT_FLOAT_TOLERANCE,
  isCounterTarget,
  RAW_COUNTER,
  STUB_RETURN_SITE,
  TEMPERATURE,
} from "./domain.js";
import {
  findCalls,
  hasExternMain,
  INCLUDE_LINE_PATTERN,
  isEntryPointCall,
  isUnityRunner,
  parseArguments,
  STANDARD_HEADERS,
  testFunctionNames,
  UNITY_HEADER,
} from "./unity-syntax.js";

export interface NormalizeOptions {
  /** Includes of the source file under test */
  sourceIncludes?: readonly string[];
}

type Step = (text: string, options: NormalizeOptions) => string;

const CONSOLE_IO = ["printf", "fprintf", "puts", "fputs", "putchar", "scanf", "getchar", "perror"];

// =============================================================================
// STEPS
// =============================================================================

export function stripCodeFences(text: string): string {
  return text.replace(/^[ \t]*```[^\n]*(?:\n|$)/gm, "").replace(/```/g, "");
}

/**
 * TEST_ASSERT_EQUAL_FLOAT(e, a) -> TEST_ASSERT_FLOAT_WITHIN(tol, e, a)
 */
export function rewriteFloatEquality(text: string): string {
  let out = text;
  // Each pass rewrites the outermost calls, exposing the ones nested in them
  for (;;) {
    const calls = findCalls(out, "TEST_ASSERT_EQUAL_FLOAT").filter((call) => call.args.length === 2);
    if (calls.length === 0) return out;

    const outermost = calls.filter(
      (call) => !calls.some((other) => other !== call && other.start <= call.start && other.end >= call.end)
    );
    for (const call of [...outermost].reverse()) {
      const [expected = "", actual = ""] = call.args;
      out = `${out.slice(0, call.start)}TEST_ASSERT_FLOAT_WITHIN(${DEFAULT_FLOAT_TOLERANCE}, ${expected}, ${actual})${out.slice(call.end)}`;
    }
  }
}

/**
 * GREATER_THAN_OR_EQUAL, GREATER_EQUAL, ... -> GREATER_OR_EQUAL
 */
export function canonicalizeComparisonMacros(text: string): string {
  return text.replace(
    /\bTEST_ASSERT_(GREATER|LESS)_(?:THAN_OR_EQUAL|THAN_EQUAL|EQUAL)(?=_|\b)/g,
    "TEST_ASSERT_$1_OR_EQUAL"
  );
}

/**
 * Clamp raw counter stub values and replace absolute-zero temperatures
 */
export function clampDomainLiterals(text: string): string {
  const clamped = text.replace(STUB_RETURN_SITE, (site: string, target: string, value: string) => {
    if (!isCounterTarget(target) || value.includes(".")) return site;
    const at = site.lastIndexOf(value);
    return `${site.slice(0, at)}${clampTo(Number.parseInt(value, 10), RAW_COUNTER)}${site.slice(at + value.length)}`;
  });
  const floor = `${TEMPERATURE.min.toFixed(1)}f`;
  return clamped.replace(new RegExp(`${String(ABSOLUTE_ZERO_C).replace(/[.-]/g, "\\$&")}f?(?![\\w.])`, "g"), floor);
}

/**
 * Remove calls to main() unless declared extern, and main() definitions
 * that are not a Unity runner
 */
export function stripEntryPoint(text: string): string {
  let out = text;

  const embedded = extractFunctionDefinitions(out).filter((def) => def.name === "main" && !isUnityRunner(def));
  for (const def of [...embedded].reverse()) {
    out = `${out.slice(0, def.start)}${out.slice(def.end)}`;
  }

  if (hasExternMain(out)) {
    return out;
  }
  return out
    .split("\n")
    .filter((line) => !isEntryPointCall(line.replace(/\/\/.*$/, "")))
    .join("\n");
}

/**
 * Remove statements that are direct console I/O calls
 */
export function stripConsoleIO(text: string): string {
  const pattern = new RegExp(`^([ \\t]*)(?:${CONSOLE_IO.join("|")})\\s*\\(`, "gm");
  let out = text;

  // Two calls on one line need two rounds
  for (;;) {
    let changed = false;
    const matches = [...out.matchAll(pattern)].reverse();
    for (const match of matches) {
      const start = match.index ?? 0;
      const open = start + match[0].length - 1;
      const parsed = parseArguments(out, open);
      if (parsed === null) continue;

      let end = parsed.close + 1;
      const semicolon = /^[ \t]*;/.exec(out.slice(end));
      if (semicolon) end += semicolon[0].length;
      const rest = /^[ \t]*(?:\n|$)/.exec(out.slice(end));
      if (rest) end += rest[0].length;
      else end += /^[ \t]*/.exec(out.slice(end))?.[0].length ?? 0;

      out = rest ? `${out.slice(0, start)}${out.slice(end)}` : `${out.slice(0, start)}${match[1] ?? ""}${out.slice(end)}`;
      changed = true;
    }
    if (!changed) return out;
  }
}

/**
 * Keep only includes of unity.h, the source's own headers and standard headers
 */
export function filterIncludes(text: string, options: NormalizeOptions): string {
  const allowed = new Set([UNITY_HEADER, ...(options.sourceIncludes ?? [])]);
  return text.replace(new RegExp(`${INCLUDE_LINE_PATTERN.source}\\n?`, "gm"), (line: string, name: string) => {
    const header = name.trim();
    return allowed.has(header) || STANDARD_HEADERS.has(header) ? line : "";
  });
}

/**
 * Append a Unity main() running every test when no runner exists
 */
export function ensureTestRunner(text: string): string {
  if (/\bUNITY_BEGIN\b/.test(blankComments(text, { strings: true }))) return text;

  const tests = testFunctionNames(text);
  if (tests.length === 0) return text;

  const runner = [
    "int main(void)",
    "{",
    "    UNITY_BEGIN();",
    ...tests.map((name) => `    RUN_TEST(${name});`),
    "    return UNITY_END();",
    "}",
  ].join("\n");
  return `${text.replace(/\s+$/, "")}\n\n${runner}\n`;
}

export function normalizeWhitespace(text: string): string {
  const trimmed = text
    .replace(/[ \t]+$/gm, "")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
  return trimmed.length > 0 ? `${trimmed}\n` : "";
}

const STEPS: ReadonlyArray<[string, Step]> = [
  ["strip-fences", stripCodeFences],
  ["float-equality", rewriteFloatEquality],
  ["comparison-macros", canonicalizeComparisonMacros],
  ["domain-literals", clampDomainLiterals],
  ["entry-point", stripEntryPoint],
  ["console-io", stripConsoleIO],
  ["includes", filterIncludes],
  ["test-runner", ensureTestRunner],
  ["whitespace", normalizeWhitespace],
];

// =============================================================================
// NORMALIZE
// =============================================================================

/**
 * Normalize raw generated text.
 * @throws NormalizationError when a step fails unexpectedly
 */
export function normalizeTestCode(raw: string, options: NormalizeOptions = {}): string {
  let text = runSteps(raw.replace(/\r\n?/g, "\n"), options);

  // A removed line can unbalance braces or expose a nested call, so
  // repeat the pipeline until it no longer changes anything
  const maxRounds = text.length + 2;
  for (let round = 1; ; round++) {
    const next = runSteps(text, options);
    if (next === text) return text;
    if (round >= maxRounds) {
      throw new NormalizationError("Normalization did not reach a stable result", "fixpoint");
    }
    text = next;
  }
}

function runSteps(input: string, options: NormalizeOptions): string {
  let text = input;
  for (const [name, step] of STEPS) {
    try {
      text = step(text, options);
    } catch (error) {
      throw new NormalizationError(
        `Normalization step "${name}" failed: ${error instanceof Error ? error.message : String(error)}`,
        name,
        { cause: error }
      );
    }
  }
  return text;
}

export interface SafeNormalizeResult {
  text: string;
  error: NormalizationError | undefined;
}

/**
 * Normalize, passing the raw text through unchanged on failure
 */
export function safeNormalizeTestCode(raw: string, options: NormalizeOptions = {}): SafeNormalizeResult {
  try {
    return { text: normalizeTestCode(raw, options), error: undefined };
  } catch (error) {
    if (error instanceof NormalizationError) {
      return { text: raw, error };
    }
    throw error;
  }
}
