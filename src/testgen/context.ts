/**
 * Context builder for test generation
 *
 * Assembles everything one generation attempt needs: the source text,
 * the cross-file symbols the test must stub, and the feedback carried
 * over from the previous attempt's validation. Pure; the caller does
 * the file reading.
 */

import { basename, extname } from "path";

import { detectEmbeddedFeatures } from "./embedded.js";

import type { SymbolTable } from "../indexer/symbol-table.js";
import type { CFunction, FileAnalysis } from "../indexer/types.js";
import type { EmbeddedFeature } from "./embedded.js";

// =============================================================================
// TYPES
// =============================================================================

/** A symbol owned by another file that the test must replace */
export interface StubTarget {
  name: string;
  /** File that defines the symbol */
  ownerFile: string;
  /** Signature and return type as defined by the owner */
  signature: string;
  returnType: string;
}

export type FeedbackSection =
  | { kind: "none" }
  | {
      kind: "issues";
      /** First issues of the previous attempt, verbatim */
      issues: string[];
      /** Number of further issues not listed */
      overflow: number;
      /** Targeted instruction for a recognized recurring problem */
      guidance: string | undefined;
    };

export interface GenerationContext {
  filePath: string;
  /** File name without extension, e.g. "sensor" */
  sourceName: string;
  /** Source text as sent to the backend (redacted when enabled) */
  source: string;
  functions: CFunction[];
  includes: string[];
  needsStub: StubTarget[];
  feedback: FeedbackSection;
  features: EmbeddedFeature[];
}

export interface ContextOptions {
  /** Redact comments, literals and credential-like content */
  redactSensitive?: boolean;
}

/** Issues carried verbatim into the next attempt */
export const MAX_FEEDBACK_ISSUES = 5;

// =============================================================================
// STUB RESOLUTION
// =============================================================================

/**
 * Called-but-undefined symbols owned by a different indexed file.
 * Symbols missing from the table resolve at link time and are not stubbed.
 */
export function computeNeedsStub(analysis: FileAnalysis, symbols: SymbolTable): StubTarget[] {
  const defined = new Set(analysis.functions.map((f) => f.name));
  const targets: StubTarget[] = [];

  for (const name of analysis.calledButUndefinedSymbols) {
    if (defined.has(name)) continue;
    const entry = symbols.lookup(name);
    if (entry === undefined || entry.filePath === analysis.filePath) continue;
    targets.push({
      name,
      ownerFile: entry.filePath,
      signature: entry.fn.signature,
      returnType: entry.fn.returnType,
    });
  }

  return targets;
}

// =============================================================================
// FEEDBACK
// =============================================================================

interface CorrectiveRule {
  id: string;
  matches: (issue: string) => boolean;
  instruction: string;
}

/**
 * Recognized recurring problems; the first rule matching any issue wins
 */
const CORRECTIVE_RULES: readonly CorrectiveRule[] = [
  {
    id: "raw-counter-range",
    matches: (issue) => /Raw counter value .* unreasonably/.test(issue),
    instruction:
      "Raw ADC/counter values (e.g. from rand() % 1024) must be 0-1023. Use values like 0, 512, 1023 for testing.",
  },
  {
    id: "temperature-range",
    matches: (issue) => /Temperature value .* unreasonably (?:high|low)/.test(issue),
    instruction:
      "Temperature values must be in range -40.0°C to 125.0°C. Check the source code for the exact valid ranges.",
  },
  {
    id: "float-equality",
    matches: (issue) => issue.includes("TEST_ASSERT_EQUAL_FLOAT"),
    instruction: "Never compare floats exactly. Use TEST_ASSERT_FLOAT_WITHIN(tolerance, expected, actual).",
  },
  {
    id: "missing-unity-include",
    matches: (issue) => issue.startsWith("Missing required Unity include"),
    instruction: 'The first include of the test file must be #include "unity.h".',
  },
];

/**
 * Feedback for the next attempt from the previous attempt's issues.
 * `null` means there was no previous attempt.
 */
export function buildFeedbackSection(priorIssues: readonly string[] | null): FeedbackSection {
  if (priorIssues === null || priorIssues.length === 0) {
    return { kind: "none" };
  }

  const rule = CORRECTIVE_RULES.find((r) => priorIssues.some((issue) => r.matches(issue)));
  return {
    kind: "issues",
    issues: priorIssues.slice(0, MAX_FEEDBACK_ISSUES),
    overflow: Math.max(0, priorIssues.length - MAX_FEEDBACK_ISSUES),
    guidance: rule?.instruction,
  };
}

/**
 * Prompt text for a feedback section
 */
export function renderFeedback(feedback: FeedbackSection): string {
  if (feedback.kind === "none") {
    return "NONE - First generation attempt";
  }

  const lines = [
    "PREVIOUS ATTEMPT FAILED WITH THESE SPECIFIC ISSUES - FIX THEM:",
    ...feedback.issues.map((issue) => `- ${issue}`),
  ];
  if (feedback.overflow > 0) {
    lines.push(`- ... and ${feedback.overflow} more issues`);
  }
  if (feedback.guidance !== undefined) {
    lines.push("", `SPECIFIC FIX REQUIRED: ${feedback.guidance}`);
  }
  return lines.join("\n");
}

// =============================================================================
// REDACTION
// =============================================================================

const REDACTIONS: ReadonlyArray<[RegExp, string]> = [
  [/\/\*[\s\S]*?\*\//g, "/* [COMMENT REDACTED] */"],
  [/\/\/.*$/gm, "// [COMMENT REDACTED]"],
  [/(?<!#[ \t]*include[ \t]*)"(?:[^"\\\n]|\\.)*"/g, '"[STRING REDACTED]"'],
  [/\b[A-Za-z0-9+/=]{20,}\b/g, "[CREDENTIAL REDACTED]"],
  [/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, "[EMAIL REDACTED]"],
  [/https?:\/\/[^\s'"]+/g, "[URL REDACTED]"],
  [/\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g, "[IP REDACTED]"],
];

/**
 * Strip content that should not leave the machine: comments, string
 * literals, long credential-like tokens, e-mail addresses, URLs and IPs
 */
export function redactSensitiveContent(source: string): string {
  return REDACTIONS.reduce((text, [pattern, replacement]) => text.replace(pattern, replacement), source);
}

// =============================================================================
// CONTEXT
// =============================================================================

/**
 * Build the generation context for one attempt
 */
export function buildGenerationContext(
  analysis: FileAnalysis,
  symbols: SymbolTable,
  priorIssues: readonly string[] | null,
  options: ContextOptions = {}
): GenerationContext {
  return {
    filePath: analysis.filePath,
    sourceName: basename(analysis.filePath, extname(analysis.filePath)),
    source: options.redactSensitive ? redactSensitiveContent(analysis.source) : analysis.source,
    functions: analysis.functions,
    includes: analysis.includes,
    needsStub: computeNeedsStub(analysis, symbols),
    feedback: buildFeedbackSection(priorIssues),
    features: detectEmbeddedFeatures(analysis.source),
  };
}
