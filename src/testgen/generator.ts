/**
 * Prompt construction and the generation call
 *
 * Turns a GenerationContext into a Unity test-generation prompt and asks
 * the adapter for the raw test text. Cleanup of the answer is the
 * normalizer's job.
 */

import { basename } from "path";

import { describeRange, RAW_COUNTER, TEMPERATURE } from "./domain.js";
import { renderFeedback } from "./context.js";

import type { GenerationContext } from "./context.js";

/** The part of the adapter the generator depends on */
export interface TextGenerator {
  generate(prompt: string, options?: { systemPrompt?: string; signal?: AbortSignal }): Promise<string>;
}

// =============================================================================
// PROMPTS
// =============================================================================

export const SYSTEM_PROMPT = [
  "You are a senior embedded C unit test engineer using the Unity test framework.",
  "You write complete, compilable test files with realistic values derived from the source.",
  "You output C code only.",
].join(" ");

export function buildGenerationPrompt(ctx: GenerationContext): string {
  const parts: string[] = [];
  const sourceFile = `${ctx.sourceName}.c`;
  const testFile = `test_${ctx.sourceName}.c`;

  parts.push(`Generate the complete Unity test file ${testFile} for the C source below.`);
  parts.push("Write tests for EVERY function defined in the source, 3-5 focused tests each, covering all branches.");
  parts.push("");

  parts.push("## Source");
  parts.push(`/* ==== BEGIN ${sourceFile} ==== */`);
  parts.push(ctx.source);
  parts.push(`/* ==== END ${sourceFile} ==== */`);
  parts.push("");

  parts.push("## Functions Under Test");
  if (ctx.functions.length === 0) {
    parts.push("- None found; test the observable behaviour of the file");
  }
  for (const fn of ctx.functions) {
    parts.push(`- ${fn.signature}`);
  }
  parts.push("");

  parts.push("## External Functions To Stub (only these)");
  if (ctx.needsStub.length === 0) {
    parts.push("- None");
  }
  for (const stub of ctx.needsStub) {
    const owner = basename(stub.ownerFile);
    parts.push(`- ${stub.signature} (from ${owner})`);
  }
  parts.push("");

  parts.push("## Allowed Includes");
  parts.push('- "unity.h" (always first)');
  for (const include of ctx.includes) {
    parts.push(`- ${include}`);
  }
  parts.push("- Standard headers such as <stdint.h>, <stdbool.h>, <string.h> when needed");
  parts.push("");

  if (ctx.features.length > 0) {
    parts.push("## Embedded Features Detected");
    for (const feature of ctx.features) {
      parts.push(`### ${feature.label}`);
      for (const line of feature.guidance) {
        parts.push(`- ${line}`);
      }
    }
    parts.push("");
  }

  parts.push("## Requirements");
  parts.push(`1. Output ONLY C code. Start with /* ${testFile} - generated tests */. No markdown fences, no explanations.`);
  parts.push("2. Structure: comment, includes, extern declarations, stubs, setUp/tearDown, tests, then main with UNITY_BEGIN, RUN_TEST for every test and return UNITY_END().");
  parts.push("3. Copy function signatures exactly from the source. Never stub or redefine functions defined in the source.");
  parts.push("4. Stubs: exact prototype plus a static control struct (return_value, call_count, captured params). Reset every stub in setUp() AND tearDown() with memset or explicit zeroing.");
  parts.push("5. Floats: always TEST_ASSERT_FLOAT_WITHIN(tolerance, expected, actual). Never TEST_ASSERT_EQUAL_FLOAT.");
  parts.push(`6. Realistic values only: temperatures ${describeRange(TEMPERATURE)}, raw ADC counters ${describeRange(RAW_COUNTER)}, voltages 0.0 to 5.5. Never absolute zero or huge magnitudes.`);
  parts.push("7. Include edge-case tests named after the boundary they check (min, max, zero, boundary).");
  parts.push("8. Never call or define the program entry point except through `extern int main(void);` when the source defines main().");
  parts.push("9. No printf, scanf or other console I/O in tests.");
  parts.push("10. Each test has one purpose and asserts a specific expected result derived from the source logic.");
  parts.push("");

  parts.push("## Validation Feedback (address these specific issues)");
  parts.push(renderFeedback(ctx.feedback));
  parts.push("");

  parts.push(`Generate ONLY the complete ${testFile} C code now.`);

  return parts.join("\n");
}

// =============================================================================
// GENERATION
// =============================================================================

/**
 * Ask the generator for a test file; failures propagate unchanged
 */
export async function generateTestCode(
  ctx: GenerationContext,
  generator: TextGenerator,
  signal?: AbortSignal
): Promise<string> {
  const prompt = buildGenerationPrompt(ctx);
  return generator.generate(prompt, { systemPrompt: SYSTEM_PROMPT, signal });
}
