/**
 * Unity test-file vocabulary shared by the normalizer and the validator
 */

import { blankComments, extractFunctionDefinitions } from "../indexer/c-parser.js";

import type { FunctionDefinition } from "../indexer/types.js";

export const UNITY_HEADER = "unity.h";

/** Standard C headers a test may include without the source doing so */
export const STANDARD_HEADERS: ReadonlySet<string> = new Set([
  "stdint.h", "stdbool.h", "stddef.h", "string.h", "stdlib.h", "stdio.h",
  "limits.h", "float.h", "math.h", "assert.h", "ctype.h", "errno.h",
  "stdarg.h", "time.h", "inttypes.h",
]);

export const TEST_FUNCTION_PATTERN = /\bvoid\s+(test_\w+)\s*\(\s*(?:void)?\s*\)/g;

export const EXTERN_MAIN_PATTERN = /\bextern\s+int\s+main\s*\(\s*(?:void)?\s*\)\s*;/;

export const INCLUDE_LINE_PATTERN = /^[ \t]*#[ \t]*include[ \t]*[<"]([^>"\n]+)[>"][^\n]*$/gm;

/**
 * Names of test functions in order of appearance, deduplicated
 */
export function testFunctionNames(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(TEST_FUNCTION_PATTERN)) {
    if (match[1] !== undefined) names.add(match[1]);
  }
  return [...names];
}

/**
 * Test function definitions with their bodies
 */
export function testFunctionDefinitions(text: string): FunctionDefinition[] {
  return extractFunctionDefinitions(text).filter((def) => def.name.startsWith("test_"));
}

/**
 * A main() whose body starts a Unity run
 */
export function isUnityRunner(def: FunctionDefinition): boolean {
  return def.name === "main" && /\bUNITY_BEGIN\s*\(/.test(def.body);
}

export function hasExternMain(text: string): boolean {
  return EXTERN_MAIN_PATTERN.test(blankComments(text));
}

/**
 * Whether a line calls main() rather than declaring or defining it
 */
export function isEntryPointCall(line: string): boolean {
  for (const match of line.matchAll(/\bmain\s*\(/g)) {
    const before = line.slice(0, match.index ?? 0);
    if (!/(?:\bint|\bvoid|\*)\s*$/.test(before)) {
      return true;
    }
  }
  return false;
}

export interface MacroCall {
  /** Offset of the macro name */
  start: number;
  /** Offset just past the closing parenthesis */
  end: number;
  /** Top-level arguments, trimmed */
  args: string[];
}

/**
 * Split a parenthesized argument list at top-level commas.
 * `open` is the offset of "("; returns null when unbalanced.
 */
export function parseArguments(text: string, open: number): { args: string[]; close: number } | null {
  let depth = 0;
  let current = "";
  const args: string[] = [];

  for (let i = open; i < text.length; i++) {
    const ch = text[i] ?? "";

    if (ch === '"' || ch === "'") {
      let j = i + 1;
      while (j < text.length && text[j] !== ch && text[j] !== "\n") {
        j += text[j] === "\\" ? 2 : 1;
      }
      current += text.slice(i, j + 1);
      i = j;
      continue;
    }

    if (ch === "(" || ch === "[" || ch === "{") {
      depth++;
      if (depth === 1) continue;
    } else if (ch === ")" || ch === "]" || ch === "}") {
      depth--;
      if (depth === 0) {
        args.push(current.trim());
        return { args: args.length === 1 && args[0] === "" ? [] : args, close: i };
      }
    } else if (ch === "," && depth === 1) {
      args.push(current.trim());
      current = "";
      continue;
    }

    current += ch;
  }

  return null;
}

/**
 * Calls with balanced argument lists. `name` is a macro/function name
 * or a regex source matching several names.
 */
export function findCalls(text: string, name: string): MacroCall[] {
  const calls: MacroCall[] = [];
  const pattern = new RegExp(`\\b${name}\\s*\\(`, "g");

  for (const match of text.matchAll(pattern)) {
    if (match.index === undefined) continue;
    const open = match.index + match[0].length - 1;
    const parsed = parseArguments(text, open);
    if (parsed === null) continue;
    calls.push({ start: match.index, end: parsed.close + 1, args: parsed.args });
  }

  return calls;
}
