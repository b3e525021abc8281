/**
 * Lightweight C text scanning.
 *
 * Not a C parser: it blanks comments, literals and preprocessor lines
 * (keeping every offset and newline in place) and then reads top-level
 * definitions, includes and call sites with brace counting and regexes.
 * Good enough for generated Unity tests and typical embedded sources.
 */

import type { CFunction, FunctionDefinition } from "./types.js";

/**
 * Words that can never be a function name or a call target
 */
export const C_KEYWORDS: ReadonlySet<string> = new Set([
  "auto", "break", "case", "char", "const", "continue", "default", "do",
  "double", "else", "enum", "extern", "float", "for", "goto", "if", "inline",
  "int", "long", "register", "restrict", "return", "short", "signed", "sizeof",
  "static", "struct", "switch", "typedef", "union", "unsigned", "void",
  "volatile", "while", "_Bool", "_Alignof", "_Static_assert", "__attribute__",
  "__asm__", "asm", "defined",
]);

/** Qualifiers dropped from return types */
const STORAGE_QUALIFIERS = /\b(?:static|inline|extern|register|__inline|__inline__)\b/g;

/** Words after which an identifier followed by "(" is still a call */
const CALL_PRECEDING_KEYWORDS = new Set(["return", "else", "case", "do", "sizeof"]);

const TYPE_KEYWORDS = new Set([
  "void", "char", "short", "int", "long", "float", "double", "signed",
  "unsigned", "_Bool", "bool", "const", "struct", "union", "enum",
]);

const INCLUDE_PATTERN = /^[ \t]*#[ \t]*include[ \t]*[<"]([^>"\n]+)[>"]/gm;

function blank(text: string): string {
  return text.replace(/[^\n]/g, " ");
}

/**
 * Replace comments (and optionally string/char literals) with spaces.
 * Offsets and line breaks are preserved.
 */
export function blankComments(source: string, options: { strings?: boolean } = {}): string {
  let out = "";
  let i = 0;
  const n = source.length;

  while (i < n) {
    const ch = source[i];
    const next = source[i + 1];

    if (ch === "/" && next === "*") {
      const close = source.indexOf("*/", i + 2);
      const stop = close === -1 ? n : close + 2;
      out += blank(source.slice(i, stop));
      i = stop;
    } else if (ch === "/" && next === "/") {
      const newline = source.indexOf("\n", i);
      const stop = newline === -1 ? n : newline;
      out += blank(source.slice(i, stop));
      i = stop;
    } else if (ch === '"' || ch === "'") {
      let j = i + 1;
      while (j < n && source[j] !== ch && source[j] !== "\n") {
        j += source[j] === "\\" ? 2 : 1;
      }
      const stop = Math.min(j + 1, n);
      const literal = source.slice(i, stop);
      out += options.strings ? blank(literal) : literal;
      i = stop;
    } else {
      out += ch;
      i++;
    }
  }

  return out;
}

/**
 * Blank preprocessor directives, including backslash-continued lines
 */
export function blankPreprocessor(text: string): string {
  const lines = text.split("\n");
  let continuing = false;
  return lines
    .map((line) => {
      const isDirective = continuing || /^\s*#/.test(line);
      continuing = isDirective && /\\\s*$/.test(line);
      return isDirective ? blank(line) : line;
    })
    .join("\n");
}

/**
 * Code-only view of C text: comments, literals and directives blanked
 */
export function codeView(source: string): string {
  return blankPreprocessor(blankComments(source, { strings: true }));
}

/**
 * Normalize a C type spelling: qualifiers dropped, whitespace collapsed,
 * pointer stars attached ("char*" and "char  *" both become "char *")
 */
export function normalizeType(raw: string): string {
  return raw
    .replace(STORAGE_QUALIFIERS, " ")
    .replace(/\s+/g, " ")
    .replace(/\s*\*\s*/g, "*")
    .replace(/([^*\s])\*/, "$1 *")
    .trim();
}

function lineAt(text: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text[i] === "\n") line++;
  }
  return line;
}

/**
 * Index of the brace matching the one at `open`, or -1
 */
export function matchBrace(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

const HEADER_PATTERN = /^([A-Za-z_][\w\s*]*?)\b([A-Za-z_]\w*)\s*\(([^{};]*)\)\s*$/;

function parseHeader(header: string): CFunction | null {
  const match = HEADER_PATTERN.exec(header);
  if (!match) return null;

  const [, rawType = "", name = "", rawParams = ""] = match;
  if (C_KEYWORDS.has(name)) return null;

  const typeWords = rawType.replace(/\*/g, " ").trim().split(/\s+/);
  if (typeWords.some((w) => w.length > 0 && C_KEYWORDS.has(w) && !TYPE_KEYWORDS.has(w) && !/^(?:static|inline|extern|register|volatile)$/.test(w))) {
    return null;
  }

  const returnType = normalizeType(rawType);
  if (returnType.length === 0) return null;

  const params = rawParams.replace(/\s+/g, " ").trim();
  const separator = returnType.endsWith("*") ? "" : " ";
  return {
    name,
    returnType,
    signature: `${returnType}${separator}${name}(${params})`,
  };
}

/**
 * Top-level function definitions in source order
 */
export function extractFunctionDefinitions(source: string): FunctionDefinition[] {
  const text = codeView(source);
  const definitions: FunctionDefinition[] = [];
  let segmentStart = 0;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (ch === ";" || ch === "}") {
      segmentStart = i + 1;
      i++;
      continue;
    }

    if (ch !== "{") {
      i++;
      continue;
    }

    const close = matchBrace(text, i);
    const end = close === -1 ? text.length : close + 1;
    const rawHeader = text.slice(segmentStart, i);
    const header = rawHeader.trim();

    if (!header.includes("=")) {
      const fn = parseHeader(header);
      if (fn) {
        const start = segmentStart + (rawHeader.length - rawHeader.trimStart().length);
        definitions.push({
          ...fn,
          line: lineAt(text, start),
          start,
          end,
          body: text.slice(i + 1, Math.max(i + 1, end - 1)),
        });
      }
    }

    segmentStart = end;
    i = end;
  }

  return definitions;
}

/**
 * Top-level function definitions as plain facts
 */
export function extractFunctions(source: string): CFunction[] {
  return extractFunctionDefinitions(source).map(({ name, returnType, signature }) => ({
    name,
    returnType,
    signature,
  }));
}

/**
 * Included header names, deduplicated, in declaration order
 */
export function extractIncludes(source: string): string[] {
  const text = blankComments(source);
  const seen = new Set<string>();
  for (const match of text.matchAll(INCLUDE_PATTERN)) {
    const name = match[1]?.trim();
    if (name) seen.add(name);
  }
  return [...seen];
}

function precedingWord(text: string, offset: number): { word: string; char: string } {
  let j = offset - 1;
  while (j >= 0 && /\s/.test(text[j] ?? "")) j--;
  const char = text[j] ?? "";
  let k = j;
  while (k >= 0 && /\w/.test(text[k] ?? "")) k--;
  return { word: text.slice(k + 1, j + 1), char };
}

/**
 * Identifiers used as call targets, in first-call order.
 * Declarations ("float read(void);") and definitions are not calls.
 */
export function extractCalledSymbols(source: string): string[] {
  const text = codeView(source);
  const seen = new Set<string>();

  for (const match of text.matchAll(/\b([A-Za-z_]\w*)\s*\(/g)) {
    const name = match[1];
    if (name === undefined || C_KEYWORDS.has(name) || match.index === undefined) continue;

    const before = precedingWord(text, match.index);
    if (before.word.length > 0 && !CALL_PRECEDING_KEYWORDS.has(before.word)) {
      // "<type> name(" is a declaration
      continue;
    }
    if (before.char === "*") {
      const beforeStar = precedingWord(text, text.lastIndexOf("*", match.index));
      if (TYPE_KEYWORDS.has(beforeStar.word) || beforeStar.word.endsWith("_t")) continue;
    }

    seen.add(name);
  }

  return [...seen];
}
