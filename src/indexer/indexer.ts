/**
 * Dependency indexer
 *
 * Lists C sources under a root, extracts per-file facts and builds the
 * run-wide symbol table. File reads are the only I/O; all parsing is
 * delegated to the pure functions in c-parser.ts.
 */

import { readFile } from "fs/promises";
import { basename, relative, sep } from "path";

import { glob } from "glob";
import { minimatch } from "minimatch";

import { ContextBuildError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { err, ok, tryCatchAsync } from "../lib/result.js";

import {
  extractCalledSymbols,
  extractFunctions,
  extractIncludes,
} from "./c-parser.js";
import { SymbolTable } from "./symbol-table.js";

import type { Result } from "../lib/result.js";
import type { CFunction, FileAnalysis } from "./types.js";

const log = logger.child("[indexer]");

/**
 * Directories never indexed
 */
const DEFAULT_IGNORE_DIRS = ["node_modules", ".git", "build", "dist"];

export interface IndexerOptions {
  /** Extra directories (relative to the listed root) to skip */
  ignoreDirs?: string[];
  /** Glob patterns matched against relative paths and basenames */
  exclude?: string[];
}

/**
 * Derive all facts for one file from its text
 */
export function analyzeSource(filePath: string, source: string): FileAnalysis {
  const functions = extractFunctions(source);
  const defined = new Set(functions.map((f) => f.name));
  return {
    filePath,
    source,
    functions,
    calledButUndefinedSymbols: extractCalledSymbols(source).filter((name) => !defined.has(name)),
    includes: extractIncludes(source),
  };
}

export class DependencyIndexer {
  private readonly ignoreDirs: string[];
  private readonly exclude: string[];

  constructor(options: IndexerOptions = {}) {
    this.ignoreDirs = [...DEFAULT_IGNORE_DIRS, ...(options.ignoreDirs ?? [])];
    this.exclude = options.exclude ?? [];
  }

  /**
   * All `.c` files under root, sorted by path
   */
  async listSourceFiles(root: string): Promise<string[]> {
    const ignore = this.ignoreDirs.map((dir) => `${dir.replace(/\/+$/, "")}/**`);
    const matches = await glob("**/*.c", { cwd: root, absolute: true, nodir: true, ignore });

    return matches
      .filter((file) => !this.isExcluded(root, file))
      .sort();
  }

  private isExcluded(root: string, file: string): boolean {
    if (this.exclude.length === 0) return false;
    const rel = relative(root, file).split(sep).join("/");
    const name = basename(file);
    return this.exclude.some((pattern) => minimatch(rel, pattern) || minimatch(name, pattern));
  }

  /**
   * Read a source file; unreadable or binary content is a failed result
   */
  async readSource(filePath: string): Promise<Result<string, ContextBuildError>> {
    const read = await tryCatchAsync(
      () => readFile(filePath, "utf-8"),
      (error) =>
        new ContextBuildError(
          `Cannot read source file: ${error instanceof Error ? error.message : String(error)}`,
          filePath,
          { cause: error }
        )
    );
    if (!read.success) return read;

    if (read.data.includes("\u0000")) {
      return err(new ContextBuildError("Source file contains binary data", filePath));
    }
    return ok(read.data);
  }

  private async readOrThrow(filePath: string): Promise<string> {
    const result = await this.readSource(filePath);
    if (!result.success) throw result.error;
    return result.data;
  }

  async extractFunctions(filePath: string): Promise<CFunction[]> {
    return extractFunctions(await this.readOrThrow(filePath));
  }

  async extractIncludes(filePath: string): Promise<string[]> {
    return extractIncludes(await this.readOrThrow(filePath));
  }

  /**
   * Full per-file analysis.
   * @throws ContextBuildError when the file cannot be used
   */
  async analyzeFileDependencies(filePath: string): Promise<FileAnalysis> {
    return analyzeSource(filePath, await this.readOrThrow(filePath));
  }

  /**
   * Index every file in order; unreadable files are skipped with a warning
   */
  async buildSymbolTable(files: readonly string[]): Promise<SymbolTable> {
    const indexed: Array<{ filePath: string; functions: CFunction[] }> = [];

    for (const filePath of files) {
      const source = await this.readSource(filePath);
      if (!source.success) {
        log.warn(`Skipping ${filePath}: ${source.error.message}`);
        continue;
      }
      indexed.push({ filePath, functions: extractFunctions(source.data) });
    }

    const table = SymbolTable.fromFiles(indexed);
    for (const collision of table.collisions()) {
      log.warn(`Function ${collision.name} is defined in ${collision.filePaths.length} files; using ${table.ownerOf(collision.name) ?? "?"}`);
    }
    log.debug(`Mapped ${table.size} functions across ${indexed.length} files`);
    return table;
  }
}

/**
 * Create an indexer instance
 */
export function createIndexer(options?: IndexerOptions): DependencyIndexer {
  return new DependencyIndexer(options);
}
