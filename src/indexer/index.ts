/**
 * Dependency indexer module
 *
 * Per-file C facts (functions, includes, unresolved calls) and the
 * run-wide symbol table.
 */

export { DependencyIndexer, createIndexer, analyzeSource, type IndexerOptions } from "./indexer.js";
export { SymbolTable, type SymbolEntry, type SymbolCollision } from "./symbol-table.js";
export {
  extractFunctions,
  extractFunctionDefinitions,
  extractIncludes,
  extractCalledSymbols,
  normalizeType,
} from "./c-parser.js";
export type { CFunction, FunctionDefinition, FileAnalysis } from "./types.js";
