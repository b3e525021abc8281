/**
 * c-testgen - AI-assisted Unity test generation for C sources
 *
 * @packageDocumentation
 */

export const VERSION = "0.1.0";

// Library utilities
export {
  // Errors
  TestgenError,
  ConfigError,
  ContextBuildError,
  GenerationError,
  BackendRequestError,
  NormalizationError,
  ValidationCheckError,
  RunInterruptedError,
  // Result utilities
  ok,
  err,
  unwrap,
  unwrapOr,
  tryCatch,
  tryCatchAsync,
  // Logger
  logger,
  Logger,
} from "./lib/index.js";

export type { Result, LogLevel } from "./lib/index.js";

// Dependency indexer
export {
  DependencyIndexer,
  createIndexer,
  analyzeSource,
  SymbolTable,
} from "./indexer/index.js";

export type {
  CFunction,
  FileAnalysis,
  IndexerOptions,
  SymbolEntry,
  SymbolCollision,
} from "./indexer/index.js";

// Generation backends
export {
  GenerationAdapter,
  createGenerationAdapter,
  createBackend,
  createBackends,
  decideRetry,
  classifyFailure,
  DEFAULT_RETRY_POLICY,
  PROVIDER_NAMES,
  PROVIDER_MODELS,
} from "./ai/index.js";

export type {
  Backend,
  BackendConfig,
  ProviderName,
  RetryPolicy,
  RetryDecision,
} from "./ai/index.js";

// Test generation
export {
  buildGenerationContext,
  buildGenerationPrompt,
  normalizeTestCode,
  safeNormalizeTestCode,
  validateTestCode,
  validateTestFile,
  computeQuality,
  meetsThreshold,
  RegenerationController,
  RegenerationStats,
  transition,
  runPipeline,
  exitCodeFor,
  DEFAULT_CHECKS,
} from "./testgen/index.js";

export type {
  GenerationContext,
  StubTarget,
  TextGenerator,
  QualityTier,
  ValidationReport,
  ValidationCheck,
  ControllerConfig,
  ControllerState,
  FileOutcome,
  PipelineConfig,
  ReportSink,
  RunSummary,
} from "./testgen/index.js";
