/**
 * Test generation module
 *
 * Builds generation context for a C source file, asks a backend for a
 * Unity test, normalizes and validates the result, and regenerates with
 * the validator's issues as feedback until the quality bar is met.
 */

export {
  buildGenerationContext,
  buildFeedbackSection,
  renderFeedback,
  computeNeedsStub,
  redactSensitiveContent,
  MAX_FEEDBACK_ISSUES,
  type GenerationContext,
  type StubTarget,
  type FeedbackSection,
  type ContextOptions,
} from "./context.js";

export {
  buildGenerationPrompt,
  generateTestCode,
  SYSTEM_PROMPT,
  type TextGenerator,
} from "./generator.js";

export {
  normalizeTestCode,
  safeNormalizeTestCode,
  type NormalizeOptions,
  type SafeNormalizeResult,
} from "./normalizer.js";

export {
  validateTestCode,
  validateTestFile,
  runChecks,
  getCheck,
  computeQuality,
  meetsThreshold,
  tierRank,
  formatTier,
  DEFAULT_CHECKS,
  QUALITY_TIERS,
  type QualityTier,
  type ValidationReport,
  type ValidationCheck,
  type CheckInput,
  type CheckOutcome,
} from "./validator/index.js";

export {
  RegenerationController,
  RegenerationStats,
  transition,
  maxAttempts,
  type ControllerConfig,
  type ControllerState,
  type ControllerEvent,
  type FileOutcome,
  type GenerationAttempt,
} from "./controller.js";

export {
  runPipeline,
  summarize,
  exitCodeFor,
  ENTRY_POINT_FILE,
  type PipelineConfig,
  type ReportSink,
  type RunSummary,
} from "./pipeline.js";

export { TEMPERATURE, RAW_COUNTER, describeRange, type BoundedQuantity } from "./domain.js";
export { EMBEDDED_FEATURES, detectEmbeddedFeatures, type EmbeddedFeature } from "./embedded.js";
