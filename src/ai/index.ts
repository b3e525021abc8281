/**
 * Generation Service Module
 *
 * Provides:
 * - HTTP backends for Gemini, Anthropic and OpenAI models (plus a mock)
 * - A pure retry policy (throttling classification, backoff decisions)
 * - The sticky multi-backend generation adapter
 */

export { GenerationAdapter, createGenerationAdapter, defaultSleep } from "./adapter.js";
export type { AdapterOptions, Sleep } from "./adapter.js";
export {
  GeminiBackend,
  AnthropicBackend,
  OpenAIBackend,
  MockBackend,
  createBackend,
  createBackends,
  PROVIDER_MODELS,
  PROVIDER_ENV_VARS,
} from "./backends.js";
export { classifyFailure, decideRetry, backoffDelay, DEFAULT_RETRY_POLICY } from "./retry-policy.js";
export { PROVIDER_NAMES } from "./types.js";
export type {
  Backend,
  BackendConfig,
  GenerateOptions,
  ProviderName,
  RetryPolicy,
  FailureKind,
  AttemptOutcome,
  RetryDecision,
} from "./types.js";
