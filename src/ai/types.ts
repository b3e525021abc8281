/**
 * Generation backend types
 */

export const PROVIDER_NAMES = ["gemini", "anthropic", "openai", "mock"] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export interface BackendConfig {
  /** Provider serving the model */
  provider: ProviderName;
  /** Model identifier (provider-specific) */
  model: string;
  /** API key; mock needs none */
  apiKey?: string;
  /** Maximum tokens in response */
  maxTokens?: number;
  /** Sampling temperature (0-1) */
  temperature?: number;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
}

export interface GenerateOptions {
  /** System instruction sent alongside the prompt */
  systemPrompt?: string;
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

/**
 * One text-generation service/model instance.
 * Resolves with generated text or rejects with the provider failure.
 */
export interface Backend {
  /** Stable id, e.g. "gemini:gemini-2.5-flash" */
  readonly id: string;
  readonly provider: ProviderName;
  readonly model: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

/**
 * Local retry bounds for the current backend
 */
export interface RetryPolicy {
  /** Tries against the current backend before falling back */
  maxTries: number;
  /** First backoff delay; doubles on every further throttled try */
  baseDelayMs: number;
}

export type FailureKind = "throttling" | "other";

/**
 * Result of a single backend call as seen by the retry policy
 */
export type AttemptOutcome =
  | { ok: true; text: string }
  | { ok: false; failure: FailureKind; error: unknown };

/**
 * What the adapter does next after one try
 */
export type RetryDecision =
  | { kind: "succeed"; text: string }
  | { kind: "retry-same-backend"; delayMs: number }
  | { kind: "switch-backend" }
  | { kind: "terminal"; reason: string; error: unknown };
