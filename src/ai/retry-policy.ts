/**
 * Retry policy for generation backends.
 *
 * Pure functions only: failure classification from the error signal and
 * the next step after a try. The adapter owns the sleeping and switching.
 */

import { BackendRequestError } from "../lib/errors.js";

import type { AttemptOutcome, FailureKind, RetryDecision, RetryPolicy } from "./types.js";

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxTries: 3,
  baseDelayMs: 1000,
};

/** HTTP statuses providers use for rate limiting and overload */
const THROTTLING_STATUSES = new Set([429, 503, 529]);

const THROTTLING_PATTERNS: readonly RegExp[] = [
  /rate[\s_-]?limit/i,
  /quota/i,
  /limit exceeded/i,
  /resource[\s_]exhausted/i,
  /too many requests/i,
  /overloaded/i,
  /\b429\b/,
];

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : String(error);
}

/**
 * Classify a backend failure as throttling (rate, quota, overload) or other
 */
export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof BackendRequestError && error.status !== undefined && THROTTLING_STATUSES.has(error.status)) {
    return "throttling";
  }
  const message = errorMessage(error);
  return THROTTLING_PATTERNS.some((pattern) => pattern.test(message)) ? "throttling" : "other";
}

/**
 * Backoff before retry number `tryIndex + 1` (tryIndex is 0-based)
 */
export function backoffDelay(tryIndex: number, policy: RetryPolicy): number {
  return policy.baseDelayMs * 2 ** tryIndex;
}

/**
 * Decide the next step after try `tryIndex` (0-based) on the current backend.
 *
 * - success ends the call
 * - throttling before the last try backs off and retries the same backend
 * - throttling on the last try falls back to the next backend
 * - any other failure is terminal for the call
 */
export function decideRetry(outcome: AttemptOutcome, tryIndex: number, policy: RetryPolicy): RetryDecision {
  if (outcome.ok) {
    return { kind: "succeed", text: outcome.text };
  }

  if (outcome.failure === "other") {
    return { kind: "terminal", reason: errorMessage(outcome.error), error: outcome.error };
  }

  if (tryIndex < policy.maxTries - 1) {
    return { kind: "retry-same-backend", delayMs: backoffDelay(tryIndex, policy) };
  }

  return { kind: "switch-backend" };
}
