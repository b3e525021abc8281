/**
 * Generation service adapter
 *
 * Wraps an ordered list of backends behind a single `generate` call.
 * One backend is current and stays current across calls until a
 * throttled fallback moves it. Throttling is retried with exponential
 * backoff; anything else is terminal for the call.
 */

import { GenerationError, RunInterruptedError } from "../lib/errors.js";
import { logger as rootLogger } from "../lib/logger.js";

import { classifyFailure, decideRetry, DEFAULT_RETRY_POLICY } from "./retry-policy.js";

import type { Logger } from "../lib/logger.js";
import type { AttemptOutcome, Backend, GenerateOptions, RetryPolicy } from "./types.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface AdapterOptions {
  policy?: RetryPolicy;
  /** Injected for tests; defaults to a timer that honours the signal */
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Timer-based sleep that rejects when the signal aborts
 */
export const defaultSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RunInterruptedError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new RunInterruptedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export class GenerationAdapter {
  private readonly backends: readonly Backend[];
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly log: Logger;
  private currentIndex = 0;

  constructor(backends: readonly Backend[], options: AdapterOptions = {}) {
    if (backends.length === 0) {
      throw new GenerationError("At least one generation backend is required");
    }
    if (options.policy && options.policy.maxTries < 1) {
      throw new GenerationError("Retry policy needs maxTries >= 1", { maxTries: options.policy.maxTries });
    }
    this.backends = [...backends];
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? rootLogger.child("[adapter]");
  }

  /** Backend that will serve the next call */
  get current(): Backend {
    const backend = this.backends[this.currentIndex];
    if (backend === undefined) {
      throw new GenerationError("Current backend index out of range", { index: this.currentIndex });
    }
    return backend;
  }

  /**
   * Generate text for a prompt.
   * @throws GenerationError when the call fails terminally or every backend is exhausted
   * @throws RunInterruptedError when the signal aborts
   */
  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const primary = this.current;
    let lastError: unknown;

    for (let tryIndex = 0; tryIndex < this.policy.maxTries; tryIndex++) {
      const outcome = await this.attempt(primary, prompt, options);
      const decision = decideRetry(outcome, tryIndex, this.policy);

      switch (decision.kind) {
        case "succeed":
          return decision.text;
        case "terminal":
          throw new GenerationError(
            `Generation failed on ${primary.id}: ${decision.reason}`,
            { backend: primary.id },
            { cause: decision.error }
          );
        case "retry-same-backend":
          lastError = outcome.ok ? undefined : outcome.error;
          this.log.warn(
            `Rate limit hit on ${primary.id}, retrying in ${decision.delayMs}ms (try ${tryIndex + 1}/${this.policy.maxTries})`
          );
          await this.sleep(decision.delayMs, options.signal);
          break;
        case "switch-backend":
          lastError = outcome.ok ? undefined : outcome.error;
          this.log.warn(`${primary.id} persistently rate limited, trying fallback backends`);
          return this.fallback(prompt, options, lastError);
      }
    }

    // maxTries >= 1 guarantees the loop ends through a decision
    throw new GenerationError(`Generation failed on ${primary.id}`, { backend: primary.id }, { cause: lastError });
  }

  /**
   * One call per remaining backend in list order; first success becomes current
   */
  private async fallback(prompt: string, options: GenerateOptions, initialError: unknown): Promise<string> {
    let lastError = initialError;

    for (let index = 0; index < this.backends.length; index++) {
      if (index === this.currentIndex) continue;
      const backend = this.backends[index];
      if (backend === undefined) continue;

      this.log.info(`Trying fallback backend ${backend.id}`);
      const outcome = await this.attempt(backend, prompt, options);
      if (outcome.ok) {
        this.log.warn(`Switched to backend ${backend.id}`);
        this.currentIndex = index;
        return outcome.text;
      }
      this.log.warn(`Fallback backend ${backend.id} also failed: ${describe(outcome.error)}`);
      lastError = outcome.error;
    }

    throw new GenerationError(
      `All generation backends failed: ${describe(lastError)}`,
      { backends: this.backends.map((b) => b.id) },
      { cause: lastError }
    );
  }

  private async attempt(backend: Backend, prompt: string, options: GenerateOptions): Promise<AttemptOutcome> {
    if (options.signal?.aborted) {
      throw new RunInterruptedError();
    }
    try {
      const text = await backend.generate(prompt, options);
      return { ok: true, text };
    } catch (error) {
      if (options.signal?.aborted) {
        throw new RunInterruptedError();
      }
      return { ok: false, failure: classifyFailure(error), error };
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create an adapter over backends in fallback order
 */
export function createGenerationAdapter(backends: readonly Backend[], options?: AdapterOptions): GenerationAdapter {
  return new GenerationAdapter(backends, options);
}
