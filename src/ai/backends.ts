/**
 * Generation backends
 *
 * HTTP clients for Gemini, Anthropic and OpenAI models plus an offline
 * mock. Each instance serves exactly one model; the adapter orders them.
 */

import { z } from "zod";

import { BackendRequestError } from "../lib/errors.js";

import type { Backend, BackendConfig, GenerateOptions, ProviderName } from "./types.js";

/** Model fallback order per provider, best first */
export const PROVIDER_MODELS: Record<ProviderName, readonly string[]> = {
  gemini: ["gemini-2.5-flash", "gemini-2.5-pro", "gemini-2.0-flash", "gemini-1.5-flash", "gemini-1.5-pro"],
  anthropic: ["claude-sonnet-4-20250514", "claude-3-5-haiku-20241022"],
  openai: ["gpt-4o", "gpt-4o-mini"],
  mock: ["mock-model"],
};

const PROVIDER_ENDPOINTS: Record<Exclude<ProviderName, "mock">, string> = {
  gemini: "https://generativelanguage.googleapis.com/v1beta/models",
  anthropic: "https://api.anthropic.com/v1/messages",
  openai: "https://api.openai.com/v1/chat/completions",
};

/** Environment variable holding each provider's API key */
export const PROVIDER_ENV_VARS: Record<Exclude<ProviderName, "mock">, string> = {
  gemini: "GEMINI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
};

const DEFAULTS = {
  maxTokens: 8192,
  temperature: 0.2,
  timeoutMs: 120_000,
};

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(z.object({ text: z.string().optional() })).default([]) }).optional(),
      })
    )
    .default([]),
});

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })),
});

const OpenAIResponseSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })),
});

/**
 * Shared HTTP plumbing: timeout, caller abort and error mapping
 */
abstract class HttpBackend implements Backend {
  readonly id: string;
  readonly provider: ProviderName;
  readonly model: string;
  protected readonly apiKey: string;
  protected readonly maxTokens: number;
  protected readonly temperature: number;
  private readonly timeoutMs: number;

  constructor(config: BackendConfig) {
    this.provider = config.provider;
    this.model = config.model;
    this.id = `${config.provider}:${config.model}`;
    this.apiKey = config.apiKey ?? "";
    this.maxTokens = config.maxTokens ?? DEFAULTS.maxTokens;
    this.temperature = config.temperature ?? DEFAULTS.temperature;
    this.timeoutMs = config.timeoutMs ?? DEFAULTS.timeoutMs;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    if (this.apiKey.length === 0) {
      throw new BackendRequestError(`API key not configured for ${this.provider}`, this.id);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    options.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const { url, headers, body } = this.buildRequest(prompt, options.systemPrompt);
      const response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...headers },
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const detail = await response.text();
        throw new BackendRequestError(
          `${this.id} API error: ${response.status} - ${detail.slice(0, 500)}`,
          this.id,
          response.status
        );
      }

      const text = this.extractText(await response.json());
      if (text.trim().length === 0) {
        throw new BackendRequestError(`${this.id} returned an empty response`, this.id);
      }
      return text;
    } catch (error) {
      if (error instanceof BackendRequestError) throw error;
      if (controller.signal.aborted && options.signal?.aborted !== true) {
        throw new BackendRequestError(`${this.id} request timed out after ${this.timeoutMs}ms`, this.id);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }

  protected abstract buildRequest(
    prompt: string,
    systemPrompt: string | undefined
  ): { url: string; headers: Record<string, string>; body: unknown };

  protected abstract extractText(payload: unknown): string;

  protected parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown): T {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new BackendRequestError(`${this.id} returned an unexpected payload: ${parsed.error.message}`, this.id);
    }
    return parsed.data;
  }
}

export class GeminiBackend extends HttpBackend {
  protected buildRequest(prompt: string, systemPrompt: string | undefined) {
    return {
      url: `${PROVIDER_ENDPOINTS.gemini}/${encodeURIComponent(this.model)}:generateContent`,
      headers: { "x-goog-api-key": this.apiKey },
      body: {
        contents: [{ role: "user", parts: [{ text: prompt }] }],
        ...(systemPrompt ? { systemInstruction: { parts: [{ text: systemPrompt }] } } : {}),
        generationConfig: { temperature: this.temperature, maxOutputTokens: this.maxTokens },
      },
    };
  }

  protected extractText(payload: unknown): string {
    const data = this.parse(GeminiResponseSchema, payload);
    const parts = data.candidates[0]?.content?.parts ?? [];
    return parts.map((p) => p.text ?? "").join("");
  }
}

export class AnthropicBackend extends HttpBackend {
  protected buildRequest(prompt: string, systemPrompt: string | undefined) {
    return {
      url: PROVIDER_ENDPOINTS.anthropic,
      headers: { "x-api-key": this.apiKey, "anthropic-version": "2023-06-01" },
      body: {
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: this.temperature,
        ...(systemPrompt ? { system: systemPrompt } : {}),
        messages: [{ role: "user", content: prompt }],
      },
    };
  }

  protected extractText(payload: unknown): string {
    const data = this.parse(AnthropicResponseSchema, payload);
    return data.content.map((block) => block.text ?? "").join("");
  }
}

export class OpenAIBackend extends HttpBackend {
  protected buildRequest(prompt: string, systemPrompt: string | undefined) {
    const messages: Array<{ role: string; content: string }> = [];
    if (systemPrompt) {
      messages.push({ role: "system", content: systemPrompt });
    }
    messages.push({ role: "user", content: prompt });

    return {
      url: PROVIDER_ENDPOINTS.openai,
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: { model: this.model, max_tokens: this.maxTokens, temperature: this.temperature, messages },
    };
  }

  protected extractText(payload: unknown): string {
    const data = this.parse(OpenAIResponseSchema, payload);
    return data.choices[0]?.message.content ?? "";
  }
}

/**
 * Offline backend returning a canned Unity test for the first function
 * named in the prompt's source block
 */
export class MockBackend implements Backend {
  readonly id: string;
  readonly provider: ProviderName = "mock";
  readonly model: string;

  constructor(config: Partial<BackendConfig> = {}) {
    this.model = config.model ?? "mock-model";
    this.id = `mock:${this.model}`;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    if (options.signal?.aborted) {
      throw new BackendRequestError("mock request aborted", this.id);
    }

    const header = /==== BEGIN (\S+?)\.c ====/.exec(prompt);
    const sourceName = header?.[1]?.split("/").pop() ?? "module";
    const fn = /^[A-Za-z_][\w\s*]*?\b([A-Za-z_]\w*)\s*\([^;{]*\)\s*\{/m.exec(prompt.slice(header?.index ?? 0));
    const target = fn?.[1] ?? "module_init";

    return [
      `/* test_${sourceName}.c - generated tests */`,
      `#include "unity.h"`,
      "",
      "void setUp(void)",
      "{",
      "}",
      "",
      "void tearDown(void)",
      "{",
      "}",
      "",
      `void test_${target}_returns_without_error(void)`,
      "{",
      `    TEST_PASS_MESSAGE("${target} placeholder");`,
      "}",
      "",
      "int main(void)",
      "{",
      "    UNITY_BEGIN();",
      `    RUN_TEST(test_${target}_returns_without_error);`,
      "    return UNITY_END();",
      "}",
      "",
    ].join("\n");
  }
}

/**
 * Create the backend for one provider/model pair
 */
export function createBackend(config: BackendConfig): Backend {
  switch (config.provider) {
    case "gemini":
      return new GeminiBackend(config);
    case "anthropic":
      return new AnthropicBackend(config);
    case "openai":
      return new OpenAIBackend(config);
    case "mock":
      return new MockBackend(config);
  }
}

/**
 * One backend per model, in fallback order
 */
export function createBackends(
  provider: ProviderName,
  models: readonly string[],
  options: Omit<BackendConfig, "provider" | "model"> = {}
): Backend[] {
  const list = models.length > 0 ? models : PROVIDER_MODELS[provider];
  return list.map((model) => createBackend({ ...options, provider, model }));
}
