/**
 * Configuration Management
 *
 * Two layers:
 * - Run configuration: defaults < `.c-testgen.yml` at the repository root
 *   < command-line flags, validated with zod.
 * - User configuration: API keys and default provider in
 *   `~/.c-testgen/config.json` with owner-only permissions. Environment
 *   variables take precedence over stored keys.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync, chmodSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { PROVIDER_ENV_VARS } from "../ai/backends.js";
import { PROVIDER_NAMES } from "../ai/types.js";
import { ConfigError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { err, ok } from "../lib/result.js";

import type { ProviderName } from "../ai/types.js";
import type { Result } from "../lib/result.js";

export const PROJECT_CONFIG_FILE = ".c-testgen.yml";

// =============================================================================
// RUN CONFIGURATION
// =============================================================================

const QualityTierSchema = z.enum(["low", "medium", "high"]);

/**
 * Fully resolved run configuration
 */
export const RunConfigSchema = z.object({
  repoPath: z.string().min(1).default("."),
  sourceDir: z.string().min(1).default("src"),
  outputDir: z.string().min(1).default("tests"),
  maxRegenerationAttempts: z.number().int().nonnegative().default(2),
  qualityThreshold: QualityTierSchema.default("high"),
  regenerateOnLowQuality: z.boolean().default(false),
  redactSensitive: z.boolean().default(false),
  provider: z.enum(PROVIDER_NAMES).default("gemini"),
  /** Fallback order; empty means the provider's default list */
  models: z.array(z.string().min(1)).default([]),
  exclude: z.array(z.string()).default([]),
  retry: z
    .object({
      maxTries: z.number().int().min(1).default(3),
      baseDelayMs: z.number().int().nonnegative().default(1000),
    })
    .default({}),
  timeoutMs: z.number().int().positive().default(120_000),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

/**
 * Settings accepted from the project file and from flags; every key optional
 */
export const ProjectConfigSchema = z
  .object({
    repoPath: z.string().min(1),
    sourceDir: z.string().min(1),
    outputDir: z.string().min(1),
    maxRegenerationAttempts: z.number().int().nonnegative(),
    qualityThreshold: QualityTierSchema,
    regenerateOnLowQuality: z.boolean(),
    redactSensitive: z.boolean(),
    provider: z.enum(PROVIDER_NAMES),
    models: z.array(z.string().min(1)),
    exclude: z.array(z.string()),
    retry: z
      .object({
        maxTries: z.number().int().min(1),
        baseDelayMs: z.number().int().nonnegative(),
      })
      .partial(),
    timeoutMs: z.number().int().positive(),
  })
  .partial()
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Read `.c-testgen.yml` from the repository root; a missing file is empty
 */
export function loadProjectConfig(repoPath: string): Result<ProjectConfig, ConfigError> {
  const filePath = join(resolve(repoPath), PROJECT_CONFIG_FILE);
  if (!existsSync(filePath)) {
    return ok({});
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, "utf-8"));
  } catch (error) {
    return err(
      new ConfigError(`Invalid YAML in ${PROJECT_CONFIG_FILE}: ${error instanceof Error ? error.message : String(error)}`, {
        filePath,
      })
    );
  }

  // An empty document parses to null
  const result = ProjectConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    return err(new ConfigError(`Invalid ${PROJECT_CONFIG_FILE}: ${formatZodError(result.error)}`, { filePath }));
  }
  return ok(result.data);
}

function pick<T, K extends keyof T>(layers: readonly T[], key: K): T[K] | undefined {
  return layers.reduce<T[K] | undefined>((value, layer) => layer[key] ?? value, undefined);
}

/**
 * Merge layers, lowest precedence first, over the schema defaults and
 * validate the result
 */
export function resolveRunConfig(...layers: ProjectConfig[]): Result<RunConfig, ConfigError> {
  const retries = layers.map((layer) => layer.retry ?? {});
  const result = RunConfigSchema.safeParse({
    repoPath: pick(layers, "repoPath"),
    sourceDir: pick(layers, "sourceDir"),
    outputDir: pick(layers, "outputDir"),
    maxRegenerationAttempts: pick(layers, "maxRegenerationAttempts"),
    qualityThreshold: pick(layers, "qualityThreshold"),
    regenerateOnLowQuality: pick(layers, "regenerateOnLowQuality"),
    redactSensitive: pick(layers, "redactSensitive"),
    provider: pick(layers, "provider"),
    models: pick(layers, "models"),
    exclude: pick(layers, "exclude"),
    retry: {
      maxTries: pick(retries, "maxTries"),
      baseDelayMs: pick(retries, "baseDelayMs"),
    },
    timeoutMs: pick(layers, "timeoutMs"),
  });

  if (!result.success) {
    return err(new ConfigError(`Invalid configuration: ${formatZodError(result.error)}`));
  }
  return ok(result.data);
}

/**
 * Resolve `base < .c-testgen.yml < flags`. The project file is read from
 * the flagged repository path when one is given.
 */
export function loadRunConfig(flags: ProjectConfig, base: ProjectConfig = {}): Result<RunConfig, ConfigError> {
  const flagCheck = ProjectConfigSchema.safeParse(flags);
  if (!flagCheck.success) {
    return err(new ConfigError(`Invalid option: ${formatZodError(flagCheck.error)}`));
  }

  const fileConfig = loadProjectConfig(flags.repoPath ?? ".");
  if (!fileConfig.success) return fileConfig;
  return resolveRunConfig(base, fileConfig.data, flagCheck.data);
}

// =============================================================================
// USER CONFIGURATION
// =============================================================================

const UserConfigSchema = z.object({
  geminiApiKey: z.string().optional(),
  anthropicApiKey: z.string().optional(),
  openaiApiKey: z.string().optional(),
  defaultProvider: z.enum(PROVIDER_NAMES).optional(),
});

export type UserConfig = z.infer<typeof UserConfigSchema>;

export type KeyedProvider = Exclude<ProviderName, "mock">;

const API_KEY_FIELDS = {
  gemini: "geminiApiKey",
  anthropic: "anthropicApiKey",
  openai: "openaiApiKey",
} as const satisfies Record<KeyedProvider, keyof UserConfig>;

/**
 * Keys accepted by `config set|get|unset`
 */
export const CONFIG_KEYS = {
  "gemini-api-key": "geminiApiKey",
  "anthropic-api-key": "anthropicApiKey",
  "openai-api-key": "openaiApiKey",
  "default-provider": "defaultProvider",
} as const satisfies Record<string, keyof UserConfig>;

export type ConfigKey = keyof typeof CONFIG_KEYS;

export function isConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(CONFIG_KEYS, key);
}

/**
 * Directory holding the user configuration; `C_TESTGEN_HOME` overrides it
 */
export function getConfigDir(): string {
  return process.env["C_TESTGEN_HOME"] ?? join(homedir(), ".c-testgen");
}

/**
 * Get config file path (for display purposes)
 */
export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
}

/**
 * Load user configuration; unreadable or invalid files count as empty
 */
export function loadConfig(): UserConfig {
  const file = getConfigPath();
  if (!existsSync(file)) {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(file, "utf-8"));
    const result = UserConfigSchema.safeParse(parsed);
    if (!result.success) {
      logger.warn(`Ignoring invalid config at ${file}`);
      return {};
    }
    return result.data;
  } catch (error) {
    logger.warn(`Ignoring unreadable config at ${file}: ${error instanceof Error ? error.message : String(error)}`);
    return {};
  }
}

/**
 * Save configuration to disk with secure permissions
 */
export function saveConfig(config: UserConfig): void {
  ensureConfigDir();
  const file = getConfigPath();
  writeFileSync(file, JSON.stringify(config, null, 2), { mode: 0o600 });
  chmodSync(file, 0o600);
}

/**
 * Set one `config set` key after validating the value
 */
export function setConfigValue(key: ConfigKey, value: string): Result<void, ConfigError> {
  const config = loadConfig();
  const field = CONFIG_KEYS[key];

  if (field === "defaultProvider") {
    const provider = z.enum(PROVIDER_NAMES).safeParse(value);
    if (!provider.success) {
      return err(new ConfigError(`Provider must be one of: ${PROVIDER_NAMES.join(", ")}`));
    }
    config.defaultProvider = provider.data;
  } else {
    const validation = validateApiKey(value);
    if (!validation.valid) {
      return err(new ConfigError(`Invalid API key: ${validation.error}`));
    }
    config[field] = value;
  }

  saveConfig(config);
  return ok(undefined);
}

export function getConfigValue(key: ConfigKey): string | undefined {
  return loadConfig()[CONFIG_KEYS[key]];
}

export function deleteConfigValue(key: ConfigKey): void {
  const config = loadConfig();
  delete config[CONFIG_KEYS[key]];
  saveConfig(config);
}

/**
 * Get API key (from environment or config file).
 * Environment variables take precedence.
 */
export function getApiKey(provider: KeyedProvider): string | undefined {
  const envValue = process.env[PROVIDER_ENV_VARS[provider]];
  if (envValue !== undefined && envValue.length > 0) {
    return envValue;
  }
  return loadConfig()[API_KEY_FIELDS[provider]];
}

export function hasApiKey(provider: KeyedProvider): boolean {
  const key = getApiKey(provider);
  return key !== undefined && key.length > 0;
}

/**
 * Stored default provider, or gemini
 */
export function getDefaultProvider(): ProviderName {
  return loadConfig().defaultProvider ?? "gemini";
}

/**
 * Mask API key for display (show first/last 4 chars)
 */
export function maskApiKey(key: string): string {
  if (key.length <= 12) {
    return "****";
  }
  return `${key.slice(0, 4)}...${key.slice(-4)}`;
}

export function validateApiKey(key: string): { valid: true } | { valid: false; error: string } {
  if (key.length === 0) {
    return { valid: false, error: "API key cannot be empty" };
  }
  if (/\s/.test(key)) {
    return { valid: false, error: "API key must not contain whitespace" };
  }
  return { valid: true };
}
