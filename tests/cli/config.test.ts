/**
 * Configuration Tests
 */

import { existsSync, statSync } from "fs";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

import {
  PROJECT_CONFIG_FILE,
  deleteConfigValue,
  getApiKey,
  getConfigPath,
  getConfigValue,
  getDefaultProvider,
  hasApiKey,
  isConfigKey,
  loadConfig,
  loadProjectConfig,
  loadRunConfig,
  maskApiKey,
  resolveRunConfig,
  saveConfig,
  setConfigValue,
  validateApiKey,
} from "@/cli/config.js";
import { logger } from "@/lib/logger.js";

describe("Configuration", () => {
  let dir: string;

  beforeAll(() => {
    logger.configure({ level: "silent" });
  });

  afterAll(() => {
    logger.configure({ level: "info" });
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "c-testgen-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("project file", () => {
    it("treats a missing file as empty", () => {
      expect(loadProjectConfig(dir)).toEqual({ success: true, data: {} });
    });

    it("treats an empty file as empty", async () => {
      await writeFile(join(dir, PROJECT_CONFIG_FILE), "");
      expect(loadProjectConfig(dir)).toEqual({ success: true, data: {} });
    });

    it("parses known keys", async () => {
      await writeFile(
        join(dir, PROJECT_CONFIG_FILE),
        ["sourceDir: firmware", "qualityThreshold: medium", "exclude:", "  - vendor/**", "retry:", "  maxTries: 5", ""].join(
          "\n"
        )
      );

      expect(loadProjectConfig(dir)).toEqual({
        success: true,
        data: { sourceDir: "firmware", qualityThreshold: "medium", exclude: ["vendor/**"], retry: { maxTries: 5 } },
      });
    });

    it("reports malformed YAML", async () => {
      await writeFile(join(dir, PROJECT_CONFIG_FILE), "exclude: [unclosed\n");

      const result = loadProjectConfig(dir);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toMatch(/^Invalid YAML in \.c-testgen\.yml: /);
      }
    });

    it("reports values of the wrong shape", async () => {
      await writeFile(join(dir, PROJECT_CONFIG_FILE), "maxRegenerationAttempts: -1\n");

      const result = loadProjectConfig(dir);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe(
          "Invalid .c-testgen.yml: maxRegenerationAttempts: Number must be greater than or equal to 0"
        );
      }
    });

    it("rejects unknown keys", async () => {
      await writeFile(join(dir, PROJECT_CONFIG_FILE), "colour: blue\n");

      const result = loadProjectConfig(dir);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toContain("Unrecognized key(s) in object: 'colour'");
      }
    });
  });

  describe("run configuration", () => {
    it("fills every default", () => {
      expect(resolveRunConfig()).toEqual({
        success: true,
        data: {
          repoPath: ".",
          sourceDir: "src",
          outputDir: "tests",
          maxRegenerationAttempts: 2,
          qualityThreshold: "high",
          regenerateOnLowQuality: false,
          redactSensitive: false,
          provider: "gemini",
          models: [],
          exclude: [],
          retry: { maxTries: 3, baseDelayMs: 1000 },
          timeoutMs: 120_000,
        },
      });
    });

    it("lets later layers win key by key", () => {
      const result = resolveRunConfig(
        { provider: "anthropic", retry: { maxTries: 4, baseDelayMs: 10 } },
        { provider: "openai", retry: { maxTries: 6 } }
      );

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.provider).toBe("openai");
        expect(result.data.retry).toEqual({ maxTries: 6, baseDelayMs: 10 });
      }
    });

    it("layers base, project file and flags in that order", async () => {
      await writeFile(
        join(dir, PROJECT_CONFIG_FILE),
        ["maxRegenerationAttempts: 4", "qualityThreshold: medium", "retry:", "  maxTries: 5", ""].join("\n")
      );

      const result = loadRunConfig(
        { repoPath: dir, maxRegenerationAttempts: 1 },
        { maxRegenerationAttempts: 5, redactSensitive: true }
      );

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.repoPath).toBe(dir);
        expect(result.data.maxRegenerationAttempts).toBe(1);
        expect(result.data.qualityThreshold).toBe("medium");
        expect(result.data.redactSensitive).toBe(true);
        expect(result.data.retry).toEqual({ maxTries: 5, baseDelayMs: 1000 });
      }
    });

    it("rejects invalid flags", () => {
      const result = loadRunConfig({ repoPath: dir, timeoutMs: 0 });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe("Invalid option: timeoutMs: Number must be greater than 0");
      }
    });

    it("propagates project file errors", async () => {
      await writeFile(join(dir, PROJECT_CONFIG_FILE), "colour: blue\n");

      const result = loadRunConfig({ repoPath: dir });
      expect(result.success).toBe(false);
    });
  });

  describe("user configuration", () => {
    beforeEach(() => {
      vi.stubEnv("C_TESTGEN_HOME", join(dir, "home"));
      vi.stubEnv("GEMINI_API_KEY", "");
      vi.stubEnv("ANTHROPIC_API_KEY", "");
    });

    it("resolves the config path under the home override", () => {
      expect(getConfigPath()).toBe(join(dir, "home", "config.json"));
    });

    it("starts empty", () => {
      expect(loadConfig()).toEqual({});
      expect(getDefaultProvider()).toBe("gemini");
      expect(hasApiKey("gemini")).toBe(false);
    });

    it("stores keys with owner-only permissions", async () => {
      expect(setConfigValue("gemini-api-key", "test-secret")).toEqual({ success: true, data: undefined });

      expect(getConfigValue("gemini-api-key")).toBe("test-secret");
      expect(JSON.parse(await readFile(getConfigPath(), "utf-8"))).toEqual({ geminiApiKey: "test-secret" });
      expect(statSync(getConfigPath()).mode & 0o777).toBe(0o600);
    });

    it("validates keys and providers", () => {
      const badKey = setConfigValue("openai-api-key", "test secret");
      expect(badKey.success).toBe(false);
      if (!badKey.success) {
        expect(badKey.error.message).toBe("Invalid API key: API key must not contain whitespace");
      }

      const badProvider = setConfigValue("default-provider", "bard");
      expect(badProvider.success).toBe(false);
      if (!badProvider.success) {
        expect(badProvider.error.message).toBe("Provider must be one of: gemini, anthropic, openai, mock");
      }

      expect(existsSync(getConfigPath())).toBe(false);
    });

    it("stores the default provider", () => {
      setConfigValue("default-provider", "mock");
      expect(getDefaultProvider()).toBe("mock");
    });

    it("deletes values", () => {
      saveConfig({ geminiApiKey: "test-secret", anthropicApiKey: "test-secret-2" });
      deleteConfigValue("gemini-api-key");

      expect(loadConfig()).toEqual({ anthropicApiKey: "test-secret-2" });
    });

    it("prefers a non-empty environment variable", () => {
      saveConfig({ geminiApiKey: "test-secret" });
      expect(getApiKey("gemini")).toBe("test-secret");

      vi.stubEnv("GEMINI_API_KEY", "test-secret-env");
      expect(getApiKey("gemini")).toBe("test-secret-env");
      expect(hasApiKey("anthropic")).toBe(false);
    });

    it("ignores unreadable and invalid files", async () => {
      saveConfig({});
      await writeFile(getConfigPath(), "{not json");
      expect(loadConfig()).toEqual({});

      await writeFile(getConfigPath(), JSON.stringify({ defaultProvider: "bard" }));
      expect(loadConfig()).toEqual({});
    });
  });

  describe("helpers", () => {
    it("masks keys", () => {
      expect(maskApiKey("test-secret")).toBe("****");
      expect(maskApiKey("test-secret-value")).toBe("test...alue");
    });

    it("validates keys", () => {
      expect(validateApiKey("")).toEqual({ valid: false, error: "API key cannot be empty" });
      expect(validateApiKey("test-secret")).toEqual({ valid: true });
    });

    it("recognizes config keys", () => {
      expect(isConfigKey("gemini-api-key")).toBe(true);
      expect(isConfigKey("default-provider")).toBe(true);
      expect(isConfigKey("geminiApiKey")).toBe(false);
      expect(isConfigKey("toString")).toBe(false);
    });
  });
});
