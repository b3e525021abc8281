#!/usr/bin/env node
/**
 * c-testgen CLI entry point
 *
 * Commands:
 * - generate - Generate and validate Unity tests for every C source file
 * - validate - Validate an existing test file against its source
 * - init     - Write a default .c-testgen.yml
 * - config   - Manage provider API keys
 */

import { existsSync } from "fs";
import { writeFile } from "fs/promises";
import { resolve } from "path";

import chalk from "chalk";
import { Command } from "commander";
import ora from "ora";

import { createBackends, createGenerationAdapter } from "../ai/index.js";
import { VERSION } from "../index.js";
import { RunInterruptedError, logger } from "../lib/index.js";
import { exitCodeFor, runPipeline } from "../testgen/pipeline.js";
import { QUALITY_TIERS, meetsThreshold, validateTestFile } from "../testgen/validator/index.js";

import {
  CONFIG_KEYS,
  PROJECT_CONFIG_FILE,
  deleteConfigValue,
  getApiKey,
  getConfigPath,
  getConfigValue,
  getDefaultProvider,
  hasApiKey,
  isConfigKey,
  loadConfig,
  loadRunConfig,
  maskApiKey,
  setConfigValue,
} from "./config.js";
import {
  formatError,
  formatStatusLine,
  formatSummary,
  formatSummaryJson,
  formatValidationReport,
  isValidOutputFormat,
} from "./formatters.js";
import { FileReportSink } from "./report-sink.js";

import type { ProjectConfig } from "./config.js";
import type { QualityTier } from "../testgen/validator/index.js";

/** Conventional exit status for SIGINT */
const EXIT_INTERRUPTED = 130;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function configureLogging(options: Record<string, unknown>): void {
  if (options["quiet"]) {
    logger.configure({ level: "error" });
  } else if (options["verbose"]) {
    logger.configure({ level: "debug" });
  }
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function optionalInt(value: unknown): number | undefined {
  return typeof value === "string" ? Number(value) : undefined;
}

function optionalList(value: unknown): string[] | undefined {
  const text = optionalString(value);
  return text === undefined
    ? undefined
    : text
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

function isQualityTier(value: string): value is QualityTier {
  return QUALITY_TIERS.some((tier) => tier === value);
}

/**
 * Command-line options as a config layer; unset options stay undefined
 */
function flagsFromOptions(options: Record<string, unknown>): ProjectConfig {
  const threshold = optionalString(options["qualityThreshold"])?.toLowerCase();
  const provider = optionalString(options["provider"]);

  if (threshold !== undefined && !isQualityTier(threshold)) {
    throw new Error(`Invalid quality threshold: ${threshold}. Use: ${QUALITY_TIERS.join(", ")}`);
  }
  if (provider !== undefined && provider !== "gemini" && provider !== "anthropic" && provider !== "openai" && provider !== "mock") {
    throw new Error(`Invalid provider: ${provider}. Use: gemini, anthropic, openai, mock`);
  }

  return {
    repoPath: optionalString(options["repoPath"]),
    sourceDir: optionalString(options["sourceDir"]),
    outputDir: optionalString(options["outputDir"]),
    maxRegenerationAttempts: optionalInt(options["maxRegenerationAttempts"]),
    qualityThreshold: threshold,
    regenerateOnLowQuality: options["regenerateOnLowQuality"] === true ? true : undefined,
    redactSensitive: options["redact"] === true ? true : undefined,
    provider,
    models: optionalList(options["model"]),
    exclude: optionalList(options["exclude"]),
  };
}

const program = new Command();

program
  .name("c-testgen")
  .description("AI-assisted Unity test generation for C sources, with static validation")
  .version(VERSION);

program
  .command("generate")
  .description("Generate tests for every C source file in the source directory")
  .option("-r, --repo-path <path>", "Repository root (default: .)")
  .option("-s, --source-dir <dir>", "Source directory relative to the repository (default: src)")
  .option("--output-dir <dir>", "Directory for generated tests and reports (default: tests)")
  .option("-m, --max-regeneration-attempts <n>", "Regenerations allowed per file (default: 2)")
  .option("-t, --quality-threshold <tier>", "Minimum accepted quality: low, medium, high (default: high)")
  .option("--regenerate-on-low-quality", "Regenerate files below the quality threshold")
  .option("--redact", "Redact comments, strings and credentials before sending source")
  .option("-p, --provider <provider>", "Provider: gemini, anthropic, openai, mock")
  .option("--model <models>", "Models in fallback order (comma-separated)")
  .option("--exclude <patterns>", "Glob patterns to skip (comma-separated)")
  .option("-o, --output <format>", "Output format: terminal, json", "terminal")
  .option("-v, --verbose", "Verbose output")
  .option("-q, --quiet", "Quiet mode (errors only)")
  .action(async (options: Record<string, unknown>) => {
    configureLogging(options);
    const isQuiet = Boolean(options["quiet"]);
    const isVerbose = Boolean(options["verbose"]);

    const outputFormat = String(options["output"] ?? "terminal");
    if (!isValidOutputFormat(outputFormat)) {
      console.error(formatError(new Error(`Invalid output format: ${outputFormat}. Use: terminal, json`)));
      process.exit(1);
    }

    let flags: ProjectConfig;
    try {
      flags = flagsFromOptions(options);
    } catch (error) {
      console.error(formatError(toError(error)));
      process.exit(1);
    }

    const configResult = loadRunConfig(flags, { provider: getDefaultProvider() });
    if (!configResult.success) {
      console.error(formatError(configResult.error));
      process.exit(1);
    }
    const config = configResult.data;

    const repoRoot = resolve(config.repoPath);
    if (!existsSync(repoRoot)) {
      console.error(formatError(new Error(`Directory not found: ${repoRoot}`)));
      process.exit(1);
    }

    const apiKey = config.provider === "mock" ? undefined : getApiKey(config.provider);
    if (config.provider !== "mock" && apiKey === undefined) {
      console.error(formatError(new Error(`No API key configured for ${config.provider}`)));
      console.error(chalk.gray(`Run: c-testgen config set ${config.provider}-api-key <key>`));
      process.exit(1);
    }

    const adapter = createGenerationAdapter(
      createBackends(config.provider, config.models, { apiKey, timeoutMs: config.timeoutMs }),
      { policy: config.retry }
    );

    const controller = new AbortController();
    const onSigint = (): void => {
      logger.warn("\nInterrupted; aborting the current request");
      controller.abort();
    };
    process.once("SIGINT", onSigint);

    const showSpinner = outputFormat === "terminal" && !isQuiet && !isVerbose;
    const spinner = showSpinner ? ora("Indexing sources...").start() : null;
    const outputDir = resolve(repoRoot, config.outputDir);
    const files = new FileReportSink(outputDir, config.qualityThreshold);

    try {
      const summary = await runPipeline(
        { ...config, repoPath: repoRoot },
        {
          generator: adapter,
          signal: controller.signal,
          sink: {
            begin: () => files.begin(),
            fileStarted: (filePath, index, total) => {
              if (spinner) spinner.text = `[${index + 1}/${total}] Generating ${filePath}...`;
            },
            transition: (filePath, state) => {
              if (spinner && state.phase === "generating") {
                spinner.text = `Generating ${filePath} (attempt ${state.attempt})...`;
              }
            },
            write: async (outcome) => {
              await files.write(outcome);
              if (outputFormat === "terminal" && !isQuiet) {
                spinner?.stop();
                console.log(formatStatusLine(outcome, config.qualityThreshold));
                spinner?.start();
              }
            },
          },
        }
      );

      spinner?.stop();

      if (outputFormat === "json") {
        console.log(formatSummaryJson(summary));
      } else if (!isQuiet) {
        console.log(formatSummary(summary, config.qualityThreshold));
        if (files.written.length > 0) {
          console.log(chalk.gray(`\nTests written to ${outputDir}`));
        }
      }

      process.exit(exitCodeFor(summary, config));
    } catch (error) {
      if (error instanceof RunInterruptedError) {
        spinner?.fail("Interrupted");
        process.exit(EXIT_INTERRUPTED);
      }
      spinner?.fail("Generation failed");
      console.error(formatError(toError(error)));
      process.exit(1);
    } finally {
      process.removeListener("SIGINT", onSigint);
    }
  });

program
  .command("validate <test> <source>")
  .description("Validate an existing test file against its C source")
  .option("-t, --quality-threshold <tier>", "Tier required for exit code 0", "high")
  .option("-o, --output <format>", "Output format: terminal, json", "terminal")
  .action(async (testPath: string, sourcePath: string, options: Record<string, unknown>) => {
    const threshold = String(options["qualityThreshold"] ?? "high").toLowerCase();
    if (!isQualityTier(threshold)) {
      console.error(formatError(new Error(`Invalid quality threshold: ${threshold}. Use: ${QUALITY_TIERS.join(", ")}`)));
      process.exit(1);
    }

    try {
      const report = await validateTestFile(resolve(testPath), resolve(sourcePath));
      if (options["output"] === "json") {
        console.log(JSON.stringify(report, null, 2));
      } else {
        console.log(formatValidationReport(report, threshold));
      }
      process.exit(meetsThreshold(report.quality, threshold) ? 0 : 1);
    } catch (error) {
      console.error(formatError(toError(error)));
      process.exit(1);
    }
  });

program
  .command("init")
  .description(`Write a default ${PROJECT_CONFIG_FILE} in the current directory`)
  .option("-f, --force", "Overwrite existing configuration")
  .action(async (options: Record<string, unknown>) => {
    const configPath = resolve(process.cwd(), PROJECT_CONFIG_FILE);

    if (existsSync(configPath) && !options["force"]) {
      console.log(chalk.yellow(`Configuration file already exists at ${PROJECT_CONFIG_FILE}`));
      console.log(chalk.gray("Use --force to overwrite."));
      process.exit(0);
    }

    const defaultConfig = `# c-testgen configuration
# Command-line flags override these values.

# C sources to generate tests for, relative to this file
sourceDir: src

# Generated tests and compilation_report/ go here
outputDir: tests

# Quality gate: low, medium, high
qualityThreshold: high
regenerateOnLowQuality: true
maxRegenerationAttempts: 2

# Provider and models in fallback order (empty: provider defaults)
provider: gemini
models: []

# Glob patterns to skip
exclude: []

# Redact comments, strings and credentials before sending source
redactSensitive: false

retry:
  maxTries: 3
  baseDelayMs: 1000
`;

    try {
      await writeFile(configPath, defaultConfig, "utf8");
      console.log(chalk.green(`Created ${PROJECT_CONFIG_FILE}`));
      console.log();
      console.log("Next steps:");
      console.log(chalk.gray("  1. Set an API key: c-testgen config set gemini-api-key <key>"));
      console.log(chalk.gray("  2. Run: c-testgen generate"));
    } catch (error) {
      console.error(formatError(toError(error)));
      process.exit(1);
    }
  });

// Config command for provider keys
const config = program.command("config").description("Manage provider API keys and defaults");

config
  .command("set <key> <value>")
  .description("Set a configuration value")
  .addHelpText("after", `
Available keys:
  gemini-api-key      Google Gemini API key
  anthropic-api-key   Anthropic API key
  openai-api-key      OpenAI API key
  default-provider    Default provider (gemini, anthropic, openai, mock)

Examples:
  c-testgen config set gemini-api-key <key>
  c-testgen config set default-provider anthropic
`)
  .action((key: string, value: string) => {
    if (!isConfigKey(key)) {
      console.log(chalk.red(`Unknown config key: ${key}`));
      console.log(chalk.gray("Run 'c-testgen config set --help' for available keys"));
      process.exit(1);
    }

    const result = setConfigValue(key, value);
    if (!result.success) {
      console.log(chalk.red(result.error.message));
      process.exit(1);
    }

    const shown = CONFIG_KEYS[key] === "defaultProvider" ? value : maskApiKey(value);
    console.log(chalk.green(`${key} set: ${shown}`));
    console.log(chalk.gray(`Config stored at: ${getConfigPath()}`));
  });

config
  .command("get <key>")
  .description("Get a configuration value")
  .action((key: string) => {
    if (!isConfigKey(key)) {
      console.log(chalk.red(`Unknown config key: ${key}`));
      process.exit(1);
    }

    const value = getConfigValue(key);
    if (value === undefined) {
      console.log(key === "default-provider" ? chalk.gray("gemini (default)") : chalk.gray("(not set)"));
    } else {
      console.log(key === "default-provider" ? value : maskApiKey(value));
    }
  });

config
  .command("list")
  .description("List all configuration values")
  .action(() => {
    const cfg = loadConfig();
    const status = (stored: string | undefined, provider: "gemini" | "anthropic" | "openai"): string => {
      const configured = hasApiKey(provider) ? chalk.green("configured") : chalk.gray("not set");
      return stored ? `${configured} ${chalk.gray(`(${maskApiKey(stored)})`)}` : configured;
    };

    console.log(chalk.bold("c-testgen configuration"));
    console.log(chalk.gray(`Config file: ${getConfigPath()}`));
    console.log();
    console.log(`  Gemini API key:     ${status(cfg.geminiApiKey, "gemini")}`);
    console.log(`  Anthropic API key:  ${status(cfg.anthropicApiKey, "anthropic")}`);
    console.log(`  OpenAI API key:     ${status(cfg.openaiApiKey, "openai")}`);
    console.log(`  Default provider:   ${cfg.defaultProvider ?? "gemini"}`);
  });

config
  .command("unset <key>")
  .description("Remove a configuration value")
  .action((key: string) => {
    if (!isConfigKey(key)) {
      console.log(chalk.red(`Unknown config key: ${key}`));
      process.exit(1);
    }
    deleteConfigValue(key);
    console.log(chalk.green(`${key} removed`));
  });

config
  .command("path")
  .description("Print the configuration file path")
  .action(() => {
    console.log(getConfigPath());
  });

await program.parseAsync();
