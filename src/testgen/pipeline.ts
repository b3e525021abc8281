/**
 * Batch pipeline
 *
 * Indexes the repository once, then runs the regeneration controller over
 * every source file in turn. Per-file failures stay per-file; only an
 * interrupt ends the run early.
 */

import { basename, relative, resolve, sep } from "path";

import { createIndexer } from "../indexer/indexer.js";
import { ContextBuildError, RunInterruptedError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import { RegenerationController, RegenerationStats } from "./controller.js";
import { meetsThreshold } from "./validator/index.js";

import type { DependencyIndexer } from "../indexer/indexer.js";
import type { SymbolTable } from "../indexer/symbol-table.js";
import type { ControllerConfig, ControllerState, FileOutcome } from "./controller.js";
import type { TextGenerator } from "./generator.js";

const log = logger.child("[pipeline]");

/** Program entry file; indexed but never a generation target */
export const ENTRY_POINT_FILE = "main.c";

// =============================================================================
// TYPES
// =============================================================================

export interface PipelineConfig extends ControllerConfig {
  repoPath: string;
  /** Relative to repoPath */
  sourceDir: string;
  /** Relative to repoPath; never indexed */
  outputDir: string;
  exclude?: string[];
}

/**
 * Receives each file's final outcome as soon as it is known
 */
export interface ReportSink {
  begin?(files: readonly string[]): Promise<void> | void;
  fileStarted?(filePath: string, index: number, total: number): void;
  transition?(filePath: string, state: ControllerState): void;
  write(outcome: FileOutcome): Promise<void> | void;
}

export interface RunSummary {
  /** Files considered for generation */
  total: number;
  accepted: number;
  failed: number;
  /** Accepted files whose final tier is under the threshold */
  belowThreshold: number;
  attemptsIssued: number;
  regenerationsIssued: number;
  successfulRegenerations: number;
  /** Percent, undefined when nothing was regenerated */
  regenerationSuccessRate: number | undefined;
  outcomes: FileOutcome[];
  durationMs: number;
}

export interface PipelineDeps {
  generator: TextGenerator;
  sink: ReportSink;
  indexer?: DependencyIndexer;
  signal?: AbortSignal;
}

// =============================================================================
// PIPELINE
// =============================================================================

/**
 * Index the repository and process every generation target.
 * @throws RunInterruptedError when the signal aborts
 */
export async function runPipeline(config: PipelineConfig, deps: PipelineDeps): Promise<RunSummary> {
  const startTime = Date.now();
  const repoRoot = resolve(config.repoPath);
  const sourceRoot = resolve(repoRoot, config.sourceDir);
  const outputRoot = resolve(repoRoot, config.outputDir);
  const outputRel = relative(repoRoot, outputRoot);

  const indexer =
    deps.indexer ??
    createIndexer({
      ignoreDirs: outputRel && !outputRel.startsWith("..") ? [outputRel] : [],
      exclude: config.exclude ?? [],
    });

  const allFiles = await indexer.listSourceFiles(repoRoot);
  const symbols = await indexer.buildSymbolTable(allFiles);
  const targets = (await indexer.listSourceFiles(sourceRoot)).filter(
    (file) => basename(file) !== ENTRY_POINT_FILE && !file.startsWith(outputRoot + sep)
  );
  log.info(`Indexed ${allFiles.length} files; ${targets.length} to process`);

  await deps.sink.begin?.(targets);

  const stats = new RegenerationStats();
  const outcomes = await processTargets(indexer, targets, symbols, stats, config, deps);

  return summarize(outcomes, stats, config, Date.now() - startTime);
}

async function processTargets(
  indexer: DependencyIndexer,
  targets: readonly string[],
  symbols: SymbolTable,
  stats: RegenerationStats,
  config: PipelineConfig,
  deps: PipelineDeps
): Promise<FileOutcome[]> {
  const controller = new RegenerationController({ generator: deps.generator, symbols, stats }, config);
  const outcomes: FileOutcome[] = [];

  for (const [index, filePath] of targets.entries()) {
    if (deps.signal?.aborted) throw new RunInterruptedError(filePath);
    deps.sink.fileStarted?.(filePath, index, targets.length);

    let outcome: FileOutcome;
    try {
      const analysis = await indexer.analyzeFileDependencies(filePath);
      outcome = await controller.processFile(analysis, {
        signal: deps.signal,
        onTransition: (state) => deps.sink.transition?.(filePath, state),
      });
    } catch (error) {
      if (!(error instanceof ContextBuildError)) throw error;
      log.warn(`Skipping ${basename(filePath)}: ${error.message}`);
      outcome = { status: "failed", filePath, attempts: 0, error };
    }

    outcomes.push(outcome);
    await deps.sink.write(outcome);
  }

  return outcomes;
}

// =============================================================================
// SUMMARY
// =============================================================================

export function summarize(
  outcomes: FileOutcome[],
  stats: RegenerationStats,
  config: Pick<ControllerConfig, "qualityThreshold">,
  durationMs: number
): RunSummary {
  let accepted = 0;
  let belowThreshold = 0;
  for (const outcome of outcomes) {
    if (outcome.status !== "accepted") continue;
    accepted++;
    if (!meetsThreshold(outcome.report.quality, config.qualityThreshold)) belowThreshold++;
  }

  return {
    total: outcomes.length,
    accepted,
    failed: outcomes.length - accepted,
    belowThreshold,
    ...stats.snapshot(),
    regenerationSuccessRate: stats.successRate(),
    outcomes,
    durationMs,
  };
}

/**
 * Process exit code for a finished run
 */
export function exitCodeFor(summary: RunSummary, config: Pick<ControllerConfig, "regenerateOnLowQuality">): number {
  if (summary.failed > 0 || summary.accepted === 0) return 1;
  if (!config.regenerateOnLowQuality && summary.belowThreshold > 0) return 1;
  return 0;
}
