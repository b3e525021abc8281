/**
 * Regeneration controller
 *
 * Drives one file through generate -> normalize -> validate attempts
 * until the report meets the quality threshold or the attempt budget is
 * spent. The transition logic is the pure `transition` reducer; the
 * controller only performs the side effects each state asks for.
 *
 *   init -> generating -> validating -> deciding -> accepted
 *                ^                          |
 *                +------ regenerating <-----+
 *   generating -> exhausted (generation failed)
 */

import { basename } from "path";

import { RunInterruptedError } from "../lib/errors.js";
import { logger as rootLogger } from "../lib/logger.js";

import { buildGenerationContext } from "./context.js";
import { generateTestCode } from "./generator.js";
import { safeNormalizeTestCode } from "./normalizer.js";
import { formatTier, meetsThreshold, validateTestCode } from "./validator/index.js";

import type { SymbolTable } from "../indexer/symbol-table.js";
import type { FileAnalysis } from "../indexer/types.js";
import type { Logger } from "../lib/logger.js";
import type { GenerationContext } from "./context.js";
import type { TextGenerator } from "./generator.js";
import type { QualityTier, ValidationReport } from "./validator/index.js";

// =============================================================================
// TYPES
// =============================================================================

export interface ControllerConfig {
  /** Regenerations allowed after the first attempt */
  maxRegenerationAttempts: number;
  qualityThreshold: QualityTier;
  /** When false every file is accepted after one attempt */
  regenerateOnLowQuality: boolean;
  redactSensitive?: boolean;
}

/** One generate -> normalize -> validate cycle */
export interface GenerationAttempt {
  attempt: number;
  context: GenerationContext;
  rawOutput: string;
  normalizedOutput: string;
  report: ValidationReport;
}

export type ControllerState =
  | { phase: "init" }
  | { phase: "generating"; attempt: number; feedback: readonly string[] | null }
  | { phase: "validating"; attempt: number; rawOutput: string }
  | { phase: "deciding"; attempt: number; report: ValidationReport; testCode: string }
  | { phase: "regenerating"; attempt: number; quality: QualityTier; feedback: readonly string[] }
  | { phase: "accepted"; attempt: number; report: ValidationReport; testCode: string; meetsThreshold: boolean }
  | { phase: "exhausted"; attempt: number; error: unknown };

export type ControllerEvent =
  | { type: "start" }
  | { type: "generated"; rawOutput: string }
  | { type: "generation-failed"; error: unknown }
  | { type: "validated"; report: ValidationReport; testCode: string }
  | { type: "decide" }
  | { type: "retry" };

export type FileOutcome =
  | {
      status: "accepted";
      filePath: string;
      attempts: number;
      report: ValidationReport;
      testCode: string;
      meetsThreshold: boolean;
    }
  | { status: "failed"; filePath: string; attempts: number; error: unknown };

export interface ProcessOptions {
  signal?: AbortSignal;
  onTransition?: (state: ControllerState) => void;
  onAttempt?: (attempt: GenerationAttempt) => void;
}

// =============================================================================
// TRANSITIONS
// =============================================================================

/**
 * Total number of attempts a file may receive
 */
export function maxAttempts(config: ControllerConfig): number {
  return config.regenerateOnLowQuality ? config.maxRegenerationAttempts + 1 : 1;
}

function invalid(state: ControllerState, event: ControllerEvent): never {
  throw new Error(`Invalid controller transition: ${event.type} in ${state.phase}`);
}

/**
 * Next state for an event. Pure.
 */
export function transition(state: ControllerState, event: ControllerEvent, config: ControllerConfig): ControllerState {
  switch (state.phase) {
    case "init":
      if (event.type === "start") return { phase: "generating", attempt: 1, feedback: null };
      return invalid(state, event);

    case "generating":
      if (event.type === "generated") {
        return { phase: "validating", attempt: state.attempt, rawOutput: event.rawOutput };
      }
      if (event.type === "generation-failed") {
        return { phase: "exhausted", attempt: state.attempt, error: event.error };
      }
      return invalid(state, event);

    case "validating":
      if (event.type === "validated") {
        return { phase: "deciding", attempt: state.attempt, report: event.report, testCode: event.testCode };
      }
      return invalid(state, event);

    case "deciding": {
      if (event.type !== "decide") return invalid(state, event);
      const meets = meetsThreshold(state.report.quality, config.qualityThreshold);
      if (meets || state.attempt >= maxAttempts(config)) {
        return {
          phase: "accepted",
          attempt: state.attempt,
          report: state.report,
          testCode: state.testCode,
          meetsThreshold: meets,
        };
      }
      return {
        phase: "regenerating",
        attempt: state.attempt,
        quality: state.report.quality,
        feedback: state.report.issues,
      };
    }

    case "regenerating":
      if (event.type === "retry") {
        return { phase: "generating", attempt: state.attempt + 1, feedback: state.feedback };
      }
      return invalid(state, event);

    case "accepted":
    case "exhausted":
      return invalid(state, event);
  }
}

// =============================================================================
// STATS
// =============================================================================

/**
 * Run-wide counters. The controller is the only writer.
 */
export class RegenerationStats {
  attemptsIssued = 0;
  regenerationsIssued = 0;
  successfulRegenerations = 0;

  /** Successful regenerations over regenerations issued, in percent */
  successRate(): number | undefined {
    if (this.regenerationsIssued === 0) return undefined;
    return (this.successfulRegenerations / this.regenerationsIssued) * 100;
  }

  snapshot(): { attemptsIssued: number; regenerationsIssued: number; successfulRegenerations: number } {
    return {
      attemptsIssued: this.attemptsIssued,
      regenerationsIssued: this.regenerationsIssued,
      successfulRegenerations: this.successfulRegenerations,
    };
  }
}

// =============================================================================
// CONTROLLER
// =============================================================================

export interface ControllerDeps {
  generator: TextGenerator;
  symbols: SymbolTable;
  stats?: RegenerationStats;
  logger?: Logger;
}

export class RegenerationController {
  readonly stats: RegenerationStats;
  private readonly generator: TextGenerator;
  private readonly symbols: SymbolTable;
  private readonly config: ControllerConfig;
  private readonly log: Logger;

  constructor(deps: ControllerDeps, config: ControllerConfig) {
    this.generator = deps.generator;
    this.symbols = deps.symbols;
    this.stats = deps.stats ?? new RegenerationStats();
    this.config = config;
    this.log = deps.logger ?? rootLogger.child("[controller]");
  }

  /**
   * Process one analyzed source file to a terminal state.
   * @throws RunInterruptedError when the signal aborts; the file then has no outcome
   */
  async processFile(analysis: FileAnalysis, options: ProcessOptions = {}): Promise<FileOutcome> {
    const name = basename(analysis.filePath);
    let context: GenerationContext | undefined;
    let state = this.advance(name, { phase: "init" }, { type: "start" }, options);

    for (;;) {
      switch (state.phase) {
        case "generating": {
          this.stats.attemptsIssued++;
          context = buildGenerationContext(analysis, this.symbols, state.feedback, {
            redactSensitive: this.config.redactSensitive ?? false,
          });
          try {
            const rawOutput = await generateTestCode(context, this.generator, options.signal);
            state = this.advance(name, state, { type: "generated", rawOutput }, options);
          } catch (error) {
            if (error instanceof RunInterruptedError || options.signal?.aborted) {
              throw error instanceof RunInterruptedError ? error : new RunInterruptedError(analysis.filePath);
            }
            state = this.advance(name, state, { type: "generation-failed", error }, options);
          }
          break;
        }

        case "validating": {
          const normalized = safeNormalizeTestCode(state.rawOutput, { sourceIncludes: analysis.includes });
          if (normalized.error) {
            this.log.warn(`${name}: ${normalized.error.message}; validating unnormalized output`);
          }
          const report = validateTestCode(normalized.text, analysis, {
            stubTargets: context?.needsStub ?? [],
          });
          if (context) {
            options.onAttempt?.({
              attempt: state.attempt,
              context,
              rawOutput: state.rawOutput,
              normalizedOutput: normalized.text,
              report,
            });
          }
          state = this.advance(name, state, { type: "validated", report, testCode: normalized.text }, options);
          break;
        }

        case "deciding":
          state = this.advance(name, state, { type: "decide" }, options);
          break;

        case "regenerating":
          this.stats.regenerationsIssued++;
          this.log.info(
            `${name}: ${formatTier(state.quality)} quality below ${formatTier(this.config.qualityThreshold)}, regenerating (attempt ${state.attempt + 1}/${maxAttempts(this.config)})`
          );
          state = this.advance(name, state, { type: "retry" }, options);
          break;

        case "accepted":
          if (state.attempt > 1 && state.meetsThreshold) {
            this.stats.successfulRegenerations++;
          }
          return {
            status: "accepted",
            filePath: analysis.filePath,
            attempts: state.attempt,
            report: state.report,
            testCode: state.testCode,
            meetsThreshold: state.meetsThreshold,
          };

        case "exhausted":
          return { status: "failed", filePath: analysis.filePath, attempts: state.attempt, error: state.error };

        case "init":
          state = this.advance(name, state, { type: "start" }, options);
          break;
      }
    }
  }

  private advance(
    name: string,
    state: ControllerState,
    event: ControllerEvent,
    options: ProcessOptions
  ): ControllerState {
    const next = transition(state, event, this.config);
    this.log.debug(`${name}: ${state.phase} -> ${next.phase}`);
    options.onTransition?.(next);
    return next;
  }
}
