import { basename } from "path";

import chalk from "chalk";

import { formatTier, meetsThreshold } from "../testgen/validator/index.js";

import type { FileOutcome } from "../testgen/controller.js";
import type { RunSummary } from "../testgen/pipeline.js";
import type { QualityTier, ValidationReport } from "../testgen/validator/index.js";

/**
 * Output format types
 */
export type OutputFormat = "terminal" | "json";

/**
 * Tier colors for terminal output
 */
const TIER_COLORS: Record<QualityTier, typeof chalk> = {
  high: chalk.green,
  medium: chalk.yellow,
  low: chalk.red,
};

/**
 * Validate output format string
 */
export function isValidOutputFormat(format: string): format is OutputFormat {
  return ["terminal", "json"].includes(format);
}

/**
 * One-line verdict for a report, without colors
 */
export function formatReportLine(report: ValidationReport, threshold: QualityTier): string {
  const marker = meetsThreshold(report.quality, threshold) ? "[OK]" : "[WARN]";
  const compiles = report.compiles ? "Compiles" : "Broken";
  const realistic = report.realistic ? "Realistic" : "Unrealistic";
  return `${marker} ${formatTier(report.quality)} quality (${compiles}, ${realistic}) issues=${report.issues.length}`;
}

/**
 * Per-file status line for terminal output
 */
export function formatStatusLine(outcome: FileOutcome, threshold: QualityTier): string {
  const name = chalk.white.bold(basename(outcome.filePath));

  if (outcome.status === "failed") {
    const message = outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
    return `${chalk.red("[FAIL]")} ${name} ${chalk.gray(message)}`;
  }

  const color = TIER_COLORS[outcome.report.quality];
  const attempts = outcome.attempts > 1 ? chalk.gray(` after ${outcome.attempts} attempts`) : "";
  return `${color(formatReportLine(outcome.report, threshold))} ${name}${attempts}`;
}

/**
 * Plain-text report written beside the generated test
 */
export function formatReportText(report: ValidationReport, threshold: QualityTier): string {
  const lines: string[] = [];

  lines.push(`File: ${report.file}`);
  lines.push(`Quality: ${formatTier(report.quality)}`);
  lines.push(`Compiles: ${report.compiles ? "yes" : "no"}`);
  lines.push(`Realistic: ${report.realistic ? "yes" : "no"}`);
  lines.push(`Meets threshold (${formatTier(threshold)}): ${meetsThreshold(report.quality, threshold) ? "yes" : "no"}`);
  lines.push("");

  if (report.issues.length === 0) {
    lines.push("No issues found.");
  } else {
    lines.push(`Issues (${report.issues.length}):`);
    for (const issue of report.issues) {
      lines.push(`- ${issue}`);
    }
  }

  return lines.join("\n") + "\n";
}

/**
 * Full report for `validate`
 */
export function formatValidationReport(report: ValidationReport, threshold: QualityTier): string {
  const lines: string[] = [];
  const color = TIER_COLORS[report.quality];

  lines.push(chalk.bold(report.file));
  lines.push(color(formatReportLine(report, threshold)));

  if (report.issues.length > 0) {
    lines.push("");
    for (const issue of report.issues) {
      lines.push(chalk.gray(`  - ${issue}`));
    }
  }

  return lines.join("\n");
}

/**
 * End-of-run summary for terminal output
 */
export function formatSummary(summary: RunSummary, threshold: QualityTier): string {
  const lines: string[] = [];

  lines.push("");
  lines.push(chalk.bold.underline("Summary"));
  lines.push(`  Generated:      ${summary.accepted}/${summary.total} files`);
  if (summary.failed > 0) {
    lines.push(chalk.red(`  Failed:         ${summary.failed}`));
  }

  const rate =
    summary.regenerationSuccessRate === undefined ? "n/a" : `${summary.regenerationSuccessRate.toFixed(1)}%`;
  lines.push(
    `  Regenerations:  ${summary.successfulRegenerations}/${summary.regenerationsIssued} successful (${rate})`
  );

  if (summary.belowThreshold > 0) {
    lines.push(chalk.yellow(`  Below ${formatTier(threshold)}:     ${summary.belowThreshold} files`));
  }
  lines.push(chalk.gray(`  Duration:       ${(summary.durationMs / 1000).toFixed(1)}s`));

  return lines.join("\n");
}

/**
 * Run summary as JSON; errors are reduced to their messages
 */
export function formatSummaryJson(summary: RunSummary): string {
  return JSON.stringify(
    {
      ...summary,
      outcomes: summary.outcomes.map((outcome) =>
        outcome.status === "accepted"
          ? {
              status: outcome.status,
              filePath: outcome.filePath,
              attempts: outcome.attempts,
              meetsThreshold: outcome.meetsThreshold,
              report: outcome.report,
            }
          : {
              status: outcome.status,
              filePath: outcome.filePath,
              attempts: outcome.attempts,
              error: outcome.error instanceof Error ? outcome.error.message : String(outcome.error),
            }
      ),
    },
    null,
    2
  );
}

/**
 * Format an error for terminal output
 */
export function formatError(error: Error): string {
  return chalk.red(`Error: ${error.message}`);
}

/**
 * Format a warning for terminal output
 */
export function formatWarning(message: string): string {
  return chalk.yellow(`Warning: ${message}`);
}

/**
 * Format a success message for terminal output
 */
export function formatSuccess(message: string): string {
  return chalk.green(`✓ ${message}`);
}
