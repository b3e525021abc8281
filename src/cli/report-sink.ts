/**
 * File-system report sink
 *
 * Writes each accepted test to `<output>/test_<name>.c` and a plain-text
 * report to `<output>/compilation_report/<name>_compiles_{yes|no}.txt`.
 * The report directory is recreated on every run.
 */

import { existsSync } from "fs";
import { mkdir, rm, writeFile } from "fs/promises";
import { basename, extname, join, resolve } from "path";

import { formatReportText } from "./formatters.js";

import type { FileOutcome } from "../testgen/controller.js";
import type { ReportSink } from "../testgen/pipeline.js";
import type { QualityTier } from "../testgen/validator/index.js";

export const REPORT_DIR = "compilation_report";

export interface WrittenFiles {
  test: string;
  report: string;
}

/**
 * Output paths for one source file
 */
export function outputPathsFor(outputDir: string, sourcePath: string, compiles: boolean): WrittenFiles {
  const stem = basename(sourcePath, extname(sourcePath));
  return {
    test: join(outputDir, `test_${stem}.c`),
    report: join(outputDir, REPORT_DIR, `${stem}_compiles_${compiles ? "yes" : "no"}.txt`),
  };
}

export class FileReportSink implements ReportSink {
  readonly written: WrittenFiles[] = [];
  private readonly outputDir: string;

  constructor(
    outputDir: string,
    private readonly threshold: QualityTier
  ) {
    this.outputDir = resolve(outputDir);
  }

  async begin(): Promise<void> {
    const reportDir = join(this.outputDir, REPORT_DIR);
    if (existsSync(reportDir)) {
      await rm(reportDir, { recursive: true, force: true });
    }
    await mkdir(reportDir, { recursive: true });
  }

  async write(outcome: FileOutcome): Promise<void> {
    if (outcome.status !== "accepted") return;

    const paths = outputPathsFor(this.outputDir, outcome.filePath, outcome.report.compiles);
    await writeFile(paths.test, outcome.testCode, "utf-8");
    await writeFile(paths.report, formatReportText(outcome.report, this.threshold), "utf-8");
    this.written.push(paths);
  }
}
