/**
 * Report Sink Tests
 */

import { existsSync } from "fs";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { formatReportText } from "@/cli/formatters.js";
import { FileReportSink, REPORT_DIR, outputPathsFor } from "@/cli/report-sink.js";

import type { ValidationReport } from "@/testgen/validator/index.js";

const REPORT: ValidationReport = {
  file: "test_sensor.c",
  compiles: true,
  realistic: true,
  quality: "high",
  issues: [],
};

describe("Report sink", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "c-testgen-sink-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("outputPathsFor", () => {
    it("names the test and report after the source stem", () => {
      expect(outputPathsFor("/out", "/repo/src/sensor.c", true)).toEqual({
        test: "/out/test_sensor.c",
        report: `/out/${REPORT_DIR}/sensor_compiles_yes.txt`,
      });
      expect(outputPathsFor("/out", "/repo/src/util.c", false).report).toBe(
        "/out/compilation_report/util_compiles_no.txt"
      );
    });
  });

  describe("FileReportSink", () => {
    it("recreates the report directory on begin", async () => {
      await mkdir(join(dir, REPORT_DIR), { recursive: true });
      await writeFile(join(dir, REPORT_DIR, "old_compiles_no.txt"), "stale");

      await new FileReportSink(dir, "high").begin();

      expect(await readdir(join(dir, REPORT_DIR))).toEqual([]);
    });

    it("writes accepted tests with their reports", async () => {
      const sink = new FileReportSink(dir, "medium");
      await sink.begin();
      await sink.write({
        status: "accepted",
        filePath: "/repo/src/sensor.c",
        attempts: 1,
        report: REPORT,
        testCode: '#include "unity.h"\n',
        meetsThreshold: true,
      });

      const testPath = join(dir, "test_sensor.c");
      const reportPath = join(dir, REPORT_DIR, "sensor_compiles_yes.txt");
      expect(sink.written).toEqual([{ test: testPath, report: reportPath }]);
      expect(await readFile(testPath, "utf-8")).toBe('#include "unity.h"\n');
      expect(await readFile(reportPath, "utf-8")).toBe(formatReportText(REPORT, "medium"));
    });

    it("writes nothing for failed files", async () => {
      const sink = new FileReportSink(dir, "high");
      await sink.begin();
      await sink.write({ status: "failed", filePath: "/repo/src/util.c", attempts: 0, error: new Error("unreadable") });

      expect(sink.written).toEqual([]);
      expect(existsSync(join(dir, "test_util.c"))).toBe(false);
    });
  });
});
