/**
 * Pipeline Tests
 *
 * End-to-end over a temporary repository with a scripted generator.
 */

import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";

import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

import { ContextBuildError, RunInterruptedError } from "@/lib/errors.js";
import { logger } from "@/lib/logger.js";
import { RegenerationStats } from "@/testgen/controller.js";
import { exitCodeFor, runPipeline, summarize } from "@/testgen/pipeline.js";

import { GOOD_TEST, SENSOR_SOURCE, TEST_WITHOUT_UNITY, UTIL_SOURCE } from "../fixtures/sensor.js";

import type { FileOutcome } from "@/testgen/controller.js";
import type { PipelineConfig, ReportSink } from "@/testgen/pipeline.js";

const UTIL_TEST = [
  '#include "unity.h"',
  "",
  "void setUp(void) {}",
  "void tearDown(void) {}",
  "",
  "void test_convert_zero(void)",
  "{",
  "    TEST_ASSERT_FLOAT_WITHIN(0.01f, 0.0f, convert(0));",
  "}",
  "",
  "int main(void)",
  "{",
  "    UNITY_BEGIN();",
  "    RUN_TEST(test_convert_zero);",
  "    return UNITY_END();",
  "}",
  "",
].join("\n");

async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const path = join(root, rel);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, "utf-8");
  }
}

class MemorySink implements ReportSink {
  begun: string[] = [];
  started: string[] = [];
  written: FileOutcome[] = [];

  begin(files: readonly string[]): void {
    this.begun = [...files];
  }

  fileStarted(filePath: string): void {
    this.started.push(filePath);
  }

  write(outcome: FileOutcome): void {
    this.written.push(outcome);
  }
}

/**
 * Sensor tests fail once for the missing include, then pass; util tests pass
 */
function scriptedGenerator() {
  let sensorCalls = 0;
  return vi.fn(async (prompt: string, _options?: { systemPrompt?: string; signal?: AbortSignal }) => {
    if (prompt.includes("==== BEGIN sensor.c ====")) {
      sensorCalls++;
      return sensorCalls === 1 ? TEST_WITHOUT_UNITY : GOOD_TEST;
    }
    return UTIL_TEST;
  });
}

describe("runPipeline", () => {
  let root: string;
  let config: PipelineConfig;

  beforeAll(() => {
    logger.configure({ level: "silent" });
  });

  afterAll(() => {
    logger.configure({ level: "info" });
  });

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "pipeline-test-"));
    await writeTree(root, {
      "src/sensor.c": SENSOR_SOURCE,
      "src/util.c": UTIL_SOURCE,
      "src/main.c": "int main(void)\n{\n    return 0;\n}\n",
      "tests/test_stale.c": "float convert(int raw) { return 0.0f; }\n",
    });
    config = {
      repoPath: root,
      sourceDir: "src",
      outputDir: "tests",
      maxRegenerationAttempts: 2,
      qualityThreshold: "high",
      regenerateOnLowQuality: true,
    };
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("generates, regenerates and summarizes every target", async () => {
    const generate = scriptedGenerator();
    const sink = new MemorySink();

    const summary = await runPipeline(config, { generator: { generate }, sink });

    expect(sink.begun).toEqual([join(root, "src", "sensor.c"), join(root, "src", "util.c")]);
    expect(sink.started).toEqual(sink.begun);
    expect(sink.written.map((o) => [o.filePath, o.status, o.attempts])).toEqual([
      [join(root, "src", "sensor.c"), "accepted", 2],
      [join(root, "src", "util.c"), "accepted", 1],
    ]);

    expect(summary).toMatchObject({
      total: 2,
      accepted: 2,
      failed: 0,
      belowThreshold: 0,
      attemptsIssued: 3,
      regenerationsIssued: 1,
      successfulRegenerations: 1,
      regenerationSuccessRate: 100,
    });
    expect(exitCodeFor(summary, config)).toBe(0);
  });

  it("stubs only symbols owned by other source files", async () => {
    const generate = scriptedGenerator();

    await runPipeline(config, { generator: { generate }, sink: new MemorySink() });

    const sensorPrompt = generate.mock.calls[0]?.[0] ?? "";
    expect(sensorPrompt).toContain("## External Functions To Stub (only these)\n- float convert(int raw) (from util.c)\n\n");
    const utilPrompt = generate.mock.calls[2]?.[0] ?? "";
    expect(utilPrompt).toContain("## External Functions To Stub (only these)\n- None\n");
  });

  it("records unreadable sources as failed files and continues", async () => {
    await writeFile(join(root, "src", "blob.c"), "int x;\u0000", "utf-8");
    const sink = new MemorySink();

    const summary = await runPipeline(config, { generator: { generate: scriptedGenerator() }, sink });

    const blob = summary.outcomes.find((o) => o.filePath === join(root, "src", "blob.c"));
    expect(blob?.status).toBe("failed");
    expect(blob?.attempts).toBe(0);
    expect(blob?.status === "failed" ? blob.error : undefined).toBeInstanceOf(ContextBuildError);
    expect(summary).toMatchObject({ total: 3, accepted: 2, failed: 1 });
    expect(exitCodeFor(summary, config)).toBe(1);
  });

  it("never treats files in an output directory inside the sources as targets", async () => {
    await writeTree(root, { "src/generated/test_sensor.c": GOOD_TEST });
    const sink = new MemorySink();

    await runPipeline({ ...config, outputDir: "src/generated" }, { generator: { generate: scriptedGenerator() }, sink });

    expect(sink.begun).toEqual([join(root, "src", "sensor.c"), join(root, "src", "util.c")]);
  });

  it("applies exclude patterns", async () => {
    const sink = new MemorySink();

    await runPipeline({ ...config, exclude: ["util.c"] }, { generator: { generate: scriptedGenerator() }, sink });

    expect(sink.begun).toEqual([join(root, "src", "sensor.c")]);
  });

  it("stops on interrupt without writing further outcomes", async () => {
    const abort = new AbortController();
    abort.abort();
    const sink = new MemorySink();

    await expect(
      runPipeline(config, { generator: { generate: scriptedGenerator() }, sink, signal: abort.signal })
    ).rejects.toBeInstanceOf(RunInterruptedError);
    expect(sink.written).toEqual([]);
  });
});

describe("summarize and exitCodeFor", () => {
  const report = { file: "test_a.c", compiles: true, realistic: true, issues: [] };

  function accepted(quality: "low" | "medium" | "high"): FileOutcome {
    return {
      status: "accepted",
      filePath: "/r/a.c",
      attempts: 1,
      report: { ...report, quality },
      testCode: "",
      meetsThreshold: quality === "high",
    };
  }

  it("counts files below the threshold", () => {
    const summary = summarize([accepted("high"), accepted("medium")], new RegenerationStats(), { qualityThreshold: "high" }, 5);
    expect(summary).toMatchObject({ total: 2, accepted: 2, failed: 0, belowThreshold: 1, regenerationSuccessRate: undefined });
  });

  it("fails runs with files below threshold only when regeneration is off", () => {
    const summary = summarize([accepted("medium")], new RegenerationStats(), { qualityThreshold: "high" }, 5);
    expect(exitCodeFor(summary, { regenerateOnLowQuality: false })).toBe(1);
    expect(exitCodeFor(summary, { regenerateOnLowQuality: true })).toBe(0);
  });

  it("fails runs that produced nothing", () => {
    const summary = summarize([], new RegenerationStats(), { qualityThreshold: "high" }, 5);
    expect(exitCodeFor(summary, { regenerateOnLowQuality: true })).toBe(1);
  });
});
