import { describe, it, expect, vi } from "vitest";

import {
  formatError,
  formatReportLine,
  formatReportText,
  formatStatusLine,
  formatSuccess,
  formatSummary,
  formatSummaryJson,
  formatValidationReport,
  formatWarning,
  isValidOutputFormat,
} from "@/cli/formatters.js";

import type { FileOutcome } from "@/testgen/controller.js";
import type { RunSummary } from "@/testgen/pipeline.js";
import type { ValidationReport } from "@/testgen/validator/index.js";

// Mock chalk to avoid color codes in test output comparisons
vi.mock("chalk", () => ({
  default: {
    red: (s: string) => `[red]${s}[/red]`,
    yellow: (s: string) => `[yellow]${s}[/yellow]`,
    green: (s: string) => `[green]${s}[/green]`,
    gray: (s: string) => `[gray]${s}[/gray]`,
    white: {
      bold: (s: string) => `[white.bold]${s}[/white.bold]`,
    },
    bold: Object.assign((s: string) => `[bold]${s}[/bold]`, {
      underline: (s: string) => `[bold.underline]${s}[/bold.underline]`,
    }),
  },
}));

const HIGH: ValidationReport = { file: "test_sensor.c", compiles: true, realistic: true, quality: "high", issues: [] };

const MEDIUM: ValidationReport = {
  file: "test_sensor.c",
  compiles: true,
  realistic: false,
  quality: "medium",
  issues: ["Temperature value 130 seems unreasonably high (valid range: -40°C to 125°C)"],
};

const LOW: ValidationReport = {
  file: "test_util.c",
  compiles: false,
  realistic: true,
  quality: "low",
  issues: ['Missing required Unity include: #include "unity.h"'],
};

const ACCEPTED: FileOutcome = {
  status: "accepted",
  filePath: "/repo/src/sensor.c",
  attempts: 3,
  report: MEDIUM,
  testCode: "int x;\n",
  meetsThreshold: false,
};

const FAILED: FileOutcome = {
  status: "failed",
  filePath: "/repo/src/util.c",
  attempts: 1,
  error: new Error("backend down"),
};

describe("Formatters", () => {
  describe("isValidOutputFormat", () => {
    it("accepts terminal and json", () => {
      expect(isValidOutputFormat("terminal")).toBe(true);
      expect(isValidOutputFormat("json")).toBe(true);
      expect(isValidOutputFormat("sarif")).toBe(false);
    });
  });

  describe("formatReportLine", () => {
    it("marks reports that meet the threshold", () => {
      expect(formatReportLine(HIGH, "high")).toBe("[OK] High quality (Compiles, Realistic) issues=0");
      expect(formatReportLine(MEDIUM, "medium")).toBe("[OK] Medium quality (Compiles, Unrealistic) issues=1");
    });

    it("warns below the threshold", () => {
      expect(formatReportLine(LOW, "medium")).toBe("[WARN] Low quality (Broken, Realistic) issues=1");
    });
  });

  describe("formatStatusLine", () => {
    it("colors accepted files by tier and shows the attempt count", () => {
      expect(formatStatusLine(ACCEPTED, "high")).toBe(
        "[yellow][WARN] Medium quality (Compiles, Unrealistic) issues=1[/yellow] " +
          "[white.bold]sensor.c[/white.bold][gray] after 3 attempts[/gray]"
      );
    });

    it("omits the attempt count for first-attempt files", () => {
      expect(formatStatusLine({ ...ACCEPTED, attempts: 1, report: HIGH }, "high")).toBe(
        "[green][OK] High quality (Compiles, Realistic) issues=0[/green] [white.bold]sensor.c[/white.bold]"
      );
    });

    it("shows the failure message for failed files", () => {
      expect(formatStatusLine(FAILED, "high")).toBe(
        "[red][FAIL][/red] [white.bold]util.c[/white.bold] [gray]backend down[/gray]"
      );
    });
  });

  describe("formatReportText", () => {
    it("lists every issue", () => {
      expect(formatReportText(LOW, "high")).toBe(
        [
          "File: test_util.c",
          "Quality: Low",
          "Compiles: no",
          "Realistic: yes",
          "Meets threshold (High): no",
          "",
          "Issues (1):",
          '- Missing required Unity include: #include "unity.h"',
          "",
        ].join("\n")
      );
    });

    it("says so when there are no issues", () => {
      expect(formatReportText(HIGH, "medium")).toBe(
        [
          "File: test_sensor.c",
          "Quality: High",
          "Compiles: yes",
          "Realistic: yes",
          "Meets threshold (Medium): yes",
          "",
          "No issues found.",
          "",
        ].join("\n")
      );
    });
  });

  describe("formatValidationReport", () => {
    it("prints the verdict and indented issues", () => {
      expect(formatValidationReport(MEDIUM, "high")).toBe(
        [
          "[bold]test_sensor.c[/bold]",
          "[yellow][WARN] Medium quality (Compiles, Unrealistic) issues=1[/yellow]",
          "",
          "[gray]  - Temperature value 130 seems unreasonably high (valid range: -40°C to 125°C)[/gray]",
        ].join("\n")
      );
    });
  });

  describe("formatSummary", () => {
    const summary: RunSummary = {
      total: 3,
      accepted: 2,
      failed: 1,
      belowThreshold: 1,
      attemptsIssued: 5,
      regenerationsIssued: 2,
      successfulRegenerations: 1,
      regenerationSuccessRate: 50,
      outcomes: [ACCEPTED, FAILED],
      durationMs: 1500,
    };

    it("prints counts, regeneration rate and duration", () => {
      expect(formatSummary(summary, "high")).toBe(
        [
          "",
          "[bold.underline]Summary[/bold.underline]",
          "  Generated:      2/3 files",
          "[red]  Failed:         1[/red]",
          "  Regenerations:  1/2 successful (50.0%)",
          "[yellow]  Below High:     1 files[/yellow]",
          "[gray]  Duration:       1.5s[/gray]",
        ].join("\n")
      );
    });

    it("shows n/a when nothing was regenerated", () => {
      const output = formatSummary(
        { ...summary, failed: 0, belowThreshold: 0, regenerationsIssued: 0, successfulRegenerations: 0, regenerationSuccessRate: undefined },
        "high"
      );
      expect(output.split("\n")[3]).toBe("  Regenerations:  0/0 successful (n/a)");
    });

    it("serializes to JSON with error messages and without test code", () => {
      const parsed: unknown = JSON.parse(formatSummaryJson(summary));

      expect(parsed).toMatchObject({
        total: 3,
        regenerationSuccessRate: 50,
        outcomes: [
          { status: "accepted", filePath: "/repo/src/sensor.c", attempts: 3, meetsThreshold: false, report: MEDIUM },
          { status: "failed", filePath: "/repo/src/util.c", attempts: 1, error: "backend down" },
        ],
      });
      expect(formatSummaryJson(summary)).not.toContain("testCode");
    });
  });

  describe("messages", () => {
    it("formats errors, warnings and successes", () => {
      expect(formatError(new Error("boom"))).toBe("[red]Error: boom[/red]");
      expect(formatWarning("careful")).toBe("[yellow]Warning: careful[/yellow]");
      expect(formatSuccess("done")).toBe("[green]✓ done[/green]");
    });
  });
});
