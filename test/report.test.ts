import { describe, expect, it } from "vitest";

import {
  buildOutcomePayload,
  describeDiagnosticCounts,
  describeTestTotals,
  formatDiagnostic,
  formatDuration,
  outputTail,
  renderDiagnosticLines,
  renderFailureLines,
  renderTestCaseLines,
  testOutcomePayload
} from "../src/commands/shared/report.js";
import type { Diagnostic, TestRunResult } from "../src/core/types.js";

const failingRun: TestRunResult = {
  totalPassed: 1,
  failedNames: ["subtracts"],
  cases: [
    { name: "adds", passed: true, duration: 0.001 },
    { name: "subtracts", passed: false, failureMessage: "expected 1\nreceived 2" }
  ]
};

describe("report formatting", () => {
  it("formats durations", () => {
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(1500)).toBe("1.5s");
  });

  it("formats diagnostics with and without a column", () => {
    const withColumn: Diagnostic = { filePath: "a.ts", line: 3, column: 5, severity: "error", message: "broken" };
    expect(formatDiagnostic(withColumn, false)).toBe("a.ts:3:5 error: broken");
    expect(formatDiagnostic(withColumn, true)).toBe("a.ts:3:5 \u001B[31merror\u001B[0m: broken");
    expect(formatDiagnostic({ filePath: "b.c", line: 9, severity: "warning", message: "unused" }, false)).toBe(
      "b.c:9 warning: unused"
    );
  });

  it("counts diagnostics and caps the listing", () => {
    const diagnostics = Array.from({ length: 52 }, (_, index): Diagnostic => ({
      filePath: "a.ts",
      line: index + 1,
      severity: index === 0 ? "error" : "warning",
      message: `m${index}`
    }));

    expect(describeDiagnosticCounts(diagnostics)).toBe("1 error, 51 warnings, 0 notes");
    const lines = renderDiagnosticLines(diagnostics, false);
    expect(lines).toHaveLength(51);
    expect(lines[0]).toBe("a.ts:1 error: m0");
    expect(lines[50]).toBe("... 2 more");
  });

  it("renders test totals, cases and failures", () => {
    expect(describeTestTotals(failingRun)).toBe("1 passed, 1 failed");
    expect(renderTestCaseLines(failingRun, false)).toEqual(["✓ adds (0.001s)", "✗ subtracts"]);
    expect(renderFailureLines(failingRun, false)).toEqual(["subtracts", "    expected 1", "    received 2"]);
  });

  it("keeps the last lines of long output", () => {
    expect(outputTail("1\n2\n3", 2)).toBe("2\n3");
  });
});

describe("JSON payloads", () => {
  it("omits the raw output of a passing build", () => {
    expect(
      buildOutcomePayload({ status: "passed", command: ["make"], output: "ok", diagnostics: [], durationMs: 10 })
    ).toEqual({
      kind: "build",
      status: "passed",
      command: ["make"],
      durationMs: 10,
      summary: { errors: 0, warnings: 0, notes: 0 },
      diagnostics: []
    });
  });

  it("includes the raw output of a failing test run", () => {
    expect(
      testOutcomePayload({ status: "failed", command: ["npm", "test"], output: "boom", result: failingRun, durationMs: 5 })
    ).toEqual({
      kind: "test",
      status: "failed",
      command: ["npm", "test"],
      durationMs: 5,
      totalPassed: 1,
      failedNames: ["subtracts"],
      cases: failingRun.cases,
      output: "boom"
    });
  });
});
