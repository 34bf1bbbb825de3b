import { parseNonNegativeInt } from "../text.js";
import type { TestCase } from "../types.js";

import { createTestCase, failedNamesOf, type TestResultStrategy } from "./cases.js";

// Jest:   "Tests:       1 failed, 4 passed, 5 total"
// Vitest: "      Tests  1 failed | 4 passed (5)"
const TESTS_SUMMARY_PATTERN = /^\s*Tests:?\s+(.*)$/;
const FAILED_COUNT_PATTERN = /(\d+) failed/;
const PASSED_COUNT_PATTERN = /(\d+) passed/;
const TOTAL_COUNT_PATTERN = /(\d+) total|\((\d+)\)/;
const MOCHA_PASSING_PATTERN = /^\s*(\d+) passing\b/;

const PASSED_CASE_PATTERN = /^\s*[✓✔√]\s+(.+?)(?:\s+\(?(\d+(?:\.\d+)?)\s*ms\)?)?$/;
const FAILED_CASE_PATTERN = /^\s*[✕×✗✘]\s+(.+?)(?:\s+\(?(\d+(?:\.\d+)?)\s*ms\)?)?$/;
// Vitest prints one line per file with a test count; those are not cases.
const FILE_LINE_PATTERN = /\(\d+ tests?(?: \|[^)]*)?\)/;
const FAILURE_HEADER_PATTERN = /^\s*●\s+(.+)$/;
const TITLE_SEPARATOR_PATTERN = /\s+[›>]\s+/;
// Jest blocks that share the failure bullet but are not test titles.
const NON_TEST_HEADERS: ReadonlySet<string> = new Set(["Console", "Test suite failed to run"]);

interface RunSummary {
  passed: number;
  failed: number;
}

function readSummary(line: string): RunSummary | null {
  const summary = TESTS_SUMMARY_PATTERN.exec(line);
  if (summary?.[1] !== undefined) {
    const body = summary[1];
    const failed = parseNonNegativeInt(FAILED_COUNT_PATTERN.exec(body)?.[1]) ?? 0;
    const passed = parseNonNegativeInt(PASSED_COUNT_PATTERN.exec(body)?.[1]);
    if (passed !== null) return { passed, failed };
    const totalMatch = TOTAL_COUNT_PATTERN.exec(body);
    const total = parseNonNegativeInt(totalMatch?.[1] ?? totalMatch?.[2]);
    if (total !== null) return { passed: Math.max(total - failed, 0), failed };
    return null;
  }
  const passing = parseNonNegativeInt(MOCHA_PASSING_PATTERN.exec(line)?.[1]);
  return passing === null ? null : { passed: passing, failed: 0 };
}

function readCase(line: string): TestCase | null {
  if (FILE_LINE_PATTERN.test(line)) return null;
  const passed = PASSED_CASE_PATTERN.exec(line);
  const failed = passed ? null : FAILED_CASE_PATTERN.exec(line);
  const match = passed ?? failed;
  if (!match?.[1]) return null;
  const ms = match[2] !== undefined ? Number.parseFloat(match[2]) : Number.NaN;
  return createTestCase(match[1], passed !== null, Number.isFinite(ms) ? ms / 1000 : undefined);
}

function lastTitleSegment(title: string): string {
  const segments = title.trim().split(TITLE_SEPARATOR_PATTERN);
  return segments[segments.length - 1] ?? title.trim();
}

export const jsRunnerStrategy: TestResultStrategy = {
  name: "jest-mocha-vitest",
  parse(lines) {
    let summary: RunSummary | null = null;
    const cases: TestCase[] = [];
    const headerNames: string[] = [];
    let awaitingMessageFor: string | null = null;

    for (const line of lines) {
      if (awaitingMessageFor !== null) {
        const trimmed = line.trim();
        if (!trimmed) continue;
        const target = cases.find(
          (testCase) => !testCase.passed && !testCase.failureMessage && testCase.name === awaitingMessageFor
        );
        if (target) target.failureMessage = trimmed;
        awaitingMessageFor = null;
      }

      if (summary === null) {
        summary = readSummary(line);
        if (summary !== null) continue;
      }

      const header = FAILURE_HEADER_PATTERN.exec(line);
      if (header?.[1]) {
        if (NON_TEST_HEADERS.has(header[1].trim())) continue;
        awaitingMessageFor = lastTitleSegment(header[1]);
        if (!headerNames.includes(awaitingMessageFor)) headerNames.push(awaitingMessageFor);
        continue;
      }

      const testCase = readCase(line);
      if (testCase) cases.push(testCase);
    }

    if (summary === null) return null;
    const failedNames = failedNamesOf(cases);
    if (!failedNames.length && summary.failed > 0) failedNames.push(...headerNames);
    return { totalPassed: summary.passed, failedNames, cases };
  }
};
