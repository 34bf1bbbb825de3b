import { parseNonNegativeInt } from "../text.js";
import type { TestCase } from "../types.js";

import { createTestCase, failedNamesOf, type TestResultStrategy } from "./cases.js";

// "==== 1 failed, 4 passed, 1 warning in 0.12s ====" or, under -q, "4 passed in 0.03s"
const SUMMARY_PATTERN = /^=*\s*(?:\d+ [a-z]+, )*\d+ (?:passed|failed)\b.*\bin \d+(?:\.\d+)?s\b/;
const PASSED_COUNT_PATTERN = /(\d+) passed/;
const VERBOSE_CASE_PATTERN = /^(\S+::\S+)\s+(PASSED|FAILED)\b/;
const FAILED_LINE_PATTERN = /^FAILED (.+?)(?: - (.*))?$/;

export const pytestStrategy: TestResultStrategy = {
  name: "pytest",
  parse(lines) {
    let totalPassed: number | null = null;
    const cases = new Map<string, TestCase>();

    for (const line of lines) {
      const trimmed = line.trim();

      if (SUMMARY_PATTERN.test(trimmed)) {
        const passed = parseNonNegativeInt(PASSED_COUNT_PATTERN.exec(trimmed)?.[1]);
        // A run where everything failed prints no passed count at all.
        totalPassed = passed ?? totalPassed ?? 0;
        continue;
      }

      const verbose = VERBOSE_CASE_PATTERN.exec(trimmed);
      if (verbose?.[1]) {
        const name = verbose[1];
        const existing = cases.get(name);
        cases.set(name, createTestCase(name, verbose[2] === "PASSED", undefined, existing?.failureMessage));
        continue;
      }

      const failed = FAILED_LINE_PATTERN.exec(trimmed);
      if (failed?.[1]) {
        const name = failed[1];
        const message = failed[2]?.trim() || cases.get(name)?.failureMessage;
        cases.set(name, createTestCase(name, false, undefined, message));
      }
    }

    if (totalPassed === null) return null;
    const ordered = [...cases.values()];
    return { totalPassed, failedNames: failedNamesOf(ordered), cases: ordered };
  }
};
