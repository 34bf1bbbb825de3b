import type { TestRunResult } from "../types.js";

import { createTestCase } from "./cases.js";

// Also hits unrelated log lines that happen to contain these markers.
const GENERIC_FAILURE_PATTERN = /(?:FAIL(?:ED)?|✗|×)\s+(.+)/;

export function parseFailedNamesFallback(lines: readonly string[]): TestRunResult {
  const failedNames: string[] = [];
  for (const line of lines) {
    const name = GENERIC_FAILURE_PATTERN.exec(line.trim())?.[1]?.trim();
    if (name) failedNames.push(name);
  }
  return {
    totalPassed: 0,
    failedNames,
    cases: failedNames.map((name) => createTestCase(name, false))
  };
}
