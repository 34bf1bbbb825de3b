import { parseSeconds } from "../text.js";
import type { TestCase } from "../types.js";

import { createTestCase, failedNamesOf, type TestResultStrategy } from "./cases.js";

const RESULT_PATTERN = /^--- (PASS|FAIL|SKIP): (\S+)(?: \((\d+(?:\.\d+)?)s\))?/;
const RUN_PATTERN = /^=== (?:RUN|CONT|PAUSE)\s/;
// t.Log / t.Error output is indented and prefixed with the test file location.
const LOG_LINE_PATTERN = /^\s+\S+_test\.go:\d+:/;

export const goStrategy: TestResultStrategy = {
  name: "go",
  parse(lines) {
    let passCount = 0;
    let found = false;
    const cases: TestCase[] = [];
    // Under -v, log lines come before the FAIL line; without it, after.
    let pending: string[] = [];
    let lastFailed: TestCase | null = null;

    for (const line of lines) {
      if (LOG_LINE_PATTERN.test(line)) {
        const text = line.trim();
        if (lastFailed) {
          lastFailed.failureMessage = lastFailed.failureMessage ? `${lastFailed.failureMessage}\n${text}` : text;
        } else {
          pending.push(text);
        }
        continue;
      }

      const trimmed = line.trim();
      if (RUN_PATTERN.test(trimmed)) {
        pending = [];
        lastFailed = null;
        continue;
      }

      const result = RESULT_PATTERN.exec(trimmed);
      if (!result?.[2]) {
        if (trimmed) lastFailed = null;
        continue;
      }

      const status = result[1];
      if (status === "SKIP") {
        pending = [];
        lastFailed = null;
        continue;
      }

      found = true;
      const duration = parseSeconds(result[3]);
      if (status === "PASS") {
        passCount += 1;
        cases.push(createTestCase(result[2], true, duration));
        pending = [];
        lastFailed = null;
        continue;
      }

      const failedCase = createTestCase(result[2], false, duration, pending.join("\n"));
      cases.push(failedCase);
      pending = [];
      lastFailed = failedCase;
    }

    if (!found) return null;
    return { totalPassed: passCount, failedNames: failedNamesOf(cases), cases };
  }
};
