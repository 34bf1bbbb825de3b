import { parseNonNegativeInt, parseSeconds } from "../text.js";
import type { TestCase } from "../types.js";

import { attachFailureMessages, createTestCase, failedNamesOf, type TestResultStrategy } from "./cases.js";

// "Test Suite 'All tests' passed at ... Executed 5 tests, with 0 failures (0 unexpected) in 0.01 seconds"
const SUITE_SUMMARY_PATTERN = /executed (\d+) tests?, with (\d+) failures?/i;
// "Test Case '-[AppTests.MathTests testAdd]' passed (0.001 seconds)."
const CASE_PATTERN = /Test Case '(.+?)' (passed|failed)(?: \((\d+(?:\.\d+)?) seconds\))?/;
// "/src/MathTests.swift:12: error: -[AppTests.MathTests testSub] : XCTAssertEqual failed: ..."
const CASE_ERROR_PATTERN = /:\d+: error: (.+?) : (.+)$/;

export const xctestStrategy: TestResultStrategy = {
  name: "xctest",
  parse(lines) {
    let totalPassed: number | null = null;
    const cases: TestCase[] = [];
    const messages = new Map<string, string>();

    for (const line of lines) {
      const summary = SUITE_SUMMARY_PATTERN.exec(line);
      if (summary) {
        const total = parseNonNegativeInt(summary[1]);
        const failures = parseNonNegativeInt(summary[2]);
        // The outermost suite prints its summary last, so later lines overwrite earlier ones.
        if (total !== null && failures !== null) {
          totalPassed = Math.max(total - failures, 0);
        }
        continue;
      }

      const caseMatch = CASE_PATTERN.exec(line);
      if (caseMatch?.[1]) {
        cases.push(createTestCase(caseMatch[1], caseMatch[2] === "passed", parseSeconds(caseMatch[3])));
        continue;
      }

      const error = CASE_ERROR_PATTERN.exec(line);
      if (error?.[1] && error[2] && !messages.has(error[1])) {
        messages.set(error[1], error[2].trim());
      }
    }

    if (totalPassed === null) return null;
    attachFailureMessages(cases, messages);
    return { totalPassed, failedNames: failedNamesOf(cases), cases };
  }
};
