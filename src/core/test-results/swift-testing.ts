import { parseSeconds } from "../text.js";
import type { TestCase } from "../types.js";

import { attachFailureMessages, createTestCase, failedNamesOf, type TestResultStrategy } from "./cases.js";

const RUN_SUMMARY_PATTERN = /[✔✗✘] Test run with /;
const PASS_PATTERN = /✔ Test (.+?) passed(?: after (\d+(?:\.\d+)?) seconds?)?/;
const ISSUE_PATTERN = /[✗✘] Test (.+?) recorded an issue(?: at \S+?:\d+:\d+)?: (.+)$/;
const FAIL_PATTERN = /[✗✘] Test (.+?) failed(?: after (\d+(?:\.\d+)?) seconds?)?/;

export const swiftTestingStrategy: TestResultStrategy = {
  name: "swift-testing",
  parse(lines) {
    let passCount = 0;
    let found = false;
    const cases: TestCase[] = [];
    const messages = new Map<string, string>();

    for (const line of lines) {
      if (RUN_SUMMARY_PATTERN.test(line)) continue;

      // Issue lines mention "failed" in their message text, so they are matched first.
      const issue = ISSUE_PATTERN.exec(line);
      if (issue?.[1] && issue[2]) {
        if (!messages.has(issue[1])) messages.set(issue[1], issue[2].trim());
        continue;
      }

      const pass = PASS_PATTERN.exec(line);
      if (pass?.[1]) {
        passCount += 1;
        found = true;
        cases.push(createTestCase(pass[1], true, parseSeconds(pass[2])));
        continue;
      }

      const fail = FAIL_PATTERN.exec(line);
      if (fail?.[1]) {
        found = true;
        cases.push(createTestCase(fail[1], false, parseSeconds(fail[2])));
      }
    }

    if (!found) return null;
    attachFailureMessages(cases, messages);
    return { totalPassed: passCount, failedNames: failedNamesOf(cases), cases };
  }
};
