import { parseNonNegativeInt } from "../text.js";
import type { TestCase } from "../types.js";

import { attachFailureMessages, createTestCase, failedNamesOf, type TestResultStrategy } from "./cases.js";

const SUMMARY_PATTERN = /test result: (?:ok|FAILED)\. (\d+) passed; (\d+) failed/;
const CASE_PATTERN = /^test (.+?) \.\.\. (ok|FAILED|ignored)$/;
const STDOUT_HEADER_PATTERN = /^---- (.+?) stdout ----$/;

export const cargoStrategy: TestResultStrategy = {
  name: "cargo",
  parse(lines) {
    let totalPassed: number | null = null;
    const cases: TestCase[] = [];
    const messages = new Map<string, string>();
    let capture: { name: string; lines: string[] } | null = null;

    const finishCapture = (): void => {
      if (!capture) return;
      const message = capture.lines.join("\n").trim();
      if (message && !messages.has(capture.name)) messages.set(capture.name, message);
      capture = null;
    };

    for (const line of lines) {
      const trimmed = line.trim();

      if (capture) {
        if (!trimmed) {
          finishCapture();
        } else if (!trimmed.startsWith("note:")) {
          capture.lines.push(line.trimEnd());
        }
        continue;
      }

      const header = STDOUT_HEADER_PATTERN.exec(trimmed);
      if (header?.[1]) {
        capture = { name: header[1], lines: [] };
        continue;
      }

      // One summary per test binary; a workspace run prints several.
      const summary = SUMMARY_PATTERN.exec(line);
      if (summary) {
        const passed = parseNonNegativeInt(summary[1]);
        if (passed !== null) totalPassed = (totalPassed ?? 0) + passed;
        continue;
      }

      const caseMatch = CASE_PATTERN.exec(trimmed);
      if (caseMatch?.[1] && caseMatch[2] !== "ignored") {
        cases.push(createTestCase(caseMatch[1], caseMatch[2] === "ok"));
      }
    }
    finishCapture();

    if (totalPassed === null) return null;
    attachFailureMessages(cases, messages);
    return { totalPassed, failedNames: failedNamesOf(cases), cases };
  }
};
