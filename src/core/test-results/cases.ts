import type { TestCase, TestRunResult } from "../types.js";

export interface TestResultStrategy {
  readonly name: string;
  /** Returns null when the output carries none of this tool's summary or case markers. */
  parse(lines: readonly string[]): TestRunResult | null;
}

export function createTestCase(
  name: string,
  passed: boolean,
  duration?: number | undefined,
  failureMessage?: string | undefined
): TestCase {
  return {
    name,
    passed,
    ...(duration !== undefined ? { duration } : {}),
    ...(failureMessage ? { failureMessage } : {})
  };
}

export function failedNamesOf(cases: readonly TestCase[]): string[] {
  return cases.filter((testCase) => !testCase.passed).map((testCase) => testCase.name);
}

export function attachFailureMessages(cases: TestCase[], messages: ReadonlyMap<string, string>): void {
  if (!messages.size) return;
  for (const testCase of cases) {
    if (testCase.passed || testCase.failureMessage) continue;
    const message = messages.get(testCase.name);
    if (message) testCase.failureMessage = message;
  }
}

export function emptyTestRunResult(): TestRunResult {
  return { totalPassed: 0, failedNames: [], cases: [] };
}
