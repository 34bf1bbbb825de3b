export { parseTestResults, TEST_RESULT_STRATEGIES } from "./test-results/parser.js";
export { emptyTestRunResult } from "./test-results/cases.js";
export type { TestResultStrategy } from "./test-results/cases.js";
export { createLatestRunStore, createTestRunRecord, failedCount, passedCount } from "./test-results/store.js";
export type { LatestRunStore } from "./test-results/store.js";
