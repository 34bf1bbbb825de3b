import { splitLines } from "../text.js";
import type { TestRunResult } from "../types.js";

import { cargoStrategy } from "./cargo.js";
import type { TestResultStrategy } from "./cases.js";
import { parseFailedNamesFallback } from "./fallback.js";
import { goStrategy } from "./go.js";
import { jsRunnerStrategy } from "./js-runners.js";
import { pytestStrategy } from "./pytest.js";
import { swiftTestingStrategy } from "./swift-testing.js";
import { xctestStrategy } from "./xctest.js";

export const TEST_RESULT_STRATEGIES: readonly TestResultStrategy[] = [
  xctestStrategy,
  swiftTestingStrategy,
  cargoStrategy,
  pytestStrategy,
  goStrategy,
  jsRunnerStrategy
];

/** Returns the first strategy result that carries a concrete count, else the name-only fallback. */
export function parseTestResults(output: string): TestRunResult {
  const lines = splitLines(output);
  for (const strategy of TEST_RESULT_STRATEGIES) {
    const result = strategy.parse(lines);
    if (result) return result;
  }
  return parseFailedNamesFallback(lines);
}
