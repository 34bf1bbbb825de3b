import { log, spinner } from "@clack/prompts";

import { runTestSuite } from "../core/runner.js";
import { defaultColorize } from "../core/text.js";
import type { TestCommandOptions, TestOutcome } from "../core/types.js";

import {
  describeTestTotals,
  formatDuration,
  outputTail,
  renderFailureLines,
  renderTestCaseLines,
  testOutcomePayload,
  writeJson
} from "./shared/report.js";
import { prepareRunWorkflow } from "./shared/workflow-setup.js";

export function reportTestOutcome(outcome: TestOutcome, colorize: boolean): void {
  const timing = formatDuration(outcome.durationMs);
  const totals = describeTestTotals(outcome.result);

  if (outcome.status === "passed") {
    log.success(`Tests passed in ${timing} (${totals}).`);
    if (outcome.result.cases.length) {
      log.message(renderTestCaseLines(outcome.result, colorize).join("\n"));
    }
    return;
  }

  log.error(`Tests failed in ${timing} (${totals}).`);
  const failures = renderFailureLines(outcome.result, colorize);
  if (failures.length) {
    log.message(failures.join("\n"));
    return;
  }
  // Nothing recognizable; the raw tail is the best hint left.
  if (outcome.output) log.message(outputTail(outcome.output));
}

export async function runTest(pathArg: string | undefined, options: TestCommandOptions): Promise<void> {
  const workflow = prepareRunWorkflow("test", pathArg, options);

  if (workflow.format === "json") {
    const outcome = await runTestSuite({
      cwd: workflow.targetDir,
      command: workflow.command,
      timeoutMs: workflow.timeoutMs
    });
    writeJson(testOutcomePayload(outcome));
    if (outcome.status === "failed") process.exitCode = 1;
    return;
  }

  log.info(`Test command (${workflow.commandSource}): ${workflow.commandLabel}`);
  const testSpinner = spinner({ indicator: "dots" });
  testSpinner.start("Running tests...");
  const outcome = await runTestSuite({
    cwd: workflow.targetDir,
    command: workflow.command,
    timeoutMs: workflow.timeoutMs
  });
  testSpinner.stop(`Tests finished (${outcome.status}).`);
  reportTestOutcome(outcome, defaultColorize());
  if (outcome.status === "failed") process.exitCode = 1;
}
