import { log, spinner } from "@clack/prompts";

import { runBuildVerification } from "../core/runner.js";
import { defaultColorize } from "../core/text.js";
import type { BuildCommandOptions, BuildOutcome } from "../core/types.js";

import {
  buildOutcomePayload,
  describeDiagnosticCounts,
  formatDuration,
  outputTail,
  renderDiagnosticLines,
  writeJson
} from "./shared/report.js";
import { prepareRunWorkflow } from "./shared/workflow-setup.js";

export function reportBuildOutcome(outcome: BuildOutcome, colorize: boolean): void {
  const timing = formatDuration(outcome.durationMs);
  if (outcome.status === "passed") {
    log.success(`Build passed in ${timing}.`);
    return;
  }

  if (!outcome.diagnostics.length) {
    log.error(`Build failed in ${timing}; no file diagnostics recognized.`);
    if (outcome.output) log.message(outputTail(outcome.output));
    return;
  }

  log.error(`Build failed in ${timing} (${describeDiagnosticCounts(outcome.diagnostics)}).`);
  log.message(renderDiagnosticLines(outcome.diagnostics, colorize).join("\n"));
}

export async function runBuild(pathArg: string | undefined, options: BuildCommandOptions): Promise<void> {
  const workflow = prepareRunWorkflow("build", pathArg, options);

  if (workflow.format === "json") {
    const outcome = await runBuildVerification({
      cwd: workflow.targetDir,
      command: workflow.command,
      timeoutMs: workflow.timeoutMs
    });
    writeJson(buildOutcomePayload(outcome));
    if (outcome.status === "failed") process.exitCode = 1;
    return;
  }

  log.info(`Build command (${workflow.commandSource}): ${workflow.commandLabel}`);
  const buildSpinner = spinner({ indicator: "dots" });
  buildSpinner.start("Running build...");
  const outcome = await runBuildVerification({
    cwd: workflow.targetDir,
    command: workflow.command,
    timeoutMs: workflow.timeoutMs
  });
  buildSpinner.stop(`Build finished (${outcome.status}).`);
  reportBuildOutcome(outcome, defaultColorize());
  if (outcome.status === "failed") process.exitCode = 1;
}
