import { parseBuildDiagnostics } from "../diagnostics.js";
import { ExecutionError } from "../errors.js";
import { emptyTestRunResult, parseTestResults } from "../test-results.js";
import type { BuildOutcome, CommandResult, TestOutcome, TestRunResult } from "../types.js";

import { runCommand, type OutputStream } from "./process-runner.js";

export interface VerificationOptions {
  cwd: string;
  command: string[];
  timeoutMs?: number | undefined;
  onOutput?: ((stream: OutputStream, chunk: string) => void) | undefined;
  now?: (() => number) | undefined;
}

interface CompletedRun {
  succeeded: boolean;
  output: string;
  launched: boolean;
  durationMs: number;
}

/** stdout followed by stderr, trimmed. */
export function combineOutput(result: Pick<CommandResult, "stdout" | "stderr">): string {
  const separator = result.stdout && !result.stdout.endsWith("\n") ? "\n" : "";
  return `${result.stdout}${separator}${result.stderr}`.trim();
}

async function runToCompletion(options: VerificationOptions): Promise<CompletedRun> {
  const [executable, ...args] = options.command;
  if (!executable) {
    throw new ExecutionError("Cannot run an empty command.");
  }
  const now = options.now ?? Date.now;
  const startedAt = now();
  const result = await runCommand(executable, args, {
    cwd: options.cwd,
    timeoutMs: options.timeoutMs,
    onOutput: options.onOutput
  });
  const durationMs = Math.max(0, now() - startedAt);

  if (result.launchError !== undefined) {
    return { succeeded: false, output: result.launchError, launched: false, durationMs };
  }

  const output = combineOutput(result);
  // A timeout or signal exit may leave nothing on either stream.
  const withReason = !result.ok && !output && result.reason ? result.reason : output;
  return { succeeded: result.ok, output: withReason, launched: true, durationMs };
}

/** Runs a build and parses diagnostics from a failing run. A passing build reports none. */
export async function runBuildVerification(options: VerificationOptions): Promise<BuildOutcome> {
  const run = await runToCompletion(options);
  return {
    status: run.succeeded ? "passed" : "failed",
    command: [...options.command],
    output: run.output,
    diagnostics: run.succeeded || !run.launched ? [] : parseBuildDiagnostics(run.output),
    durationMs: run.durationMs
  };
}

export async function runTestSuite(options: VerificationOptions): Promise<TestOutcome> {
  const run = await runToCompletion(options);
  const result: TestRunResult = run.launched ? parseTestResults(run.output) : emptyTestRunResult();
  return {
    status: run.succeeded ? "passed" : "failed",
    command: [...options.command],
    output: run.output,
    result,
    durationMs: run.durationMs
  };
}
