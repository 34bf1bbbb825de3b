import type { Diagnostic } from "./diagnostics.js";
import type { TestRunResult } from "./test-results.js";

export interface CommandResult {
  ok: boolean;
  /** Null when the process never started or was killed by a signal. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  reason?: string | undefined;
  /** Set when the process could not be started at all. */
  launchError?: string | undefined;
}

export type OutcomeStatus = "passed" | "failed";

export interface BuildOutcome {
  status: OutcomeStatus;
  command: string[];
  output: string;
  diagnostics: Diagnostic[];
  durationMs: number;
}

export interface TestOutcome {
  status: OutcomeStatus;
  command: string[];
  output: string;
  result: TestRunResult;
  durationMs: number;
}
