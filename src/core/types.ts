export type { Diagnostic, DiagnosticSeverity, DiagnosticSummary } from "./types/diagnostics.js";
export type { TestCase, TestRunRecord, TestRunResult } from "./types/test-results.js";
export type { ActivityEvent, ActivityEventKind } from "./types/activity.js";
export type { AgentMode, WatcherState } from "./types/session.js";
export type {
  BuildCommandOptions,
  ParseCommandOptions,
  RunCommandOptionsInput,
  TestCommandOptions,
  WatchCommandOptions
} from "./types/commands.js";
export type { BuildOutcome, CommandResult, OutcomeStatus, TestOutcome } from "./types/outcomes.js";
