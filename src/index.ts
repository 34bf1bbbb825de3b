export { filterDiagnosticsForFile, normalizeSeverity, parseBuildDiagnostics, summarizeDiagnostics } from "./core/diagnostics.js";
export * from "./core/test-results.js";
export * from "./core/terminal.js";
export * from "./core/runner.js";
export { CONFIG_FILE_NAME, loadConfig, parseConfig } from "./core/config.js";
export type { LoadedConfig, ToolSignalConfig } from "./core/config.js";
export {
  ConfigError,
  ExecutionError,
  normalizeError,
  ToolSignalError,
  toJsonErrorPayload,
  UserInputError
} from "./core/errors.js";
export type { CliOutputFormat } from "./core/errors.js";
export type {
  ActivityEvent,
  ActivityEventKind,
  AgentMode,
  BuildOutcome,
  CommandResult,
  Diagnostic,
  DiagnosticSeverity,
  DiagnosticSummary,
  OutcomeStatus,
  TestCase,
  TestOutcome,
  TestRunRecord,
  TestRunResult,
  WatcherState
} from "./core/types.js";
