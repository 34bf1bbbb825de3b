import { summarizeDiagnostics } from "../../core/diagnostics.js";
import { ANSI, paint } from "../../core/text.js";
import type { BuildOutcome, Diagnostic, TestCase, TestOutcome, TestRunResult } from "../../core/types.js";

const MAX_LISTED_DIAGNOSTICS = 50;
const OUTPUT_TAIL_LINES = 30;

export function formatDuration(durationMs: number): string {
  if (durationMs < 1000) return `${Math.round(durationMs)}ms`;
  return `${(durationMs / 1000).toFixed(1)}s`;
}

function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

export function formatDiagnostic(diagnostic: Diagnostic, colorize: boolean): string {
  const location = `${diagnostic.filePath}:${diagnostic.line}${diagnostic.column !== undefined ? `:${diagnostic.column}` : ""}`;
  const color = diagnostic.severity === "error" ? ANSI.red : diagnostic.severity === "warning" ? ANSI.yellow : ANSI.cyan;
  return `${location} ${paint(diagnostic.severity, color, colorize)}: ${diagnostic.message}`;
}

export function describeDiagnosticCounts(diagnostics: readonly Diagnostic[]): string {
  const summary = summarizeDiagnostics(diagnostics);
  return `${pluralize(summary.errors, "error")}, ${pluralize(summary.warnings, "warning")}, ${pluralize(summary.notes, "note")}`;
}

export function renderDiagnosticLines(diagnostics: readonly Diagnostic[], colorize: boolean): string[] {
  const lines = diagnostics.slice(0, MAX_LISTED_DIAGNOSTICS).map((entry) => formatDiagnostic(entry, colorize));
  if (diagnostics.length > MAX_LISTED_DIAGNOSTICS) {
    lines.push(`... ${diagnostics.length - MAX_LISTED_DIAGNOSTICS} more`);
  }
  return lines;
}

function formatCase(testCase: TestCase, colorize: boolean): string {
  const mark = testCase.passed ? paint("✓", ANSI.green, colorize) : paint("✗", ANSI.red, colorize);
  const duration = testCase.duration !== undefined ? paint(` (${testCase.duration}s)`, ANSI.gray, colorize) : "";
  return `${mark} ${testCase.name}${duration}`;
}

export function describeTestTotals(result: TestRunResult): string {
  return `${result.totalPassed} passed, ${result.failedNames.length} failed`;
}

export function renderTestCaseLines(result: TestRunResult, colorize: boolean): string[] {
  return result.cases.map((testCase) => formatCase(testCase, colorize));
}

/** One entry per failing test; the failure message, when known, is indented under the name. */
export function renderFailureLines(result: TestRunResult, colorize: boolean): string[] {
  const lines: string[] = [];
  for (const name of result.failedNames) {
    lines.push(paint(name, ANSI.bold, colorize));
    const message = result.cases.find((testCase) => testCase.name === name && !testCase.passed)?.failureMessage;
    if (!message) continue;
    for (const messageLine of message.split("\n")) {
      lines.push(`    ${messageLine}`);
    }
  }
  return lines;
}

export function outputTail(output: string, maxLines: number = OUTPUT_TAIL_LINES): string {
  const lines = output.split(/\r?\n/);
  return lines.slice(-maxLines).join("\n");
}

export function buildOutcomePayload(outcome: BuildOutcome): Record<string, unknown> {
  return {
    kind: "build",
    status: outcome.status,
    command: outcome.command,
    durationMs: outcome.durationMs,
    summary: summarizeDiagnostics(outcome.diagnostics),
    diagnostics: outcome.diagnostics,
    ...(outcome.status === "failed" ? { output: outcome.output } : {})
  };
}

export function testOutcomePayload(outcome: TestOutcome): Record<string, unknown> {
  return {
    kind: "test",
    status: outcome.status,
    command: outcome.command,
    durationMs: outcome.durationMs,
    totalPassed: outcome.result.totalPassed,
    failedNames: outcome.result.failedNames,
    cases: outcome.result.cases,
    ...(outcome.status === "failed" ? { output: outcome.output } : {})
  };
}

export function writeJson(payload: unknown): void {
  process.stdout.write(`${JSON.stringify(payload, null, 2)}\n`);
}
