import { isAbsolute } from "node:path";

import type { Diagnostic, DiagnosticSummary } from "../types.js";

/**
 * Picks the diagnostics that point at one file, keyed by line. Later entries replace earlier
 * ones on the same line.
 */
export function filterDiagnosticsForFile(
  diagnostics: readonly Diagnostic[],
  absolutePath: string,
  relativePath: string
): Map<number, Diagnostic> {
  const byLine = new Map<number, Diagnostic>();
  for (const diagnostic of diagnostics) {
    if (!refersToFile(diagnostic.filePath, absolutePath, relativePath)) continue;
    byLine.set(diagnostic.line, diagnostic);
  }
  return byLine;
}

function refersToFile(filePath: string, absolutePath: string, relativePath: string): boolean {
  if (isAbsolute(filePath)) return filePath === absolutePath;
  return filePath === relativePath || relativePath.endsWith(`/${filePath}`);
}

export function summarizeDiagnostics(diagnostics: readonly Diagnostic[]): DiagnosticSummary {
  const summary: DiagnosticSummary = { errors: 0, warnings: 0, notes: 0 };
  for (const diagnostic of diagnostics) {
    if (diagnostic.severity === "error") summary.errors += 1;
    else if (diagnostic.severity === "warning") summary.warnings += 1;
    else summary.notes += 1;
  }
  return summary;
}
