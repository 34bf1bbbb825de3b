import { parseNonNegativeInt, parsePositiveInt, splitLines } from "../text.js";
import type { Diagnostic, DiagnosticSeverity } from "../types.js";

interface PendingHeader {
  severity: DiagnosticSeverity;
  message: string;
}

interface LocatedPattern {
  pattern: RegExp;
  hasColumn: boolean;
}

// path:line:col: severity: message  (swiftc, clang, gcc, go vet)
// path:line: severity: message
// path(line,col): severity TS1234: message  (tsc, MSBuild)
// path:line:col - severity TS1234: message  (tsc --pretty)
const SINGLE_LINE_PATTERNS: readonly LocatedPattern[] = [
  { pattern: /^(.+?):(\d+):(\d+):\s*(fatal error|error|warning|note):\s*(.+)$/, hasColumn: true },
  { pattern: /^(.+?):(\d+):\s*(fatal error|error|warning|note):\s*(.+)$/, hasColumn: false },
  { pattern: /^(.+?)\((\d+),(\d+)\):\s*(error|warning)\s+\S+:\s*(.+)$/, hasColumn: true },
  { pattern: /^(.+?):(\d+):(\d+)\s+-\s+(error|warning)\s+TS\d+:\s*(.+)$/, hasColumn: true }
];

const RUST_HEADER_PATTERN = /^(error|warning)(?:\[E\d+\])?:\s*(.+)$/;
const RUST_ARROW_PATTERN = /^\s*-->\s+(.+?):(\d+)(?::(\d+))?\s*$/;

export function normalizeSeverity(token: string): DiagnosticSeverity {
  const normalized = token.trim().toLowerCase();
  if (normalized === "warning" || normalized === "note") return normalized;
  return "error";
}

function matchSingleLine(line: string): Diagnostic | null | undefined {
  for (const entry of SINGLE_LINE_PATTERNS) {
    const match = entry.pattern.exec(line);
    if (!match) continue;
    const filePath = match[1];
    const lineNumber = parsePositiveInt(match[2]);
    const column = entry.hasColumn ? parseNonNegativeInt(match[3]) : undefined;
    const severityToken = entry.hasColumn ? match[4] : match[3];
    const message = entry.hasColumn ? match[5] : match[4];
    // A recognized line with a bad number is dropped without trying weaker forms.
    if (!filePath || lineNumber === null || column === null || !severityToken || !message) return null;
    return {
      filePath,
      line: lineNumber,
      ...(column !== undefined ? { column } : {}),
      severity: normalizeSeverity(severityToken),
      message: message.trim()
    };
  }
  return undefined;
}

function matchRustHeader(line: string): PendingHeader | null {
  const match = RUST_HEADER_PATTERN.exec(line);
  const severity = match?.[1];
  const message = match?.[2];
  if (!severity || !message) return null;
  return { severity: normalizeSeverity(severity), message: message.trim() };
}

function matchRustArrow(line: string, pending: PendingHeader): Diagnostic | null {
  const match = RUST_ARROW_PATTERN.exec(line);
  if (!match?.[1]) return null;
  const lineNumber = parsePositiveInt(match[2]);
  if (lineNumber === null) return null;
  const column = match[3] !== undefined ? parseNonNegativeInt(match[3]) : undefined;
  if (column === null) return null;
  return {
    filePath: match[1],
    line: lineNumber,
    ...(column !== undefined ? { column } : {}),
    severity: pending.severity,
    message: pending.message
  };
}

/**
 * Extracts file-located diagnostics from combined build output.
 *
 * Single pass over the lines. Rust/cargo prints the message and its location on separate lines,
 * so a header is held until the `-->` line arrives or something unrelated interrupts it.
 */
export function parseBuildDiagnostics(output: string): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  let pending: PendingHeader | null = null;

  for (const line of splitLines(output)) {
    const single = matchSingleLine(line);
    if (single !== undefined) {
      if (single) diagnostics.push(single);
      pending = null;
      continue;
    }

    const header = matchRustHeader(line);
    if (header) {
      pending = header;
      continue;
    }

    if (!pending) continue;

    const located = matchRustArrow(line, pending);
    if (located) {
      diagnostics.push(located);
      pending = null;
      continue;
    }

    const trimmed = line.trim();
    if (trimmed && !trimmed.startsWith("-->") && !trimmed.startsWith("= ")) {
      pending = null;
    }
  }

  return diagnostics;
}
