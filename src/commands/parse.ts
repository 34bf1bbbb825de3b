import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import { log } from "@clack/prompts";

import { parseBuildDiagnostics, summarizeDiagnostics } from "../core/diagnostics.js";
import { normalizeOutputFormat, UserInputError } from "../core/errors.js";
import { parseTestResults } from "../core/test-results.js";
import { defaultColorize } from "../core/text.js";
import type { ParseCommandOptions } from "../core/types.js";

import {
  describeDiagnosticCounts,
  describeTestTotals,
  renderDiagnosticLines,
  renderFailureLines,
  renderTestCaseLines,
  writeJson
} from "./shared/report.js";

export type ParseKind = "build" | "test";

export interface ParseInputSource {
  readFile(path: string): Promise<string>;
  readStdin(): Promise<string>;
}

async function readAllStdin(): Promise<string> {
  process.stdin.setEncoding("utf8");
  let text = "";
  for await (const chunk of process.stdin) {
    text += String(chunk);
  }
  return text;
}

const defaultInputSource: ParseInputSource = {
  readFile: (path) => readFile(path, "utf8"),
  readStdin: readAllStdin
};

function normalizeParseKind(value: string): ParseKind {
  const normalized = value.trim().toLowerCase();
  if (normalized === "build" || normalized === "test") return normalized;
  throw new UserInputError(`Invalid parse kind "${value}". Expected "build" or "test".`);
}

async function readInput(file: string | undefined, source: ParseInputSource): Promise<string> {
  if (!file || file === "-") return source.readStdin();
  const path = resolve(process.cwd(), file);
  try {
    return await source.readFile(path);
  } catch (error) {
    throw new UserInputError(`Could not read log file: ${path}`, { cause: error });
  }
}

/** Parses a captured log without running anything. Exits 1 when it holds errors or failing tests. */
export async function runParse(
  kindArg: string,
  file: string | undefined,
  options: ParseCommandOptions,
  source: ParseInputSource = defaultInputSource
): Promise<void> {
  const kind = normalizeParseKind(kindArg);
  const format = normalizeOutputFormat(options.format);
  const output = await readInput(file, source);
  const colorize = format === "text" && defaultColorize();

  if (kind === "build") {
    const diagnostics = parseBuildDiagnostics(output);
    const summary = summarizeDiagnostics(diagnostics);
    if (format === "json") {
      writeJson({ kind, summary, diagnostics });
    } else if (!diagnostics.length) {
      log.info("No diagnostics found.");
    } else {
      log.info(`Found ${describeDiagnosticCounts(diagnostics)}.`);
      log.message(renderDiagnosticLines(diagnostics, colorize).join("\n"));
    }
    if (summary.errors > 0) process.exitCode = 1;
    return;
  }

  const result = parseTestResults(output);
  if (format === "json") {
    writeJson({ kind, ...result });
  } else {
    const report = result.failedNames.length ? log.warn : log.info;
    report(`Parsed test output: ${describeTestTotals(result)}.`);
    const lines = result.failedNames.length ? renderFailureLines(result, colorize) : renderTestCaseLines(result, colorize);
    if (lines.length) log.message(lines.join("\n"));
  }
  if (result.failedNames.length) process.exitCode = 1;
}
