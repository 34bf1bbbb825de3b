import { existsSync, statSync } from "node:fs";
import { resolve } from "node:path";

import {
  DEFAULT_RUN_TIMEOUT_SEC,
  DEFAULT_WATCH_POLL_INTERVAL_MS,
  DEFAULT_WATCH_ROWS,
  loadConfig,
  type ToolSignalConfig
} from "../../core/config.js";
import { normalizeOutputFormat, UserInputError, type CliOutputFormat } from "../../core/errors.js";
import { detectBuildCommand, detectTestCommand, resolveShellInvocation } from "../../core/runner.js";
import { parsePositiveInt } from "../../core/text.js";
import type { RunCommandOptionsInput, WatchCommandOptions } from "../../core/types.js";

export type RunKind = "build" | "test";
export type CommandSource = "flag" | "config" | "detected";

export interface PreparedRunWorkflow {
  kind: RunKind;
  targetDir: string;
  command: string[];
  commandLabel: string;
  commandSource: CommandSource;
  timeoutMs: number;
  format: CliOutputFormat;
}

export interface PreparedWatchWorkflow {
  command: string[];
  rows: number;
  pollIntervalMs: number;
  format: CliOutputFormat;
}

const MAX_TIMEOUT_SEC = 24 * 60 * 60;
const MIN_WATCH_ROWS = 5;
const MAX_WATCH_ROWS = 500;
const MIN_POLL_INTERVAL_MS = 50;
const MAX_POLL_INTERVAL_MS = 60_000;

function parseIntegerFlag(
  value: number | string | undefined,
  flag: string,
  min: number,
  max: number
): number | undefined {
  if (value === undefined) return undefined;
  const parsed = typeof value === "number" ? (Number.isSafeInteger(value) ? value : null) : parsePositiveInt(value.trim());
  if (parsed === null || parsed < min || parsed > max) {
    throw new UserInputError(`Invalid ${flag} value "${String(value)}". Expected an integer between ${min} and ${max}.`);
  }
  return parsed;
}

export function resolveTargetDir(pathArg: string | undefined): string {
  const targetDir = resolve(process.cwd(), pathArg ?? ".");
  if (!existsSync(targetDir) || !statSync(targetDir).isDirectory()) {
    throw new UserInputError(`Target path is not a directory: ${targetDir}`);
  }
  return targetDir;
}

function resolveCommand(
  kind: RunKind,
  targetDir: string,
  flagCommand: string | undefined,
  config: ToolSignalConfig
): { command: string[]; label: string; source: CommandSource } {
  const trimmed = flagCommand?.trim();
  if (trimmed) {
    const shell = resolveShellInvocation(trimmed);
    return { command: [shell.executable, ...shell.args], label: trimmed, source: "flag" };
  }

  const configured = config[kind]?.command;
  if (configured) {
    return { command: [...configured], label: configured.join(" "), source: "config" };
  }

  const detected = kind === "build" ? detectBuildCommand(targetDir) : detectTestCommand(targetDir);
  if (!detected) {
    throw new UserInputError(
      `No ${kind} system detected in ${targetDir}. Pass --command or set ${kind}.command in toolsignal.config.json.`
    );
  }
  return { command: detected, label: detected.join(" "), source: "detected" };
}

/** Flags override the config file, which overrides detection and defaults. */
export function prepareRunWorkflow(
  kind: RunKind,
  pathArg: string | undefined,
  options: RunCommandOptionsInput
): PreparedRunWorkflow {
  const format = normalizeOutputFormat(options.format);
  const targetDir = resolveTargetDir(pathArg);
  const { config } = loadConfig(targetDir);
  const resolved = resolveCommand(kind, targetDir, options.command, config);
  const timeoutSec =
    parseIntegerFlag(options.timeoutSec, "--timeout-sec", 1, MAX_TIMEOUT_SEC) ??
    config[kind]?.timeoutSec ??
    DEFAULT_RUN_TIMEOUT_SEC;

  return {
    kind,
    targetDir,
    command: resolved.command,
    commandLabel: resolved.label,
    commandSource: resolved.source,
    timeoutMs: timeoutSec * 1000,
    format
  };
}

export function prepareWatchWorkflow(commandArgs: readonly string[], options: WatchCommandOptions): PreparedWatchWorkflow {
  const format = normalizeOutputFormat(options.format);
  if (!commandArgs.length || !commandArgs[0]?.trim()) {
    throw new UserInputError("Missing command to watch. Usage: toolsignal watch -- <command> [args...]");
  }
  const { config } = loadConfig(process.cwd());

  return {
    command: [...commandArgs],
    rows:
      parseIntegerFlag(options.rows, "--rows", MIN_WATCH_ROWS, MAX_WATCH_ROWS) ?? config.watch?.rows ?? DEFAULT_WATCH_ROWS,
    pollIntervalMs:
      parseIntegerFlag(options.pollMs, "--poll-ms", MIN_POLL_INTERVAL_MS, MAX_POLL_INTERVAL_MS) ??
      config.watch?.pollIntervalMs ??
      DEFAULT_WATCH_POLL_INTERVAL_MS,
    format
  };
}
