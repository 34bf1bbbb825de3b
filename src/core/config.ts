import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { z } from "zod";

import { ConfigError } from "./errors.js";

export const CONFIG_FILE_NAME = "toolsignal.config.json";

const commandSchema = z.array(z.string().min(1)).min(1);

const runSectionSchema = z
  .object({
    command: commandSchema.optional(),
    timeoutSec: z.number().int().min(1).max(24 * 60 * 60).optional()
  })
  .strict();

const configSchema = z
  .object({
    build: runSectionSchema.optional(),
    test: runSectionSchema.optional(),
    watch: z
      .object({
        rows: z.number().int().min(5).max(500).optional(),
        pollIntervalMs: z.number().int().min(50).max(60_000).optional()
      })
      .strict()
      .optional()
  })
  .strict();

export type ToolSignalConfig = z.infer<typeof configSchema>;

export interface LoadedConfig {
  config: ToolSignalConfig;
  /** Null when the directory has no config file. */
  configPath: string | null;
}

export const DEFAULT_RUN_TIMEOUT_SEC = 10 * 60;
export const DEFAULT_WATCH_ROWS = 40;
export const DEFAULT_WATCH_POLL_INTERVAL_MS = 500;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseConfig(raw: string, configPath: string): ToolSignalConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${configPath}.`, { cause: error, details: { configPath } });
  }

  const result = configSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${configPath}: ${formatIssues(result.error)}`, {
      cause: result.error,
      details: { configPath }
    });
  }
  return result.data;
}

/** Reads `toolsignal.config.json` from the target directory; a missing file means defaults. */
export function loadConfig(targetDir: string): LoadedConfig {
  const configPath = join(targetDir, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    return { config: {}, configPath: null };
  }
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf8");
  } catch (error) {
    throw new ConfigError(`Could not read ${configPath}.`, { cause: error, details: { configPath } });
  }
  return { config: parseConfig(raw, configPath), configPath };
}
