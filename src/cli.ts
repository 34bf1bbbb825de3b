#!/usr/bin/env node
import { readFileSync } from "node:fs";

import { log } from "@clack/prompts";
import { Command } from "commander";
import { z } from "zod";

import { runBuild } from "./commands/build.js";
import { runParse } from "./commands/parse.js";
import { runTest } from "./commands/test.js";
import { runWatch } from "./commands/watch.js";
import { isCommanderInfoExit, normalizeError, resolveOutputFormatFromArgv, toJsonErrorPayload } from "./core/errors.js";
import type {
  BuildCommandOptions,
  ParseCommandOptions,
  TestCommandOptions,
  WatchCommandOptions
} from "./core/types.js";

const packageManifestSchema = z.object({ version: z.string() });

function readCliVersion(): string {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf8");
  return packageManifestSchema.parse(JSON.parse(raw)).version;
}

const program = new Command();

// Parse errors are thrown back to main() and reported once, in the requested format.
program
  .name("toolsignal")
  .description("Turn build, test, and interactive terminal output into structured signals.")
  .version(readCliVersion())
  .exitOverride()
  .configureOutput({ outputError: () => undefined });

program
  .command("build")
  .description("Detect and run the project's build, then report file diagnostics.")
  .argument("[path]", "Project directory (defaults to current working directory)")
  .option("--command <cmd>", "Build command to run instead of the detected one")
  .option("--timeout-sec <seconds>", "Build timeout in seconds (default: 600)")
  .option("--format <format>", "text | json", "text")
  .action(async (pathArg: string | undefined, options: BuildCommandOptions) => {
    await runBuild(pathArg, options);
  });

program
  .command("test")
  .description("Detect and run the project's tests, then report per-case results.")
  .argument("[path]", "Project directory (defaults to current working directory)")
  .option("--command <cmd>", "Test command to run instead of the detected one")
  .option("--timeout-sec <seconds>", "Test timeout in seconds (default: 600)")
  .option("--format <format>", "text | json", "text")
  .action(async (pathArg: string | undefined, options: TestCommandOptions) => {
    await runTest(pathArg, options);
  });

program
  .command("parse")
  .description("Parse a captured build or test log without running anything.")
  .argument("<kind>", "build | test")
  .argument("[file]", "Log file to parse (reads stdin when omitted)")
  .option("--format <format>", "text | json", "text")
  .action(async (kind: string, file: string | undefined, options: ParseCommandOptions) => {
    await runParse(kind, file, options);
  });

program
  .command("watch")
  .description("Run an interactive command and report input waits, mode, model, and activity.")
  .argument("<command...>", "Command and arguments to run (put them after --)")
  .option("--rows <count>", "Rows kept in the line grid (default: 40)")
  .option("--poll-ms <ms>", "Poll interval for prompt and activity detection (default: 500)")
  .option("--format <format>", "text | json", "text")
  .action(async (commandArgs: string[], options: WatchCommandOptions) => {
    await runWatch(commandArgs, options);
  });

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (isCommanderInfoExit(error)) return;
    const normalized = normalizeError(error);
    if (resolveOutputFormatFromArgv(process.argv.slice(2)) === "json") {
      process.stdout.write(`${JSON.stringify(toJsonErrorPayload(normalized), null, 2)}\n`);
    } else {
      log.error(normalized.message);
    }
    process.exitCode = normalized.exitCode;
  }
}

void main();
