import { spawn } from "node:child_process";

import { log } from "@clack/prompts";

import { ExecutionError } from "../core/errors.js";
import { withDefaultPath } from "../core/runner.js";
import { createLineGrid, createSessionMonitor } from "../core/terminal.js";
import { defaultColorize } from "../core/text.js";
import type { WatchCommandOptions } from "../core/types.js";

import { createWatchReporter } from "./watch/reporter.js";
import { prepareWatchWorkflow } from "./shared/workflow-setup.js";

/**
 * Runs an interactive program with piped stdio and reports its session state while it runs.
 * The program's own output is passed through unchanged; reports go to stderr.
 */
export async function runWatch(
  commandArgs: string[],
  options: WatchCommandOptions,
  input: NodeJS.ReadableStream = process.stdin
): Promise<void> {
  const workflow = prepareWatchWorkflow(commandArgs, options);
  const [executable, ...args] = workflow.command;
  if (!executable) return;

  const grid = createLineGrid({ rows: workflow.rows });
  const reporter = createWatchReporter({
    format: workflow.format,
    colorize: Boolean(process.stderr.isTTY) && defaultColorize()
  });
  const monitor = createSessionMonitor({
    pollIntervalMs: workflow.pollIntervalMs,
    onStateChanged: (state) => reporter.state(state),
    onActivity: (event) => reporter.activity(event)
  });

  if (workflow.format === "text") {
    log.info(`Watching ${workflow.command.join(" ")} (${workflow.rows} rows, ${workflow.pollIntervalMs}ms poll).`);
  }

  const exitCode = await new Promise<number>((resolveExit, rejectExit) => {
    const child = spawn(executable, args, {
      env: withDefaultPath(process.env),
      stdio: ["pipe", "pipe", "pipe"]
    });
    monitor.attach(grid);

    const forward = (target: NodeJS.WriteStream) => (chunk: string) => {
      target.write(chunk);
      grid.write(chunk);
    };

    child.stdout?.setEncoding("utf8");
    child.stdout?.on("data", forward(process.stdout));
    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", forward(process.stderr));

    if (child.stdin) {
      input.pipe(child.stdin);
      child.stdin.on("error", () => {
        // EPIPE once the program exits; its close event reports the outcome.
        input.unpipe();
      });
    }

    const finish = (): void => {
      monitor.detach();
      if (child.stdin) input.unpipe(child.stdin);
      input.pause();
    };

    child.on("error", (error) => {
      finish();
      rejectExit(new ExecutionError(`Could not start ${executable}: ${error.message}`, { cause: error }));
    });

    child.on("close", (code, signal) => {
      finish();
      resolveExit(code ?? (signal ? 1 : 0));
    });
  });

  if (workflow.format === "text") {
    if (exitCode === 0) log.success("Watched command exited cleanly.");
    else log.warn(`Watched command exited with code ${exitCode}.`);
  }
  if (exitCode !== 0) process.exitCode = exitCode;
}
