import { spawn } from "node:child_process";

import type { CommandResult } from "../types.js";

export type OutputStream = "stdout" | "stderr";

export interface RunCommandOptions {
  cwd?: string | undefined;
  maxBufferBytes?: number | undefined;
  timeoutMs?: number | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  onOutput?: ((stream: OutputStream, chunk: string) => void) | undefined;
}

const DEFAULT_MAX_BUFFER_BYTES = 10 * 1024 * 1024;
export const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;
const FALLBACK_PATH = "/usr/local/bin:/usr/bin:/bin:/usr/sbin:/sbin";

export function trimToTailWithinBytes(value: string, maxBytes: number): string {
  if (Buffer.byteLength(value, "utf8") <= maxBytes) return value;
  let low = 0;
  let high = value.length;

  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    const sliced = value.slice(mid);
    if (Buffer.byteLength(sliced, "utf8") > maxBytes) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  return value.slice(low);
}

export function withDefaultPath(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  if (env.PATH) return env;
  return { ...env, PATH: FALLBACK_PATH };
}

interface StreamCapture {
  text: string;
  truncated: boolean;
}

function closeReason(code: number | null, signal: NodeJS.Signals | null): string {
  if (code === null && signal) return `killed by ${signal}`;
  return `exit code ${code ?? "unknown"}`;
}

/**
 * Runs a command to completion and keeps the tail of each stream. Never rejects: launch
 * failures come back as `launchError`, timeouts and non-zero exits as `reason`.
 */
export function runCommand(command: string, args: string[], options: RunCommandOptions = {}): Promise<CommandResult> {
  const maxBufferBytes = options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return new Promise((resolveResult) => {
    const captured: Record<OutputStream, StreamCapture> = {
      stdout: { text: "", truncated: false },
      stderr: { text: "", truncated: false }
    };
    let done = false;
    let timedOut = false;

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: withDefaultPath(options.env ?? process.env),
      stdio: ["ignore", "pipe", "pipe"]
    });

    const timeoutHandle = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, timeoutMs);

    const finish = (exitCode: number | null, failure?: { reason: string; launchError?: string }): void => {
      if (done) return;
      done = true;
      clearTimeout(timeoutHandle);
      const result: CommandResult = {
        ok: failure === undefined,
        exitCode,
        stdout: captured.stdout.text,
        stderr: captured.stderr.text
      };
      if (failure) {
        const truncated = captured.stdout.truncated || captured.stderr.truncated;
        result.reason = truncated
          ? `${failure.reason}; output truncated to last ${maxBufferBytes} bytes per stream`
          : failure.reason;
        if (failure.launchError !== undefined) result.launchError = failure.launchError;
      }
      resolveResult(result);
    };

    for (const name of ["stdout", "stderr"] as const) {
      const stream = child[name];
      if (!stream) continue;
      stream.setEncoding("utf8");
      stream.on("data", (chunk: string) => {
        options.onOutput?.(name, chunk);
        const capture = captured[name];
        const combined = capture.text + chunk;
        capture.text = trimToTailWithinBytes(combined, maxBufferBytes);
        capture.truncated ||= capture.text.length < combined.length;
      });
    }

    child.on("error", (error) => {
      finish(null, { reason: error.message, launchError: error.message });
    });

    child.on("close", (code, signal) => {
      if (timedOut) {
        finish(code, { reason: `timeout after ${timeoutMs / 1000}s` });
      } else if (code !== 0) {
        finish(code, { reason: closeReason(code, signal) });
      } else {
        finish(0);
      }
    });
  });
}
