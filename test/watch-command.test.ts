import { PassThrough } from "node:stream";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { runWatch } from "../src/commands/watch.js";
import { ExecutionError } from "../src/core/errors.js";

const mocks = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  success: vi.fn(),
  error: vi.fn(),
  message: vi.fn()
}));

vi.mock("@clack/prompts", () => ({
  log: mocks
}));

const PROMPT_SCRIPT = "process.stdout.write('? Continue [y/n]'); setTimeout(() => process.exit(3), 300);";

let stdoutChunks: string[] = [];
let stderrChunks: string[] = [];

function reportLines(): string[] {
  return stderrChunks
    .join("")
    .split("\n")
    .filter((line) => line.startsWith("[toolsignal]") || line.startsWith("{"));
}

beforeEach(() => {
  stdoutChunks = [];
  stderrChunks = [];
  vi.stubEnv("NO_COLOR", "1");
  vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
    stdoutChunks.push(String(chunk));
    return true;
  });
  vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
    stderrChunks.push(String(chunk));
    return true;
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  for (const mock of Object.values(mocks)) mock.mockReset();
  process.exitCode = undefined;
});

describe("watch command", () => {
  it("passes output through, reports the input wait and keeps the exit code", async () => {
    await runWatch([process.execPath, "-e", PROMPT_SCRIPT], { pollMs: 50 }, new PassThrough());

    expect(stdoutChunks.join("")).toBe("? Continue [y/n]");
    expect(reportLines()).toEqual(["[toolsignal] waiting for input"]);
    expect(mocks.warn).toHaveBeenCalledWith("Watched command exited with code 3.");
    expect(process.exitCode).toBe(3);
  });

  it("writes state changes as JSON lines", async () => {
    const script = "process.stdout.write('Using model: gpt-4o\\n'); setTimeout(() => process.exit(0), 300);";
    await runWatch([process.execPath, "-e", script], { pollMs: 50, format: "json" }, new PassThrough());

    expect(reportLines()).toEqual([
      JSON.stringify({
        type: "state",
        state: { isWaitingForInput: false, mode: null, model: "gpt-4o", promptVisible: false }
      })
    ]);
    expect(mocks.info).not.toHaveBeenCalled();
    expect(mocks.success).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });

  it("rejects with an execution error when the program cannot start", async () => {
    const run = runWatch(["toolsignal-missing-binary"], {}, new PassThrough());

    await expect(run).rejects.toBeInstanceOf(ExecutionError);
    await expect(run).rejects.toThrow("Could not start toolsignal-missing-binary");
  });
});
