import { describe, expect, it } from "vitest";

import { runCommand, trimToTailWithinBytes, withDefaultPath } from "../src/core/runner.js";

describe("runCommand", () => {
  it("captures both streams of a successful command", async () => {
    const result = await runCommand(process.execPath, [
      "-e",
      "process.stdout.write('hello\\n'); process.stderr.write('warn\\n');"
    ]);

    expect(result).toEqual({ ok: true, exitCode: 0, stdout: "hello\n", stderr: "warn\n" });
  });

  it("reports a non-zero exit code", async () => {
    const result = await runCommand(process.execPath, ["-e", "process.exit(3)"], { timeoutMs: 5000 });

    expect(result.ok).toBe(false);
    expect(result.exitCode).toBe(3);
    expect(result.reason).toBe("exit code 3");
    expect(result.launchError).toBeUndefined();
  });

  it("kills commands that run past the timeout", async () => {
    const result = await runCommand(process.execPath, ["-e", "setInterval(() => {}, 1000);"], { timeoutMs: 250 });

    expect(result.ok).toBe(false);
    expect(result.reason).toBe("timeout after 0.25s");
  });

  it("keeps only the output tail and says so on failure", async () => {
    const result = await runCommand(
      process.execPath,
      [
        "-e",
        "const chunk='y'.repeat(2048); for (let i = 0; i < 64; i += 1) process.stderr.write(chunk); process.exit(7);"
      ],
      { timeoutMs: 5000, maxBufferBytes: 4096 }
    );

    expect(result.ok).toBe(false);
    expect(Buffer.byteLength(result.stderr, "utf8")).toBe(4096);
    expect(result.reason).toBe("exit code 7; output truncated to last 4096 bytes per stream");
  });

  it("reports a launch error instead of rejecting", async () => {
    const result = await runCommand("toolsignal-missing-binary-for-tests", [], { timeoutMs: 5000 });

    expect(result.ok).toBe(false);
    expect(result.exitCode).toBeNull();
    expect(result.launchError).toContain("ENOENT");
  });

  it("forwards output chunks as they arrive", async () => {
    const chunks: string[] = [];
    await runCommand(process.execPath, ["-e", "console.log('a'); console.error('b');"], {
      timeoutMs: 5000,
      onOutput: (stream, chunk) => chunks.push(`${stream}:${chunk}`)
    });

    expect(chunks.filter((entry) => entry.startsWith("stdout:")).join("")).toBe("stdout:a\n");
    expect(chunks.filter((entry) => entry.startsWith("stderr:")).join("")).toBe("stderr:b\n");
  });
});

describe("trimToTailWithinBytes", () => {
  it("keeps the longest tail that fits", () => {
    expect(trimToTailWithinBytes("abcdef", 3)).toBe("def");
    expect(trimToTailWithinBytes("aé", 2)).toBe("é");
    expect(trimToTailWithinBytes("short", 10)).toBe("short");
  });
});

describe("withDefaultPath", () => {
  it("fills in PATH only when it is missing", () => {
    const withPath = { PATH: "/opt/bin" };
    expect(withDefaultPath(withPath)).toBe(withPath);
    expect(withDefaultPath({ HOME: "/home/test" }).PATH).toBe("/usr/local/bin:/usr/bin:/bin:/usr/sbin:/sbin");
  });
});
