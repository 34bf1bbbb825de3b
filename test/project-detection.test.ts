import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { detectBuildCommand, detectTestCommand, resolveShellInvocation } from "../src/core/runner.js";

function withProject(markers: string[], run: (dir: string) => void): void {
  const dir = mkdtempSync(join(tmpdir(), "toolsignal-detect-"));
  try {
    for (const marker of markers) writeFileSync(join(dir, marker), "");
    run(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

describe("project detection", () => {
  it("returns null without a known marker file", () => {
    withProject([], (dir) => {
      expect(detectBuildCommand(dir)).toBeNull();
      expect(detectTestCommand(dir)).toBeNull();
    });
  });

  it("detects swift packages first", () => {
    withProject(["Package.swift", "package.json"], (dir) => {
      expect(detectBuildCommand(dir)).toEqual(["swift", "build"]);
      expect(detectTestCommand(dir)).toEqual(["swift", "test"]);
    });
  });

  it("detects npm projects ahead of cargo", () => {
    withProject(["package.json", "Cargo.toml"], (dir) => {
      expect(detectBuildCommand(dir)).toEqual(["npm", "run", "build"]);
      expect(detectTestCommand(dir)).toEqual(["npm", "test", "--", "--passWithNoTests"]);
    });
  });

  it("detects cargo and go projects", () => {
    withProject(["Cargo.toml"], (dir) => {
      expect(detectBuildCommand(dir)).toEqual(["cargo", "build"]);
      expect(detectTestCommand(dir)).toEqual(["cargo", "test"]);
    });
    withProject(["go.mod"], (dir) => {
      expect(detectBuildCommand(dir)).toBeNull();
      expect(detectTestCommand(dir)).toEqual(["go", "test", "./..."]);
    });
  });

  it("detects pytest and make", () => {
    withProject(["pyproject.toml"], (dir) => {
      expect(detectTestCommand(dir)).toEqual(["python", "-m", "pytest", "--tb=short", "-q"]);
    });
    withProject(["GNUmakefile"], (dir) => {
      expect(detectBuildCommand(dir)).toEqual(["make"]);
      expect(detectTestCommand(dir)).toEqual(["make", "test"]);
    });
  });
});

describe("resolveShellInvocation", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it.skipIf(process.platform === "win32")("runs through the login shell", () => {
    vi.stubEnv("SHELL", "/bin/bash");
    expect(resolveShellInvocation("echo hi")).toEqual({ executable: "/bin/bash", args: ["-lc", "echo hi"] });

    vi.stubEnv("SHELL", " ");
    expect(resolveShellInvocation("echo hi").executable).toBe("sh");
  });
});
