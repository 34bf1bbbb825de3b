import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { CONFIG_FILE_NAME, loadConfig, parseConfig } from "../src/core/config.js";
import { ConfigError } from "../src/core/errors.js";

const createdDirs: string[] = [];

function makeDir(config?: string): string {
  const dir = mkdtempSync(join(tmpdir(), "toolsignal-config-"));
  createdDirs.push(dir);
  if (config !== undefined) writeFileSync(join(dir, CONFIG_FILE_NAME), config);
  return dir;
}

afterEach(() => {
  for (const dir of createdDirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

describe("loadConfig", () => {
  it("returns an empty config when the file is missing", () => {
    expect(loadConfig(makeDir())).toEqual({ config: {}, configPath: null });
  });

  it("reads a valid file", () => {
    const dir = makeDir(
      JSON.stringify({
        build: { command: ["cargo", "build", "--release"], timeoutSec: 30 },
        watch: { rows: 24, pollIntervalMs: 250 }
      })
    );

    expect(loadConfig(dir)).toEqual({
      config: {
        build: { command: ["cargo", "build", "--release"], timeoutSec: 30 },
        watch: { rows: 24, pollIntervalMs: 250 }
      },
      configPath: join(dir, CONFIG_FILE_NAME)
    });
  });

  it("rejects malformed JSON", () => {
    const dir = makeDir("{ build: ");
    const configPath = join(dir, CONFIG_FILE_NAME);
    expect(() => loadConfig(dir)).toThrow(ConfigError);
    expect(() => loadConfig(dir)).toThrow(`Invalid JSON in ${configPath}.`);
  });
});

describe("parseConfig", () => {
  it("lists schema violations with their paths", () => {
    expect(() => parseConfig(JSON.stringify({ build: { command: [] } }), "cfg.json")).toThrow(
      "Invalid configuration in cfg.json: build.command: Array must contain at least 1 element(s)"
    );
  });

  it("rejects unknown keys", () => {
    expect(() => parseConfig(JSON.stringify({ lint: {} }), "cfg.json")).toThrow(ConfigError);
  });

  it("rejects out-of-range watch settings", () => {
    expect(() => parseConfig(JSON.stringify({ watch: { pollIntervalMs: 10 } }), "cfg.json")).toThrow(
      /^Invalid configuration in cfg\.json: watch\.pollIntervalMs: /
    );
  });
});
