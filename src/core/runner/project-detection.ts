import { existsSync } from "node:fs";
import { join } from "node:path";

interface CommandRule {
  markers: readonly string[];
  command: readonly string[];
}

const MAKEFILE_MARKERS = ["Makefile", "makefile", "GNUmakefile"] as const;

// First rule whose marker file exists wins.
const BUILD_COMMAND_RULES: readonly CommandRule[] = [
  { markers: ["Package.swift"], command: ["swift", "build"] },
  { markers: ["package.json"], command: ["npm", "run", "build"] },
  { markers: ["Cargo.toml"], command: ["cargo", "build"] },
  { markers: MAKEFILE_MARKERS, command: ["make"] }
];

const TEST_COMMAND_RULES: readonly CommandRule[] = [
  { markers: ["Package.swift"], command: ["swift", "test"] },
  // --passWithNoTests keeps projects without tests from failing.
  { markers: ["package.json"], command: ["npm", "test", "--", "--passWithNoTests"] },
  { markers: ["Cargo.toml"], command: ["cargo", "test"] },
  { markers: ["go.mod"], command: ["go", "test", "./..."] },
  { markers: ["pytest.ini", "pyproject.toml", "setup.py"], command: ["python", "-m", "pytest", "--tb=short", "-q"] },
  { markers: MAKEFILE_MARKERS, command: ["make", "test"] }
];

function detectCommand(rootDir: string, rules: readonly CommandRule[]): string[] | null {
  for (const rule of rules) {
    if (rule.markers.some((marker) => existsSync(join(rootDir, marker)))) {
      return [...rule.command];
    }
  }
  return null;
}

export function detectBuildCommand(rootDir: string): string[] | null {
  return detectCommand(rootDir, BUILD_COMMAND_RULES);
}

export function detectTestCommand(rootDir: string): string[] | null {
  return detectCommand(rootDir, TEST_COMMAND_RULES);
}

export interface ShellInvocation {
  executable: string;
  args: string[];
}

/** Wraps a free-form command line for the platform shell. */
export function resolveShellInvocation(command: string): ShellInvocation {
  if (process.platform === "win32") {
    return {
      executable: process.env["COMSPEC"] ?? "cmd.exe",
      args: ["/d", "/s", "/c", command]
    };
  }
  return {
    executable: process.env.SHELL?.trim() || "sh",
    args: ["-lc", command]
  };
}
