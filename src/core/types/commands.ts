export interface RunCommandOptionsInput {
  command?: string;
  timeoutSec?: number | string;
  format?: string;
}

export type BuildCommandOptions = RunCommandOptionsInput;
export type TestCommandOptions = RunCommandOptionsInput;

export interface ParseCommandOptions {
  format?: string;
}

export interface WatchCommandOptions {
  rows?: number | string;
  pollMs?: number | string;
  format?: string;
}
