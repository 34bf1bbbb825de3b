import type { CliOutputFormat } from "../../core/errors.js";
import { agentModeLabel } from "../../core/terminal.js";
import { ANSI, paint } from "../../core/text.js";
import type { ActivityEvent, WatcherState } from "../../core/types.js";

interface CreateWatchReporterOptions {
  format: CliOutputFormat;
  write?: ((chunk: string) => void) | undefined;
  colorize?: boolean | undefined;
}

export interface WatchReporter {
  state(next: WatcherState): void;
  activity(event: ActivityEvent): void;
}

const PREFIX = "[toolsignal]";

export function describeStateChanges(previous: WatcherState, next: WatcherState): string[] {
  const changes: string[] = [];
  if (previous.isWaitingForInput !== next.isWaitingForInput) {
    changes.push(next.isWaitingForInput ? "waiting for input" : "no longer waiting for input");
  }
  if (previous.mode !== next.mode && next.mode !== null) {
    changes.push(`mode: ${agentModeLabel(next.mode)}`);
  }
  if (previous.model !== next.model && next.model !== null) {
    changes.push(`model: ${next.model}`);
  }
  if (previous.promptVisible !== next.promptVisible) {
    changes.push(next.promptVisible ? "prompt visible" : "prompt hidden");
  }
  return changes;
}

export function describeActivity(event: ActivityEvent): string {
  const kind = event.kind;
  switch (kind.type) {
    case "fileRead":
      return `read ${kind.path}`;
    case "commandRun":
      return `run ${kind.command}`;
    case "agentStatus":
      return `status ${kind.status}`;
  }
}

/** Writes one line per session signal: plain text, or one JSON object per line. */
export function createWatchReporter(options: CreateWatchReporterOptions): WatchReporter {
  const write = options.write ?? ((chunk: string) => process.stderr.write(chunk));
  const colorize = options.format === "text" && (options.colorize ?? false);
  let previous: WatcherState = {
    isWaitingForInput: false,
    mode: null,
    model: null,
    promptVisible: false
  };

  const writeLine = (text: string, color: string): void => {
    write(`${paint(PREFIX, ANSI.gray, colorize)} ${paint(text, color, colorize)}\n`);
  };

  return {
    state(next) {
      if (options.format === "json") {
        write(`${JSON.stringify({ type: "state", state: next })}\n`);
      } else {
        for (const change of describeStateChanges(previous, next)) {
          writeLine(change, change === "waiting for input" ? ANSI.yellow : ANSI.cyan);
        }
      }
      previous = next;
    },
    activity(event) {
      if (options.format === "json") {
        write(`${JSON.stringify({ type: "activity", timestamp: event.timestamp.toISOString(), activity: event.kind })}\n`);
        return;
      }
      writeLine(describeActivity(event), ANSI.green);
    }
  };
}
