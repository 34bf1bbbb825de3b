import { describe, expect, it } from "vitest";

import { createWatchReporter, describeActivity, describeStateChanges } from "../src/commands/watch/reporter.js";
import { INITIAL_WATCHER_STATE } from "../src/core/terminal.js";
import type { ActivityEvent, WatcherState } from "../src/core/types.js";

const timestamp = new Date("2026-01-01T00:00:00.000Z");
const waitingInPlan: WatcherState = { isWaitingForInput: true, mode: "plan", model: null, promptVisible: false };

describe("describeStateChanges", () => {
  it("lists only the fields that changed", () => {
    expect(describeStateChanges(INITIAL_WATCHER_STATE, waitingInPlan)).toEqual(["waiting for input", "mode: Plan"]);
    expect(
      describeStateChanges(waitingInPlan, { ...waitingInPlan, isWaitingForInput: false, model: "opus", promptVisible: true })
    ).toEqual(["no longer waiting for input", "model: opus", "prompt visible"]);
    expect(describeStateChanges(waitingInPlan, waitingInPlan)).toEqual([]);
  });
});

describe("describeActivity", () => {
  it("names each activity kind", () => {
    expect(describeActivity({ timestamp, kind: { type: "fileRead", path: "a.ts" } })).toBe("read a.ts");
    expect(describeActivity({ timestamp, kind: { type: "commandRun", command: "ls" } })).toBe("run ls");
    expect(describeActivity({ timestamp, kind: { type: "agentStatus", status: "Thinking" } })).toBe("status Thinking");
  });
});

describe("createWatchReporter", () => {
  it("writes prefixed text lines for changes", () => {
    const written: string[] = [];
    const reporter = createWatchReporter({ format: "text", write: (chunk) => written.push(chunk) });

    reporter.state(waitingInPlan);
    reporter.state(waitingInPlan);
    reporter.activity({ timestamp, kind: { type: "fileRead", path: "src/a.ts" } });

    expect(written).toEqual([
      "[toolsignal] waiting for input\n",
      "[toolsignal] mode: Plan\n",
      "[toolsignal] read src/a.ts\n"
    ]);
  });

  it("writes one JSON object per line", () => {
    const written: string[] = [];
    const reporter = createWatchReporter({ format: "json", write: (chunk) => written.push(chunk), colorize: true });
    const event: ActivityEvent = { timestamp, kind: { type: "commandRun", command: "npm test" } };

    reporter.state(waitingInPlan);
    reporter.activity(event);

    expect(written.map((line) => JSON.parse(line))).toEqual([
      { type: "state", state: waitingInPlan },
      {
        type: "activity",
        timestamp: "2026-01-01T00:00:00.000Z",
        activity: { type: "commandRun", command: "npm test" }
      }
    ]);
  });
});
