import type { ActivityEvent } from "../types.js";

import { parseActivityLine } from "./activity.js";
import { scanChangedRows } from "./buffer-scanner.js";
import { createDeliveryChannel, type Dispatch } from "./delivery.js";
import type { TerminalGrid } from "./grid.js";
import { DEFAULT_POLL_INTERVAL_MS } from "./prompt-visibility-watcher.js";

export interface ActivityEventWatcherOptions {
  onEvent?: ((event: ActivityEvent) => void) | undefined;
  pollIntervalMs?: number | undefined;
  dispatch?: Dispatch | undefined;
  now?: (() => Date) | undefined;
}

export interface ActivityEventWatcher {
  attach(grid: TerminalGrid): void;
  detach(): void;
  poll(): void;
}

/** Polls the whole grid and turns each newly changed row into at most one activity event. */
export function createActivityEventWatcher(options: ActivityEventWatcherOptions = {}): ActivityEventWatcher {
  const channel = createDeliveryChannel(options.dispatch);
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const now = options.now ?? (() => new Date());
  let grid: TerminalGrid | null = null;
  let timer: ReturnType<typeof setInterval> | null = null;
  let rowCache: ReadonlyMap<number, string> = new Map();

  const poll = (): void => {
    if (!grid) return;
    const scan = scanChangedRows(grid, rowCache);
    rowCache = scan.next;
    if (!scan.changed.length) return;

    const detectedAt = now();
    for (const change of scan.changed) {
      const event = parseActivityLine(change.text, detectedAt);
      if (event) channel.post(options.onEvent, event);
    }
  };

  const detach = (): void => {
    if (timer) clearInterval(timer);
    timer = null;
    grid = null;
    rowCache = new Map();
    channel.invalidate();
  };

  return {
    attach(target) {
      detach();
      grid = target;
      timer = setInterval(poll, pollIntervalMs);
    },
    detach,
    poll
  };
}
