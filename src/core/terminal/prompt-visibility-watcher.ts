import { createDeliveryChannel, type Dispatch } from "./delivery.js";
import { bottomWindowStart, type TerminalGrid } from "./grid.js";
import { isAgentPrompt } from "./patterns.js";

export const PROMPT_SCAN_ROWS = 10;
export const DEFAULT_POLL_INTERVAL_MS = 500;

export interface PromptVisibilityWatcherOptions {
  onVisibilityChanged?: ((visible: boolean) => void) | undefined;
  pollIntervalMs?: number | undefined;
  dispatch?: Dispatch | undefined;
}

export interface PromptVisibilityWatcher {
  readonly isPromptVisible: boolean;
  attach(grid: TerminalGrid): void;
  detach(): void;
  /** Runs one scan immediately; a no-op while detached. */
  poll(): void;
}

export function scanForAgentPrompt(grid: TerminalGrid): boolean {
  const start = bottomWindowStart(grid.rows, PROMPT_SCAN_ROWS);
  if (start === null) return false;
  for (let row = start; row < grid.rows; row += 1) {
    const text = grid.lineAt(row);
    if (text !== null && isAgentPrompt(text)) return true;
  }
  return false;
}

export function createPromptVisibilityWatcher(
  options: PromptVisibilityWatcherOptions = {}
): PromptVisibilityWatcher {
  const channel = createDeliveryChannel(options.dispatch);
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  let grid: TerminalGrid | null = null;
  let timer: ReturnType<typeof setInterval> | null = null;
  let visible = false;

  const poll = (): void => {
    if (!grid) return;
    const next = scanForAgentPrompt(grid);
    if (next === visible) return;
    visible = next;
    channel.post(options.onVisibilityChanged, next);
  };

  const detach = (): void => {
    if (timer) clearInterval(timer);
    timer = null;
    grid = null;
    channel.invalidate();
    visible = false;
  };

  return {
    get isPromptVisible() {
      return visible;
    },
    attach(target) {
      detach();
      grid = target;
      timer = setInterval(poll, pollIntervalMs);
    },
    detach,
    poll
  };
}
