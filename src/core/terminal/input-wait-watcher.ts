import { createDeliveryChannel, type Dispatch } from "./delivery.js";
import { bottomWindowStart, readBottomRows, type ObservableTerminalGrid, type TerminalGrid } from "./grid.js";
import { containsSpinner, isPromptLine } from "./patterns.js";

export const INPUT_WAIT_WINDOW_ROWS = 5;

export interface InputWaitWatcherOptions {
  onStateChanged?: ((waiting: boolean) => void) | undefined;
  dispatch?: Dispatch | undefined;
}

export interface InputWaitWatcher {
  readonly isWaitingForInput: boolean;
  attach(grid: ObservableTerminalGrid): void;
  detach(): void;
  /**
   * Re-evaluates after rows `startRow..endRow` changed. Ignored while detached or unless the
   * range reaches the bottom rows.
   */
  processRange(grid: TerminalGrid, startRow: number, endRow: number): void;
}

/**
 * Tracks whether an interactive program is blocked on a question. Prompts are drawn at the
 * cursor, so only the bottom rows are read, and a visible spinner means the program is still busy.
 */
export function createInputWaitWatcher(options: InputWaitWatcherOptions = {}): InputWaitWatcher {
  const channel = createDeliveryChannel(options.dispatch);
  let waiting = false;
  let unsubscribe: (() => void) | null = null;

  const processRange = (grid: TerminalGrid, _startRow: number, endRow: number): void => {
    if (!unsubscribe) return;
    const windowStart = bottomWindowStart(grid.rows, INPUT_WAIT_WINDOW_ROWS);
    if (windowStart === null || endRow < windowStart) return;

    let promptFound = false;
    let spinnerFound = false;
    for (const text of readBottomRows(grid, windowStart)) {
      if (!promptFound && isPromptLine(text)) promptFound = true;
      if (!spinnerFound && containsSpinner(text)) spinnerFound = true;
    }

    const next = promptFound && !spinnerFound;
    if (next === waiting) return;
    waiting = next;
    channel.post(options.onStateChanged, next);
  };

  const detach = (): void => {
    unsubscribe?.();
    unsubscribe = null;
    channel.invalidate();
    // A dropped post never reached the consumer, so the next attach starts from scratch.
    waiting = false;
  };

  return {
    get isWaitingForInput() {
      return waiting;
    },
    attach(grid) {
      detach();
      unsubscribe = grid.onRangeChanged((startRow, endRow) => {
        processRange(grid, startRow, endRow);
      });
    },
    detach,
    processRange
  };
}
