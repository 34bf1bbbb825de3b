import type { AgentMode } from "../types.js";

import { createDeliveryChannel, type Dispatch } from "./delivery.js";
import { bottomWindowStart, readBottomRows, type ObservableTerminalGrid, type TerminalGrid } from "./grid.js";
import { detectMode, detectModel } from "./patterns.js";

export const MODE_MODEL_WINDOW_ROWS = 8;

export interface ModeModelWatcherOptions {
  onModeChanged?: ((mode: AgentMode) => void) | undefined;
  onModelChanged?: ((model: string) => void) | undefined;
  dispatch?: Dispatch | undefined;
}

export interface ModeModelWatcher {
  readonly currentMode: AgentMode | null;
  readonly currentModel: string | null;
  attach(grid: ObservableTerminalGrid): void;
  detach(): void;
  /** Ignored while detached. */
  processRange(grid: TerminalGrid, startRow: number, endRow: number): void;
}

export function createModeModelWatcher(options: ModeModelWatcherOptions = {}): ModeModelWatcher {
  const channel = createDeliveryChannel(options.dispatch);
  let currentMode: AgentMode | null = null;
  let currentModel: string | null = null;
  let unsubscribe: (() => void) | null = null;

  const processRange = (grid: TerminalGrid, _startRow: number, endRow: number): void => {
    if (!unsubscribe) return;
    const windowStart = bottomWindowStart(grid.rows, MODE_MODEL_WINDOW_ROWS);
    if (windowStart === null || endRow < windowStart) return;

    // Rows are read top to bottom, so the lowest (newest) match is kept.
    let mode: AgentMode | null = null;
    let model: string | null = null;
    for (const text of readBottomRows(grid, windowStart)) {
      mode = detectMode(text) ?? mode;
      model = detectModel(text) ?? model;
    }

    if (mode !== null && mode !== currentMode) {
      currentMode = mode;
      channel.post(options.onModeChanged, mode);
    }
    if (model !== null && model !== currentModel) {
      currentModel = model;
      channel.post(options.onModelChanged, model);
    }
  };

  const detach = (): void => {
    unsubscribe?.();
    unsubscribe = null;
    channel.invalidate();
    currentMode = null;
    currentModel = null;
  };

  return {
    get currentMode() {
      return currentMode;
    },
    get currentModel() {
      return currentModel;
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
