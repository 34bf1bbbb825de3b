import type { ActivityEvent, AgentMode, WatcherState } from "../types.js";

import { createActivityEventWatcher } from "./activity-event-watcher.js";
import { defaultDispatch, type Dispatch } from "./delivery.js";
import type { ObservableTerminalGrid } from "./grid.js";
import { createInputWaitWatcher } from "./input-wait-watcher.js";
import { createModeModelWatcher } from "./mode-model-watcher.js";
import { createPromptVisibilityWatcher } from "./prompt-visibility-watcher.js";

export interface SessionMonitorOptions {
  onStateChanged?: ((state: WatcherState) => void) | undefined;
  onActivity?: ((event: ActivityEvent) => void) | undefined;
  pollIntervalMs?: number | undefined;
  dispatch?: Dispatch | undefined;
  now?: (() => Date) | undefined;
}

export interface SessionMonitor {
  readonly state: WatcherState;
  attach(grid: ObservableTerminalGrid): void;
  detach(): void;
}

export const INITIAL_WATCHER_STATE: WatcherState = {
  isWaitingForInput: false,
  mode: null,
  model: null,
  promptVisible: false
};

/** Runs all four watchers against one grid and folds their signals into one snapshot. */
export function createSessionMonitor(options: SessionMonitorOptions = {}): SessionMonitor {
  const dispatch = options.dispatch ?? defaultDispatch;
  let state: WatcherState = INITIAL_WATCHER_STATE;

  const update = (patch: Partial<WatcherState>): void => {
    state = { ...state, ...patch };
    options.onStateChanged?.(state);
  };

  const inputWait = createInputWaitWatcher({
    dispatch,
    onStateChanged: (isWaitingForInput) => update({ isWaitingForInput })
  });
  const modeModel = createModeModelWatcher({
    dispatch,
    onModeChanged: (mode: AgentMode) => update({ mode }),
    onModelChanged: (model) => update({ model })
  });
  const promptVisibility = createPromptVisibilityWatcher({
    dispatch,
    pollIntervalMs: options.pollIntervalMs,
    onVisibilityChanged: (promptVisible) => update({ promptVisible })
  });
  const activity = createActivityEventWatcher({
    dispatch,
    pollIntervalMs: options.pollIntervalMs,
    now: options.now,
    onEvent: options.onActivity
  });

  const detach = (): void => {
    inputWait.detach();
    modeModel.detach();
    promptVisibility.detach();
    activity.detach();
    state = INITIAL_WATCHER_STATE;
  };

  return {
    get state() {
      return state;
    },
    attach(grid) {
      detach();
      inputWait.attach(grid);
      modeModel.attach(grid);
      promptVisibility.attach(grid);
      activity.attach(grid);
    },
    detach
  };
}
