export type { ObservableTerminalGrid, RangeChangedListener, TerminalGrid } from "./terminal/grid.js";
export { createDeliveryChannel, defaultDispatch } from "./terminal/delivery.js";
export type { DeliveryChannel, Dispatch } from "./terminal/delivery.js";
export { scanChangedRows } from "./terminal/buffer-scanner.js";
export type { RowChange, RowScan } from "./terminal/buffer-scanner.js";
export { containsSpinner, detectMode, detectModel, isAgentPrompt, isPromptLine, SPINNER_GLYPHS } from "./terminal/patterns.js";
export { classifyActivityLine, parseActivityLine } from "./terminal/activity.js";
export { AGENT_MODES, agentModeCommand, agentModeLabel, isAgentMode, nextAgentMode } from "./terminal/agent-mode.js";
export { createInputWaitWatcher, INPUT_WAIT_WINDOW_ROWS } from "./terminal/input-wait-watcher.js";
export type { InputWaitWatcher, InputWaitWatcherOptions } from "./terminal/input-wait-watcher.js";
export { createModeModelWatcher, MODE_MODEL_WINDOW_ROWS } from "./terminal/mode-model-watcher.js";
export type { ModeModelWatcher, ModeModelWatcherOptions } from "./terminal/mode-model-watcher.js";
export {
  createPromptVisibilityWatcher,
  DEFAULT_POLL_INTERVAL_MS,
  PROMPT_SCAN_ROWS,
  scanForAgentPrompt
} from "./terminal/prompt-visibility-watcher.js";
export type { PromptVisibilityWatcher, PromptVisibilityWatcherOptions } from "./terminal/prompt-visibility-watcher.js";
export { createActivityEventWatcher } from "./terminal/activity-event-watcher.js";
export type { ActivityEventWatcher, ActivityEventWatcherOptions } from "./terminal/activity-event-watcher.js";
export { createSessionMonitor, INITIAL_WATCHER_STATE } from "./terminal/session-monitor.js";
export type { SessionMonitor, SessionMonitorOptions } from "./terminal/session-monitor.js";
export { createLineGrid } from "./terminal/line-grid.js";
export type { LineGrid, LineGridOptions } from "./terminal/line-grid.js";
