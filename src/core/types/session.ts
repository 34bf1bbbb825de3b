export type AgentMode = "interactive" | "plan" | "autopilot";

export interface WatcherState {
  isWaitingForInput: boolean;
  mode: AgentMode | null;
  model: string | null;
  promptVisible: boolean;
}
