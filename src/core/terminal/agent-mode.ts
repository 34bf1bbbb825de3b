import type { AgentMode } from "../types.js";

export const AGENT_MODES: readonly AgentMode[] = ["interactive", "plan", "autopilot"];

const AGENT_MODE_LABELS: Record<AgentMode, string> = {
  interactive: "Interactive",
  plan: "Plan",
  autopilot: "Autopilot"
};

export function nextAgentMode(mode: AgentMode): AgentMode {
  const index = AGENT_MODES.indexOf(mode);
  return AGENT_MODES[(index + 1) % AGENT_MODES.length] ?? "interactive";
}

export function agentModeLabel(mode: AgentMode): string {
  return AGENT_MODE_LABELS[mode];
}

/** Text typed into the agent session to switch to `mode`. */
export function agentModeCommand(mode: AgentMode): string {
  return `/agent ${mode}\n`;
}

export function isAgentMode(value: string): value is AgentMode {
  return AGENT_MODES.some((mode) => mode === value);
}
