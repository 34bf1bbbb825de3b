import type { AgentMode } from "../types.js";

export const SPINNER_GLYPHS = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"] as const;

const CONFIRMATION_SUFFIXES = ["[y/n]", "(y/n)", "(yes/no)", "[yes/no]", "press enter", "press any key"] as const;

const MODE_ALIASES: ReadonlyArray<readonly [token: string, mode: AgentMode]> = [
  ["interactive", "interactive"],
  ["ask", "interactive"],
  ["plan", "plan"],
  ["autopilot", "autopilot"],
  ["agent", "autopilot"]
];

// Longest first, so "using model: " wins over "model: ".
const MODEL_PREFIXES = ["using model: ", "using model:", "model: ", "model:"] as const;
const MODEL_EDGE_PATTERN = /^[.,;)>]+|[.,;)>]+$/g;

/** Inquirer-style questions and confirmation hints such as `[Y/n]` or `press enter`. */
export function isPromptLine(text: string): boolean {
  const stripped = text.trim();
  if (stripped.startsWith("? ")) return true;
  const lower = stripped.toLowerCase();
  return CONFIRMATION_SUFFIXES.some((suffix) => lower.endsWith(suffix) || lower.includes(` ${suffix}`));
}

export function containsSpinner(text: string): boolean {
  return SPINNER_GLYPHS.some((glyph) => text.includes(glyph));
}

/** Agent input prompt: a bare `>` or `> ` followed by typed text. */
export function isAgentPrompt(text: string): boolean {
  const trimmed = text.trim();
  return trimmed === ">" || trimmed.startsWith("> ");
}

export function detectMode(text: string): AgentMode | null {
  const lower = text.toLowerCase();
  for (const [token, mode] of MODE_ALIASES) {
    if (lower.includes(`(${token})`) || lower.includes(`[${token}]`)) return mode;
  }
  for (const [token, mode] of MODE_ALIASES) {
    if (lower.includes(`mode: ${token}`) || lower.includes(`mode:${token}`)) return mode;
  }
  for (const [token, mode] of MODE_ALIASES) {
    if (lower.includes(`switched to ${token}`)) return mode;
  }
  return null;
}

export function detectModel(text: string): string | null {
  const lower = text.toLowerCase();
  for (const prefix of MODEL_PREFIXES) {
    const index = lower.indexOf(prefix);
    if (index === -1) continue;
    const rest = text.slice(index + prefix.length).trim();
    const token = rest.split(/\s+/)[0] ?? "";
    const model = token.replace(MODEL_EDGE_PATTERN, "");
    if (model) return model;
  }
  return null;
}
