import { stripAnsi, visibleLength } from "../text.js";
import type { ActivityEvent, ActivityEventKind } from "../types.js";

import { SPINNER_GLYPHS } from "./patterns.js";

const FILE_READ_PATTERNS = [
  /reading file[:\s]+(.+)/i,
  /opening file[:\s]+(.+)/i,
  /\bread[:\s]+(\S.+\.\w{1,10})\b/i
] as const;
const COMMAND_RUN_PATTERNS = [/running[:\s]+(.+)/i, /executing[:\s]+(.+)/i, /^>\s+(.+)/, /^\$\s+(.+)/] as const;
const STATUS_KEYWORDS = ["thinking", "working", "planning", "analyzing", "searching", "generating", "processing"] as const;
const STATUS_PREFIX_PATTERN = new RegExp(`^[✓✔✗✘${SPINNER_GLYPHS.join("")}]\\s+(.+)`);
const MAX_STATUS_LINE_LENGTH = 80;

function firstCapture(patterns: readonly RegExp[], line: string): string | null {
  for (const pattern of patterns) {
    const captured = pattern.exec(line)?.[1]?.trim();
    if (captured) return captured;
  }
  return null;
}

function matchAgentStatus(line: string): string | null {
  if (visibleLength(line) < MAX_STATUS_LINE_LENGTH) {
    const lower = line.toLowerCase();
    if (STATUS_KEYWORDS.some((keyword) => lower.includes(keyword))) return line;
  }
  return STATUS_PREFIX_PATTERN.exec(line)?.[1]?.trim() || null;
}

/** Classifies one cleaned terminal line. File reads beat commands, which beat status lines. */
export function classifyActivityLine(line: string): ActivityEventKind | null {
  const path = firstCapture(FILE_READ_PATTERNS, line);
  if (path) return { type: "fileRead", path };
  const command = firstCapture(COMMAND_RUN_PATTERNS, line);
  if (command) return { type: "commandRun", command };
  const status = matchAgentStatus(line);
  if (status) return { type: "agentStatus", status };
  return null;
}

export function parseActivityLine(raw: string, timestamp: Date): ActivityEvent | null {
  const line = stripAnsi(raw).trim();
  if (!line) return null;
  const kind = classifyActivityLine(line);
  return kind ? { timestamp, kind } : null;
}
