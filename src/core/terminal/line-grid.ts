import { stripAnsi } from "../text.js";

import type { ObservableTerminalGrid, RangeChangedListener } from "./grid.js";

export interface LineGridOptions {
  rows: number;
}

export interface LineGrid extends ObservableTerminalGrid {
  /** Feeds raw program output; escape sequences are dropped. */
  write(chunk: string): void;
  /** Visible rows, top to bottom. */
  snapshot(): string[];
  clear(): void;
}

const MAX_PENDING_ESCAPE_LENGTH = 64;
const CONTROL_CHAR_PATTERN = /[\u0000-\u0007\u000B\u000C\u000E-\u001F\u007F]/g;

function splitPendingEscape(text: string): { body: string; pending: string } {
  const lastEscape = text.lastIndexOf("\u001B");
  if (lastEscape === -1) return { body: text, pending: "" };
  const tail = text.slice(lastEscape);
  if (tail.length > MAX_PENDING_ESCAPE_LENGTH || !stripAnsi(tail).startsWith("\u001B")) {
    return { body: text, pending: "" };
  }
  return { body: text.slice(0, lastEscape), pending: tail };
}

/**
 * Bottom-anchored row buffer for line-oriented output: the last row always holds the line being
 * written. Carriage return restarts the current line, so spinners redraw in place.
 */
export function createLineGrid(options: LineGridOptions): LineGrid {
  const rows = Math.max(1, Math.floor(options.rows));
  const listeners = new Set<RangeChangedListener>();
  let history: string[] = [];
  let current = "";
  let pendingEscape = "";
  let pendingCarriageReturn = false;
  let rendered: string[] | null = null;

  const emit = (startRow: number, endRow: number): void => {
    for (const listener of [...listeners]) listener(startRow, endRow);
  };

  const visibleRows = (): string[] => {
    if (rendered) return rendered;
    const lines = [...history, current].slice(-rows);
    const padding: string[] = Array.from({ length: rows - lines.length }, () => "");
    rendered = [...padding, ...lines].map((line) => line.trimEnd());
    return rendered;
  };

  const newline = (): void => {
    history.push(current);
    if (history.length > rows) history = history.slice(-rows);
    current = "";
  };

  return {
    rows,
    lineAt(row) {
      if (!Number.isInteger(row) || row < 0 || row >= rows) return null;
      return visibleRows()[row] ?? null;
    },
    onRangeChanged(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    write(chunk) {
      const split = splitPendingEscape(pendingEscape + chunk);
      pendingEscape = split.pending;
      const text = stripAnsi(split.body);
      if (!text) return;

      rendered = null;
      const before = current;
      let scrolled = false;
      for (const char of text) {
        if (pendingCarriageReturn) {
          pendingCarriageReturn = false;
          if (char === "\n") {
            newline();
            scrolled = true;
            continue;
          }
          current = "";
        }
        if (char === "\n") {
          newline();
          scrolled = true;
        } else if (char === "\r") {
          pendingCarriageReturn = true;
        } else if (char === "\b") {
          current = Array.from(current).slice(0, -1).join("");
        } else {
          current += char.replace(CONTROL_CHAR_PATTERN, "");
        }
      }

      if (scrolled) {
        emit(0, rows - 1);
      } else if (current !== before || pendingCarriageReturn) {
        emit(rows - 1, rows - 1);
      }
    },
    snapshot() {
      return [...visibleRows()];
    },
    clear() {
      history = [];
      current = "";
      pendingEscape = "";
      pendingCarriageReturn = false;
      rendered = null;
      emit(0, rows - 1);
    }
  };
}
