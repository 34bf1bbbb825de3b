import type { TerminalGrid } from "./grid.js";

export interface RowChange {
  row: number;
  text: string;
}

export interface RowScan {
  changed: RowChange[];
  next: Map<number, string>;
}

/**
 * Compares every row against the cached text from the previous call. Unreadable rows keep their
 * cached text; cache entries for rows past the current row count are pruned.
 */
export function scanChangedRows(grid: TerminalGrid, previous: ReadonlyMap<number, string>): RowScan {
  const rows = grid.rows;
  const next = new Map<number, string>();
  const changed: RowChange[] = [];

  for (const [row, text] of previous) {
    if (row < rows) next.set(row, text);
  }

  for (let row = 0; row < rows; row += 1) {
    const text = grid.lineAt(row);
    if (text === null) continue;
    if (text === (previous.get(row) ?? "")) continue;
    next.set(row, text);
    changed.push({ row, text });
  }

  return { changed, next };
}
