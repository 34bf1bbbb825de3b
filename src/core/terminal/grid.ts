/** Row-indexed view of a terminal screen. Row 0 is the top visible row. */
export interface TerminalGrid {
  readonly rows: number;
  /** Text of one row with trailing blanks removed, or null when the row cannot be read right now. */
  lineAt(row: number): string | null;
}

export type RangeChangedListener = (startRow: number, endRow: number) => void;

export interface ObservableTerminalGrid extends TerminalGrid {
  /** Returns an unsubscribe function. */
  onRangeChanged(listener: RangeChangedListener): () => void;
}

/** First row of the bottom `windowRows` rows, or null for an empty grid. */
export function bottomWindowStart(rows: number, windowRows: number): number | null {
  if (rows <= 0) return null;
  return Math.max(0, rows - windowRows);
}

/** Reads rows [start, rows) once each, skipping unreadable and blank ones. */
export function readBottomRows(grid: TerminalGrid, start: number): string[] {
  const texts: string[] = [];
  for (let row = start; row < grid.rows; row += 1) {
    const text = grid.lineAt(row)?.trimEnd();
    if (text) texts.push(text);
  }
  return texts;
}
