/**
 * Viewport positioning with minimal-movement scrolling.
 */

export interface ViewportInput {
  /** Requested cursor row; may be out of range. */
  cursor: number;
  rowCount: number;
  height: number;
  /** Current first visible row. */
  viewportStart: number;
}

export interface ViewportPosition {
  viewportStart: number;
  /** Clamped cursor, or null when there are no rows. */
  cursor: number | null;
}

/**
 * Clamp the cursor into [0, rowCount) and move the viewport by the smallest
 * amount that keeps the cursor visible. The viewport start stays within
 * [0, max(0, rowCount - height)].
 */
export function reposition({ cursor, rowCount, height, viewportStart }: ViewportInput): ViewportPosition {
  if (rowCount <= 0) return { viewportStart: 0, cursor: null };

  const rows = Math.max(1, Math.floor(height));
  const clamped = Math.min(Math.max(0, Math.floor(cursor)), rowCount - 1);
  const maxStart = Math.max(0, rowCount - rows);

  let start = Math.min(Math.max(0, Math.floor(viewportStart)), maxStart);
  if (clamped < start) {
    start = clamped;
  } else if (clamped >= start + rows) {
    start = clamped - rows + 1;
  }

  return { viewportStart: Math.min(start, maxStart), cursor: clamped };
}

/** Index range [start, end) of the rows currently visible. */
export function visibleRange(viewportStart: number, height: number, rowCount: number): [number, number] {
  const start = Math.min(Math.max(0, viewportStart), Math.max(0, rowCount));
  return [start, Math.min(rowCount, start + Math.max(0, height))];
}
