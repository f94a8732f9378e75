export type RowWindow = Readonly<{ start: number; end: number }>;

/**
 * Slice of `total` rows to draw in `height` lines so that `cursor` stays
 * visible, scrolling in half-pane steps.
 */
export function visibleWindow(total: number, cursor: number, height: number): RowWindow {
  if (height <= 0 || total === 0) return { start: 0, end: 0 };
  if (total <= height) return { start: 0, end: total };
  const maxStart = total - height;
  const start = Math.max(0, Math.min(maxStart, cursor - Math.floor(height / 2)));
  return { start, end: start + height };
}

/** Slice of `total` lines starting at `offset`, pulled back so the last page stays full. */
export function scrollWindow(total: number, offset: number, height: number): RowWindow {
  if (height <= 0 || total === 0) return { start: 0, end: 0 };
  const start = Math.max(0, Math.min(offset, total - height));
  return { start, end: Math.min(total, start + height) };
}
