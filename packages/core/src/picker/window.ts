/**
 * packages/core/src/picker/window.ts — Cursor and visible-window arithmetic.
 *
 * Pure functions over (index, count, maxVisible). The window keeps its
 * position while the cursor stays inside it and shifts by exactly the
 * overflow when the cursor leaves it, so the cursor lands on the edge row.
 */

export type VisibleWindow = Readonly<{
  /** First visible row (inclusive). */
  start: number;
  /** One past the last visible row. */
  end: number;
}>;

const EMPTY_WINDOW: VisibleWindow = Object.freeze({ start: 0, end: 0 });

/** Number of rows the window shows for `count` items. */
export function windowSize(count: number, maxVisible: number): number {
  return Math.max(0, Math.min(count, maxVisible));
}

/**
 * Clamp a cursor to [0, count - 1]; -1 for an empty list.
 */
export function clampIndex(index: number, count: number): number {
  if (count <= 0) return -1;
  return Math.max(0, Math.min(index, count - 1));
}

/**
 * Recompute the window so `index` is visible, moving it as little as possible.
 *
 * @param previousStart - windowStart before the cursor moved
 */
export function scrollWindowTo(
  index: number,
  previousStart: number,
  count: number,
  maxVisible: number,
): VisibleWindow {
  const size = windowSize(count, maxVisible);
  if (size === 0) return EMPTY_WINDOW;

  const maxStart = count - size;
  let start = Math.max(0, Math.min(previousStart, maxStart));
  if (index < start) {
    start = index;
  } else if (index >= start + size) {
    start = index - size + 1;
  }
  start = Math.max(0, Math.min(start, maxStart));
  return Object.freeze({ start, end: start + size });
}

/** Window anchored at the first row. */
export function windowAtTop(count: number, maxVisible: number): VisibleWindow {
  const size = windowSize(count, maxVisible);
  if (size === 0) return EMPTY_WINDOW;
  return Object.freeze({ start: 0, end: size });
}

/** Window anchored at the last row. */
export function windowAtBottom(count: number, maxVisible: number): VisibleWindow {
  const size = windowSize(count, maxVisible);
  if (size === 0) return EMPTY_WINDOW;
  return Object.freeze({ start: count - size, end: count });
}
