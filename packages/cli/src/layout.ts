import { InvalidBoardDimensionsError } from "@lifegrid/core";

export interface Point {
  x: number;
  y: number;
}

/**
 * Screen geometry, in terminal-kit's 1-based coordinates.
 *
 * ```
 * y=1        +--------+   box top
 * y=2..h-2   |cells...|   board rows
 * y=h-1      +--------+   box bottom
 * y=h        prompt line
 * ```
 */
export interface ScreenLayout {
  width: number;
  height: number;
  /** Board size in cells. */
  rows: number;
  cols: number;
  /** Position of cell (0, 0). */
  origin: Point;
  promptY: number;
}

export function computeLayout(width: number, height: number): ScreenLayout {
  const rows = height - 3;
  const cols = width - 2;
  if (rows <= 0 || cols <= 0) {
    throw new InvalidBoardDimensionsError(rows, cols);
  }
  return { width, height, rows, cols, origin: { x: 2, y: 2 }, promptY: height };
}

export function cellPosition(layout: ScreenLayout, row: number, col: number): Point {
  return { x: layout.origin.x + col, y: layout.origin.y + row };
}
