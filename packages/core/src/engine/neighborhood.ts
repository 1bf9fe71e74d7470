import type { Board } from "./board.js";

/** The 8 Moore offsets as [dRow, dCol]. */
export const NEIGHBOR_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
  [1, 1],
];

/**
 * Counts live neighbors of (row, col).
 * Offsets that fall outside the board are skipped; there is no wraparound.
 */
export function countAliveNeighbors(board: Board, row: number, col: number): number {
  let alive = 0;
  for (const [dr, dc] of NEIGHBOR_OFFSETS) {
    const r = row + dr;
    const c = col + dc;
    if (!board.contains(r, c)) continue;
    if (board.getState(r, c) === "alive") alive++;
  }
  return alive;
}
