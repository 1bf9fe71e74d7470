import type { CellState } from "./types.js";

/**
 * View Layer responsibility:
 * receive what changed during setup and simulation and show it.
 * The core never draws anything itself; only changed cells are reported,
 * so an implementation can update just those positions.
 */
export interface SimulationView {
  /** Show a live or dead marker at a board-relative position. */
  drawCell(row: number, col: number, state: CellState): void;

  /** Show the index (0-based) of the tick that just ran. */
  reportTick(tickIndex: number): void;

  /** Show the final message once the board reached a fixed point. */
  reportTermination(totalTicks: number): void;
}

export const nullView: SimulationView = {
  drawCell: () => {},
  reportTick: () => {},
  reportTermination: () => {},
};
