import type { CellState } from "./types.js";

/**
 * A transition rule decides the next state of one cell from its current
 * state and its number of live neighbors.
 * MUST be deterministic and pure.
 */
export interface TransitionRule {
  next(current: CellState, aliveNeighbors: number): CellState;
}

/**
 * Standard Game of Life policy (B3/S23).
 */
export function nextState(current: CellState, aliveNeighbors: number): CellState {
  switch (current) {
    case "alive":
      // survival on 2 or 3, under/overpopulation otherwise
      return aliveNeighbors === 2 || aliveNeighbors === 3 ? "alive" : "dead";
    case "dead":
      return aliveNeighbors === 3 ? "alive" : "dead";
  }
}

export class ConwayRule implements TransitionRule {
  next(current: CellState, aliveNeighbors: number): CellState {
    return nextState(current, aliveNeighbors);
  }
}
