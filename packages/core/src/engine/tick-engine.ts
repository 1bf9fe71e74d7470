import type { Board } from "./board.js";
import { countAliveNeighbors } from "./neighborhood.js";
import { ConwayRule, type TransitionRule } from "./rule.js";
import type { ChangeListener, PendingChange } from "./types.js";

/**
 * Runs one simulation step in two phases:
 * 1. Scan: evaluate the rule for every cell against the unmodified board
 *    and collect the cells whose state differs.
 * 2. Apply: write the collected changes.
 *
 * Transitions are simultaneous across the whole grid, so the board must not
 * change while it is being scanned.
 */
export class TickEngine {
  constructor(protected readonly rule: TransitionRule = new ConwayRule()) {}

  /**
   * Main step function.
   * Returns the number of changed cells; 0 means the board is at a fixed point.
   */
  runTick(board: Board, onChange?: ChangeListener): number {
    const changes = this.scan(board);
    return this.apply(board, changes, onChange);
  }

  /** Scan phase. Never mutates `board`. */
  scan(board: Board): PendingChange[] {
    const pending: PendingChange[] = [];
    for (const { row, col, state } of board.cells()) {
      const next = this.rule.next(state, countAliveNeighbors(board, row, col));
      if (next !== state) {
        pending.push({ row, col, state: next });
      }
    }
    return pending;
  }

  /** Apply phase. Each change targets a distinct cell, so order does not matter. */
  apply(board: Board, changes: readonly PendingChange[], onChange?: ChangeListener): number {
    for (const { row, col, state } of changes) {
      board.setState(row, col, state);
      onChange?.(row, col, state);
    }
    return changes.length;
  }
}
