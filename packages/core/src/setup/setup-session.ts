import type { Board } from "../engine/board.js";
import type { Coordinate } from "../engine/types.js";
import { nullView, type SimulationView } from "../engine/view.js";

export type SetupCommand =
  | "move-up"
  | "move-down"
  | "move-left"
  | "move-right"
  | "toggle-cell"
  | "confirm"
  | "quit";

export type SetupStep =
  | { kind: "continue" }
  | { kind: "confirmed"; board: Board }
  | { kind: "cancelled" };

const MOVES: Record<
  Extract<SetupCommand, `move-${string}`>,
  readonly [number, number]
> = {
  "move-up": [-1, 0],
  "move-down": [1, 0],
  "move-left": [0, -1],
  "move-right": [0, 1],
};

/**
 * Interactive painting before the simulation starts.
 * The cursor begins at (0, 0) and stops at the edges of the board.
 * Once confirmed or cancelled, the session is finished and ignores further input.
 */
export class SetupSession {
  private position: Coordinate = { row: 0, col: 0 };
  private outcome: SetupStep | null = null;

  constructor(
    readonly board: Board,
    private readonly view: SimulationView = nullView,
  ) {}

  get cursor(): Coordinate {
    return { ...this.position };
  }

  handle(command: SetupCommand): SetupStep {
    if (this.outcome) return this.outcome;

    switch (command) {
      case "move-up":
      case "move-down":
      case "move-left":
      case "move-right": {
        const [dr, dc] = MOVES[command];
        const row = this.position.row + dr;
        const col = this.position.col + dc;
        if (this.board.contains(row, col)) {
          this.position = { row, col };
        }
        return { kind: "continue" };
      }
      case "toggle-cell": {
        const { row, col } = this.position;
        const state = this.board.toggle(row, col);
        this.view.drawCell(row, col, state);
        return { kind: "continue" };
      }
      case "confirm":
        this.outcome = { kind: "confirmed", board: this.board };
        return this.outcome;
      case "quit":
        this.outcome = { kind: "cancelled" };
        return this.outcome;
    }
  }
}
