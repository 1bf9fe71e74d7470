import type { CellState, Coordinate, SimulationView } from "@lifegrid/core";
import { cellPosition, type ScreenLayout } from "./layout.js";

export const ALIVE_MARK = "X";
export const DEAD_MARK = " ";

/** Minimal drawing surface; see createTermkitScreen for the real one. */
export interface Screen {
  write(x: number, y: number, text: string): void;
  moveCursor(x: number, y: number): void;
}

/**
 * Draws the board box, the cells and the one-line prompt.
 * Cells are only ever drawn when they change.
 */
export class TerminalView implements SimulationView {
  constructor(
    private readonly screen: Screen,
    private readonly layout: ScreenLayout,
  ) {}

  drawFrame(): void {
    const { width, height } = this.layout;
    const edge = `+${"-".repeat(width - 2)}+`;

    this.screen.write(1, 1, edge);
    for (let y = 2; y <= height - 2; y++) {
      this.screen.write(1, y, "|");
      this.screen.write(width, y, "|");
    }
    this.screen.write(1, height - 1, edge);
  }

  drawCell(row: number, col: number, state: CellState): void {
    const { x, y } = cellPosition(this.layout, row, col);
    this.screen.write(x, y, state === "alive" ? ALIVE_MARK : DEAD_MARK);
  }

  reportTick(tickIndex: number): void {
    this.prompt(`On tick ${tickIndex}`);
  }

  reportTermination(totalTicks: number): void {
    this.prompt(`Terminated after ${totalTicks} ticks.  Press 'q' to quit`);
  }

  /** Replace the prompt line and leave the cursor after the text. */
  prompt(text: string): void {
    const { width, promptY } = this.layout;
    const visible = text.slice(0, width);
    this.screen.write(1, promptY, visible.padEnd(width));
    this.screen.moveCursor(Math.min(visible.length + 1, width), promptY);
  }

  placeCursor(cursor: Coordinate): void {
    const { x, y } = cellPosition(this.layout, cursor.row, cursor.col);
    this.screen.moveCursor(x, y);
  }
}
