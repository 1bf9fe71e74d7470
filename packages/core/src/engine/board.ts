import { CellOutOfBoundsError, InvalidBoardDimensionsError } from "./errors.js";
import type { CellState, Coordinate } from "./types.js";

/**
 * Fixed-size grid of cells stored row-major.
 * `liveCount` is kept in step with every write instead of being recounted.
 */
export class Board {
  readonly rows: number;
  readonly cols: number;
  private readonly tiles: CellState[];
  private alive = 0;

  constructor(rows: number, cols: number) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
      throw new InvalidBoardDimensionsError(rows, cols);
    }
    this.rows = rows;
    this.cols = cols;
    this.tiles = new Array<CellState>(rows * cols).fill("dead");
  }

  get liveCount(): number {
    return this.alive;
  }

  contains(row: number, col: number): boolean {
    return (
      Number.isInteger(row) &&
      Number.isInteger(col) &&
      row >= 0 &&
      row < this.rows &&
      col >= 0 &&
      col < this.cols
    );
  }

  getState(row: number, col: number): CellState {
    return this.tiles[this.indexOf(row, col)];
  }

  setState(row: number, col: number, state: CellState): void {
    const index = this.indexOf(row, col);
    const prev = this.tiles[index];
    if (prev === state) return;

    this.tiles[index] = state;
    this.alive += state === "alive" ? 1 : -1;
  }

  /** Flips a cell and returns its new state. */
  toggle(row: number, col: number): CellState {
    const next: CellState = this.getState(row, col) === "alive" ? "dead" : "alive";
    this.setState(row, col, next);
    return next;
  }

  /** Row-major walk over every cell. */
  *cells(): IterableIterator<Coordinate & { state: CellState }> {
    for (let row = 0; row < this.rows; row++) {
      for (let col = 0; col < this.cols; col++) {
        yield { row, col, state: this.tiles[row * this.cols + col] };
      }
    }
  }

  private indexOf(row: number, col: number): number {
    if (!this.contains(row, col)) {
      throw new CellOutOfBoundsError(row, col, this.rows, this.cols);
    }
    return row * this.cols + col;
  }
}
