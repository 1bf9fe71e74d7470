/** Board dimensions must be positive integers. */
export class InvalidBoardDimensionsError extends Error {
  constructor(rows: number, cols: number) {
    super(`Invalid board dimensions ${rows}x${cols}: both must be positive integers.`);
    this.name = "InvalidBoardDimensionsError";
  }
}

/** A cell was addressed outside the board. Always a caller bug. */
export class CellOutOfBoundsError extends Error {
  constructor(row: number, col: number, rows: number, cols: number) {
    super(`Cell (${row}, ${col}) is outside the ${rows}x${cols} board.`);
    this.name = "CellOutOfBoundsError";
  }
}

/** Tick rate must be a positive integer. */
export class InvalidTickRateError extends Error {
  constructor(ticksPerSecond: number) {
    super(`Invalid tick rate ${ticksPerSecond}: must be a positive integer.`);
    this.name = "InvalidTickRateError";
  }
}

export type TickRateParseReason = "empty" | "not-a-number" | "zero" | "too-large";

/**
 * Typed rate input could not be read as a positive integer.
 * Returned inside a Result rather than thrown.
 */
export class TickRateParseError extends Error {
  constructor(
    readonly input: string,
    readonly reason: TickRateParseReason,
  ) {
    super(`Cannot parse tick rate "${input}" (${reason}).`);
    this.name = "TickRateParseError";
  }
}
