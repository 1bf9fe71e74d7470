import { Board } from "./board.js";

const ALIVE_MARKS = new Set(["X", "O"]);

/**
 * Builds a board from text rows: `X` or `O` is alive, anything else is dead.
 * Ragged rows are padded with dead cells up to the longest one.
 */
export function parsePattern(lines: readonly string[]): Board {
  const cols = Math.max(0, ...lines.map((line) => line.length));
  const board = new Board(lines.length, cols);

  lines.forEach((line, row) => {
    for (let col = 0; col < line.length; col++) {
      if (ALIVE_MARKS.has(line[col])) board.setState(row, col, "alive");
    }
  });

  return board;
}

export function formatBoard(board: Board): string[] {
  const lines: string[] = [];
  for (let row = 0; row < board.rows; row++) {
    let line = "";
    for (let col = 0; col < board.cols; col++) {
      line += board.getState(row, col) === "alive" ? "X" : ".";
    }
    lines.push(line);
  }
  return lines;
}
