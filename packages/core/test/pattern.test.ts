import { describe, expect, it } from "vitest";
import { InvalidBoardDimensionsError } from "../src/engine/errors.js";
import { formatBoard, parsePattern } from "../src/engine/pattern.js";

describe("patterns", () => {
  it("parses ragged rows padded with dead cells", () => {
    const board = parsePattern([".X", "XOX", ""]);
    expect(board.rows).toBe(3);
    expect(board.cols).toBe(3);
    expect(board.liveCount).toBe(4);
    expect(formatBoard(board)).toEqual([".X.", "XXX", "..."]);
  });

  it("treats any other character as dead", () => {
    const board = parsePattern(["x #"]);
    expect(board.liveCount).toBe(0);
  });

  it("rejects an empty pattern", () => {
    expect(() => parsePattern([])).toThrow(InvalidBoardDimensionsError);
  });
});
