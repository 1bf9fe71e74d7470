import { afterEach, describe, expect, it, vi } from "vitest";
import { SimulationDriver } from "../src/driver/simulation-driver.js";
import { Board } from "../src/engine/board.js";
import { InvalidTickRateError } from "../src/engine/errors.js";
import { formatBoard, parsePattern } from "../src/engine/pattern.js";
import type { SimulationView } from "../src/engine/view.js";
import type { TimeSource } from "../src/time/time-source.js";

// 1. Test doubles
class RecordingTimeSource implements TimeSource {
  readonly sleeps: number[] = [];

  async sleepMicros(micros: number): Promise<void> {
    this.sleeps.push(micros);
  }
}

class RecordingView implements SimulationView {
  readonly drawn: string[] = [];
  readonly ticks: number[] = [];
  terminatedAfter: number | null = null;

  drawCell(row: number, col: number, state: "dead" | "alive"): void {
    this.drawn.push(`${row},${col}=${state}`);
  }

  reportTick(tickIndex: number): void {
    this.ticks.push(tickIndex);
  }

  reportTermination(totalTicks: number): void {
    this.terminatedAfter = totalTicks;
  }
}

function setup() {
  const view = new RecordingView();
  const timeSource = new RecordingTimeSource();
  const driver = new SimulationDriver({ view, timeSource });
  return { view, timeSource, driver };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("SimulationDriver", () => {
  it("stops after the first tick that changes nothing, counting it", async () => {
    const { view, timeSource, driver } = setup();
    // Ticks: 3 changes, 2 changes, 0 changes
    const board = parsePattern(["XXX.", "....", "....", "...."]);

    const total = await driver.run(board, 4);

    expect(total).toBe(3);
    expect(driver.tick).toBe(3);
    expect(view.ticks).toEqual([0, 1, 2]);
    expect(view.terminatedAfter).toBe(3);
    expect(board.liveCount).toBe(0);
  });

  it("sleeps the integer period between ticks but not after the last", async () => {
    const { timeSource, driver } = setup();
    const board = parsePattern(["XXX.", "....", "....", "...."]);

    await driver.run(board, 3);

    expect(timeSource.sleeps).toEqual([333333, 333333]);
  });

  it("reports only the cells that changed", async () => {
    const { view, driver } = setup();
    const board = parsePattern(["XXX.", "....", "....", "...."]);

    await driver.run(board, 10);

    expect(view.drawn).toEqual([
      "0,0=dead",
      "0,2=dead",
      "1,1=alive",
      "0,1=dead",
      "1,1=dead",
    ]);
  });

  it("finishes in one tick on a still life", async () => {
    const { view, timeSource, driver } = setup();
    const block = ["....", ".XX.", ".XX.", "...."];
    const board = parsePattern(block);

    expect(await driver.run(board, 1)).toBe(1);
    expect(formatBoard(board)).toEqual(block);
    expect(view.drawn).toEqual([]);
    expect(timeSource.sleeps).toEqual([]);
  });

  it("finishes in one tick on an empty board", async () => {
    const { driver } = setup();
    expect(await driver.run(new Board(3, 3), 2)).toBe(1);
  });

  it("restarts the clock on each run", async () => {
    const { driver } = setup();
    await driver.run(parsePattern(["XXX.", "....", "....", "...."]), 5);
    expect(await driver.run(new Board(2, 2), 5)).toBe(1);
    expect(driver.tick).toBe(1);
  });

  it("rejects an invalid tick rate before running anything", async () => {
    const { view, driver } = setup();
    const board = parsePattern(["XXX.", "....", "....", "...."]);

    await expect(driver.run(board, 0)).rejects.toThrow(InvalidTickRateError);
    await expect(driver.run(board, -2)).rejects.toThrow(InvalidTickRateError);
    await expect(driver.run(board, 1.5)).rejects.toThrow(InvalidTickRateError);

    expect(view.ticks).toEqual([]);
    expect(board.liveCount).toBe(3);
  });

  it("logs progress when output is enabled", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const driver = new SimulationDriver({
      timeSource: new RecordingTimeSource(),
      output: true,
    });

    await driver.run(new Board(2, 2), 5);

    expect(log.mock.calls).toEqual([
      ["[SimulationDriver] start 2x2, 0 alive, 5 ticks/s"],
      ["[SimulationDriver] fixed point after 1 ticks"],
    ]);
  });

  it("stays quiet by default", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const { driver } = setup();

    await driver.run(new Board(2, 2), 5);

    expect(log).not.toHaveBeenCalled();
  });
});
