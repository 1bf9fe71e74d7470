import type { Board } from "../engine/board.js";
import { TickEngine } from "../engine/tick-engine.js";
import { nullView, type SimulationView } from "../engine/view.js";
import { createTimeSource, type TimeSource } from "../time/time-source.js";
import { tickPeriodMicros } from "./tick-rate.js";

export interface SimulationDriverOptions {
  view?: SimulationView;
  timeSource?: TimeSource;
  engine?: TickEngine;
  /** Log progress to the console. */
  output?: boolean;
}

/**
 * SimulationDriver repeatedly runs ticks at a fixed rate until a tick
 * changes nothing (a fixed point), then stops.
 *
 * Pacing is sleep-based and does not subtract the time spent computing a
 * tick, so the effective rate drifts below the requested one on large boards.
 */
export class SimulationDriver {
  private readonly view: SimulationView;
  private readonly timeSource: TimeSource;
  private readonly engine: TickEngine;
  private readonly output: boolean;
  private clock = 0;

  constructor(opts: SimulationDriverOptions = {}) {
    this.view = opts.view ?? nullView;
    this.timeSource = opts.timeSource ?? createTimeSource();
    this.engine = opts.engine ?? new TickEngine();
    this.output = opts.output ?? false;
  }

  /** Number of ticks completed so far. */
  get tick(): number {
    return this.clock;
  }

  /**
   * Runs until the board reaches a fixed point.
   * Resolves with the number of ticks executed, including the one that changed nothing.
   */
  async run(board: Board, ticksPerSecond: number): Promise<number> {
    // Throws InvalidTickRateError before anything runs.
    const periodMicros = tickPeriodMicros(ticksPerSecond);
    this.clock = 0;

    if (this.output) {
      console.log(
        `[SimulationDriver] start ${board.rows}x${board.cols}, ${board.liveCount} alive, ${ticksPerSecond} ticks/s`,
      );
    }

    while (true) {
      const changed = this.engine.runTick(board, (row, col, state) =>
        this.view.drawCell(row, col, state),
      );
      this.view.reportTick(this.clock);
      this.clock++;

      if (this.output && this.clock % 100 === 0) {
        console.log(
          `[SimulationDriver] tick ${this.clock}: ${changed} changed, ${board.liveCount} alive`,
        );
      }

      if (changed === 0) break;
      await this.timeSource.sleepMicros(periodMicros);
    }

    if (this.output) {
      console.log(`[SimulationDriver] fixed point after ${this.clock} ticks`);
    }
    this.view.reportTermination(this.clock);
    return this.clock;
  }
}
