// Engine — board, rule, tick

export { Board } from "./engine/board.js";
export {
  CellOutOfBoundsError,
  InvalidBoardDimensionsError,
  InvalidTickRateError,
  TickRateParseError,
} from "./engine/errors.js";
export type { TickRateParseReason } from "./engine/errors.js";
export { countAliveNeighbors, NEIGHBOR_OFFSETS } from "./engine/neighborhood.js";
export { formatBoard, parsePattern } from "./engine/pattern.js";
export { ConwayRule, nextState } from "./engine/rule.js";
export type { TransitionRule } from "./engine/rule.js";
export { TickEngine } from "./engine/tick-engine.js";
export { err, ok } from "./engine/types.js";
export type {
  CellState,
  ChangeListener,
  Coordinate,
  PendingChange,
  Result,
} from "./engine/types.js";
export { nullView } from "./engine/view.js";
export type { SimulationView } from "./engine/view.js";

// Driver — pacing and termination

export { SimulationDriver } from "./driver/simulation-driver.js";
export type { SimulationDriverOptions } from "./driver/simulation-driver.js";
export { assertTickRate, parseTickRate, tickPeriodMicros } from "./driver/tick-rate.js";
export { createTimeSource } from "./time/time-source.js";
export type { TimeSource } from "./time/time-source.js";

// Setup — painting and rate entry

export { MAX_RATE_DIGITS, RateEntry } from "./setup/rate-entry.js";
export type { RateEntryStep, RateInput } from "./setup/rate-entry.js";
export { SetupSession } from "./setup/setup-session.js";
export type { SetupCommand, SetupStep } from "./setup/setup-session.js";
