/**
 * Result type for operations that might fail, without throwing exceptions.
 * Used for conditions the caller is expected to recover from (e.g. re-prompting).
 */
export type Result<T, E = string> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/** State of a single cell. */
export type CellState = "dead" | "alive";

export interface Coordinate {
  row: number;
  col: number;
}

/**
 * A transition decided during a tick's scan phase but not yet written.
 * Each coordinate appears at most once per tick.
 */
export interface PendingChange extends Coordinate {
  state: CellState;
}

/** Callback receiving every change applied to a board. */
export type ChangeListener = (row: number, col: number, state: CellState) => void;
