import { InvalidTickRateError, TickRateParseError } from "../engine/errors.js";
import { err, ok, type Result } from "../engine/types.js";

const MICROS_PER_SECOND = 1_000_000;

/**
 * Read typed rate input as a positive integer.
 * Failures are returned, not thrown, so the caller can ask again.
 */
export function parseTickRate(input: string): Result<number, TickRateParseError> {
  const text = input.trim();
  if (text.length === 0) return err(new TickRateParseError(input, "empty"));
  if (!/^\d+$/.test(text)) return err(new TickRateParseError(input, "not-a-number"));

  const value = Number.parseInt(text, 10);
  if (!Number.isSafeInteger(value)) return err(new TickRateParseError(input, "too-large"));
  if (value === 0) return err(new TickRateParseError(input, "zero"));

  return ok(value);
}

export function assertTickRate(ticksPerSecond: number): void {
  if (!Number.isInteger(ticksPerSecond) || ticksPerSecond <= 0) {
    throw new InvalidTickRateError(ticksPerSecond);
  }
}

/** Delay between ticks, truncated to whole microseconds. */
export function tickPeriodMicros(ticksPerSecond: number): number {
  assertTickRate(ticksPerSecond);
  return Math.floor(MICROS_PER_SECOND / ticksPerSecond);
}
