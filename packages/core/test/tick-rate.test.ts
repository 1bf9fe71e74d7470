import { describe, expect, it } from "vitest";
import {
  assertTickRate,
  parseTickRate,
  tickPeriodMicros,
} from "../src/driver/tick-rate.js";
import { InvalidTickRateError, TickRateParseError } from "../src/engine/errors.js";

describe("parseTickRate", () => {
  it("accepts positive integers", () => {
    expect(parseTickRate("30")).toEqual({ ok: true, value: 30 });
    expect(parseTickRate(" 7 ")).toEqual({ ok: true, value: 7 });
    expect(parseTickRate("007")).toEqual({ ok: true, value: 7 });
  });

  it.each([
    ["", "empty"],
    ["   ", "empty"],
    ["abc", "not-a-number"],
    ["12x", "not-a-number"],
    ["-3", "not-a-number"],
    ["1.5", "not-a-number"],
    ["0", "zero"],
    ["000", "zero"],
    ["99999999999999999999", "too-large"],
  ])("rejects %j as %s", (input, reason) => {
    const result = parseTickRate(input);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TickRateParseError);
      expect(result.error.reason).toBe(reason);
      expect(result.error.input).toBe(input);
    }
  });
});

describe("tickPeriodMicros", () => {
  it("truncates the period to whole microseconds", () => {
    expect(tickPeriodMicros(1)).toBe(1_000_000);
    expect(tickPeriodMicros(2)).toBe(500_000);
    expect(tickPeriodMicros(3)).toBe(333_333);
    expect(tickPeriodMicros(2_000_000)).toBe(0);
  });

  it("rejects rates that are not positive integers", () => {
    expect(() => tickPeriodMicros(0)).toThrow(InvalidTickRateError);
    expect(() => assertTickRate(-1)).toThrow(InvalidTickRateError);
    expect(() => assertTickRate(2.5)).toThrow(
      "Invalid tick rate 2.5: must be a positive integer.",
    );
    expect(() => assertTickRate(Number.NaN)).toThrow(InvalidTickRateError);
  });
});
