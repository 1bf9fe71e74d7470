import { parseTickRate } from "../driver/tick-rate.js";
import type { TickRateParseError } from "../engine/errors.js";

export const MAX_RATE_DIGITS = 9;

export type RateInput =
  | { type: "digit"; char: string }
  | { type: "backspace" }
  | { type: "confirm" }
  | { type: "cancel" };

export type RateEntryStep =
  | { kind: "editing"; text: string }
  | { kind: "confirmed"; ticksPerSecond: number }
  | { kind: "invalid"; text: string; error: TickRateParseError }
  | { kind: "cancelled" };

/**
 * Collects a tick rate typed one key at a time.
 * A rejected value clears the buffer so the user can type again;
 * cancel ends the entry without a rate.
 */
export class RateEntry {
  private buffer = "";
  private done: RateEntryStep | null = null;

  get text(): string {
    return this.buffer;
  }

  handle(input: RateInput): RateEntryStep {
    if (this.done) return this.done;

    switch (input.type) {
      case "digit":
        if (/^\d$/.test(input.char) && this.buffer.length < MAX_RATE_DIGITS) {
          this.buffer += input.char;
        }
        return { kind: "editing", text: this.buffer };
      case "backspace":
        this.buffer = this.buffer.slice(0, -1);
        return { kind: "editing", text: this.buffer };
      case "confirm": {
        const parsed = parseTickRate(this.buffer);
        if (!parsed.ok) {
          const text = this.buffer;
          this.buffer = "";
          return { kind: "invalid", text, error: parsed.error };
        }
        this.done = { kind: "confirmed", ticksPerSecond: parsed.value };
        return this.done;
      }
      case "cancel":
        this.done = { kind: "cancelled" };
        return this.done;
    }
  }
}
