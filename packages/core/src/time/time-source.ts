// packages/core/src/time/time-source.ts

import { setTimeout as sleep } from "node:timers/promises";

export type TimeSource = {
  /**
   * Suspend for roughly `micros` microseconds.
   * Resolution is whatever the host timer offers (milliseconds for Node).
   */
  sleepMicros(micros: number): Promise<void>;
};

export function createTimeSource(): TimeSource {
  return {
    async sleepMicros(micros: number): Promise<void> {
      await sleep(Math.floor(micros / 1000));
    },
  };
}
