/**
 * @breakwater/breaker: Global tick source.
 *
 * One clock is shared by every principal. Ticks only move forward.
 */

import type { Tick } from "@breakwater/types";
import { BreakerError } from "./types.js";

/**
 * Read side of a clock. Everything in the breaker depends on this only.
 */
export interface Clock {
  now(): Tick;
}

export class TickClock implements Clock {
  private _now: Tick;

  constructor(start: Tick = 0n) {
    if (start < 0n) {
      throw new BreakerError("INVALID_TICKS", `Clock cannot start before tick 0, got ${start.toString()}`);
    }
    this._now = start;
  }

  now(): Tick {
    return this._now;
  }

  /**
   * Move forward by `ticks` and return the new tick.
   */
  advance(ticks: Tick = 1n): Tick {
    if (ticks < 0n) {
      throw new BreakerError("INVALID_TICKS", `Cannot advance by ${ticks.toString()} ticks`);
    }
    this._now += ticks;
    return this._now;
  }
}
