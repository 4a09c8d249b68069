/**
 * @chronovault/runtime — Time Source.
 *
 * Programs never read wall-clock time directly. They receive the clock
 * sysvar account positionally and ask the invoke context for the time,
 * which the host answers from its configured TimeSource.
 */

import type { Timestamp } from "@chronovault/types";
import { addressFromLabel } from "./address.js";
import { RuntimeError } from "./errors.js";

/** Address of the clock sysvar account. */
export const CLOCK_SYSVAR_ID = addressFromLabel("chronovault:sysvar:clock");

/**
 * Supplies the current unix time in seconds.
 * Must be non-decreasing across calls within one transaction.
 */
export interface TimeSource {
  now(): Timestamp;
}

/** Wall-clock time source. */
export class SystemClock implements TimeSource {
  now(): Timestamp {
    return BigInt(Math.floor(Date.now() / 1000));
  }
}

/**
 * Time source that only moves when told to.
 * Used by tests and the demo to step across unlock boundaries.
 */
export class ManualClock implements TimeSource {
  private _now: Timestamp;

  constructor(start: Timestamp) {
    this._now = start;
  }

  now(): Timestamp {
    return this._now;
  }

  set(timestamp: Timestamp): void {
    if (timestamp < this._now) {
      throw new RuntimeError(
        "INVALID_ARGUMENT",
        `Clock cannot move backwards: ${this._now.toString()} -> ${timestamp.toString()}`,
      );
    }
    this._now = timestamp;
  }

  advance(seconds: bigint): Timestamp {
    this.set(this._now + seconds);
    return this._now;
  }
}
