/**
 * TimerClock: real-time clock for Node.js hosts.
 *
 * `performance.now()` for timestamps, `setTimeout` for frame scheduling.
 */

import type { CancelHandle, Clock, FrameCallback } from "./clock.js";

/** Options for a TimerClock. */
export interface TimerClockOptions {
  /** Frames per second to schedule at. Defaults to 60. */
  readonly fps?: number;
}

/**
 * A clock that schedules frames on timers. Frame timestamps come from
 * `now()`, not from the requested interval, so late timers yield larger
 * deltas instead of drifting.
 */
export class TimerClock implements Clock {
  private readonly intervalMs: number;

  constructor(options: TimerClockOptions = {}) {
    const fps = options.fps ?? 60;
    if (!Number.isFinite(fps) || fps <= 0) {
      throw new RangeError(`TimerClock fps must be a positive number, got ${fps}`);
    }
    this.intervalMs = 1000 / fps;
  }

  /** Current monotonic time in milliseconds. */
  now(): number {
    return performance.now();
  }

  /** Schedule a callback roughly one frame interval from now. */
  requestFrame(callback: FrameCallback): CancelHandle {
    const timer = setTimeout(() => callback(this.now()), this.intervalMs);
    return { cancel: () => clearTimeout(timer) };
  }
}
