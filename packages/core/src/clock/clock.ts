/**
 * Time source and frame scheduler seam.
 *
 * The engine reads time for `onAfter` delays and first-frame stamps, and
 * schedules its frame loop, only through a Clock. Hosts pick the clock
 * that matches their runtime; tests drive a TestClock by hand.
 */

/** Receives the frame timestamp in ms, on the same time base as `Clock.now()`. */
export type FrameCallback = (timestamp: number) => void;

/** Returned by `requestFrame`. Cancelling twice is harmless. */
export interface CancelHandle {
  cancel(): void;
}

export interface Clock {
  /** Monotonic time in milliseconds. */
  now(): number;

  /** Schedule `callback` for the next frame. */
  requestFrame(callback: FrameCallback): CancelHandle;
}
