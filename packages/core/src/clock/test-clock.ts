/**
 * TestClock: a clock that only moves when a test moves it.
 *
 * Frame callbacks run synchronously inside `advance()`, in the order they
 * were requested. A callback that requests another frame is queued for the
 * following `advance()`, the way a real frame loop re-arms itself.
 */

import type { CancelHandle, Clock, FrameCallback } from "./clock.js";

/**
 * @example
 * ```ts
 * const clock = new TestClock();
 * const engine = new AnimationEngine({ clock });
 *
 * engine.start();
 * clock.advance(16);               // first frame: dt = 0
 * clock.advanceFrames(30, 1000 / 30); // one more second at 30 fps
 * ```
 */
export class TestClock implements Clock {
  private time = 0;
  private queue: Array<{ readonly callback: FrameCallback; cancelled: boolean }> = [];

  now(): number {
    return this.time;
  }

  requestFrame(callback: FrameCallback): CancelHandle {
    const entry = { callback, cancelled: false };
    this.queue.push(entry);
    return {
      cancel: () => {
        entry.cancelled = true;
        this.queue = this.queue.filter((queued) => queued !== entry);
      },
    };
  }

  /** Move time forward by `ms` and run every frame queued before the call. */
  advance(ms: number): void {
    this.time += ms;
    const due = this.queue;
    this.queue = [];
    for (const entry of due) {
      if (!entry.cancelled) {
        entry.callback(this.time);
      }
    }
  }

  /** `advance(frameMs)` `count` times. */
  advanceFrames(count: number, frameMs: number): void {
    for (let i = 0; i < count; i++) {
      this.advance(frameMs);
    }
  }

  /** Frames requested and not yet run or cancelled. */
  get pendingCount(): number {
    return this.queue.length;
  }
}
