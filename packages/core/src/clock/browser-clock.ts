/**
 * BrowserClock: display-synchronised clock for browser hosts.
 *
 * Frames come from `requestAnimationFrame`, time from `performance.now()`.
 * Both are read from a host object, `globalThis` unless another window is
 * passed (an iframe's, or a stand-in under test).
 */

import type { CancelHandle, Clock, FrameCallback } from "./clock.js";

/** The parts of a window a BrowserClock needs. */
export interface AnimationFrameHost {
  readonly performance: { now(): number };
  requestAnimationFrame(callback: FrameRequestCallback): number;
  cancelAnimationFrame(handle: number): void;
}

/**
 * @example
 * ```ts
 * const engine = new AnimationEngine({ clock: new BrowserClock() });
 * engine.start(); // ticks at the display refresh rate
 * ```
 */
export class BrowserClock implements Clock {
  private readonly host: AnimationFrameHost;

  constructor(host: AnimationFrameHost = globalThis) {
    this.host = host;
  }

  now(): number {
    return this.host.performance.now();
  }

  requestFrame(callback: FrameCallback): CancelHandle {
    const id = this.host.requestAnimationFrame(callback);
    return { cancel: () => this.host.cancelAnimationFrame(id) };
  }
}
