export type { Clock, CancelHandle, FrameCallback } from "./clock.js";
export { TestClock } from "./test-clock.js";
export { BrowserClock } from "./browser-clock.js";
export type { AnimationFrameHost } from "./browser-clock.js";
export { TimerClock } from "./timer-clock.js";
export type { TimerClockOptions } from "./timer-clock.js";
