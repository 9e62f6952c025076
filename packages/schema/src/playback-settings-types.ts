/**
 * TypeScript types for playback settings.
 *
 * These types are aligned with the `playbackSettings` definition in
 * state-machine.schema.json. When updating, change the schema first, then
 * update these types to match.
 */

// ---------------------------------------------------------------------------
// Direction & looping
// ---------------------------------------------------------------------------

/**
 * The direction to play the segment of an animation.
 *
 * - `"normal"`: first frame to last frame.
 * - `"reverse"`: last frame to first frame.
 */
export type PlaybackDirection = "normal" | "reverse";

/** Play once and hold the last frame. Equivalent to `{ type: "amount", amount: 0 }`. */
export interface DoNotLoop {
  readonly type: "doNotLoop";
}

/** Complete a fixed number of loops after the first play, then hold the last frame. */
export interface LoopAmount {
  readonly type: "amount";
  /** Number of additional loops. Non-negative integer. */
  readonly amount: number;
}

/** Loop forever. */
export interface LoopForever {
  readonly type: "loop";
}

/**
 * How often to loop, discriminated on `type`.
 */
export type PlaybackLoopBehavior = DoNotLoop | LoopAmount | LoopForever;

// ---------------------------------------------------------------------------
// Segments
// ---------------------------------------------------------------------------

/**
 * Half-open frame range `[start, end)` a playback restricts itself to.
 *
 * Values outside the composition's own frame range are clamped by consumers,
 * and `start <= end` is not enforced here.
 */
export interface FrameSegment {
  readonly start: number;
  readonly end: number;
}

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

/**
 * How one animation should play. Pure configuration, no behaviour.
 */
export interface PlaybackSettings {
  /** Start playing automatically when first encountered. */
  readonly autoplay: boolean;
  readonly direction: PlaybackDirection;
  /** Speed multiplier. 1 is normal speed. Finite and >= 0. */
  readonly speed: number;
  /**
   * Idle pause appended after each loop, measured in frames of the
   * composition timeline (the playhead's unit).
   */
  readonly intermission: number;
  readonly looping: PlaybackLoopBehavior;
  readonly segments: FrameSegment;
}
