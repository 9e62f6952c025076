/**
 * Playhead arithmetic.
 *
 * The playhead (`renderedFrames`) counts frames since the start of the
 * timeline and is never wrapped eagerly. The loop currently playing is
 * derived on demand from `renderedFrames / (length + intermission)`, which
 * lets the loop count survive seeks, intermission changes and speed changes
 * without being tracked separately.
 *
 * Every function here is pure: it takes the current playhead and returns
 * the next one.
 */

import type {
  FrameSegment,
  PlaybackDirection,
  PlaybackLoopBehavior,
  PlaybackSettings,
} from "@playhead/schema";
import type { Composition } from "../assets/types.js";
import { previousFloat } from "./float.js";

/** Half-open frame range `[start, end)`. */
export interface FrameRange {
  readonly start: number;
  readonly end: number;
}

/**
 * Clamp a segment against the composition's own frame range.
 * An inverted segment collapses to an empty range at its start.
 */
export function effectiveRange(composition: Composition, segments: FrameSegment): FrameRange {
  const start = Math.max(segments.start, composition.frameStart);
  const end = Math.min(segments.end, composition.frameEnd);
  return { start, end: Math.max(start, end) };
}

/** Frames covered by `dt` seconds of playback. */
export function elapsedFrames(dt: number, speed: number, frameRate: number): number {
  return dt * speed * frameRate;
}

/**
 * Number of loops already played, counting the intermission after each.
 */
export function loopsCompleted(
  renderedFrames: number,
  composition: Composition,
  settings: PlaybackSettings,
): number {
  const { start, end } = effectiveRange(composition, settings.segments);
  const cycle = end - start + settings.intermission;
  if (cycle <= 0) return 0;
  return Math.floor(Math.max(0, renderedFrames) / cycle);
}

/** Loops allowed after the first play, or `null` for endless looping. */
function loopLimit(looping: PlaybackLoopBehavior): number | null {
  switch (looping.type) {
    case "loop":
      return null;
    case "doNotLoop":
      return 0;
    case "amount":
      return looping.amount;
  }
}

/**
 * Whether a finite looping policy has played all of its loops.
 * Always false for endless looping.
 */
export function isPlaybackComplete(
  renderedFrames: number,
  composition: Composition,
  settings: PlaybackSettings,
): boolean {
  const limit = loopLimit(settings.looping);
  if (limit === null) return false;
  return loopsCompleted(renderedFrames, composition, settings) > limit;
}

/**
 * The frame to display for the current playhead.
 *
 * Within a loop the position is `renderedFrames mod (length + intermission)`,
 * held at the last frame during the intermission and once a finite looping
 * policy is exhausted. Reverse playback mirrors the position about the
 * segment end. The result always lies in `[start, previousFloat(end)]`.
 */
export function calculatePlayhead(
  renderedFrames: number,
  composition: Composition,
  settings: PlaybackSettings,
): number {
  const { start, end } = effectiveRange(composition, settings.segments);
  const length = end - start;
  const cycle = length + settings.intermission;
  const frames = Math.max(0, renderedFrames);

  let position = 0;
  if (cycle > 0) {
    position = isPlaybackComplete(frames, composition, settings)
      ? length
      : Math.min(frames % cycle, length);
  }

  const lastFrame = Math.max(start, previousFloat(end));
  const frame = settings.direction === "normal" ? start + position : end - position;
  return Math.min(Math.max(frame, start), lastFrame);
}

/**
 * Re-anchor the playhead after the intermission changes mid-playback.
 *
 * The loop the player is in never changes; only the dead time contributed
 * by loops already completed does. A playhead inside an intermission window
 * stays inside it, snapped to just before the next loop boundary under the
 * new intermission.
 */
export function applyIntermissionChange(
  renderedFrames: number,
  composition: Composition,
  previousIntermission: number,
  intermission: number,
): number {
  const length = composition.frameEnd - composition.frameStart;
  const previousCycle = length + previousIntermission;

  let loops = 0;
  if (renderedFrames > previousCycle && previousCycle > 0) {
    loops = Math.floor(renderedFrames / previousCycle);
  } else if (renderedFrames > length) {
    loops = 1;
  }

  const inIntermission =
    renderedFrames > length &&
    renderedFrames >= loops * length &&
    renderedFrames < loops * length + previousIntermission;

  if (inIntermission) {
    return previousFloat(loops * (length + intermission));
  }
  const shift = (intermission - previousIntermission) * loops;
  return Math.max(0, renderedFrames + shift);
}

/**
 * Move the playhead to `frame` within the loop it is currently in.
 *
 * The frame is clamped into the playable segment (end exclusive) and
 * mirrored for reverse playback. Seeking to frame 0 while on loop 5 lands
 * on loop 5's frame 0.
 */
export function seekPlayhead(
  renderedFrames: number,
  composition: Composition,
  settings: PlaybackSettings,
  frame: number,
): number {
  const { start, end } = effectiveRange(composition, settings.segments);
  const lastFrame = Math.max(start, previousFloat(end));
  const bounded = Math.min(Math.max(frame, start), lastFrame);
  const seek = settings.direction === "normal" ? bounded : end - bounded;

  const cycle = end - start + settings.intermission;
  const loops = cycle > 0 ? Math.floor(Math.max(0, renderedFrames) / cycle) : 0;
  return loops * cycle + seek;
}

/**
 * Remap the playhead when a state commit keeps the same asset and neither
 * state asks for a reset.
 *
 * @param playhead - `calculatePlayhead` under the outgoing settings
 */
export function remapPlayhead(
  renderedFrames: number,
  composition: Composition,
  playhead: number,
  from: PlaybackDirection,
  to: PlaybackDirection,
): number {
  const lastFrame = previousFloat(composition.frameEnd);
  if (from === "normal" && to === "reverse") {
    return Math.min(composition.frameEnd - playhead, lastFrame);
  }
  if (from === "reverse" && to === "normal") {
    return playhead;
  }
  // Same direction: collapse accumulated loops into a single-loop position,
  // the incoming state counts its loops from scratch.
  const length = composition.frameEnd - composition.frameStart;
  if (length <= 0) return 0;
  return Math.min(renderedFrames % length, lastFrame);
}
