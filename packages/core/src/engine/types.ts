/**
 * Entity and collaborator types for the animation engine.
 */

import type { PlaybackSettings, Theme } from "@playhead/schema";
import type { AnimationAsset, AssetHandle } from "../assets/types.js";
import type { LottiePlayer } from "../player/lottie-player.js";

/** Pointer position in world coordinates. */
export interface PointerPosition {
  readonly x: number;
  readonly y: number;
}

/** Pointer state sampled once per tick. */
export interface PointerSnapshot {
  /** World position, or `null` when no pointer is over the view. */
  readonly position: PointerPosition | null;
  /** Left button went down since the previous snapshot. */
  readonly leftJustPressed: boolean;
}

/** Supplies one pointer snapshot per tick. */
export interface PointerSource {
  snapshot(): PointerSnapshot;
}

/** A pointer source with no pointer. */
export const NO_POINTER: PointerSource = {
  snapshot: () => ({ position: null, leftJustPressed: false }),
};

/**
 * Decides whether the pointer lies inside an entity's animation bounds.
 * Implemented by the stage layer, which knows world transforms.
 */
export interface HitTester {
  isPointerInside(entity: PlayerEntity, asset: AnimationAsset, pointer: PointerPosition): boolean;
}

/** A hit tester for hosts without a camera: nothing is ever inside. */
export const NO_HIT_TESTER: HitTester = {
  isPointerInside: () => false,
};

/** Internal record for a managed entity. */
export interface PlayerEntity {
  readonly id: string;
  /** Asset currently bound. Swapped by state commits. */
  asset: AssetHandle;
  /** Absent: an uncontrolled asset that plays with default settings. */
  readonly player: LottiePlayer | undefined;
  /** Settings of the current playback. Absent: the defaults. */
  settings: PlaybackSettings | undefined;
  theme: Theme | undefined;
  /** Pointer was inside on the last evaluated tick. */
  hovered: boolean;
}
