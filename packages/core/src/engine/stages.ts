/**
 * The four tick stages.
 *
 * The engine runs them in this order, each one over every entity before the
 * next begins:
 *
 *   applyPlayerInputs → advancePlayheads → runTransitions → setState
 *
 * Inputs are folded into the playhead before it advances, it advances
 * before transitions are judged against it, and transitions are decided
 * before the commit consumes them.
 */

import type { AnimationTransition, PlaybackSettings } from "@playhead/schema";
import type { AssetStore } from "../assets/asset-store.js";
import type { AnimationAsset, AssetHandle } from "../assets/types.js";
import { InvalidTransitionError } from "../errors.js";
import type { AnimationState } from "../player/animation-state.js";
import {
  applyIntermissionChange,
  calculatePlayhead,
  elapsedFrames,
  remapPlayhead,
  seekPlayhead,
} from "../playhead/playhead.js";
import { DEFAULT_PLAYBACK_SETTINGS } from "../playhead/settings.js";
import type { Logger } from "./logger.js";
import type { HitTester, PlayerEntity, PointerSnapshot } from "./types.js";

/** Shared inputs of every stage. */
export interface StageContext {
  readonly entities: readonly PlayerEntity[];
  readonly assets: AssetStore;
  readonly logger: Logger;
}

// ---------------------------------------------------------------------------
// Stage 1: player inputs
// ---------------------------------------------------------------------------

/**
 * Fold pending seek / speed / intermission requests into the playhead and
 * the entity's settings. Intermission goes first because the seek keeps the
 * loop count under the updated intermission.
 *
 * Requests wait while the bound asset is not a ready frame-based asset.
 */
export function applyPlayerInputs(context: StageContext): void {
  for (const entity of context.entities) {
    const player = entity.player;
    if (!player) continue;

    const asset = context.assets.get(entity.asset);
    if (asset?.kind !== "lottie") continue;

    const initial = entity.settings ?? DEFAULT_PLAYBACK_SETTINGS;
    let settings = initial;

    const intermission = player.takePendingIntermission();
    if (intermission !== null) {
      asset.renderedFrames = applyIntermissionChange(
        asset.renderedFrames,
        asset.composition,
        settings.intermission,
        intermission,
      );
      settings = { ...settings, intermission };
    }

    const seekFrame = player.takePendingSeek();
    if (seekFrame !== null) {
      asset.renderedFrames = seekPlayhead(asset.renderedFrames, asset.composition, settings, seekFrame);
    }

    const speed = player.takePendingSpeed();
    if (speed !== null) {
      settings = { ...settings, speed };
    }

    if (settings !== initial) {
      entity.settings = settings;
    }
  }
}

// ---------------------------------------------------------------------------
// Stage 2: playheads
// ---------------------------------------------------------------------------

/**
 * Integrate elapsed time into every playhead, once per asset.
 *
 * Uncontrolled assets always play. Controlled ones play unless stopped or
 * paused; autoplay arms a player that has not started yet. The first tick
 * that plays records the asset's first-frame time.
 *
 * @param dt - Seconds since the previous tick
 * @param now - Clock time in ms
 */
export function advancePlayheads(context: StageContext, dt: number, now: number): void {
  const advanced = new Set<AssetHandle>();

  const advance = (handle: AssetHandle, asset: AnimationAsset, settings: PlaybackSettings): void => {
    if (asset.kind !== "lottie" || advanced.has(handle)) return;
    advanced.add(handle);
    asset.renderedFrames += elapsedFrames(dt, settings.speed, asset.composition.frameRate);
  };

  for (const entity of context.entities) {
    const asset = context.assets.get(entity.asset);
    if (!asset) continue;

    const settings = entity.settings ?? DEFAULT_PLAYBACK_SETTINGS;
    const player = entity.player;
    if (!player) {
      advance(entity.asset, asset, settings);
      continue;
    }

    if (player.isStopped()) continue;
    if (settings.autoplay) {
      player.autoplay();
    }
    if (!player.isPlaying()) continue;

    if (asset.firstFrame === null) {
      asset.firstFrame = now;
    }
    player.markStarted();
    advance(entity.asset, asset, settings);
  }
}

// ---------------------------------------------------------------------------
// Stage 3: transitions
// ---------------------------------------------------------------------------

/** Everything a transition predicate may look at. */
interface TransitionInputs {
  readonly asset: AnimationAsset;
  readonly settings: PlaybackSettings;
  readonly inside: boolean;
  readonly wasHovered: boolean;
  readonly leftJustPressed: boolean;
  readonly now: number;
}

function matches(state: AnimationState, transition: AnimationTransition, inputs: TransitionInputs): boolean {
  const { asset } = inputs;
  switch (transition.type) {
    case "onAfter":
      return asset.firstFrame !== null && (inputs.now - asset.firstFrame) / 1000 >= transition.secs;
    case "onComplete": {
      if (asset.kind !== "lottie") {
        throw new InvalidTransitionError(
          state.id,
          "`onComplete` is only valid for frame-based assets. Use `onAfter` for static images.",
        );
      }
      const { frameStart, frameEnd } = asset.composition;
      return asset.renderedFrames >= frameEnd - frameStart + inputs.settings.intermission;
    }
    case "onMouseEnter":
      return inputs.inside;
    case "onMouseClick":
      return inputs.inside && inputs.leftJustPressed;
    case "onMouseLeave":
      return inputs.wasHovered && !inputs.inside;
    case "onShow":
      return asset.firstFrame !== null;
  }
}

/**
 * Evaluate the current state's transitions in declared order; the first
 * one that matches arms the next state.
 *
 * Stopped players are skipped. The hovered latch is written on every other
 * tick, whichever rule fires; a player that already has a transition
 * waiting to be committed gets its latch written but no rule walk, so the
 * pending request wins.
 *
 * @param now - Clock time in ms
 */
export function runTransitions(
  context: StageContext,
  pointer: PointerSnapshot,
  hitTester: HitTester,
  now: number,
): void {
  for (const entity of context.entities) {
    const player = entity.player;
    if (!player || player.isStopped()) continue;

    const asset = context.assets.get(entity.asset);
    if (!asset) continue;

    const inside =
      pointer.position !== null && hitTester.isPointerInside(entity, asset, pointer.position);
    const wasHovered = entity.hovered;
    entity.hovered = inside;
    if (player.nextState !== null) continue;

    const state = player.state();
    const inputs: TransitionInputs = {
      asset,
      settings: entity.settings ?? DEFAULT_PLAYBACK_SETTINGS,
      inside,
      wasHovered,
      leftJustPressed: pointer.leftJustPressed,
      now,
    };

    const fired = state.transitions.find((transition) => matches(state, transition, inputs));
    if (fired) {
      player.requestState(fired.state);
    }
  }
}

// ---------------------------------------------------------------------------
// Stage 4: commit
// ---------------------------------------------------------------------------

/**
 * Commit pending transitions.
 *
 * The target asset is resolved and checked for readiness before anything
 * is mutated; a target that is not ready re-arms the same transition for
 * the next tick. On commit the playhead is either reset or remapped so the
 * incoming state picks up where the outgoing one left off.
 */
export function setState(context: StageContext): void {
  for (const entity of context.entities) {
    const player = entity.player;
    if (!player) continue;

    const nextId = player.takeNextState();
    if (nextId === null) continue;

    player.clearRunStatus();

    const target = player.getState(nextId);
    const targetHandle = target.asset ?? entity.asset;
    const asset = context.assets.get(targetHandle);
    if (!asset) {
      context.logger.warn(
        `asset ${targetHandle.id} not ready for ${entity.id} transition to '${nextId}', re-queueing`,
      );
      player.requestState(nextId);
      continue;
    }

    context.logger.info(`transitioning ${entity.id} from=${player.currentState} to=${nextId}`);

    const outgoing = player.state();
    const changedAsset = targetHandle !== entity.asset;
    entity.asset = targetHandle;

    const settings = entity.settings ?? DEFAULT_PLAYBACK_SETTINGS;
    asset.firstFrame = null;
    if (asset.kind === "lottie") {
      const playhead = calculatePlayhead(asset.renderedFrames, asset.composition, settings);
      if (outgoing.resetPlayheadOnTransition || target.resetPlayheadOnStart || changedAsset) {
        asset.renderedFrames = 0;
      } else {
        asset.renderedFrames = remapPlayhead(
          asset.renderedFrames,
          asset.composition,
          playhead,
          settings.direction,
          target.playbackSettings?.direction ?? "normal",
        );
      }
    }

    if (target.theme) {
      entity.theme = target.theme;
    }
    entity.settings = target.playbackSettings;
    player.commitState(nextId);
  }
}
