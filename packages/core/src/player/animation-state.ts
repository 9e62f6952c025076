/**
 * AnimationState: one node of a player's state graph.
 *
 * Built with chained `with*` calls:
 *
 * @example
 * ```ts
 * const hover = new AnimationState("hover")
 *   .withAsset(hoverHandle)
 *   .withPlaybackSettings({ ...DEFAULT_PLAYBACK_SETTINGS, direction: "reverse" })
 *   .withTransition({ type: "onMouseLeave", state: "idle" })
 *   .withResetPlayheadOnStart(true);
 * ```
 */

import type { AnimationTransition, PlaybackSettings, Theme } from "@playhead/schema";
import type { AssetHandle } from "../assets/types.js";

export class AnimationState {
  readonly id: string;
  /** Asset to bind on entry. Absent: keep whatever asset is bound. */
  asset: AssetHandle | undefined = undefined;
  theme: Theme | undefined = undefined;
  /** Settings applied on entry. Absent: the default settings. */
  playbackSettings: PlaybackSettings | undefined = undefined;
  /** Evaluated in order; the first rule that matches wins the tick. */
  readonly transitions: AnimationTransition[] = [];
  /** Reset the playhead to 0 when leaving this state. */
  resetPlayheadOnTransition = false;
  /** Reset the playhead to 0 when entering this state. */
  resetPlayheadOnStart = false;

  constructor(id: string) {
    this.id = id;
  }

  withAsset(asset: AssetHandle): this {
    this.asset = asset;
    return this;
  }

  withTheme(theme: Theme): this {
    this.theme = theme;
    return this;
  }

  withPlaybackSettings(settings: PlaybackSettings): this {
    this.playbackSettings = settings;
    return this;
  }

  withTransition(transition: AnimationTransition): this {
    this.transitions.push(transition);
    return this;
  }

  withResetPlayheadOnTransition(reset: boolean): this {
    this.resetPlayheadOnTransition = reset;
    return this;
  }

  withResetPlayheadOnStart(reset: boolean): this {
    this.resetPlayheadOnStart = reset;
    return this;
  }
}
