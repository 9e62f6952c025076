/**
 * TypeScript types for the state-machine definition format.
 *
 * These types are aligned with state-machine.schema.json; the JSON Schema
 * is the source of truth for authoring files.
 */

import type { PlaybackSettings } from "./playback-settings-types.js";

// ---------------------------------------------------------------------------
// Transitions (discriminated union)
// ---------------------------------------------------------------------------

/** Transition after the state has been playing for `secs` seconds. */
export interface OnAfterTransition {
  readonly type: "onAfter";
  /** Destination state id. */
  readonly state: string;
  readonly secs: number;
}

/**
 * Transition once every frame (plus the intermission) has played.
 * Only valid for frame-based assets; use `onAfter` for static images.
 */
export interface OnCompleteTransition {
  readonly type: "onComplete";
  readonly state: string;
}

/** Transition when the pointer is inside the animation bounds. */
export interface OnMouseEnterTransition {
  readonly type: "onMouseEnter";
  readonly state: string;
}

/** Transition when the left button is pressed while the pointer is inside. */
export interface OnMouseClickTransition {
  readonly type: "onMouseClick";
  readonly state: string;
}

/** Transition when a hovering pointer leaves the animation bounds. */
export interface OnMouseLeaveTransition {
  readonly type: "onMouseLeave";
  readonly state: string;
}

/** Transition once the state's first frame has been shown. */
export interface OnShowTransition {
  readonly type: "onShow";
  readonly state: string;
}

/**
 * A transition rule, discriminated on `type`.
 *
 * Check `transition.type` to narrow:
 * - `"onAfter"` → `OnAfterTransition`
 * - `"onComplete"` → `OnCompleteTransition`
 * - `"onMouseEnter"` / `"onMouseClick"` / `"onMouseLeave"` / `"onShow"`
 */
export type AnimationTransition =
  | OnAfterTransition
  | OnCompleteTransition
  | OnMouseEnterTransition
  | OnMouseClickTransition
  | OnMouseLeaveTransition
  | OnShowTransition;

/** All transition trigger names. */
export type AnimationTransitionType = AnimationTransition["type"];

// ---------------------------------------------------------------------------
// Themes
// ---------------------------------------------------------------------------

/**
 * Color overrides applied to an animation while a state is active.
 * Keys are layer names, values CSS colors.
 */
export interface Theme {
  readonly id?: string;
  readonly colors: Readonly<Record<string, string>>;
}

// ---------------------------------------------------------------------------
// Definition documents
// ---------------------------------------------------------------------------

/**
 * One state as it appears in a definition file.
 *
 * `asset` is a name the loader resolves to a handle; absent means the state
 * reuses whatever asset is bound when it is entered.
 */
export interface AnimationStateDefinition {
  readonly id: string;
  readonly asset?: string;
  readonly theme?: Theme;
  /** Partial settings, completed with defaults on load. */
  readonly playbackSettings?: Partial<PlaybackSettings>;
  readonly transitions?: readonly AnimationTransition[];
  /** Reset the playhead to 0 when leaving this state. */
  readonly resetPlayheadOnTransition?: boolean;
  /** Reset the playhead to 0 when entering this state. */
  readonly resetPlayheadOnStart?: boolean;
}

/**
 * Top-level structure of a state-machine definition file.
 *
 * @example
 * ```json
 * {
 *   "initialState": "idle",
 *   "states": [
 *     { "id": "idle", "transitions": [{ "type": "onMouseEnter", "state": "hover" }] },
 *     { "id": "hover", "transitions": [{ "type": "onMouseLeave", "state": "idle" }] }
 *   ]
 * }
 * ```
 */
export interface StateMachineDefinition {
  readonly initialState: string;
  readonly states: readonly AnimationStateDefinition[];
}
