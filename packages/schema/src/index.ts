/**
 * @playhead/schema: shared types for playback settings and state machines.
 *
 * This package is the shared contract between all playhead packages.
 * state-machine.schema.json is the source of truth for definition files;
 * TypeScript types are aligned with it.
 */

export type {
  PlaybackDirection,
  PlaybackLoopBehavior,
  DoNotLoop,
  LoopAmount,
  LoopForever,
  FrameSegment,
  PlaybackSettings,
} from "./playback-settings-types.js";

export type {
  AnimationTransition,
  AnimationTransitionType,
  OnAfterTransition,
  OnCompleteTransition,
  OnMouseEnterTransition,
  OnMouseClickTransition,
  OnMouseLeaveTransition,
  OnShowTransition,
  Theme,
  AnimationStateDefinition,
  StateMachineDefinition,
} from "./state-machine-types.js";
