/**
 * @playhead/core: playhead arithmetic and state-machine runtime for
 * interactive vector animations.
 *
 * No rendering or decoding dependencies. Runs in browser and Node.js.
 */

export {
  AnimationEngine,
  applyPlayerInputs,
  advancePlayheads,
  runTransitions,
  setState,
  createConsoleLogger,
  silentLogger,
  NO_POINTER,
  NO_HIT_TESTER,
} from "./engine/index.js";
export type {
  AnimationEngineOptions,
  SpawnOptions,
  StageContext,
  Logger,
  PlayerEntity,
  PointerPosition,
  PointerSnapshot,
  PointerSource,
  HitTester,
} from "./engine/index.js";

export { AnimationState, LottiePlayer, loadStateMachine, stateMachineDefinitionSchema } from "./player/index.js";
export type { ValidationResult, AssetResolver } from "./player/index.js";

export { AssetStore, createLottieAsset, createSvgAsset } from "./assets/index.js";
export type {
  AnimationAsset,
  AssetHandle,
  Composition,
  LottieAsset,
  LottieAssetOptions,
  SvgAsset,
} from "./assets/index.js";

export {
  previousFloat,
  effectiveRange,
  elapsedFrames,
  loopsCompleted,
  isPlaybackComplete,
  calculatePlayhead,
  applyIntermissionChange,
  seekPlayhead,
  remapPlayhead,
  DEFAULT_PLAYBACK_SETTINGS,
  playbackSettingsSchema,
  loopBehaviorSchema,
  speedSchema,
  intermissionSchema,
  seekFrameSchema,
  parsePlaybackSettings,
  parseOrThrow,
} from "./playhead/index.js";
export type { FrameRange } from "./playhead/index.js";

export { TestClock, BrowserClock, TimerClock } from "./clock/index.js";
export type {
  Clock,
  CancelHandle,
  FrameCallback,
  AnimationFrameHost,
  TimerClockOptions,
} from "./clock/index.js";

export {
  UnknownStateError,
  InvalidTransitionError,
  StateMachineValidationError,
  PlaybackInputError,
} from "./errors.js";
