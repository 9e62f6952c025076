export { previousFloat } from "./float.js";
export {
  effectiveRange,
  elapsedFrames,
  loopsCompleted,
  isPlaybackComplete,
  calculatePlayhead,
  applyIntermissionChange,
  seekPlayhead,
  remapPlayhead,
} from "./playhead.js";
export type { FrameRange } from "./playhead.js";
export {
  DEFAULT_PLAYBACK_SETTINGS,
  playbackSettingsSchema,
  loopBehaviorSchema,
  speedSchema,
  intermissionSchema,
  seekFrameSchema,
  parsePlaybackSettings,
  parseOrThrow,
} from "./settings.js";
