export { AnimationEngine } from "./engine.js";
export type { AnimationEngineOptions, SpawnOptions } from "./engine.js";
export { applyPlayerInputs, advancePlayheads, runTransitions, setState } from "./stages.js";
export type { StageContext } from "./stages.js";
export { createConsoleLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { NO_POINTER, NO_HIT_TESTER } from "./types.js";
export type {
  PlayerEntity,
  PointerPosition,
  PointerSnapshot,
  PointerSource,
  HitTester,
} from "./types.js";
