export { AnimationState } from "./animation-state.js";
export { LottiePlayer } from "./lottie-player.js";
export type { ValidationResult } from "./lottie-player.js";
export { loadStateMachine, stateMachineDefinitionSchema } from "./loader.js";
export type { AssetResolver } from "./loader.js";
