/**
 * @playhead/stage: three.js collaborators for @playhead/core.
 *
 * Supplies the engine's HitTester and PointerSource from world transforms
 * and an orthographic view camera. Rendering stays with the host.
 */

export { TransformHitTester } from "./transform-hit-tester.js";
export { PointerTracker } from "./pointer-tracker.js";
export { isPointerInside, centeredContentTransform } from "./hit-test.js";
export { createViewCamera, resizeViewCamera } from "./view-camera.js";

export type { ViewCameraOptions } from "./view-camera.js";
