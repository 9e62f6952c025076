/**
 * Pointer-inside test for animation bounds.
 *
 * The pointer's world position is carried into the animation's local
 * space through the inverse of `world * inverse(localTransformCenter)`.
 * Local space has its origin at the content's top-left corner with +Y up,
 * so the content covers `0 ≤ x ≤ width`, `-height ≤ y ≤ 0`.
 */

import * as THREE from "three";
import type { PointerPosition } from "@playhead/core";

const _transform = new THREE.Matrix4();
const _centerInverse = new THREE.Matrix4();
const _local = new THREE.Vector3();

/** Whether `pointer` lies inside a `width` × `height` animation. */
export function isPointerInside(
  pointer: PointerPosition,
  worldTransform: THREE.Matrix4,
  localTransformCenter: THREE.Matrix4,
  width: number,
  height: number,
): boolean {
  _centerInverse.copy(localTransformCenter).invert();
  _transform.copy(worldTransform).multiply(_centerInverse).invert();
  _local.set(pointer.x, pointer.y, 0).applyMatrix4(_transform);

  return _local.x >= 0 && _local.x <= width && _local.y >= -height && _local.y <= 0;
}

/**
 * The local-content-center transform that centres a `width` × `height`
 * animation on its entity's origin.
 */
export function centeredContentTransform(width: number, height: number): THREE.Matrix4 {
  return new THREE.Matrix4().makeTranslation(width / 2, -height / 2, 0);
}
