/**
 * HitTester backed by three.js transforms.
 *
 * The host pushes each entity's world transform whenever it moves the
 * entity. Assets may carry their own local-content-center transform;
 * without one, content is centred on the entity origin.
 */

import * as THREE from "three";
import type {
  AnimationAsset,
  AssetHandle,
  HitTester,
  PlayerEntity,
  PointerPosition,
} from "@playhead/core";
import { centeredContentTransform, isPointerInside } from "./hit-test.js";

const IDENTITY = new THREE.Matrix4();

export class TransformHitTester implements HitTester {
  private readonly worldTransforms = new Map<string, THREE.Matrix4>();
  private readonly contentTransforms = new Map<AssetHandle, THREE.Matrix4>();

  /** Set an entity's world transform. The matrix is copied. */
  setWorldTransform(entityId: string, matrix: THREE.Matrix4): void {
    const stored = this.worldTransforms.get(entityId) ?? new THREE.Matrix4();
    stored.copy(matrix);
    this.worldTransforms.set(entityId, stored);
  }

  /** Forget an entity; it is then tested at the world origin. */
  removeEntity(entityId: string): void {
    this.worldTransforms.delete(entityId);
  }

  /** Override an asset's local-content-center transform. The matrix is copied. */
  setContentTransform(handle: AssetHandle, matrix: THREE.Matrix4): void {
    this.contentTransforms.set(handle, matrix.clone());
  }

  isPointerInside(entity: PlayerEntity, asset: AnimationAsset, pointer: PointerPosition): boolean {
    const world = this.worldTransforms.get(entity.id) ?? IDENTITY;
    const content =
      this.contentTransforms.get(entity.asset) ?? centeredContentTransform(asset.width, asset.height);
    return isPointerInside(pointer, world, content, asset.width, asset.height);
  }
}
