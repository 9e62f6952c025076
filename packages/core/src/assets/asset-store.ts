/**
 * AssetStore: arena of animation assets keyed by stable handles.
 *
 * Several entities may reference the same asset, so entities hold handles
 * rather than the asset itself, and the integration stage advances each
 * handle at most once per tick. A handle may be reserved before its content
 * is decoded; `get()` returns `undefined` until it is resolved.
 */

import type { AnimationAsset, AssetHandle } from "./types.js";

export class AssetStore {
  private nextId = 1;
  private readonly handles = new Map<number, AssetHandle>();
  private readonly assets = new Map<number, AnimationAsset>();

  /** Reserve a handle whose content is not ready yet. */
  reserve(): AssetHandle {
    const handle: AssetHandle = Object.freeze({ id: this.nextId++ });
    this.handles.set(handle.id, handle);
    return handle;
  }

  /**
   * Provide the content for a reserved handle, making it ready.
   *
   * @throws Error if the handle was not issued by this store
   */
  resolve(handle: AssetHandle, asset: AnimationAsset): void {
    if (this.handles.get(handle.id) !== handle) {
      throw new Error(`Unknown asset handle: ${handle.id}`);
    }
    this.assets.set(handle.id, asset);
  }

  /** Add a ready asset and return its handle. */
  insert(asset: AnimationAsset): AssetHandle {
    const handle = this.reserve();
    this.assets.set(handle.id, asset);
    return handle;
  }

  /** The asset behind a handle, or `undefined` while it is not ready. */
  get(handle: AssetHandle): AnimationAsset | undefined {
    return this.assets.get(handle.id);
  }

  /** Whether the handle's content is ready. */
  isReady(handle: AssetHandle): boolean {
    return this.assets.has(handle.id);
  }

  /** Drop a handle and its content. */
  remove(handle: AssetHandle): void {
    this.handles.delete(handle.id);
    this.assets.delete(handle.id);
  }

  /** Number of issued handles, ready or not. */
  get size(): number {
    return this.handles.size;
  }
}
