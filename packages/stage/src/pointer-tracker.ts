/**
 * Pointer state for the animation engine.
 *
 * The host forwards pointer events here, either already in world
 * coordinates or as viewport coordinates that are unprojected through an
 * orthographic camera. The engine samples one snapshot per tick; a left
 * press is reported in exactly one snapshot.
 */

import * as THREE from "three";
import type { PointerPosition, PointerSnapshot, PointerSource } from "@playhead/core";

/** `MouseEvent.button` of the primary button. */
const LEFT_BUTTON = 0;

export class PointerTracker implements PointerSource {
  private readonly camera: THREE.OrthographicCamera;
  private readonly ndc = new THREE.Vector3();
  private viewportWidth: number;
  private viewportHeight: number;

  private position: PointerPosition | null = null;
  private leftDown = false;
  private leftJustPressed = false;

  constructor(camera: THREE.OrthographicCamera, viewportWidth: number, viewportHeight: number) {
    this.camera = camera;
    this.viewportWidth = viewportWidth;
    this.viewportHeight = viewportHeight;
  }

  /** Update the viewport size used by `moveToViewport`. */
  setViewportSize(width: number, height: number): void {
    this.viewportWidth = width;
    this.viewportHeight = height;
  }

  /** Pointer moved to a world position. */
  moveTo(world: PointerPosition): void {
    this.position = { x: world.x, y: world.y };
  }

  /**
   * Pointer moved to viewport coordinates, top-left origin, y down
   * (`clientX - rect.left`, `clientY - rect.top`).
   */
  moveToViewport(x: number, y: number): void {
    this.ndc.set((x / this.viewportWidth) * 2 - 1, -(y / this.viewportHeight) * 2 + 1, 0);
    this.camera.updateMatrixWorld();
    this.ndc.unproject(this.camera);
    this.position = { x: this.ndc.x, y: this.ndc.y };
  }

  /** Pointer left the view. */
  leave(): void {
    this.position = null;
  }

  press(button: number): void {
    if (button !== LEFT_BUTTON) return;
    if (!this.leftDown) {
      this.leftJustPressed = true;
    }
    this.leftDown = true;
  }

  release(button: number): void {
    if (button !== LEFT_BUTTON) return;
    this.leftDown = false;
  }

  snapshot(): PointerSnapshot {
    const snapshot: PointerSnapshot = {
      position: this.position,
      leftJustPressed: this.leftJustPressed,
    };
    this.leftJustPressed = false;
    return snapshot;
  }
}
