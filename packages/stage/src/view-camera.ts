/**
 * Orthographic camera for a 2D animation view.
 *
 * Camera sits on +Z looking at the origin, +Y up. With no `viewSize`,
 * world units map 1:1 to viewport pixels and the origin is the viewport
 * centre.
 */

import * as THREE from "three";

/** Configuration for creating a view camera. */
export interface ViewCameraOptions {
  /** Viewport width in pixels. */
  readonly width: number;
  /** Viewport height in pixels. */
  readonly height: number;
  /** Vertical view span in world units. Default: the viewport height. */
  readonly viewSize?: number;
}

/** Create an OrthographicCamera framing the XY plane. */
export function createViewCamera(options: ViewCameraOptions): THREE.OrthographicCamera {
  const { width, height, viewSize = height } = options;
  const aspect = width / height;

  const camera = new THREE.OrthographicCamera(
    (-viewSize * aspect) / 2,
    (viewSize * aspect) / 2,
    viewSize / 2,
    -viewSize / 2,
    0.1,
    1000,
  );

  camera.position.set(0, 0, 100);
  camera.lookAt(0, 0, 0);
  camera.updateMatrixWorld();

  return camera;
}

/** Update camera frustum for a new viewport size. */
export function resizeViewCamera(
  camera: THREE.OrthographicCamera,
  width: number,
  height: number,
  viewSize: number = height,
): void {
  const aspect = width / height;
  camera.left = (-viewSize * aspect) / 2;
  camera.right = (viewSize * aspect) / 2;
  camera.top = viewSize / 2;
  camera.bottom = -viewSize / 2;
  camera.updateProjectionMatrix();
}
