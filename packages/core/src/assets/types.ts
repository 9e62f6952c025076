/**
 * Asset records the engine reads and mutates.
 *
 * Decoding and rendering live outside this package; an asset here is only
 * the state the playhead arithmetic and hit testing need.
 */

/** Immutable frame range and rate of a decoded composition. */
export interface Composition {
  /** First frame (inclusive). */
  readonly frameStart: number;
  /** Last frame (exclusive). */
  readonly frameEnd: number;
  /** Frames per second. Must be > 0. */
  readonly frameRate: number;
}

/** A frame-based animation. */
export interface LottieAsset {
  readonly kind: "lottie";
  readonly composition: Composition;
  /**
   * Playhead in frames since the start of the timeline, not wrapped into a
   * single loop. Mutated only by the engine.
   */
  renderedFrames: number;
  /** Clock time (ms) the asset first played since the last state entry. */
  firstFrame: number | null;
  /** Content width in local units. */
  readonly width: number;
  /** Content height in local units. */
  readonly height: number;
}

/** A static image. Has no frames, so `onComplete` cannot apply to it. */
export interface SvgAsset {
  readonly kind: "svg";
  firstFrame: number | null;
  readonly width: number;
  readonly height: number;
}

/**
 * An asset, discriminated on `kind`.
 */
export type AnimationAsset = LottieAsset | SvgAsset;

/** Stable reference into an AssetStore. Compare by identity. */
export interface AssetHandle {
  readonly id: number;
}

/** Options for `createLottieAsset`. */
export interface LottieAssetOptions extends Composition {
  readonly width: number;
  readonly height: number;
}

/** Create a frame-based asset with its playhead at 0. */
export function createLottieAsset(options: LottieAssetOptions): LottieAsset {
  if (!(options.frameRate > 0)) {
    throw new RangeError(`frameRate must be > 0, got ${options.frameRate}`);
  }
  return {
    kind: "lottie",
    composition: {
      frameStart: options.frameStart,
      frameEnd: options.frameEnd,
      frameRate: options.frameRate,
    },
    renderedFrames: 0,
    firstFrame: null,
    width: options.width,
    height: options.height,
  };
}

/** Create a static-image asset. */
export function createSvgAsset(options: { readonly width: number; readonly height: number }): SvgAsset {
  return { kind: "svg", firstFrame: null, width: options.width, height: options.height };
}
