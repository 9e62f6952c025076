export { AssetStore } from "./asset-store.js";
export { createLottieAsset, createSvgAsset } from "./types.js";
export type {
  AnimationAsset,
  AssetHandle,
  Composition,
  LottieAsset,
  LottieAssetOptions,
  SvgAsset,
} from "./types.js";
