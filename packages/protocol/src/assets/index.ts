export { AssetHandle, type AssetResolver, type AssetStatus } from './handle.js';
export { resolveAssetPath, toAssetPath } from './paths.js';
