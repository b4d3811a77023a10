export {
  AssetResolver,
  normalizeFormats,
  findFileUid,
  selectManifestEntry,
} from './asset-resolver.js';
export type { AssetResolverOptions } from './asset-resolver.js';
export type { FormatFile, AssetFormatEntry, ManifestLocation, ResolvedManifest } from './types.js';
