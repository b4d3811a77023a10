export { Library } from './library.js';
export { CursorWalker, pageAssets } from './cursor-walker.js';
export type { CursorWalkerOptions } from './cursor-walker.js';
export { mapAssetRecord, isRecord } from './asset-mapper.js';
export type {
  RawRecord,
  Cursor,
  License,
  Seller,
  AssetFormatType,
  TechnicalSpecs,
  ListingFormat,
  Listing,
  Capabilities,
  Asset,
  LibraryPage,
} from './types.js';
