export { JsonManifestCodec, manifestFromRecord } from './codec.js';
export type { JsonManifestCodecOptions } from './codec.js';
export { detectManifestFormat, validateManifestFile } from './inspect.js';
export {
  ManifestSchema,
  ManifestFileEntrySchema,
  ManifestChunkPartSchema,
  formatIssues,
} from './schema.js';
export type { ManifestDocument } from './schema.js';
export type { ManifestFile, ParsedManifest, ManifestCodec, ManifestFormat } from './types.js';
