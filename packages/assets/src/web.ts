/**
 * Filesystem-free surface of @gamepak/assets, safe to bundle for a sandboxed target.
 */

export {
  ARCHIVE_MAGIC,
  ARCHIVE_VERSION,
  DEFAULT_IGNORED_FILE_NAMES,
  DEFAULT_LOADER_OPTIONS,
  DEFAULT_PACKER_CONFIG,
  HEADER_SIZE,
} from './types.js';
export type {
  ArchiveHeader,
  AssetLoaderOptions,
  BackendConfig,
  BackendKind,
  CompressionKind,
  CompressionLevel,
  IndexEntry,
  PackerConfig,
  ProgressCallback,
} from './types.js';

export {
  AssetError,
  AssetCorruptError,
  AssetNotFoundError,
  CorruptArchiveError,
  DuplicatePathError,
  InvalidAssetPathError,
  IoFailureError,
  SourceNotFoundError,
  UnsupportedVersionError,
} from './errors.js';

export {
  compareLogicalPaths,
  isIgnoredFileName,
  listUnder,
  normalizeLogicalPath,
  validateLogicalPath,
} from './logical-path.js';
export { assetId, assetRef, fnv1a64 } from './asset-id.js';
export type { AssetRef } from './asset-id.js';
export { compress, decompress, extensionOf, shouldCompress } from './compression.js';
export {
  ArchiveIndex,
  archiveLayout,
  decodeEntry,
  decodeHeader,
  decodeIndex,
  encodeArchive,
  extractEntry,
  readArchive,
  storedBytes,
} from './archive-format.js';
export type { ArchiveInputEntry, ArchiveLayout, DecodedArchive } from './archive-format.js';

export type { AssetBackend } from './backends/backend.js';
export { EmbeddedBackend, decodeBase64 } from './backends/embedded-backend.js';
export { DecodeCache } from './decode-cache.js';
export type { DecodeCacheStats } from './decode-cache.js';
export { AssetLoader } from './asset-loader.js';
