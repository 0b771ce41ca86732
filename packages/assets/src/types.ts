/**
 * Asset system types: archive records, backend selection, loader and packer configuration.
 */

/** Archive file magic, ASCII. */
export const ARCHIVE_MAGIC = 'GPAK';
/** The only archive format version this build reads and writes. */
export const ARCHIVE_VERSION = 1;
/** Fixed header size in bytes. */
export const HEADER_SIZE = 20;

/** Per-entry compression. `none` bypasses decompression entirely. */
export type CompressionKind = 'none' | 'deflate';

/** DEFLATE levels accepted by the packer. */
export type CompressionLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/** Decoded archive header. */
export interface ArchiveHeader {
  readonly version: number;
  readonly entryCount: number;
  /** Byte length of the index region. */
  readonly indexLength: number;
  /** Byte length of the entry data region. */
  readonly dataLength: number;
}

/** One index record. Offsets are relative to the start of entry data. */
export interface IndexEntry {
  readonly path: string;
  readonly offset: number;
  readonly storedLength: number;
  readonly uncompressedLength: number;
  readonly compression: CompressionKind;
}

/** Which storage a backend reads from. */
export type BackendKind = 'folder' | 'archive' | 'embedded';

/** Startup selection of one backend and its source. */
export type BackendConfig =
  | { readonly kind: 'folder'; readonly root: string }
  | { readonly kind: 'archive'; readonly path: string; readonly preload?: boolean }
  | { readonly kind: 'embedded'; readonly bytes: Uint8Array };

/** Options for the AssetLoader. */
export interface AssetLoaderOptions {
  /** Memoize decoded bytes per logical path. Default: true. */
  decodeCache: boolean;
}

/** Default asset loader options. */
export const DEFAULT_LOADER_OPTIONS: AssetLoaderOptions = {
  decodeCache: true,
};

/** File names the packer skips and the folder backend hides. */
export const DEFAULT_IGNORED_FILE_NAMES: readonly string[] = ['.DS_Store', 'Thumbs.db', 'desktop.ini'];

/** Configuration for the packer. */
export interface PackerConfig {
  /** DEFLATE level for allowlisted entries. Default: 6. */
  compressionLevel: CompressionLevel;
  /** Lower-case extensions (with dot) eligible for compression. */
  compressExtensions: readonly string[];
  /** Exact file names left out of the archive. */
  ignoredFileNames: readonly string[];
}

/** Default packer configuration. Already-compressed formats (png, ogg, ...) are left out. */
export const DEFAULT_PACKER_CONFIG: PackerConfig = {
  compressionLevel: 6,
  compressExtensions: [
    '.txt', '.json', '.ini', '.csv', '.xml', '.yaml', '.yml', '.toml',
    '.glsl', '.wgsl', '.frag', '.vert', '.obj', '.gltf', '.svg', '.ttf',
    '.bin', '.bmp', '.tga', '.wav', '.map', '.lvl',
  ],
  ignoredFileNames: DEFAULT_IGNORED_FILE_NAMES,
};

/** Progress callback signature. */
export type ProgressCallback = (loaded: number, total: number) => void;
