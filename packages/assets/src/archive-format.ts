/**
 * GPAK archive format.
 *
 * Layout (all integers little-endian):
 *   Header (20 bytes):
 *     [0..3]   Magic: "GPAK" (ASCII)
 *     [4..5]   Format version (uint16)
 *     [6..7]   Flags, reserved, must be 0 (uint16)
 *     [8..11]  Entry count (uint32)
 *     [12..15] Index byte length (uint32)
 *     [16..19] Entry data byte length (uint32)
 *
 *   Index (starting at offset 20), one record per entry, sorted by path:
 *     2 bytes: path byte length (uint16)
 *     variable: UTF-8 logical path
 *     1 byte: compression kind (0 = none, 1 = deflate)
 *     4 bytes: offset relative to the start of entry data (uint32)
 *     4 bytes: stored length (uint32)
 *     4 bytes: uncompressed length (uint32)
 *
 *   Entry data (starting at 20 + index byte length).
 *
 * The header alone tells a reader how many bytes of index to fetch, and each
 * record tells it where one entry lives, so a single asset can be read
 * without touching the rest of the data region.
 */

import { compressionCode, compressionFromCode, decompress } from './compression.js';
import {
  AssetCorruptError,
  CorruptArchiveError,
  DuplicatePathError,
  InvalidAssetPathError,
  UnsupportedVersionError,
  describeCause,
} from './errors.js';
import { compareLogicalPaths, validateLogicalPath } from './logical-path.js';
import type { ArchiveHeader, CompressionKind, IndexEntry } from './types.js';
import { ARCHIVE_MAGIC, ARCHIVE_VERSION, HEADER_SIZE } from './types.js';

const UINT16_MAX = 0xffff;
const UINT32_MAX = 0xffffffff;
/** Fixed bytes per index record besides the path itself. */
const RECORD_FIXED_SIZE = 2 + 1 + 4 + 4 + 4;

const encoder = new TextEncoder();
const pathDecoder = new TextDecoder('utf-8', { fatal: true });

/** An entry handed to the encoder, already compressed (or not) by the caller. */
export interface ArchiveInputEntry {
  readonly path: string;
  readonly stored: Uint8Array;
  readonly uncompressedLength: number;
  readonly compression: CompressionKind;
}

/** Byte positions of each region, derived from the header. */
export interface ArchiveLayout {
  readonly indexOffset: number;
  readonly dataOffset: number;
  /** Minimum source length for the archive to be complete. */
  readonly totalLength: number;
}

/** An archive decoded from a single in-memory region. */
export interface DecodedArchive {
  readonly header: ArchiveHeader;
  readonly index: ArchiveIndex;
  /** The entry data region (a view, not a copy). */
  readonly data: Uint8Array;
}

/**
 * Path-keyed view over the decoded index records.
 */
export class ArchiveIndex {
  private readonly byPath = new Map<string, IndexEntry>();

  constructor(public readonly entries: readonly IndexEntry[]) {
    for (const entry of entries) {
      this.byPath.set(entry.path, entry);
    }
  }

  get(path: string): IndexEntry | undefined {
    return this.byPath.get(path);
  }

  has(path: string): boolean {
    return this.byPath.has(path);
  }

  /** Logical paths in archive order (sorted). */
  paths(): string[] {
    return this.entries.map((entry) => entry.path);
  }

  get size(): number {
    return this.entries.length;
  }
}

// ===========================================================================
// Encoding
// ===========================================================================

/**
 * Encode entries into one archive. Entries are written in logical path order,
 * so the output depends only on the entry set.
 */
export function encodeArchive(entries: readonly ArchiveInputEntry[]): Uint8Array {
  const sorted = [...entries].sort((a, b) => compareLogicalPaths(a.path, b.path));

  let indexLength = 0;
  let dataLength = 0;
  const encodedPaths: Uint8Array[] = [];

  for (let i = 0; i < sorted.length; i++) {
    const entry = sorted[i]!;
    const reason = validateLogicalPath(entry.path);
    if (reason) {
      throw new InvalidAssetPathError(entry.path, reason);
    }
    if (i > 0 && sorted[i - 1]!.path === entry.path) {
      throw new DuplicatePathError(entry.path);
    }
    if (entry.compression === 'none' && entry.stored.byteLength !== entry.uncompressedLength) {
      throw new RangeError(
        `Stored entry "${entry.path}" has ${entry.stored.byteLength} bytes but declares ${entry.uncompressedLength}`,
      );
    }
    if (entry.uncompressedLength > UINT32_MAX) {
      throw new RangeError(`Entry "${entry.path}" is too large for the archive format`);
    }

    const pathBytes = encoder.encode(entry.path);
    if (pathBytes.byteLength > UINT16_MAX) {
      throw new InvalidAssetPathError(entry.path, 'Path is longer than 65535 bytes');
    }
    encodedPaths.push(pathBytes);
    indexLength += RECORD_FIXED_SIZE + pathBytes.byteLength;
    dataLength += entry.stored.byteLength;
  }

  if (dataLength > UINT32_MAX || indexLength > UINT32_MAX) {
    throw new RangeError(`Archive data region of ${dataLength} bytes exceeds the format limit`);
  }

  const output = new Uint8Array(HEADER_SIZE + indexLength + dataLength);
  const view = new DataView(output.buffer);

  for (let i = 0; i < ARCHIVE_MAGIC.length; i++) {
    output[i] = ARCHIVE_MAGIC.charCodeAt(i);
  }
  view.setUint16(4, ARCHIVE_VERSION, true);
  view.setUint16(6, 0, true);
  view.setUint32(8, sorted.length, true);
  view.setUint32(12, indexLength, true);
  view.setUint32(16, dataLength, true);

  const dataStart = HEADER_SIZE + indexLength;
  let recordCursor = HEADER_SIZE;
  let dataCursor = 0;

  for (let i = 0; i < sorted.length; i++) {
    const entry = sorted[i]!;
    const pathBytes = encodedPaths[i]!;

    view.setUint16(recordCursor, pathBytes.byteLength, true);
    recordCursor += 2;
    output.set(pathBytes, recordCursor);
    recordCursor += pathBytes.byteLength;
    output[recordCursor] = compressionCode(entry.compression);
    recordCursor += 1;
    view.setUint32(recordCursor, dataCursor, true);
    recordCursor += 4;
    view.setUint32(recordCursor, entry.stored.byteLength, true);
    recordCursor += 4;
    view.setUint32(recordCursor, entry.uncompressedLength, true);
    recordCursor += 4;

    output.set(entry.stored, dataStart + dataCursor);
    dataCursor += entry.stored.byteLength;
  }

  return output;
}

// ===========================================================================
// Decoding
// ===========================================================================

/** Decode the fixed header. Only the first HEADER_SIZE bytes are read. */
export function decodeHeader(bytes: Uint8Array): ArchiveHeader {
  if (bytes.byteLength < HEADER_SIZE) {
    throw new CorruptArchiveError(
      `header needs ${HEADER_SIZE} bytes, got ${bytes.byteLength}`,
    );
  }

  const magic = String.fromCharCode(bytes[0] ?? 0, bytes[1] ?? 0, bytes[2] ?? 0, bytes[3] ?? 0);
  if (magic !== ARCHIVE_MAGIC) {
    throw new CorruptArchiveError(`bad magic: expected "${ARCHIVE_MAGIC}", got ${JSON.stringify(magic)}`);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, HEADER_SIZE);
  const version = view.getUint16(4, true);
  if (version !== ARCHIVE_VERSION) {
    throw new UnsupportedVersionError(version, ARCHIVE_VERSION);
  }

  const flags = view.getUint16(6, true);
  if (flags !== 0) {
    throw new CorruptArchiveError(`unknown header flags 0x${flags.toString(16)}`);
  }

  return {
    version,
    entryCount: view.getUint32(8, true),
    indexLength: view.getUint32(12, true),
    dataLength: view.getUint32(16, true),
  };
}

export function archiveLayout(header: ArchiveHeader): ArchiveLayout {
  const indexOffset = HEADER_SIZE;
  const dataOffset = indexOffset + header.indexLength;
  return { indexOffset, dataOffset, totalLength: dataOffset + header.dataLength };
}

/**
 * Decode the index region on its own. Every record is checked against the
 * data region length declared in the header, so later reads by offset and
 * length can never leave the region.
 */
export function decodeIndex(header: ArchiveHeader, indexBytes: Uint8Array): ArchiveIndex {
  if (indexBytes.byteLength !== header.indexLength) {
    throw new CorruptArchiveError(
      `index truncated: expected ${header.indexLength} bytes, got ${indexBytes.byteLength}`,
    );
  }

  const view = new DataView(indexBytes.buffer, indexBytes.byteOffset, indexBytes.byteLength);
  const entries: IndexEntry[] = [];
  let cursor = 0;

  for (let i = 0; i < header.entryCount; i++) {
    if (cursor + 2 > indexBytes.byteLength) {
      throw new CorruptArchiveError(`index ended while reading record ${i} at offset ${cursor}`);
    }
    const pathLength = view.getUint16(cursor, true);
    cursor += 2;

    if (cursor + pathLength + RECORD_FIXED_SIZE - 2 > indexBytes.byteLength) {
      throw new CorruptArchiveError(`index ended while reading record ${i} at offset ${cursor}`);
    }

    const path = decodePath(indexBytes.subarray(cursor, cursor + pathLength), i);
    cursor += pathLength;

    const code = indexBytes[cursor] ?? 0;
    const compression = compressionFromCode(code);
    cursor += 1;
    if (!compression) {
      throw new CorruptArchiveError(`record ${i} ("${path}") has unknown compression kind ${code}`);
    }

    const offset = view.getUint32(cursor, true);
    const storedLength = view.getUint32(cursor + 4, true);
    const uncompressedLength = view.getUint32(cursor + 8, true);
    cursor += 12;

    const reason = validateLogicalPath(path);
    if (reason) {
      throw new CorruptArchiveError(`record ${i} has invalid path "${path}": ${reason}`);
    }

    const previous = entries[entries.length - 1];
    if (previous && compareLogicalPaths(previous.path, path) >= 0) {
      throw new CorruptArchiveError(
        previous.path === path
          ? `duplicate index path "${path}"`
          : `index is not sorted at "${path}"`,
      );
    }

    if (offset + storedLength > header.dataLength) {
      throw new CorruptArchiveError(
        `record "${path}" extends beyond entry data: ` +
          `offset=${offset}, length=${storedLength}, dataLength=${header.dataLength}`,
      );
    }

    if (compression === 'none' && storedLength !== uncompressedLength) {
      throw new CorruptArchiveError(
        `stored record "${path}" declares ${uncompressedLength} bytes but stores ${storedLength}`,
      );
    }

    entries.push({ path, offset, storedLength, uncompressedLength, compression });
  }

  if (cursor !== indexBytes.byteLength) {
    throw new CorruptArchiveError(
      `index has ${indexBytes.byteLength - cursor} trailing bytes after ${header.entryCount} records`,
    );
  }

  return new ArchiveIndex(entries);
}

/**
 * Turn an entry's stored bytes into its content, checking the declared
 * uncompressed length.
 */
export function decodeEntry(entry: IndexEntry, stored: Uint8Array): Uint8Array {
  if (stored.byteLength !== entry.storedLength) {
    throw new AssetCorruptError(
      entry.path,
      `has ${stored.byteLength} stored bytes, index declares ${entry.storedLength}`,
    );
  }

  let content: Uint8Array;
  try {
    content = decompress(entry.compression, stored, entry.uncompressedLength);
  } catch (err) {
    throw new AssetCorruptError(entry.path, `failed to decompress: ${describeCause(err)}`, { cause: err });
  }

  if (content.byteLength !== entry.uncompressedLength) {
    throw new AssetCorruptError(
      entry.path,
      `decompressed to ${content.byteLength} bytes, index declares ${entry.uncompressedLength}`,
    );
  }
  return content;
}

/** Decode header and index of an archive held entirely in memory. */
export function readArchive(bytes: Uint8Array): DecodedArchive {
  const header = decodeHeader(bytes);
  const layout = archiveLayout(header);
  if (bytes.byteLength < layout.totalLength) {
    throw new CorruptArchiveError(
      `archive truncated: expected ${layout.totalLength} bytes, got ${bytes.byteLength}`,
    );
  }

  const index = decodeIndex(header, bytes.subarray(layout.indexOffset, layout.dataOffset));
  const data = bytes.subarray(layout.dataOffset, layout.totalLength);
  return { header, index, data };
}

/** The stored (still compressed) bytes of one entry, as a view into the data region. */
export function storedBytes(archive: DecodedArchive, entry: IndexEntry): Uint8Array {
  const end = entry.offset + entry.storedLength;
  if (end > archive.data.byteLength) {
    throw new CorruptArchiveError(
      `record "${entry.path}" extends beyond entry data: ` +
        `offset=${entry.offset}, length=${entry.storedLength}, dataLength=${archive.data.byteLength}`,
    );
  }
  return archive.data.subarray(entry.offset, end);
}

/** Decoded content of one entry, always in a fresh buffer rather than a view into the archive. */
export function extractEntry(archive: DecodedArchive, entry: IndexEntry): Uint8Array {
  const content = decodeEntry(entry, storedBytes(archive, entry));
  return entry.compression === 'none' ? new Uint8Array(content) : content;
}

function decodePath(bytes: Uint8Array, record: number): string {
  try {
    return pathDecoder.decode(bytes);
  } catch (err) {
    throw new CorruptArchiveError(`record ${record} path is not valid UTF-8`, { cause: err });
  }
}
