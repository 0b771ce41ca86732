/**
 * ArchiveBackend: serves entries from a standalone archive file.
 *
 * The header and index are read and validated once when the backend is
 * opened. Entry data stays on disk and is fetched with positioned reads, so
 * concurrent open() calls never share a seek position. With `preload` the
 * whole file is read up front and served from memory instead.
 */

import type { FileHandle } from 'node:fs/promises';
import { open as openFile, readFile } from 'node:fs/promises';
import {
  archiveLayout,
  decodeEntry,
  decodeHeader,
  decodeIndex,
  extractEntry,
  readArchive,
  type ArchiveIndex,
  type DecodedArchive,
} from '../archive-format.js';
import { AssetError, CorruptArchiveError, IoFailureError, SourceNotFoundError } from '../errors.js';
import { normalizeLogicalPath } from '../logical-path.js';
import { HEADER_SIZE, type IndexEntry } from '../types.js';
import type { AssetBackend } from './backend.js';
import { asBytes, errorCode } from './source-files.js';

export interface ArchiveBackendOptions {
  /** Read the whole archive into memory at open time. Default: false. */
  preload?: boolean;
}

type ArchiveSource =
  | { readonly type: 'memory'; readonly archive: DecodedArchive }
  | { readonly type: 'file'; readonly handle: FileHandle; readonly dataOffset: number };

export class ArchiveBackend implements AssetBackend {
  readonly kind = 'archive';
  private closed = false;

  private constructor(
    readonly file: string,
    private readonly index: ArchiveIndex,
    private readonly source: ArchiveSource,
  ) {}

  /**
   * Open and validate an archive file.
   * Fails with SourceNotFoundError, IoFailureError, CorruptArchiveError or
   * UnsupportedVersionError.
   */
  static async openFile(file: string, options: ArchiveBackendOptions = {}): Promise<ArchiveBackend> {
    if (options.preload) {
      let bytes: Uint8Array;
      try {
        bytes = asBytes(await readFile(file));
      } catch (err) {
        throw toOpenError(file, err);
      }
      const archive = readArchive(bytes);
      return new ArchiveBackend(file, archive.index, { type: 'memory', archive });
    }

    let handle: FileHandle;
    try {
      handle = await openFile(file, 'r');
    } catch (err) {
      throw toOpenError(file, err);
    }

    try {
      const { size } = await handle.stat();
      const header = decodeHeader(await readAt(handle, file, 0, Math.min(HEADER_SIZE, size)));
      const layout = archiveLayout(header);
      if (size < layout.totalLength) {
        throw new CorruptArchiveError(
          `archive truncated: expected ${layout.totalLength} bytes, got ${size}`,
        );
      }
      const index = decodeIndex(header, await readAt(handle, file, layout.indexOffset, header.indexLength));
      return new ArchiveBackend(file, index, { type: 'file', handle, dataOffset: layout.dataOffset });
    } catch (err) {
      await handle.close();
      throw err instanceof AssetError ? err : new IoFailureError(file, err);
    }
  }

  get entryCount(): number {
    return this.index.size;
  }

  /** Index records in archive order. */
  entries(): readonly IndexEntry[] {
    return this.index.entries;
  }

  async list(): Promise<string[]> {
    return this.index.paths();
  }

  async open(path: string): Promise<Uint8Array | null> {
    if (this.closed) {
      throw new AssetError(`Archive backend for "${this.file}" is closed`);
    }

    const entry = this.index.get(normalizeLogicalPath(path));
    if (!entry) return null;

    if (this.source.type === 'memory') {
      return extractEntry(this.source.archive, entry);
    }

    const stored = await readAt(
      this.source.handle,
      this.file,
      this.source.dataOffset + entry.offset,
      entry.storedLength,
    );
    return decodeEntry(entry, stored);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.source.type === 'file') {
      await this.source.handle.close();
    }
  }
}

/** Read exactly `length` bytes at `position`; running out of file is corruption, not I/O failure. */
async function readAt(handle: FileHandle, file: string, position: number, length: number): Promise<Uint8Array> {
  const buffer = new Uint8Array(length);
  let total = 0;
  while (total < length) {
    let bytesRead: number;
    try {
      ({ bytesRead } = await handle.read(buffer, total, length - total, position + total));
    } catch (err) {
      throw new IoFailureError(file, err);
    }
    if (bytesRead === 0) {
      throw new CorruptArchiveError(
        `unexpected end of file reading ${length} bytes at offset ${position} (got ${total})`,
      );
    }
    total += bytesRead;
  }
  return buffer;
}

function toOpenError(file: string, err: unknown): AssetError {
  const code = errorCode(err);
  if (code === 'ENOENT' || code === 'ENOTDIR') {
    return new SourceNotFoundError(file);
  }
  return new IoFailureError(file, err);
}
