/**
 * EmbeddedBackend: serves entries from archive bytes compiled into the program.
 *
 * Touches no filesystem and no Node built-ins. The bytes are validated once
 * in `from()`; after that the only failures are a missing path or an entry
 * that does not decompress.
 */

import { archiveLayout, extractEntry, readArchive, type DecodedArchive } from '../archive-format.js';
import { CorruptArchiveError } from '../errors.js';
import { normalizeLogicalPath } from '../logical-path.js';
import type { AssetBackend } from './backend.js';

export class EmbeddedBackend implements AssetBackend {
  readonly kind = 'embedded';

  private constructor(private readonly archive: DecodedArchive) {}

  /** Validate header and index of an in-memory archive. */
  static from(bytes: Uint8Array): EmbeddedBackend {
    return new EmbeddedBackend(readArchive(bytes));
  }

  /** Same as from(), for archives embedded as base64 text. */
  static fromBase64(text: string): EmbeddedBackend {
    return EmbeddedBackend.from(decodeBase64(text));
  }

  get entryCount(): number {
    return this.archive.index.size;
  }

  /** Size of the embedded region in bytes. */
  get byteLength(): number {
    return archiveLayout(this.archive.header).totalLength;
  }

  async list(): Promise<string[]> {
    return this.archive.index.paths();
  }

  async open(path: string): Promise<Uint8Array | null> {
    const entry = this.archive.index.get(normalizeLogicalPath(path));
    if (!entry) return null;
    return extractEntry(this.archive, entry);
  }

  async close(): Promise<void> {
    // The bytes belong to the program image; nothing to release.
  }
}

export function decodeBase64(text: string): Uint8Array {
  let binary: string;
  try {
    binary = atob(text.replace(/\s+/g, ''));
  } catch (err) {
    throw new CorruptArchiveError('embedded archive is not valid base64', { cause: err });
  }
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}
