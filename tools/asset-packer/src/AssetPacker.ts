/**
 * Asset Packer
 *
 * Packs a source directory into one GPAK archive:
 *   1. Enumerate regular files under the root (ignored names skipped)
 *   2. Map each to its logical path; two files on one path is an error
 *   3. Compress allowlisted entries when it makes them smaller
 *   4. Encode header, index and entry data in logical path order
 *   5. Write to a temporary file beside the output, then rename over it
 *
 * Output depends only on file paths, contents and the config, so the same
 * tree always produces the same bytes.
 */

import { readFile, rename, rm, stat, writeFile, mkdir } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import {
  DEFAULT_PACKER_CONFIG,
  DuplicatePathError,
  IoFailureError,
  SourceNotFoundError,
  compress,
  encodeArchive,
  errorCode,
  shouldCompress,
  walkSourceFiles,
  type ArchiveInputEntry,
  type CompressionKind,
  type PackerConfig,
} from '@gamepak/assets';

/** Summary of one packed entry. */
export interface PackedEntry {
  readonly path: string;
  readonly compression: CompressionKind;
  readonly uncompressedLength: number;
  readonly storedLength: number;
}

export interface PackResult {
  readonly output: string;
  readonly entries: readonly PackedEntry[];
  readonly uncompressedBytes: number;
  readonly storedBytes: number;
  /** Size of the written archive file. */
  readonly archiveBytes: number;
}

export type PackEntryCallback = (entry: PackedEntry) => void;

/**
 * Encode a directory tree into archive bytes without writing anything.
 */
export async function buildArchive(
  root: string,
  config: Partial<PackerConfig> = {},
  options: { exclude?: readonly string[]; onEntry?: PackEntryCallback } = {},
): Promise<{ bytes: Uint8Array; entries: PackedEntry[] }> {
  const cfg: PackerConfig = { ...DEFAULT_PACKER_CONFIG, ...config };
  await assertDirectory(root);

  const files = await walkSourceFiles(root, {
    ignoredFileNames: cfg.ignoredFileNames,
    exclude: options.exclude,
    onInvalidPath: (absolutePath, reason) => {
      console.warn(`Skipping ${absolutePath}: ${reason}`);
    },
  });

  for (let i = 1; i < files.length; i++) {
    const previous = files[i - 1];
    const file = files[i];
    if (previous && file && previous.logicalPath === file.logicalPath) {
      throw new DuplicatePathError(file.logicalPath, [previous.absolutePath, file.absolutePath]);
    }
  }

  const inputs: ArchiveInputEntry[] = [];
  const entries: PackedEntry[] = [];

  for (const file of files) {
    let content: Uint8Array;
    try {
      content = await readFile(file.absolutePath);
    } catch (err) {
      throw new IoFailureError(file.absolutePath, err);
    }

    let compression: CompressionKind = 'none';
    let stored = content;
    if (shouldCompress(file.logicalPath, cfg.compressExtensions)) {
      const deflated = compress('deflate', content, cfg.compressionLevel);
      if (deflated.byteLength < content.byteLength) {
        compression = 'deflate';
        stored = deflated;
      }
    }

    inputs.push({
      path: file.logicalPath,
      stored,
      uncompressedLength: content.byteLength,
      compression,
    });

    const entry: PackedEntry = {
      path: file.logicalPath,
      compression,
      uncompressedLength: content.byteLength,
      storedLength: stored.byteLength,
    };
    entries.push(entry);
    options.onEntry?.(entry);
  }

  return { bytes: encodeArchive(inputs), entries };
}

/**
 * Pack `root` into the archive file `output`.
 *
 * Fails with SourceNotFoundError, DuplicatePathError or IoFailureError. On
 * failure no output file is created and an existing one is left untouched.
 */
export async function packDirectory(
  root: string,
  output: string,
  config: Partial<PackerConfig> = {},
  onEntry?: PackEntryCallback,
): Promise<PackResult> {
  const outputPath = resolve(output);
  const tempPath = join(dirname(outputPath), `.${basename(outputPath)}.${process.pid}.tmp`);

  const { bytes, entries } = await buildArchive(root, config, {
    exclude: [outputPath, tempPath],
    onEntry,
  });

  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(tempPath, bytes);
    await rename(tempPath, outputPath);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw new IoFailureError(outputPath, err);
  }

  let uncompressedBytes = 0;
  let storedBytes = 0;
  for (const entry of entries) {
    uncompressedBytes += entry.uncompressedLength;
    storedBytes += entry.storedLength;
  }

  return {
    output: outputPath,
    entries,
    uncompressedBytes,
    storedBytes,
    archiveBytes: bytes.byteLength,
  };
}

async function assertDirectory(root: string): Promise<void> {
  try {
    const info = await stat(root);
    if (info.isDirectory()) return;
  } catch (err) {
    const code = errorCode(err);
    if (code !== 'ENOENT' && code !== 'ENOTDIR') {
      throw new IoFailureError(root, err);
    }
  }
  throw new SourceNotFoundError(root);
}
