/**
 * Source tree enumeration shared by the packer and the folder backend, so a
 * directory lists the same logical paths whether it is read live or packed.
 */

import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';
import { InvalidAssetPathError, IoFailureError } from '../errors.js';
import { compareLogicalPaths, isIgnoredFileName, normalizeLogicalPath } from '../logical-path.js';

export interface SourceFile {
  /** Root-relative path with separators normalized. */
  readonly logicalPath: string;
  readonly absolutePath: string;
}

export interface WalkOptions {
  readonly ignoredFileNames: readonly string[];
  /** Absolute paths to leave out (e.g. the archive being written into the root). */
  readonly exclude?: readonly string[];
  /** Called for a file whose name cannot be a logical path (e.g. `c:notes.txt` at the root). It is skipped. */
  readonly onInvalidPath?: (absolutePath: string, reason: string) => void;
}

/**
 * Recursively collect the regular files under `root`. Symlinks, sockets and
 * other special files are skipped, as are names that are not valid logical
 * paths. The result is sorted by logical path, and
 * two files that normalize to the same path are both returned.
 */
export async function walkSourceFiles(root: string, options: WalkOptions): Promise<SourceFile[]> {
  const absoluteRoot = resolve(root);
  const excluded = new Set((options.exclude ?? []).map((path) => resolve(path)));
  const files: SourceFile[] = [];

  async function visit(dir: string, segments: string[]): Promise<void> {
    let dirents: Dirent[];
    try {
      dirents = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      throw new IoFailureError(dir, err);
    }

    for (const dirent of dirents) {
      const absolutePath = join(dir, dirent.name);
      if (dirent.isDirectory()) {
        await visit(absolutePath, [...segments, dirent.name]);
      } else if (dirent.isFile()) {
        if (isIgnoredFileName(dirent.name, options.ignoredFileNames) || excluded.has(absolutePath)) {
          continue;
        }
        let logicalPath: string;
        try {
          logicalPath = normalizeLogicalPath([...segments, dirent.name].join('/'));
        } catch (err) {
          if (!(err instanceof InvalidAssetPathError)) throw err;
          options.onInvalidPath?.(absolutePath, err.reason);
          continue;
        }
        files.push({ logicalPath, absolutePath });
      }
    }
  }

  await visit(absoluteRoot, []);

  return files.sort(
    (a, b) =>
      compareLogicalPaths(a.logicalPath, b.logicalPath) ||
      compareLogicalPaths(a.absolutePath, b.absolutePath),
  );
}

/** True when `target` lies strictly below `root`. Both must be absolute. */
export function isInsideRoot(root: string, target: string): boolean {
  const rel = relative(root, target);
  return rel.length > 0 && rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/** The `code` of a Node system error, if there is one. */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** A plain Uint8Array view over a Buffer, so every backend hands out the same type. */
export function asBytes(buffer: Uint8Array): Uint8Array {
  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}
