/**
 * FolderBackend: reads assets straight from a directory tree.
 *
 * Used during development: nothing is cached, so edits on disk show up on
 * the next list() or open().
 */

import { lstat, readFile, realpath, stat } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { InvalidAssetPathError, IoFailureError, SourceNotFoundError } from '../errors.js';
import { isIgnoredFileName, normalizeLogicalPath } from '../logical-path.js';
import { DEFAULT_IGNORED_FILE_NAMES } from '../types.js';
import type { AssetBackend } from './backend.js';
import { asBytes, errorCode, isInsideRoot, walkSourceFiles } from './source-files.js';

/** Read errors that mean "no such asset" rather than a failing disk. */
const NOT_FOUND_CODES = new Set(['ENOENT', 'ENOTDIR', 'EISDIR']);

export class FolderBackend implements AssetBackend {
  readonly kind = 'folder';
  readonly root: string;

  constructor(
    root: string,
    private readonly ignoredFileNames: readonly string[] = DEFAULT_IGNORED_FILE_NAMES,
  ) {
    this.root = resolve(root);
  }

  /** Create a backend after checking that the root is an existing directory. */
  static async create(
    root: string,
    ignoredFileNames: readonly string[] = DEFAULT_IGNORED_FILE_NAMES,
  ): Promise<FolderBackend> {
    try {
      const info = await stat(root);
      if (!info.isDirectory()) {
        throw new SourceNotFoundError(root);
      }
    } catch (err) {
      if (err instanceof SourceNotFoundError) throw err;
      if (errorCode(err) === 'ENOENT' || errorCode(err) === 'ENOTDIR') {
        throw new SourceNotFoundError(root);
      }
      throw new IoFailureError(root, err);
    }
    return new FolderBackend(root, ignoredFileNames);
  }

  async list(): Promise<string[]> {
    const files = await walkSourceFiles(this.root, { ignoredFileNames: this.ignoredFileNames });
    const paths: string[] = [];
    for (const file of files) {
      if (paths[paths.length - 1] !== file.logicalPath) {
        paths.push(file.logicalPath);
      }
    }
    return paths;
  }

  async open(path: string): Promise<Uint8Array | null> {
    const logicalPath = normalizeLogicalPath(path);
    const name = logicalPath.slice(logicalPath.lastIndexOf('/') + 1);
    if (isIgnoredFileName(name, this.ignoredFileNames)) {
      return null;
    }

    const absolutePath = resolve(this.root, ...logicalPath.split('/'));
    if (!isInsideRoot(this.root, absolutePath)) {
      throw new InvalidAssetPathError(path, 'Path resolves outside the asset root');
    }

    try {
      // Same rule as the walk: only regular files, never through a link out of the root.
      const info = await lstat(absolutePath);
      if (!info.isFile()) {
        return null;
      }
      const [realRoot, realDir] = await Promise.all([
        realpath(this.root),
        realpath(dirname(absolutePath)),
      ]);
      if (realDir !== realRoot && !isInsideRoot(realRoot, realDir)) {
        return null;
      }
      return asBytes(await readFile(absolutePath));
    } catch (err) {
      const code = errorCode(err);
      if (code && NOT_FOUND_CODES.has(code)) {
        return null;
      }
      throw new IoFailureError(absolutePath, err);
    }
  }

  async close(): Promise<void> {
    // Holds no handles.
  }
}
