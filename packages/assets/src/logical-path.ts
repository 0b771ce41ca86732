/**
 * Logical paths: the forward-slash, root-relative, case-sensitive keys
 * every backend is addressed by.
 */

import { InvalidAssetPathError } from './errors.js';

/**
 * Return the reason an already-normalized path is not a valid logical path,
 * or null when it is valid.
 */
export function validateLogicalPath(path: string): string | null {
  if (path.length === 0) {
    return 'Path cannot be empty';
  }
  if (path.includes('\0')) {
    return 'Path must not contain NUL bytes';
  }
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(path)) {
    return 'Path must be relative';
  }
  if (/^[A-Za-z]:/.test(path)) {
    return 'Path must not have a drive prefix';
  }
  if (path.includes('\\')) {
    return 'Path must use forward slashes';
  }
  if (path.startsWith('/')) {
    return 'Path must be relative';
  }

  const segments = path.split('/');
  if (segments.some((segment) => segment.length === 0)) {
    return 'Path must not contain empty segments';
  }
  if (segments.includes('.')) {
    return 'Path must not contain "." segments';
  }
  if (segments.includes('..')) {
    return 'Path must not contain ".." segments';
  }
  return null;
}

/**
 * Normalize a caller-supplied path into a logical path.
 *
 * Backslashes become forward slashes, `.` segments and repeated slashes are
 * dropped. Anything that would still escape the root (`..`, a leading `/`, a
 * drive letter) is rejected rather than rewritten.
 */
export function normalizeLogicalPath(input: string): string {
  const slashed = input.replace(/\\/g, '/');
  if (slashed.startsWith('/') || /^[a-z][a-z0-9+.-]*:\/\//i.test(slashed)) {
    throw new InvalidAssetPathError(input, 'Path must be relative');
  }

  const segments = slashed.split('/').filter((segment) => segment.length > 0 && segment !== '.');
  const normalized = segments.join('/');

  const reason = validateLogicalPath(normalized);
  if (reason) {
    throw new InvalidAssetPathError(input, reason);
  }
  return normalized;
}

/** Ordinal UTF-16 code unit order. Locale independent, so archive order is stable everywhere. */
export function compareLogicalPaths(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function isIgnoredFileName(name: string, ignored: readonly string[]): boolean {
  return ignored.includes(name);
}

/**
 * Paths lying under a directory prefix. An empty prefix matches everything;
 * `textures` and `textures/` are the same directory.
 */
export function listUnder(paths: readonly string[], prefix: string): string[] {
  const dir = prefix.replace(/\\/g, '/').replace(/\/+$/, '');
  if (dir.length === 0) return [...paths];
  const dirPrefix = `${dir}/`;
  return paths.filter((path) => path.startsWith(dirPrefix));
}
