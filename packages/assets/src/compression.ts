/**
 * Per-entry compression codecs.
 *
 * DEFLATE goes through fflate rather than node:zlib so the embedded backend
 * decodes the same way in a sandbox with no Node built-ins.
 */

import { Inflate, deflateSync } from 'fflate';
import type { CompressionKind, CompressionLevel } from './types.js';

const KIND_TO_CODE: Record<CompressionKind, number> = {
  none: 0,
  deflate: 1,
};

const CODE_TO_KIND = new Map<number, CompressionKind>([
  [KIND_TO_CODE.none, 'none'],
  [KIND_TO_CODE.deflate, 'deflate'],
]);

export function compressionCode(kind: CompressionKind): number {
  return KIND_TO_CODE[kind];
}

/** Map a wire code back to its kind; null for codes this build does not know. */
export function compressionFromCode(code: number): CompressionKind | null {
  return CODE_TO_KIND.get(code) ?? null;
}

export function compress(kind: CompressionKind, data: Uint8Array, level: CompressionLevel): Uint8Array {
  switch (kind) {
    case 'none':
      return data;
    case 'deflate':
      return deflateSync(data, { level });
  }
}

/** Input slice fed to the inflater per step; bounds the output a single step can produce. */
const INFLATE_STEP = 1024;

/**
 * Throws whatever the codec throws; callers attach the entry context.
 * Inflating stops with a RangeError as soon as the output passes `maxLength`.
 */
export function decompress(kind: CompressionKind, stored: Uint8Array, maxLength: number): Uint8Array {
  switch (kind) {
    case 'none':
      return stored;
    case 'deflate':
      return inflateBounded(stored, maxLength);
  }
}

function inflateBounded(stored: Uint8Array, maxLength: number): Uint8Array {
  const chunks: Uint8Array[] = [];
  let total = 0;
  const inflater = new Inflate();
  inflater.ondata = (chunk) => {
    total += chunk.byteLength;
    if (total > maxLength) {
      throw new RangeError(`inflates past the declared ${maxLength} bytes`);
    }
    chunks.push(chunk);
  };

  if (stored.byteLength === 0) {
    inflater.push(stored, true);
  }
  for (let offset = 0; offset < stored.byteLength; offset += INFLATE_STEP) {
    const end = Math.min(offset + INFLATE_STEP, stored.byteLength);
    inflater.push(stored.subarray(offset, end), end === stored.byteLength);
  }

  if (chunks.length === 1 && chunks[0]) {
    return chunks[0];
  }
  const out = new Uint8Array(total);
  let at = 0;
  for (const chunk of chunks) {
    out.set(chunk, at);
    at += chunk.byteLength;
  }
  return out;
}

/** Lower-case extension including the dot, or '' when the file name has none. */
export function extensionOf(path: string): string {
  const name = path.slice(path.lastIndexOf('/') + 1);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot).toLowerCase() : '';
}

export function shouldCompress(path: string, compressExtensions: readonly string[]): boolean {
  const ext = extensionOf(path);
  return ext.length > 0 && compressExtensions.includes(ext);
}
