/**
 * Stable 64-bit asset ids: FNV-1a over the UTF-8 bytes of the logical path.
 */

import { normalizeLogicalPath } from './logical-path.js';

const FNV_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;
const MASK_64 = 0xffffffffffffffffn;

const encoder = new TextEncoder();

/** A logical path paired with its precomputed id. */
export interface AssetRef {
  readonly path: string;
  readonly id: bigint;
}

export function fnv1a64(bytes: Uint8Array): bigint {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < bytes.length; i++) {
    hash ^= BigInt(bytes[i] ?? 0);
    hash = (hash * FNV_PRIME) & MASK_64;
  }
  return hash;
}

/** Id of a logical path. The path is normalized first, so `a\\b` and `a/b` share an id. */
export function assetId(path: string): bigint {
  return fnv1a64(encoder.encode(normalizeLogicalPath(path)));
}

export function assetRef(path: string): AssetRef {
  const normalized = normalizeLogicalPath(path);
  return { path: normalized, id: fnv1a64(encoder.encode(normalized)) };
}
