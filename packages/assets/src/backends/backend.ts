import type { BackendKind } from '../types.js';

/**
 * A concrete source of asset bytes. The three variants are picked once at
 * startup; nothing downstream branches on which one is active.
 */
export interface AssetBackend {
  readonly kind: BackendKind;

  /** Every logical path this backend can serve, sorted. */
  list(): Promise<string[]>;

  /** Decoded bytes for a logical path, or null when the path is absent. */
  open(path: string): Promise<Uint8Array | null>;

  /** Release held resources. Safe to call more than once. */
  close(): Promise<void>;
}
