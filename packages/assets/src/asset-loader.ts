/**
 * AssetLoader: the one front end game code loads assets through.
 *
 * Holds a single backend chosen at startup and orchestrates:
 *  - Logical path normalization
 *  - Decode cache lookups with per-path in-flight deduplication
 *  - Typed failures (AssetNotFound, AssetCorrupt) per request
 *  - Development reload against a folder backend
 */

import type { AssetRef } from './asset-id.js';
import type { AssetBackend } from './backends/backend.js';
import { DecodeCache, type DecodeCacheStats } from './decode-cache.js';
import { AssetError, AssetNotFoundError } from './errors.js';
import { listUnder, normalizeLogicalPath } from './logical-path.js';
import type { AssetLoaderOptions, BackendKind, ProgressCallback } from './types.js';
import { DEFAULT_LOADER_OPTIONS } from './types.js';

const textDecoder = new TextDecoder();

export class AssetLoader {
  private readonly options: AssetLoaderOptions;
  private readonly cache: DecodeCache | null;
  private backend: AssetBackend | null;

  constructor(backend: AssetBackend, options: Partial<AssetLoaderOptions> = {}) {
    this.options = { ...DEFAULT_LOADER_OPTIONS, ...options };
    this.cache = this.options.decodeCache ? new DecodeCache() : null;
    this.backend = backend;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  get backendKind(): BackendKind {
    return this.activeBackend().kind;
  }

  /** The active backend. */
  getBackend(): AssetBackend {
    return this.activeBackend();
  }

  /**
   * Development hot reload: forget every decoded asset so the next load
   * reads the edited file. Only a folder backend can change under a running
   * program, so any other backend refuses.
   */
  async reload(): Promise<void> {
    const backend = this.activeBackend();
    if (backend.kind !== 'folder') {
      throw new AssetError(`reload() needs a folder backend, active backend is "${backend.kind}"`);
    }
    this.cache?.clear();
  }

  /** Close the backend and drop cached data. The loader is unusable afterwards. */
  async dispose(): Promise<void> {
    const backend = this.backend;
    if (!backend) return;
    this.backend = null;
    this.cache?.clear();
    await backend.close();
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Load the decoded bytes of one asset.
   * Fails with AssetNotFoundError when the backend has no such path.
   */
  async load(asset: string | AssetRef): Promise<Uint8Array> {
    const backend = this.activeBackend();
    const path = normalizeLogicalPath(typeof asset === 'string' ? asset : asset.path);

    if (!this.cache) {
      return this.openOrThrow(backend, path);
    }
    // The cache keeps one buffer per path; each caller gets its own copy to mutate.
    const cached = await this.cache.getOrDecode(path, () => this.openOrThrow(backend, path));
    return cached.slice();
  }

  /** Load an asset as UTF-8 text. */
  async loadText(asset: string | AssetRef): Promise<string> {
    return textDecoder.decode(await this.load(asset));
  }

  /** Load and parse a JSON asset. */
  async loadJSON<T = unknown>(asset: string | AssetRef): Promise<T> {
    return JSON.parse(await this.loadText(asset)) as T;
  }

  /**
   * Load multiple assets in parallel with aggregate progress.
   */
  async loadBatch(
    assets: readonly (string | AssetRef)[],
    onProgress?: ProgressCallback,
  ): Promise<Uint8Array[]> {
    let completed = 0;
    const total = assets.length;

    return Promise.all(
      assets.map(async (asset) => {
        const bytes = await this.load(asset);
        completed++;
        onProgress?.(completed, total);
        return bytes;
      }),
    );
  }

  /** Logical paths served by the backend, optionally only those under a directory. */
  async list(prefix = ''): Promise<string[]> {
    const paths = await this.activeBackend().list();
    return listUnder(paths, prefix);
  }

  async has(asset: string | AssetRef): Promise<boolean> {
    const path = normalizeLogicalPath(typeof asset === 'string' ? asset : asset.path);
    if (this.cache?.has(path)) return true;
    const paths = await this.activeBackend().list();
    return paths.includes(path);
  }

  clearCache(): void {
    this.cache?.clear();
  }

  /** Decode cache counters, or null when caching is disabled. */
  cacheStats(): DecodeCacheStats | null {
    return this.cache?.stats() ?? null;
  }

  // ===========================================================================
  // Internal helpers
  // ===========================================================================

  private activeBackend(): AssetBackend {
    if (!this.backend) {
      throw new AssetError('AssetLoader has been disposed');
    }
    return this.backend;
  }

  private async openOrThrow(backend: AssetBackend, path: string): Promise<Uint8Array> {
    const bytes = await backend.open(path);
    if (!bytes) {
      throw new AssetNotFoundError(path);
    }
    return bytes;
  }
}
