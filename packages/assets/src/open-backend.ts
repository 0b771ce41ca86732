/**
 * Startup backend selection: build the backend named by a BackendConfig, or
 * probe a list of candidate locations for one.
 */

import { stat } from 'node:fs/promises';
import { AssetLoader } from './asset-loader.js';
import { ArchiveBackend } from './backends/archive-backend.js';
import type { AssetBackend } from './backends/backend.js';
import { EmbeddedBackend } from './backends/embedded-backend.js';
import { FolderBackend } from './backends/folder-backend.js';
import { errorCode } from './backends/source-files.js';
import { IoFailureError, SourceNotFoundError } from './errors.js';
import type { AssetLoaderOptions, BackendConfig } from './types.js';

export async function openBackend(config: BackendConfig): Promise<AssetBackend> {
  switch (config.kind) {
    case 'folder':
      return FolderBackend.create(config.root);
    case 'archive':
      return ArchiveBackend.openFile(config.path, { preload: config.preload ?? false });
    case 'embedded':
      return EmbeddedBackend.from(config.bytes);
  }
}

/** Open the configured backend and wrap it in a loader. */
export async function createAssetLoader(
  config: BackendConfig,
  options: Partial<AssetLoaderOptions> = {},
): Promise<AssetLoader> {
  return new AssetLoader(await openBackend(config), options);
}

export interface ProbeOptions {
  /** Archive bytes to fall back to when no candidate exists on disk. */
  embedded?: () => Uint8Array | Promise<Uint8Array>;
  /** Passed through to archive configs. */
  preload?: boolean;
}

/**
 * Pick the first candidate that exists: a directory becomes a folder backend,
 * a file an archive backend. With none found, use the embedded fallback if
 * there is one, otherwise fail with SourceNotFoundError.
 */
export async function probeAssetSources(
  candidates: readonly string[],
  options: ProbeOptions = {},
): Promise<BackendConfig> {
  for (const candidate of candidates) {
    try {
      const info = await stat(candidate);
      if (info.isDirectory()) {
        console.info(`Asset source "${candidate}" found (folder)`);
        return { kind: 'folder', root: candidate };
      }
      if (info.isFile()) {
        console.info(`Asset source "${candidate}" found (archive)`);
        return { kind: 'archive', path: candidate, preload: options.preload ?? false };
      }
    } catch (err) {
      const code = errorCode(err);
      if (code !== 'ENOENT' && code !== 'ENOTDIR') {
        throw new IoFailureError(candidate, err);
      }
    }
    console.info(`Asset source "${candidate}" not found`);
  }

  if (options.embedded) {
    const bytes = await options.embedded();
    console.info(`Reading embedded assets (${bytes.byteLength} bytes)`);
    return { kind: 'embedded', bytes };
  }

  throw new SourceNotFoundError(candidates.join(', '));
}
