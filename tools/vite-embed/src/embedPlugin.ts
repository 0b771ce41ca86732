/**
 * Vite plugin that compiles a packed archive into the bundle.
 *
 * `import archive from 'virtual:gamepak-archive'` yields the archive as base64
 * text, ready for `EmbeddedBackend.fromBase64()`. The archive is validated
 * when the module is built, so a corrupt or outdated file fails the build
 * instead of the first asset load.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { readArchive } from '@gamepak/assets/web';
import type { Plugin } from 'vite';

export const DEFAULT_EMBED_ID = 'virtual:gamepak-archive';

export interface EmbeddedAssetsOptions {
  /** Path of the archive file to embed. */
  archive: string;
  /** Module id to import. Default: DEFAULT_EMBED_ID. */
  id?: string;
}

/** Rollup convention: a leading NUL marks an id no other plugin should touch. */
export function resolvedEmbedId(id: string): string {
  return `\0${id}`;
}

/** Module source for archive bytes. */
export function renderEmbeddedModule(bytes: Uint8Array): string {
  const base64 = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
  return `export default ${JSON.stringify(base64)};\n`;
}

/** Read, validate and render the archive at `archivePath`. */
export async function loadEmbeddedModule(archivePath: string): Promise<string> {
  const bytes = await readFile(archivePath);
  readArchive(bytes);
  return renderEmbeddedModule(bytes);
}

export function embeddedAssets(options: EmbeddedAssetsOptions): Plugin {
  const id = options.id ?? DEFAULT_EMBED_ID;
  const resolvedId = resolvedEmbedId(id);
  const archivePath = resolve(options.archive);

  return {
    name: 'gamepak-embedded-assets',

    resolveId(source) {
      return source === id ? resolvedId : null;
    },

    async load(loadId) {
      if (loadId !== resolvedId) return null;
      this.addWatchFile(archivePath);
      return loadEmbeddedModule(archivePath);
    },
  };
}
