import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CorruptArchiveError, EmbeddedBackend, encodeArchive } from '@gamepak/assets/web';
import {
  DEFAULT_EMBED_ID,
  embeddedAssets,
  loadEmbeddedModule,
  renderEmbeddedModule,
  resolvedEmbedId,
} from './embedPlugin.js';

const encoder = new TextEncoder();

function sampleArchive(): Uint8Array {
  return encodeArchive([
    { path: 'text/hello.txt', stored: encoder.encode('hi there'), uncompressedLength: 8, compression: 'none' },
  ]);
}

/** Pull the base64 literal back out of a rendered module. */
function moduleBase64(source: string): string {
  const match = /^export default (".*");\n$/.exec(source);
  const literal: unknown = match?.[1] === undefined ? undefined : JSON.parse(match[1]);
  if (typeof literal !== 'string') {
    throw new Error(`unexpected module source: ${source}`);
  }
  return literal;
}

describe('renderEmbeddedModule', () => {
  it('renders the archive as a base64 default export', () => {
    expect(renderEmbeddedModule(new Uint8Array([0x47, 0x50, 0x41, 0x4b]))).toBe('export default "R1BBSw==";\n');
  });

  it('renders a module the embedded backend reads back', async () => {
    const backend = EmbeddedBackend.fromBase64(moduleBase64(renderEmbeddedModule(sampleArchive())));
    expect(await backend.list()).toEqual(['text/hello.txt']);
    expect(await backend.open('text/hello.txt')).toEqual(encoder.encode('hi there'));
  });

  it('encodes only the bytes of a view', () => {
    const padded = new Uint8Array(10);
    padded.set([1, 2, 3], 4);
    expect(renderEmbeddedModule(padded.subarray(4, 7))).toBe('export default "AQID";\n');
  });
});

describe('loadEmbeddedModule', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gamepak-embed-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads and renders a valid archive', async () => {
    const file = join(dir, 'assets.gpak');
    writeFileSync(file, sampleArchive());
    expect(await loadEmbeddedModule(file)).toBe(renderEmbeddedModule(sampleArchive()));
  });

  it('fails the build for a corrupt archive', async () => {
    const file = join(dir, 'assets.gpak');
    writeFileSync(file, 'this is not an archive');
    await expect(loadEmbeddedModule(file)).rejects.toBeInstanceOf(CorruptArchiveError);
  });
});

describe('embeddedAssets', () => {
  it('names the plugin and the virtual module', () => {
    const plugin = embeddedAssets({ archive: 'dist/assets.gpak' });
    expect(plugin.name).toBe('gamepak-embedded-assets');
    expect(DEFAULT_EMBED_ID).toBe('virtual:gamepak-archive');
    expect(resolvedEmbedId(DEFAULT_EMBED_ID)).toBe('\0virtual:gamepak-archive');
  });
});
