import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ArchiveBackend,
  DuplicatePathError,
  EmbeddedBackend,
  FolderBackend,
  IoFailureError,
  SourceNotFoundError,
  readArchive,
  type AssetBackend,
} from '@gamepak/assets';
import { buildArchive, packDirectory, type PackedEntry } from './AssetPacker.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Deterministic pseudo-random bytes (LCG), effectively incompressible. */
function noiseBytes(length: number, seed = 7): Uint8Array {
  const bytes = new Uint8Array(length);
  let state = seed;
  for (let i = 0; i < length; i++) {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    bytes[i] = state >>> 24;
  }
  return bytes;
}

function writeTree(root: string, files: Record<string, string | Uint8Array>): void {
  for (const [path, content] of Object.entries(files)) {
    const absolute = join(root, ...path.split('/'));
    mkdirSync(dirname(absolute), { recursive: true });
    writeFileSync(absolute, content);
  }
}

const SAMPLE_TREE: Record<string, string | Uint8Array> = {
  'a.txt': 'hello',
  'dir/b.bin': noiseBytes(1000),
  'scripts/intro.txt': 'say "welcome commander"\n'.repeat(40),
  'textures/stripes.png': new Uint8Array(2048).fill(0xaa),
  'data/noise.json': noiseBytes(512, 3),
};

function byPath(entries: readonly PackedEntry[]): Map<string, PackedEntry> {
  return new Map(entries.map((entry) => [entry.path, entry]));
}

describe('AssetPacker', () => {
  let workDir: string;
  let root: string;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'gamepak-packer-'));
    root = join(workDir, 'assets');
    mkdirSync(root);
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  // =========================================================================
  // Packing
  // =========================================================================

  it('packs every regular file in logical path order', async () => {
    writeTree(root, SAMPLE_TREE);
    const output = join(workDir, 'out.gpak');

    const result = await packDirectory(root, output);

    expect(result.output).toBe(output);
    expect(result.entries.map((entry) => entry.path)).toEqual([
      'a.txt',
      'data/noise.json',
      'dir/b.bin',
      'scripts/intro.txt',
      'textures/stripes.png',
    ]);
    expect(readArchive(readFileSync(output)).index.paths()).toEqual(
      result.entries.map((entry) => entry.path),
    );
    expect(result.archiveBytes).toBe(readFileSync(output).byteLength);
  });

  it('reports per-entry progress in archive order', async () => {
    writeTree(root, SAMPLE_TREE);
    const seen: string[] = [];
    await packDirectory(root, join(workDir, 'out.gpak'), {}, (entry) => seen.push(entry.path));
    expect(seen).toEqual(['a.txt', 'data/noise.json', 'dir/b.bin', 'scripts/intro.txt', 'textures/stripes.png']);
  });

  it('totals stored and uncompressed sizes', async () => {
    writeTree(root, { 'a.txt': 'hello', 'dir/b.bin': noiseBytes(1000) });
    const result = await packDirectory(root, join(workDir, 'out.gpak'));
    expect(result.uncompressedBytes).toBe(1005);
    expect(result.storedBytes).toBe(1005);
  });

  it('produces identical bytes for identical trees', async () => {
    writeTree(root, SAMPLE_TREE);
    const otherRoot = join(workDir, 'copy');
    const reversed = Object.fromEntries(Object.entries(SAMPLE_TREE).reverse());
    writeTree(otherRoot, reversed);

    await packDirectory(root, join(workDir, 'first.gpak'));
    await packDirectory(otherRoot, join(workDir, 'second.gpak'));
    await packDirectory(root, join(workDir, 'third.gpak'));

    const first = readFileSync(join(workDir, 'first.gpak'));
    expect(readFileSync(join(workDir, 'second.gpak')).equals(first)).toBe(true);
    expect(readFileSync(join(workDir, 'third.gpak')).equals(first)).toBe(true);
  });

  it('skips ignored file names', async () => {
    writeTree(root, { 'a.txt': 'hello', '.DS_Store': 'finder', 'dir/Thumbs.db': 'thumbs' });
    const { entries } = await buildArchive(root);
    expect(entries.map((entry) => entry.path)).toEqual(['a.txt']);
  });

  it('leaves an output file inside the root out of the archive', async () => {
    writeTree(root, { 'a.txt': 'hello' });
    const output = join(root, 'packed.gpak');

    await packDirectory(root, output);
    const second = await packDirectory(root, output);

    expect(second.entries.map((entry) => entry.path)).toEqual(['a.txt']);
  });

  // =========================================================================
  // Compression policy
  // =========================================================================

  it('deflates allowlisted entries only when that makes them smaller', async () => {
    writeTree(root, SAMPLE_TREE);
    const entries = byPath((await buildArchive(root)).entries);

    expect(entries.get('scripts/intro.txt')?.compression).toBe('deflate');
    expect(entries.get('scripts/intro.txt')?.storedLength).toBeLessThan(
      entries.get('scripts/intro.txt')?.uncompressedLength ?? 0,
    );
    // allowlisted but too small or incompressible
    expect(entries.get('a.txt')?.compression).toBe('none');
    expect(entries.get('data/noise.json')?.compression).toBe('none');
    // compressible but not allowlisted
    expect(entries.get('textures/stripes.png')?.compression).toBe('none');
    expect(entries.get('dir/b.bin')).toMatchObject({ compression: 'none', storedLength: 1000 });
  });

  it('honors a custom allowlist', async () => {
    writeTree(root, SAMPLE_TREE);
    const entries = byPath((await buildArchive(root, { compressExtensions: ['.png'] })).entries);
    expect(entries.get('textures/stripes.png')?.compression).toBe('deflate');
    expect(entries.get('scripts/intro.txt')?.compression).toBe('none');
  });

  it('stores everything when level 0 cannot shrink anything', async () => {
    writeTree(root, SAMPLE_TREE);
    const { entries } = await buildArchive(root, { compressionLevel: 0 });
    expect(entries.every((entry) => entry.compression === 'none')).toBe(true);
  });

  // =========================================================================
  // Failures
  // =========================================================================

  it('fails with SourceNotFoundError for a missing root and writes nothing', async () => {
    const output = join(workDir, 'out.gpak');
    await expect(packDirectory(join(workDir, 'missing'), output)).rejects.toBeInstanceOf(
      SourceNotFoundError,
    );
    expect(existsSync(output)).toBe(false);
  });

  it('fails with SourceNotFoundError when the root is a file', async () => {
    writeFileSync(join(workDir, 'file.txt'), 'not a dir');
    await expect(buildArchive(join(workDir, 'file.txt'))).rejects.toBeInstanceOf(SourceNotFoundError);
  });

  it('fails with DuplicatePathError when two files share a logical path', async () => {
    writeTree(root, { 'a/b.txt': 'from a directory' });
    writeFileSync(join(root, 'a\\b.txt'), 'from a backslash name');
    const output = join(workDir, 'out.gpak');
    writeFileSync(output, 'previous archive');

    const err = await packDirectory(root, output).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DuplicatePathError);
    expect(err).toMatchObject({
      path: 'a/b.txt',
      sources: [join(root, 'a', 'b.txt'), join(root, 'a\\b.txt')],
    });
    expect(readFileSync(output, 'utf8')).toBe('previous archive');
    expect(readdirSync(workDir).sort()).toEqual(['assets', 'out.gpak']);
  });

  it('fails with IoFailureError when the output cannot be replaced and removes its temporary file', async () => {
    writeTree(root, { 'a.txt': 'hello' });
    const output = join(workDir, 'out.gpak');
    mkdirSync(output);
    writeFileSync(join(output, 'keep.txt'), 'occupied');

    const err = await packDirectory(root, output).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(IoFailureError);
    expect(err).toMatchObject({ path: output });
    expect(readdirSync(workDir).sort()).toEqual(['assets', 'out.gpak']);
    expect(readFileSync(join(output, 'keep.txt'), 'utf8')).toBe('occupied');
  });

  it('warns about and skips files whose names are not logical paths', async () => {
    writeTree(root, { 'a.txt': 'hello' });
    writeFileSync(join(root, 'c:notes.txt'), 'drive relative');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    try {
      const { entries } = await buildArchive(root);

      expect(entries.map((entry) => entry.path)).toEqual(['a.txt']);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        `Skipping ${join(root, 'c:notes.txt')}: Path must not have a drive prefix`,
      );
    } finally {
      warn.mockRestore();
    }
  });

  // =========================================================================
  // End to end
  // =========================================================================

  it('serves a packed tree identically from every backend', async () => {
    writeTree(root, SAMPLE_TREE);
    const output = join(workDir, 'out.gpak');
    await packDirectory(root, output);

    const backends: AssetBackend[] = [
      await FolderBackend.create(root),
      await ArchiveBackend.openFile(output),
      await ArchiveBackend.openFile(output, { preload: true }),
      EmbeddedBackend.from(readFileSync(output)),
    ];

    try {
      const expectedPaths = await backends[0]?.list();
      for (const backend of backends) {
        expect(await backend.list()).toEqual(expectedPaths);
        for (const [path, content] of Object.entries(SAMPLE_TREE)) {
          const expected = typeof content === 'string' ? new TextEncoder().encode(content) : content;
          expect(await backend.open(path)).toEqual(expected);
        }
      }
    } finally {
      for (const backend of backends) {
        await backend.close();
      }
    }
  });
});
