/**
 * Embedded build demo: the archive is compiled into the bundle by the
 * embeddedAssets() plugin and read without any filesystem access.
 */

import archive from 'virtual:gamepak-archive';
import { AssetLoader, EmbeddedBackend } from '@gamepak/assets/web';

interface LevelData {
  name: string;
  width: number;
  height: number;
}

async function main(): Promise<void> {
  const loader = new AssetLoader(EmbeddedBackend.fromBase64(archive));

  const paths = await loader.list();
  console.log(`Embedded archive: ${paths.length} asset(s)`);
  for (const path of paths) {
    console.log(`  ${path}`);
  }

  console.log(await loader.loadText('text/hello.txt'));
  const level = await loader.loadJSON<LevelData>('data/level1.json');
  console.log(`Level "${level.name}" is ${level.width}x${level.height}`);
}

main().catch((err: unknown) => {
  console.error('Embedded demo failed:', err);
});
