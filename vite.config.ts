import { defineConfig } from 'vite';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { embeddedAssets } from './tools/vite-embed/src/embedPlugin.js';

const rootDir = fileURLToPath(new URL('.', import.meta.url));

// Run `npm run pack:demo` first so the archive exists.
export default defineConfig({
  root: resolve(rootDir, 'examples/embedded-demo'),
  plugins: [embeddedAssets({ archive: resolve(rootDir, 'dist/demo-assets.gpak') })],
  resolve: {
    alias: {
      '@gamepak/assets/web': resolve(rootDir, 'packages/assets/src/web.ts'),
      '@gamepak/assets': resolve(rootDir, 'packages/assets/src/index.ts'),
    },
  },
  build: {
    outDir: resolve(rootDir, 'dist/embedded-demo'),
    emptyOutDir: true,
    sourcemap: true,
  },
});
