/**
 * @gamepak/assets: archive format, storage backends and the runtime asset loader.
 */

export * from './web.js';

export { FolderBackend } from './backends/folder-backend.js';
export { ArchiveBackend } from './backends/archive-backend.js';
export type { ArchiveBackendOptions } from './backends/archive-backend.js';
export { asBytes, errorCode, isInsideRoot, walkSourceFiles } from './backends/source-files.js';
export type { SourceFile, WalkOptions } from './backends/source-files.js';
export { openBackend, createAssetLoader, probeAssetSources } from './open-backend.js';
export type { ProbeOptions } from './open-backend.js';
