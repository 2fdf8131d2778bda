// @protoforge/sources
// Where prototype documents and the assets they reference are read from

export type { AssetLoader, DocumentSource, SourceOptions } from './types.js';
export { AssetLoadError } from './errors.js';

// Filesystem
export {
  createFilesystemSource,
  createFilesystemAssetLoader,
  createFilesystemByteLoader,
  type FilesystemAssetLoader,
} from './fs/index.js';

// In-memory
export { createInMemorySource, createInMemoryAssetLoader } from './in-memory/index.js';
