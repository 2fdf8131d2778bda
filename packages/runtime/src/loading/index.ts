export {
  PrototypeLoader,
  type PrototypeLoaderOptions,
  type DocumentLoadReport,
  type DocumentStatus,
  type FolderLoadReport,
  type RecordFailure,
} from './loader.js';
