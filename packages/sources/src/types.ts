// Document and asset source abstractions
// Lets the loader run against the local filesystem or in-memory fixtures.

import type { AssetHandle, AssetResolver } from '@protoforge/protocol';

/**
 * Where prototype documents come from.
 *
 * Paths are forward-slash paths relative to the source root, which is also
 * the asset root that reference fields resolve against.
 */
export interface DocumentSource {
  /**
   * Read a document's raw bytes.
   */
  readDocument(path: string): Promise<Uint8Array>;

  /**
   * List prototype documents below a directory, recursively, in sorted order.
   */
  listDocuments(dir: string): Promise<string[]>;
}

/**
 * Turns an asset path into a handle immediately; the handle settles once the
 * resource has been read.
 */
export interface AssetLoader extends AssetResolver {
  load(path: string): AssetHandle;
}

export type SourceOptions = {
  /** Document extensions to list; defaults to the prototype extensions */
  extensions?: readonly string[];
};
