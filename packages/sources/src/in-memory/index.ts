// In-memory implementations of DocumentSource and AssetLoader for testing.

import { AssetHandle, PROTOTYPE_EXTENSIONS, isPrototypeDocument, toAssetPath } from '@protoforge/protocol';
import { AssetLoadError } from '../errors.js';
import type { AssetLoader, DocumentSource, SourceOptions } from '../types.js';

const encoder = new TextEncoder();

/**
 * Create an in-memory DocumentSource from a Map of documents.
 *
 * The map is read on every call, so tests can edit documents between loads.
 */
export function createInMemorySource(
  documents: Map<string, string | Uint8Array>,
  options: SourceOptions = {}
): DocumentSource {
  const extensions = options.extensions ?? PROTOTYPE_EXTENSIONS;

  return {
    async readDocument(documentPath: string): Promise<Uint8Array> {
      const content = documents.get(toAssetPath(documentPath));
      if (content === undefined) {
        throw new Error(`Document not found: ${documentPath}`);
      }
      return typeof content === 'string' ? encoder.encode(content) : content;
    },

    async listDocuments(dir: string): Promise<string[]> {
      const normalized = toAssetPath(dir)
        .split('/')
        .filter((segment) => segment !== '' && segment !== '.')
        .join('/');
      const prefix = normalized === '' ? '' : `${normalized}/`;

      return [...documents.keys()]
        .filter((key) => key.startsWith(prefix))
        .filter((key) => isPrototypeDocument(key, extensions))
        .sort();
    },
  };
}

/**
 * Create an in-memory AssetLoader.
 * Returns the loader and the list of paths requested from it, in order.
 *
 * Known paths settle immediately with their value; unknown paths fail.
 */
export function createInMemoryAssetLoader<T = unknown>(
  assets: Map<string, T> = new Map()
): {
  loader: AssetLoader & { load(path: string): AssetHandle<T> };
  requested: string[];
} {
  const handles = new Map<string, AssetHandle<T>>();
  const requested: string[] = [];

  const loader = {
    load(assetPath: string): AssetHandle<T> {
      requested.push(assetPath);

      const existing = handles.get(assetPath);
      if (existing) return existing;

      const handle = new AssetHandle<T>(assetPath);
      handles.set(assetPath, handle);

      const value = assets.get(assetPath);
      if (value === undefined) {
        handle.reject(new AssetLoadError(assetPath, { cause: new Error('no such asset') }));
      } else {
        handle.resolve(value);
      }
      return handle;
    },
  };

  return { loader, requested };
}
