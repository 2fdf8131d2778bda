// Filesystem implementations of DocumentSource and AssetLoader.
// Uses Node.js fs module for local filesystem operations.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { AssetHandle, PROTOTYPE_EXTENSIONS, isPrototypeDocument, toAssetPath } from '@protoforge/protocol';
import { AssetLoadError } from '../errors.js';
import type { AssetLoader, DocumentSource, SourceOptions } from '../types.js';

/**
 * Join a root-relative asset path onto a directory on disk.
 */
function onDisk(root: string, assetPath: string): string {
  return path.join(root, ...toAssetPath(assetPath).split('/'));
}

function isRootDir(dir: string): boolean {
  return dir === '' || dir === '.' || dir === '/';
}

async function collectDocuments(
  root: string,
  dir: string,
  extensions: readonly string[],
  found: string[]
): Promise<void> {
  const entries = await fs.readdir(onDisk(root, dir), { withFileTypes: true });
  for (const entry of entries) {
    const relative = isRootDir(dir) ? entry.name : path.posix.join(dir, entry.name);
    if (entry.isDirectory()) {
      await collectDocuments(root, relative, extensions, found);
    } else if (entry.isFile() && isPrototypeDocument(entry.name, extensions)) {
      found.push(relative);
    }
  }
}

/**
 * Create a DocumentSource that reads from a directory on the local filesystem.
 */
export function createFilesystemSource(root: string, options: SourceOptions = {}): DocumentSource {
  const extensions = options.extensions ?? PROTOTYPE_EXTENSIONS;

  return {
    async readDocument(documentPath: string): Promise<Uint8Array> {
      return fs.readFile(onDisk(root, documentPath));
    },

    async listDocuments(dir: string): Promise<string[]> {
      const found: string[] = [];
      await collectDocuments(root, toAssetPath(dir).replace(/\/+$/, ''), extensions, found);
      return found.sort();
    },
  };
}

export type FilesystemAssetLoader<T> = AssetLoader & {
  load(path: string): AssetHandle<T>;

  /**
   * Resolves once every read started so far has settled its handle.
   */
  whenIdle(): Promise<void>;
};

/**
 * Create an AssetLoader that reads assets below `root`.
 *
 * Handles are cached per path, so every record referring to the same asset
 * shares one handle and the file is read once. `decode` turns the bytes into
 * the value the handle carries.
 */
export function createFilesystemAssetLoader<T = Uint8Array>(
  root: string,
  decode: (bytes: Uint8Array, assetPath: string) => T | Promise<T>
): FilesystemAssetLoader<T> {
  const handles = new Map<string, AssetHandle<T>>();
  const reads = new Set<Promise<void>>();

  async function read(handle: AssetHandle<T>): Promise<void> {
    try {
      const bytes = await fs.readFile(onDisk(root, handle.path));
      handle.resolve(await decode(bytes, handle.path));
    } catch (error) {
      handle.reject(new AssetLoadError(handle.path, { cause: error }));
    }
  }

  return {
    load(assetPath: string): AssetHandle<T> {
      const existing = handles.get(assetPath);
      if (existing) return existing;

      const handle = new AssetHandle<T>(assetPath);
      handles.set(assetPath, handle);

      const pending = read(handle).finally(() => reads.delete(pending));
      reads.add(pending);
      return handle;
    },

    async whenIdle(): Promise<void> {
      while (reads.size > 0) {
        await Promise.all(reads);
      }
    },
  };
}

/**
 * Asset loader that hands out the raw bytes of each asset.
 */
export function createFilesystemByteLoader(root: string): FilesystemAssetLoader<Uint8Array> {
  return createFilesystemAssetLoader(root, (bytes) => bytes);
}
