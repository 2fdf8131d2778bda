// Asset path resolution
//
// Asset paths are POSIX-style and relative to the asset root. References inside
// a document are relative to the directory holding that document, unless they
// start with "/", which anchors them at the asset root.

import { posix } from 'node:path';
import { InvalidAssetPathError } from '../errors.js';

/**
 * Convert a path to the forward-slash form used for asset paths.
 */
export function toAssetPath(path: string): string {
  return path.replace(/\\/g, '/');
}

/**
 * Resolve a reference found in a document against the document's location.
 *
 * @example
 * resolveAssetPath('assets/protos/sword.proto.json', '../icons/foo.png')
 * // => 'assets/icons/foo.png'
 *
 * @throws InvalidAssetPathError for empty references or ones that climb above the root
 */
export function resolveAssetPath(documentPath: string, reference: string): string {
  const ref = toAssetPath(reference);
  if (ref.trim() === '') {
    throw new InvalidAssetPathError(reference, 'path is empty');
  }

  const resolved = ref.startsWith('/')
    ? posix.normalize(ref.slice(1))
    : posix.join(posix.dirname(toAssetPath(documentPath)), ref);

  if (resolved === '..' || resolved.startsWith('../')) {
    throw new InvalidAssetPathError(reference, 'path escapes the asset root');
  }
  return resolved;
}
