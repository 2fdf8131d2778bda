// Source error types

import { ProtoError } from '@protoforge/protocol';

/**
 * An asset could not be read. Handles that fail settle with this error.
 */
export class AssetLoadError extends ProtoError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('ASSET_LOAD', `Failed to load asset ${path}${detail}`, options);
    this.name = 'AssetLoadError';
    this.path = path;
  }
}
