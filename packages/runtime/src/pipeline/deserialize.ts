// Deserialization pipeline
//
// OnDiskRecord -> typed record:
// 1. the payload is validated with unloaded handles in its reference fields
// 2. reference fields are swapped for handles from the asset loader
// 3. zod parses the payload into the shape
// 4. the record is assembled under the handle that owns it
//
// A record that fails validation never starts an asset load.

import {
  AssetHandle,
  FieldDeserializationError,
  NamedIdentifier,
  formatFieldPath,
  resolveReferences,
  type AssetResolver,
  type OnDiskRecord,
} from '@protoforge/protocol';
import type { PrototypeRecord, TypeHandle } from '../types/handle.js';

const dryRunResolver: AssetResolver = {
  load: (path) => new AssetHandle(path),
};

export type DeserializeContext = {
  /** Path of the document the record was read from */
  sourcePath: string;
  assets: AssetResolver;
};

/**
 * Deserialize one record into the shape of `handle`.
 *
 * Once the payload validates, asset loads start for every reference field; the record is
 * complete once it holds the handles, whether or not they have settled.
 *
 * @throws FieldDeserializationError naming the first field that does not fit
 */
export function deserializeRecord<D>(
  handle: TypeHandle<D>,
  record: OnDiskRecord,
  context: DeserializeContext
): PrototypeRecord<D> {
  const dryRun = { sourcePath: context.sourcePath, assets: dryRunResolver };
  parsePayload(handle, resolveReferences(handle.schema, record.payload, dryRun));

  const data = parsePayload(handle, resolveReferences(handle.schema, record.payload, context));

  return handle.claim({
    name: NamedIdentifier.fromName<D>(record.name),
    tags: [...record.tags],
    data,
  });
}

function parsePayload<D>(handle: TypeHandle<D>, payload: unknown): D {
  const result = handle.schema.safeParse(payload);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new FieldDeserializationError(
      issue ? formatFieldPath(issue.path) : '',
      issue ? issue.message : 'payload does not match its shape',
      { cause: result.error }
    );
  }
  return result.data;
}
