// Field builders for prototype shapes

import { z } from 'zod';
import { AssetHandle } from '../assets/handle.js';
import { Identifier } from '../identifier/index.js';
import { named, withShapeMeta } from './meta.js';

/**
 * A field holding a reference to an externally loadable resource.
 *
 * In documents the field is a path relative to the document. After
 * deserialization it holds the AssetHandle returned by the asset loader.
 */
export function assetRef<T = unknown>(): z.ZodType<AssetHandle<T>> {
  const schema = z.custom<AssetHandle<T>>((value) => value instanceof AssetHandle, {
    message: 'Expected an asset path',
  });
  return withShapeMeta(schema, { kind: 'asset', title: 'AssetPath', comment: 'an asset path' });
}

/**
 * A field referencing another prototype by identifier.
 * Accepts the prototype's name, or its raw hash as a non-negative safe integer.
 * A name made only of digits is still a name.
 */
export function idRef<T = unknown>(): z.ZodType<Identifier<T>, z.ZodTypeDef, string | number> {
  const schema = z
    .union([z.string(), z.number().int().nonnegative().safe()])
    .transform((value) =>
      typeof value === 'string' ? Identifier.fromName<T>(value) : Identifier.fromRaw<T>(BigInt(value))
    );
  return withShapeMeta(schema, {
    kind: 'identifier',
    title: 'PrototypeId',
    comment: 'an identifier for a prototype',
  });
}

/**
 * A fixed-length numeric or boolean vector, e.g. `vector('Vec2', z.number(), 2)`.
 */
export function vector<S extends z.ZodTypeAny>(
  title: string,
  scalar: S,
  length: number
): z.ZodArray<S> {
  return named(title, z.array(scalar).length(length), {
    comment: `${length}-component vector`,
  });
}

/**
 * Merge the fields of `extension` into `base` at the same level, like a
 * flattened sub-structure.
 */
export function flatten<A extends z.ZodTypeAny, B extends z.ZodTypeAny>(
  base: A,
  extension: B
): z.ZodIntersection<A, B> {
  return z.intersection(base, extension);
}
