// Shape metadata
//
// zod schemas describe the shape of prototype payloads. The extra facts the
// pipeline and the schema generator need (a stable title, "this is an asset
// path") are attached here, keyed by the schema instance.

import type { z } from 'zod';

export type ShapeKind = 'asset' | 'identifier';

export type ShapeMeta = {
  /** Canonical title; titled shapes are emitted once into `definitions` */
  title?: string;
  description?: string;
  /** Free-form note copied to `$comment` */
  comment?: string;
  /** Special field kinds recognised by the pipeline and the schema generator */
  kind?: ShapeKind;
};

const metadata = new WeakMap<z.ZodTypeAny, ShapeMeta>();

export function getShapeMeta(schema: z.ZodTypeAny): ShapeMeta | undefined {
  return metadata.get(schema);
}

/**
 * Merge metadata into a schema and return the same schema instance.
 */
export function withShapeMeta<S extends z.ZodTypeAny>(schema: S, meta: ShapeMeta): S {
  metadata.set(schema, { ...metadata.get(schema), ...meta });
  return schema;
}

/**
 * Give a shape a canonical title.
 *
 * Named shapes are emitted once in the schema's `definitions` and referenced
 * everywhere else, which is also what lets recursive shapes terminate.
 *
 * @example
 * const Effect = named('Effect', z.object({ slowFactor: z.number().optional() }));
 */
export function named<S extends z.ZodTypeAny>(
  title: string,
  schema: S,
  meta: Omit<ShapeMeta, 'title' | 'kind'> = {}
): S {
  return withShapeMeta(schema, { ...meta, title });
}

export function isAssetShape(schema: z.ZodTypeAny): boolean {
  return metadata.get(schema)?.kind === 'asset';
}
