// Reference field resolution
//
// Walks a declared shape alongside an untyped payload and replaces every
// asset path found at an asset-reference position with a handle from the
// asset resolver. Which values are references is decided by the declared
// shape, never by the JSON value.

import { z } from 'zod';
import { AssetHandle, type AssetResolver } from '../assets/handle.js';
import { resolveAssetPath } from '../assets/paths.js';
import { FieldDeserializationError, InvalidAssetPathError, formatFieldPath } from '../errors.js';
import { isAssetShape } from './meta.js';

export type ReferenceContext = {
  /** Path of the document the payload came from */
  sourcePath: string;
  assets: AssetResolver;
};

type FieldPath = ReadonlyArray<string | number>;

/** Resolver used to try union branches without starting any load */
const dryRunResolver: AssetResolver = {
  load: (path) => new AssetHandle(path),
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Unwrap schemas that only add behaviour around a single inner schema.
 * Returns undefined for everything else.
 */
function innerSchema(schema: z.ZodTypeAny): z.ZodTypeAny | undefined {
  if (schema instanceof z.ZodEffects) return schema.innerType();
  if (schema instanceof z.ZodBranded) return schema.unwrap();
  if (schema instanceof z.ZodCatch) return schema.removeCatch();
  if (schema instanceof z.ZodReadonly) return schema.unwrap();
  if (schema instanceof z.ZodPipeline) return schema._def.in;
  if (schema instanceof z.ZodLazy) return schema.schema;
  return undefined;
}

/**
 * Replace asset paths in `value` with handles, following `schema`.
 *
 * `null` given for an optional field that does not accept null is dropped,
 * so that it reads as absent.
 * Values that do not match the declared structure are passed through
 * unchanged so that structural validation can report them with a proper
 * message.
 *
 * @throws FieldDeserializationError when an asset reference is not a usable path
 */
export function resolveReferences(
  schema: z.ZodTypeAny,
  value: unknown,
  context: ReferenceContext,
  path: FieldPath = []
): unknown {
  return walk(schema, value, context, path);
}

function walk(
  schema: z.ZodTypeAny,
  value: unknown,
  context: ReferenceContext,
  path: FieldPath
): unknown {
  if (isAssetShape(schema)) {
    return resolveAsset(value, context, path);
  }

  const inner = innerSchema(schema);
  if (inner) return walk(inner, value, context, path);

  if (schema instanceof z.ZodOptional) {
    const inner: z.ZodTypeAny = schema.unwrap();
    if (value === undefined) return undefined;
    // null stands for an absent optional field unless the field is nullable
    if (value === null && !inner.safeParse(null).success) return undefined;
    return walk(inner, value, context, path);
  }
  if (schema instanceof z.ZodNullable) {
    if (value === null) return null;
    return walk(schema.unwrap(), value, context, path);
  }
  if (schema instanceof z.ZodDefault) {
    if (value === undefined) return undefined;
    return walk(schema.removeDefault(), value, context, path);
  }

  if (schema instanceof z.ZodObject) {
    if (!isRecord(value)) return value;
    const shape: z.ZodRawShape = schema.shape;
    const catchall: z.ZodTypeAny = schema._def.catchall;
    const result: Record<string, unknown> = { ...value };
    for (const [key, fieldValue] of Object.entries(value)) {
      const field = Object.hasOwn(shape, key)
        ? shape[key]
        : catchall instanceof z.ZodNever
          ? undefined
          : catchall;
      if (field) {
        result[key] = walk(field, fieldValue, context, [...path, key]);
      }
    }
    return result;
  }

  if (schema instanceof z.ZodArray) {
    if (!Array.isArray(value)) return value;
    const element: z.ZodTypeAny = schema.element;
    return value.map((item, index) => walk(element, item, context, [...path, index]));
  }

  if (schema instanceof z.ZodTuple) {
    if (!Array.isArray(value)) return value;
    const items: z.ZodTypeAny[] = schema.items;
    const rest: z.ZodTypeAny | null = schema._def.rest;
    return value.map((item, index) => {
      const itemSchema = items[index] ?? rest;
      return itemSchema ? walk(itemSchema, item, context, [...path, index]) : item;
    });
  }

  if (schema instanceof z.ZodRecord) {
    if (!isRecord(value)) return value;
    const valueSchema: z.ZodTypeAny = schema.valueSchema;
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = walk(valueSchema, entry, context, [...path, key]);
    }
    return result;
  }

  if (schema instanceof z.ZodIntersection) {
    const left = walk(schema._def.left, value, context, path);
    return walk(schema._def.right, left, context, path);
  }

  if (schema instanceof z.ZodDiscriminatedUnion) {
    if (!isRecord(value)) return value;
    const discriminator: string = schema.discriminator;
    const tag = value[discriminator];
    for (const [key, option] of schema.optionsMap) {
      if (key === tag) return walk(option, value, context, path);
    }
    return value;
  }

  if (schema instanceof z.ZodUnion) {
    const options: z.ZodTypeAny[] = [...schema.options];
    return walkUnion(options, value, context, path);
  }

  return value;
}

/**
 * Pick the first union branch that accepts the value once its references are
 * resolved. Branches are tried with a dry-run resolver so that only the chosen
 * branch ever starts a load. When no branch fits, the value is left for the
 * union's own validation to reject.
 */
function walkUnion(
  options: z.ZodTypeAny[],
  value: unknown,
  context: ReferenceContext,
  path: FieldPath
): unknown {
  const dryRun: ReferenceContext = { sourcePath: context.sourcePath, assets: dryRunResolver };

  for (const option of options) {
    try {
      const candidate = walk(option, value, dryRun, path);
      if (option.safeParse(candidate).success) {
        return walk(option, value, context, path);
      }
    } catch (error) {
      if (!(error instanceof FieldDeserializationError)) throw error;
    }
  }
  return value;
}

function resolveAsset(value: unknown, context: ReferenceContext, path: FieldPath): unknown {
  if (value instanceof AssetHandle) return value;
  if (typeof value !== 'string') {
    throw new FieldDeserializationError(
      formatFieldPath(path),
      `expected an asset path string, received ${value === null ? 'null' : typeof value}`
    );
  }

  let resolved: string;
  try {
    resolved = resolveAssetPath(context.sourcePath, value);
  } catch (error) {
    if (error instanceof InvalidAssetPathError) {
      throw new FieldDeserializationError(formatFieldPath(path), error.message, { cause: error });
    }
    throw error;
  }
  return context.assets.load(resolved);
}
