// Prototype type handles
//
// A TypeHandle is the token a host receives when it defines a prototype type.
// It keys the type's registry and carries the payload shape. Records are stored
// erased; the handle remembers every record it produced or accepted so that a
// stored record can be given its static type back without a cast.

import { z } from 'zod';
import {
  RECORD_HEADER_KEYS,
  getShapeMeta,
  type NamedIdentifier,
} from '@protoforge/protocol';
import { ReservedFieldError } from '../errors.js';

/**
 * A loaded prototype.
 */
export type PrototypeRecord<D> = {
  name: NamedIdentifier<D>;
  tags: string[];
  data: D;
};

export type ErasedPrototypeRecord = PrototypeRecord<unknown>;

export type PrototypeDefinition<D> = {
  /** Value of the `type` field selecting this shape in documents */
  discriminant: string;
  schema: z.ZodType<D, z.ZodTypeDef, unknown>;
  /** Title in the emitted schema; defaults to the shape's title, then the discriminant */
  title?: string;
};

export class TypeHandle<D> {
  readonly discriminant: string;
  readonly title: string;
  readonly schema: z.ZodType<D, z.ZodTypeDef, unknown>;
  private readonly records = new WeakSet<ErasedPrototypeRecord>();

  constructor(definition: PrototypeDefinition<D>) {
    this.discriminant = definition.discriminant;
    this.schema = definition.schema;
    this.title = definition.title ?? getShapeMeta(definition.schema)?.title ?? definition.discriminant;
  }

  /**
   * Mark a record as belonging to this type.
   */
  claim(record: PrototypeRecord<D>): PrototypeRecord<D> {
    this.records.add(record);
    return record;
  }

  /**
   * Whether an erased record belongs to this type.
   */
  owns(record: ErasedPrototypeRecord): record is PrototypeRecord<D> {
    return this.records.has(record);
  }

  toString(): string {
    return this.title;
  }
}

export type ErasedTypeHandle = TypeHandle<unknown>;

/**
 * Top-level object shape of a payload schema, if it has one.
 */
function objectShape(schema: z.ZodTypeAny): z.ZodRawShape | undefined {
  if (schema instanceof z.ZodObject) return schema.shape;
  if (schema instanceof z.ZodEffects) return objectShape(schema.innerType());
  return undefined;
}

/**
 * Define a prototype type.
 *
 * @example
 * const Sword = definePrototype({
 *   discriminant: 'sword',
 *   schema: named('Sword', z.object({ damage: z.number(), icon: assetRef() })),
 * });
 *
 * @throws ReservedFieldError if the payload shape declares `type`, `name` or `tags`
 */
export function definePrototype<D>(definition: PrototypeDefinition<D>): TypeHandle<D> {
  const handle = new TypeHandle(definition);
  const shape = objectShape(definition.schema);
  if (shape) {
    for (const key of RECORD_HEADER_KEYS) {
      if (Object.hasOwn(shape, key)) {
        throw new ReservedFieldError(handle.title, key);
      }
    }
  }
  return handle;
}
