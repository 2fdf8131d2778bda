// Composite schema covering every registered prototype type
//
// A document is one prototype record or a list of them, so the root schema
// accepts either a PrototypeAny object or an array of PrototypeAny.

import { z } from 'zod';
import { SchemaGenerator, definitionRef } from './generator.js';
import { DRAFT_07, type JsonSchema } from './types.js';

/**
 * What the composite schema needs to know about one registered type.
 */
export type PrototypeSchemaEntry = {
  discriminant: string;
  /** Title the payload shape is emitted under */
  title: string;
  schema: z.ZodTypeAny;
};

export const PROTOTYPE_ANY = 'PrototypeAny';
export const PROTOTYPE_NAME = 'PrototypeName';

/**
 * Schema of the record header shared by every prototype.
 */
function headerSchema(generator: SchemaGenerator, discriminant: string): JsonSchema {
  return {
    type: 'object',
    properties: {
      type: { type: 'string', const: discriminant },
      name: generator.define(PROTOTYPE_NAME, {
        type: 'string',
        $comment: 'the name the prototype identifier is derived from',
      }),
      tags: generator.schemaFor(z.array(z.string())),
    },
    required: ['type', 'name'],
  };
}

/**
 * One PrototypeAny branch: the header merged with the payload's own fields.
 * Payloads that are not plain objects are combined with allOf instead.
 */
function prototypeBranch(generator: SchemaGenerator, entry: PrototypeSchemaEntry): JsonSchema {
  const header = headerSchema(generator, entry.discriminant);
  const dataRef = generator.defineShape(entry.title, entry.schema);
  const data = generator.definition(entry.title);

  if (data?.type !== 'object' || data.properties === undefined) {
    return { allOf: [header, dataRef] };
  }

  const branch: JsonSchema = {
    type: 'object',
    properties: { ...header.properties, ...data.properties },
    required: [...(header.required ?? []), ...(data.required ?? [])],
  };
  if (data.additionalProperties !== undefined) {
    branch.additionalProperties = data.additionalProperties;
  }
  return branch;
}

/**
 * Build the schema of a prototype document.
 */
export function buildPrototypeSchema(entries: readonly PrototypeSchemaEntry[]): JsonSchema {
  const generator = new SchemaGenerator();
  const branches = entries.map((entry) => prototypeBranch(generator, entry));

  const definitions = generator.getDefinitions();
  definitions[PROTOTYPE_ANY] =
    branches.length > 0
      ? { title: PROTOTYPE_ANY, oneOf: branches }
      : { title: PROTOTYPE_ANY, not: {} };

  const anyRef: JsonSchema = { $ref: definitionRef(PROTOTYPE_ANY) };

  return {
    $schema: DRAFT_07,
    title: 'Prototype',
    type: ['object', 'array'],
    oneOf: [anyRef, { type: 'array', items: anyRef }],
    definitions,
  };
}

/**
 * Serialize a schema. Bigint defaults are written as decimal strings.
 */
export function stringifySchema(schema: JsonSchema): string {
  return JSON.stringify(
    schema,
    (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value),
    2
  );
}
