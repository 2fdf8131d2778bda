// JSON Schema generation from prototype shapes
//
// Shapes are walked depth first. Every shape with a canonical title is written
// once into a shared definitions table and referenced with $ref everywhere it
// appears; untitled shapes (anonymous objects, unions, constrained scalars) are
// inlined. The table entry is reserved before descending, so a titled shape
// that refers back to itself resolves to a $ref instead of looping.

import { z } from 'zod';
import { SchemaGenerationError } from '../errors.js';
import { getShapeMeta } from '../shapes/meta.js';
import type { JsonSchema } from './types.js';

/**
 * Build the $ref pointing at a definition.
 */
export function definitionRef(title: string): string {
  const pointer = title.replace(/~/g, '~0').replace(/\//g, '~1');
  return `#/definitions/${encodeURIComponent(pointer)}`;
}

const NULL_SCHEMA: JsonSchema = { type: 'null' };

/**
 * Attach keywords to a schema. Siblings of $ref are ignored by draft-07
 * validators, so a reference is wrapped in allOf first.
 */
function annotate(base: JsonSchema, extra: JsonSchema): JsonSchema {
  if (base.$ref !== undefined) {
    return { allOf: [base], ...extra };
  }
  return { ...base, ...extra };
}

function orNull(base: JsonSchema): JsonSchema {
  return { anyOf: [base, NULL_SCHEMA] };
}

export class SchemaGenerator {
  private readonly definitions = new Map<string, JsonSchema>();
  private readonly expanding = new Set<z.ZodTypeAny>();

  /**
   * Schema for a shape: a $ref for titled shapes, the inline schema otherwise.
   */
  schemaFor(schema: z.ZodTypeAny): JsonSchema {
    const title = this.titleOf(schema);
    if (title === undefined) {
      return this.describe(schema);
    }
    this.defineWith(title, () => this.describe(schema));
    return { $ref: definitionRef(title) };
  }

  /**
   * Emit a shape under an explicit title, whatever its own title is.
   */
  defineShape(title: string, schema: z.ZodTypeAny): JsonSchema {
    this.defineWith(title, () => this.describe(schema));
    return { $ref: definitionRef(title) };
  }

  /**
   * Emit a hand-written schema under a title.
   */
  define(title: string, schema: JsonSchema): JsonSchema {
    this.defineWith(title, () => schema);
    return { $ref: definitionRef(title) };
  }

  /**
   * The emitted definition for a title, if any.
   */
  definition(title: string): JsonSchema | undefined {
    return this.definitions.get(title);
  }

  getDefinitions(): Record<string, JsonSchema> {
    return Object.fromEntries(this.definitions);
  }

  private defineWith(title: string, build: () => JsonSchema): void {
    if (this.definitions.has(title)) return;
    // Reserve the slot first so recursive references terminate
    this.definitions.set(title, {});
    this.definitions.set(title, { title, ...build() });
  }

  /**
   * Canonical title of a shape, or undefined when it should be inlined.
   */
  titleOf(schema: z.ZodTypeAny): string | undefined {
    const meta = getShapeMeta(schema);
    if (meta?.title !== undefined) return meta.title;

    if (schema instanceof z.ZodString) {
      return schema._def.checks.length === 0 ? 'String' : undefined;
    }
    if (schema instanceof z.ZodNumber) {
      const checks = schema._def.checks;
      if (checks.length === 0) return 'Number';
      if (checks.length === 1 && checks[0].kind === 'int') return 'Integer';
      return undefined;
    }
    if (schema instanceof z.ZodBoolean) return 'Boolean';
    if (schema instanceof z.ZodNull) return 'Null';
    if (schema instanceof z.ZodArray) {
      const { minLength, maxLength, exactLength } = schema._def;
      if (minLength || maxLength || exactLength) return undefined;
      const element = this.titleOf(schema.element);
      return element === undefined ? undefined : `Array<${element}>`;
    }
    if (schema instanceof z.ZodRecord) {
      const key = this.titleOf(schema.keySchema);
      const value = this.titleOf(schema.valueSchema);
      return key === undefined || value === undefined ? undefined : `Record<${key}, ${value}>`;
    }
    if (schema instanceof z.ZodTuple) {
      if (schema._def.rest) return undefined;
      const items: z.ZodTypeAny[] = schema.items;
      const titles = items.map((item) => this.titleOf(item));
      if (titles.some((title) => title === undefined)) return undefined;
      return `(${titles.join(', ')})`;
    }
    return undefined;
  }

  /**
   * Inline schema of a shape, descending into its children.
   */
  private describe(schema: z.ZodTypeAny): JsonSchema {
    const meta = getShapeMeta(schema);
    const body = this.describeStructure(schema);
    const extra: JsonSchema = {};
    if (meta?.description !== undefined) extra.description = meta.description;
    if (meta?.comment !== undefined) extra.$comment = meta.comment;
    return Object.keys(extra).length > 0 ? annotate(body, extra) : body;
  }

  private describeStructure(schema: z.ZodTypeAny): JsonSchema {
    const meta = getShapeMeta(schema);
    if (meta?.kind === 'asset') {
      return { type: 'string' };
    }
    if (meta?.kind === 'identifier') {
      return { type: ['string', 'integer'], minimum: 0, maximum: Number.MAX_SAFE_INTEGER };
    }

    if (schema instanceof z.ZodString) return describeString(schema);
    if (schema instanceof z.ZodNumber) return describeNumber(schema);
    if (schema instanceof z.ZodBigInt) return { type: 'integer' };
    if (schema instanceof z.ZodBoolean) return { type: 'boolean' };
    if (schema instanceof z.ZodNull) return { type: 'null' };
    if (schema instanceof z.ZodAny || schema instanceof z.ZodUnknown) return {};

    if (schema instanceof z.ZodLiteral) {
      const value: unknown = schema.value;
      return literalSchema(value);
    }
    if (schema instanceof z.ZodEnum) {
      const options: string[] = [...schema.options];
      return { type: 'string', enum: options };
    }
    if (schema instanceof z.ZodNativeEnum) {
      const values = z.util.getValidEnumValues(schema.enum);
      return { enum: values };
    }

    if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
      return orNull(this.schemaFor(schema.unwrap()));
    }
    if (schema instanceof z.ZodDefault) {
      const value: unknown = schema._def.defaultValue();
      return annotate(this.schemaFor(schema.removeDefault()), { default: value });
    }

    if (schema instanceof z.ZodObject) return this.describeObject(schema);
    if (schema instanceof z.ZodArray) return this.describeArray(schema);
    if (schema instanceof z.ZodTuple) return this.describeTuple(schema);
    if (schema instanceof z.ZodRecord) {
      return { type: 'object', additionalProperties: this.schemaFor(schema.valueSchema) };
    }

    if (schema instanceof z.ZodIntersection) {
      return { allOf: [this.schemaFor(schema._def.left), this.schemaFor(schema._def.right)] };
    }
    if (schema instanceof z.ZodUnion || schema instanceof z.ZodDiscriminatedUnion) {
      const options: z.ZodTypeAny[] = [...schema.options];
      return { oneOf: options.map((option) => this.schemaFor(option)) };
    }

    if (schema instanceof z.ZodLazy) return this.describeLazy(schema);
    if (schema instanceof z.ZodEffects) return this.schemaFor(schema.innerType());
    if (schema instanceof z.ZodBranded) return this.schemaFor(schema.unwrap());
    if (schema instanceof z.ZodReadonly) return this.schemaFor(schema.unwrap());
    if (schema instanceof z.ZodCatch) return this.schemaFor(schema.removeCatch());
    if (schema instanceof z.ZodPipeline) return this.schemaFor(schema._def.in);

    const typeName: unknown = schema._def.typeName;
    throw new SchemaGenerationError(`Unsupported shape: ${String(typeName)}`);
  }

  private describeObject(schema: z.AnyZodObject): JsonSchema {
    const shape: z.ZodRawShape = schema.shape;
    const properties: Record<string, JsonSchema> = {};
    const required: string[] = [];

    for (const [key, field] of Object.entries(shape)) {
      properties[key] = this.schemaFor(field);
      // Optional and default-provided fields may be left out
      if (!field.isOptional()) {
        required.push(key);
      }
    }

    const result: JsonSchema = { type: 'object', properties };
    if (required.length > 0) result.required = required;

    const catchall: z.ZodTypeAny = schema._def.catchall;
    if (!(catchall instanceof z.ZodNever)) {
      result.additionalProperties = this.schemaFor(catchall);
    } else if (schema._def.unknownKeys === 'strict') {
      result.additionalProperties = false;
    }
    return result;
  }

  private describeArray(schema: z.ZodArray<z.ZodTypeAny>): JsonSchema {
    const result: JsonSchema = { type: 'array', items: this.schemaFor(schema.element) };
    const { minLength, maxLength, exactLength } = schema._def;
    if (exactLength) {
      result.minItems = exactLength.value;
      result.maxItems = exactLength.value;
    }
    if (minLength) result.minItems = minLength.value;
    if (maxLength) result.maxItems = maxLength.value;
    return result;
  }

  private describeTuple(schema: z.ZodTuple): JsonSchema {
    const items: z.ZodTypeAny[] = schema.items;
    const rest: z.ZodTypeAny | null = schema._def.rest;
    const result: JsonSchema = {
      type: 'array',
      items: items.map((item) => this.schemaFor(item)),
      minItems: items.length,
    };
    if (rest) {
      result.additionalItems = this.schemaFor(rest);
    } else {
      result.maxItems = items.length;
    }
    return result;
  }

  private describeLazy(schema: z.ZodLazy<z.ZodTypeAny>): JsonSchema {
    if (this.expanding.has(schema)) {
      throw new SchemaGenerationError(
        'Recursive shape without a title; wrap the recursive shape in named()'
      );
    }
    this.expanding.add(schema);
    try {
      return this.schemaFor(schema.schema);
    } finally {
      this.expanding.delete(schema);
    }
  }
}

function describeString(schema: z.ZodString): JsonSchema {
  const result: JsonSchema = { type: 'string' };
  for (const check of schema._def.checks) {
    switch (check.kind) {
      case 'min':
        result.minLength = check.value;
        break;
      case 'max':
        result.maxLength = check.value;
        break;
      case 'length':
        result.minLength = check.value;
        result.maxLength = check.value;
        break;
      case 'regex':
        result.pattern = check.regex.source;
        break;
      case 'email':
      case 'uuid':
        result.format = check.kind;
        break;
      case 'url':
        result.format = 'uri';
        break;
      case 'datetime':
        result.format = 'date-time';
        break;
      default:
        break;
    }
  }
  return result;
}

function describeNumber(schema: z.ZodNumber): JsonSchema {
  const result: JsonSchema = { type: 'number' };
  for (const check of schema._def.checks) {
    switch (check.kind) {
      case 'int':
        result.type = 'integer';
        break;
      case 'min':
        if (check.inclusive) result.minimum = check.value;
        else result.exclusiveMinimum = check.value;
        break;
      case 'max':
        if (check.inclusive) result.maximum = check.value;
        else result.exclusiveMaximum = check.value;
        break;
      case 'multipleOf':
        result.multipleOf = check.value;
        break;
      default:
        break;
    }
  }
  return result;
}

function literalSchema(value: unknown): JsonSchema {
  switch (typeof value) {
    case 'string':
      return { type: 'string', const: value };
    case 'number':
      return { type: 'number', const: value };
    case 'boolean':
      return { type: 'boolean', const: value };
    default:
      return value === null ? { type: 'null' } : { const: value };
  }
}
