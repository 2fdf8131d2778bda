// Tests for JSON Schema generation

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { SchemaGenerationError } from '../errors.js';
import { assetRef, flatten, idRef, vector } from '../shapes/fields.js';
import { named } from '../shapes/meta.js';
import { unit, variants } from '../shapes/variants.js';
import { buildPrototypeSchema, stringifySchema } from './document.js';
import { SchemaGenerator, definitionRef } from './generator.js';
import { DRAFT_07 } from './types.js';

// --- Test Fixtures ---

const NUMBER_REF = { $ref: '#/definitions/Number' };
const STRING_REF = { $ref: '#/definitions/String' };

type TreeNode = { label: string; children: TreeNode[] };

const Tree: z.ZodType<TreeNode> = named(
  'Tree',
  z.lazy(() => z.object({ label: z.string(), children: z.array(Tree) }))
);

// --- Tests ---

describe('definitionRef', () => {
  it('should escape titles into a JSON pointer', () => {
    expect(definitionRef('Sword')).toBe('#/definitions/Sword');
    expect(definitionRef('Array<Tree>')).toBe('#/definitions/Array%3CTree%3E');
    expect(definitionRef('a/b')).toBe('#/definitions/a~1b');
  });
});

describe('SchemaGenerator', () => {
  it('should emit a type used by two sibling fields once', () => {
    const Vec2 = vector('Vec2', z.number(), 2);
    const Line = named('Line', z.object({ from: Vec2, to: Vec2 }));
    const generator = new SchemaGenerator();

    expect(generator.schemaFor(Line)).toEqual({ $ref: '#/definitions/Line' });

    const definitions = generator.getDefinitions();
    expect(Object.keys(definitions)).toEqual(['Line', 'Vec2', 'Number']);
    expect(definitions.Line).toEqual({
      title: 'Line',
      type: 'object',
      properties: {
        from: { $ref: '#/definitions/Vec2' },
        to: { $ref: '#/definitions/Vec2' },
      },
      required: ['from', 'to'],
    });
    expect(definitions.Vec2).toEqual({
      title: 'Vec2',
      type: 'array',
      items: NUMBER_REF,
      minItems: 2,
      maxItems: 2,
      $comment: '2-component vector',
    });
  });

  it('should close a recursive titled shape with a self reference', () => {
    const generator = new SchemaGenerator();
    generator.schemaFor(Tree);

    const definitions = generator.getDefinitions();
    expect(definitions.Tree).toEqual({
      title: 'Tree',
      type: 'object',
      properties: {
        label: STRING_REF,
        children: { $ref: '#/definitions/Array%3CTree%3E' },
      },
      required: ['label', 'children'],
    });
    expect(definitions['Array<Tree>']).toEqual({
      title: 'Array<Tree>',
      type: 'array',
      items: { $ref: '#/definitions/Tree' },
    });
  });

  it('should reject recursion through an untitled shape', () => {
    type Chain = { next?: Chain };
    const Chain: z.ZodType<Chain> = z.lazy(() => z.object({ next: Chain.optional() }));

    expect(() => new SchemaGenerator().schemaFor(Chain)).toThrow(SchemaGenerationError);
  });

  it('should leave optional and defaulted fields out of required', () => {
    const Item = named(
      'Item',
      z.object({
        weight: z.number(),
        note: z.string().optional(),
        stack: z.number().int().default(1),
      })
    );
    const generator = new SchemaGenerator();
    generator.schemaFor(Item);

    expect(generator.definition('Item')).toEqual({
      title: 'Item',
      type: 'object',
      properties: {
        weight: NUMBER_REF,
        note: { anyOf: [STRING_REF, { type: 'null' }] },
        stack: { allOf: [{ $ref: '#/definitions/Integer' }], default: 1 },
      },
      required: ['weight'],
    });
    expect(generator.definition('Integer')).toEqual({ title: 'Integer', type: 'integer' });
  });

  it('should describe flattened fields with allOf', () => {
    const Base = named('Base', z.object({ hp: z.number() }));
    const Unit = named('Unit', flatten(Base, z.object({ speed: z.number() })));
    const generator = new SchemaGenerator();
    generator.schemaFor(Unit);

    expect(generator.definition('Unit')).toEqual({
      title: 'Unit',
      allOf: [
        { $ref: '#/definitions/Base' },
        { type: 'object', properties: { speed: NUMBER_REF }, required: ['speed'] },
      ],
    });
  });

  it('should describe variant enums as oneOf with a string enum for unit variants', () => {
    const Status = variants('Status', {
      Burning: unit,
      Frozen: unit,
      Slow: z.tuple([z.number(), z.number()]),
      Knockback: z.object({ force: z.number() }),
    });
    const generator = new SchemaGenerator();
    generator.schemaFor(Status);

    expect(generator.definition('Status')).toEqual({
      title: 'Status',
      oneOf: [
        { type: 'string', enum: ['Burning', 'Frozen'] },
        {
          type: 'object',
          properties: { Slow: { $ref: definitionRef('(Number, Number)') } },
          required: ['Slow'],
          additionalProperties: false,
        },
        {
          type: 'object',
          properties: {
            Knockback: {
              type: 'object',
              properties: { force: NUMBER_REF },
              required: ['force'],
            },
          },
          required: ['Knockback'],
          additionalProperties: false,
        },
      ],
    });
    expect(generator.definition('(Number, Number)')).toEqual({
      title: '(Number, Number)',
      type: 'array',
      items: [NUMBER_REF, NUMBER_REF],
      minItems: 2,
      maxItems: 2,
    });
  });

  it('should describe asset and identifier references', () => {
    const generator = new SchemaGenerator();
    const result = generator.schemaFor(z.object({ icon: assetRef(), target: idRef() }));

    expect(result.properties).toEqual({
      icon: { $ref: '#/definitions/AssetPath' },
      target: { $ref: '#/definitions/PrototypeId' },
    });
    expect(generator.definition('AssetPath')).toEqual({
      title: 'AssetPath',
      type: 'string',
      $comment: 'an asset path',
    });
    expect(generator.definition('PrototypeId')).toEqual({
      title: 'PrototypeId',
      type: ['string', 'integer'],
      minimum: 0,
      maximum: 9007199254740991,
      $comment: 'an identifier for a prototype',
    });
  });

  it('should inline constrained scalars with their bounds', () => {
    const generator = new SchemaGenerator();

    expect(generator.schemaFor(z.number().int().min(0).max(10))).toEqual({
      type: 'integer',
      minimum: 0,
      maximum: 10,
    });
    expect(generator.schemaFor(z.string().min(1).max(3))).toEqual({
      type: 'string',
      minLength: 1,
      maxLength: 3,
    });
  });

  it('should title string-keyed records', () => {
    const generator = new SchemaGenerator();

    expect(generator.schemaFor(z.record(z.number()))).toEqual({
      $ref: definitionRef('Record<String, Number>'),
    });
    expect(generator.definition('Record<String, Number>')).toEqual({
      title: 'Record<String, Number>',
      type: 'object',
      additionalProperties: NUMBER_REF,
    });
  });

  it('should reject shapes it cannot describe', () => {
    expect(() => new SchemaGenerator().schemaFor(z.date())).toThrow('Unsupported shape: ZodDate');
  });
});

describe('buildPrototypeSchema', () => {
  const Sword = z.object({ damage: z.number(), icon: assetRef() });

  it('should accept one prototype or a list of them at the top level', () => {
    const schema = buildPrototypeSchema([{ discriminant: 'sword', title: 'Sword', schema: Sword }]);
    const anyRef = { $ref: '#/definitions/PrototypeAny' };

    expect(schema.$schema).toBe(DRAFT_07);
    expect(schema.title).toBe('Prototype');
    expect(schema.type).toEqual(['object', 'array']);
    expect(schema.oneOf).toEqual([anyRef, { type: 'array', items: anyRef }]);
  });

  it('should merge the record header into each object branch', () => {
    const schema = buildPrototypeSchema([{ discriminant: 'sword', title: 'Sword', schema: Sword }]);

    expect(schema.definitions?.PrototypeAny).toEqual({
      title: 'PrototypeAny',
      oneOf: [
        {
          type: 'object',
          properties: {
            type: { type: 'string', const: 'sword' },
            name: { $ref: '#/definitions/PrototypeName' },
            tags: { $ref: '#/definitions/Array%3CString%3E' },
            damage: NUMBER_REF,
            icon: { $ref: '#/definitions/AssetPath' },
          },
          required: ['type', 'name', 'damage', 'icon'],
        },
      ],
    });
    expect(schema.definitions?.Sword?.title).toBe('Sword');
  });

  it('should combine non-object payloads with allOf', () => {
    const schema = buildPrototypeSchema([
      { discriminant: 'palette', title: 'Palette', schema: z.array(z.string()) },
    ]);
    const branches = schema.definitions?.PrototypeAny?.oneOf;

    expect(branches).toHaveLength(1);
    expect(branches?.[0]?.allOf?.[1]).toEqual({ $ref: '#/definitions/Palette' });
    expect(schema.definitions?.Palette).toEqual({
      title: 'Palette',
      type: 'array',
      items: STRING_REF,
    });
  });

  it('should emit an unsatisfiable PrototypeAny when nothing is registered', () => {
    const schema = buildPrototypeSchema([]);
    expect(schema.definitions?.PrototypeAny).toEqual({ title: 'PrototypeAny', not: {} });
  });
});

describe('stringifySchema', () => {
  it('should write bigint values as decimal strings', () => {
    expect(stringifySchema({ default: 5n })).toBe('{\n  "default": "5"\n}');
  });
});
