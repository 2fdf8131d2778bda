// Tests for the deserialization pipeline

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  AssetHandle,
  FieldDeserializationError,
  Identifier,
  assetRef,
  idRef,
  named,
  unit,
  variants,
  type OnDiskRecord,
} from '@protoforge/protocol';
import { createInMemoryAssetLoader } from '@protoforge/sources';
import { definePrototype } from '../types/index.js';
import { deserializeRecord } from './deserialize.js';

// --- Test Fixtures ---

const Element = variants('Element', {
  Physical: unit,
  Fire: z.object({ burn: z.number() }),
});

const Sword = definePrototype({
  discriminant: 'sword',
  schema: named(
    'Sword',
    z.object({
      damage: z.number().int().min(0),
      icon: assetRef<string>(),
      sheath: assetRef<string>().optional(),
      element: Element.default('Physical'),
      upgrade: idRef().optional(),
    })
  ),
});

function sword(payload: Record<string, unknown>, name = 'iron_sword'): OnDiskRecord {
  return { type: 'sword', name, tags: ['melee'], payload };
}

const SOURCE = 'assets/protos/sword.proto.json';

function captureFieldError(run: () => unknown): FieldDeserializationError {
  try {
    run();
  } catch (error) {
    if (error instanceof FieldDeserializationError) return error;
    throw error;
  }
  throw new Error('expected a field deserialization error');
}

// --- Tests ---

describe('deserializeRecord', () => {
  it('should build a typed record with resolved asset handles', () => {
    const { loader, requested } = createInMemoryAssetLoader(
      new Map([['assets/icons/foo.png', 'pixels']])
    );

    const record = deserializeRecord(Sword, sword({ damage: 7, icon: '../icons/foo.png' }), {
      sourcePath: SOURCE,
      assets: loader,
    });

    expect(record.name.name()).toBe('iron_sword');
    expect(record.tags).toEqual(['melee']);
    expect(record.data.damage).toBe(7);
    expect(record.data.element).toBe('Physical');
    expect(record.data.icon).toBeInstanceOf(AssetHandle);
    expect(record.data.icon.path).toBe('assets/icons/foo.png');
    expect(requested).toEqual(['assets/icons/foo.png']);
    expect(Sword.owns(record)).toBe(true);
  });

  it('should keep the record even while its assets are still loading', () => {
    const pending = { load: (path: string) => new AssetHandle(path) };

    const record = deserializeRecord(Sword, sword({ damage: 1, icon: 'icon.png' }), {
      sourcePath: SOURCE,
      assets: pending,
    });

    expect(record.data.icon.status).toBe('pending');
  });

  it('should treat null optional fields as absent', () => {
    const { loader } = createInMemoryAssetLoader();

    const record = deserializeRecord(
      Sword,
      sword({ damage: 1, icon: 'icon.png', sheath: null, upgrade: null }),
      { sourcePath: SOURCE, assets: loader }
    );

    expect(record.data.sheath).toBeUndefined();
    expect(record.data.upgrade).toBeUndefined();
  });

  it('should parse variant and identifier fields', () => {
    const { loader } = createInMemoryAssetLoader();

    const record = deserializeRecord(
      Sword,
      sword({ damage: 1, icon: 'icon.png', element: { Fire: { burn: 2 } }, upgrade: 'steel_sword' }),
      { sourcePath: SOURCE, assets: loader }
    );

    expect(record.data.element).toEqual({ Fire: { burn: 2 } });
    expect(record.data.upgrade?.equals(Identifier.fromName('steel_sword'))).toBe(true);
  });

  it('should name the field that does not fit', () => {
    const { loader } = createInMemoryAssetLoader();

    const error = captureFieldError(() =>
      deserializeRecord(Sword, sword({ damage: -1, icon: 'icon.png' }), {
        sourcePath: SOURCE,
        assets: loader,
      })
    );

    expect(error.field).toBe('damage');
    expect(error.reason).toBe('Number must be greater than or equal to 0');
    expect(error.message).toBe(
      'Invalid value for field "damage": Number must be greater than or equal to 0'
    );
  });

  it('should report missing required fields', () => {
    const { loader } = createInMemoryAssetLoader();

    const error = captureFieldError(() =>
      deserializeRecord(Sword, sword({ icon: 'icon.png' }), { sourcePath: SOURCE, assets: loader })
    );

    expect(error.field).toBe('damage');
    expect(error.reason).toBe('Required');
  });

  it('should reject asset references that are not strings', () => {
    const { loader, requested } = createInMemoryAssetLoader();

    const error = captureFieldError(() =>
      deserializeRecord(Sword, sword({ damage: 1, icon: 42 }), { sourcePath: SOURCE, assets: loader })
    );

    expect(error.field).toBe('icon');
    expect(error.reason).toBe('expected an asset path string, received number');
    expect(requested).toEqual([]);
  });

  it('should not load assets of a record that fails validation', () => {
    const { loader, requested } = createInMemoryAssetLoader();

    const error = captureFieldError(() =>
      deserializeRecord(Sword, sword({ damage: -1, icon: 'icon.png', sheath: 'sheath.png' }), {
        sourcePath: SOURCE,
        assets: loader,
      })
    );

    expect(error.field).toBe('damage');
    expect(requested).toEqual([]);
  });
});
