// Tests for identifiers

import { describe, it, expect } from 'vitest';
import { fnv1a64 } from './fnv.js';
import { Identifier, NamedIdentifier, toIdentifier } from './identifier.js';

type Sword = { damage: number };

describe('fnv1a64', () => {
  it('should return the offset basis for the empty string', () => {
    expect(fnv1a64('')).toBe(0xcbf29ce484222325n);
  });

  it('should match the reference vectors', () => {
    expect(fnv1a64('a')).toBe(0xaf63dc4c8601ec8cn);
    expect(fnv1a64('foobar')).toBe(0x85944171f73967e8n);
  });

  it('should hash multi-byte characters over their UTF-8 bytes', () => {
    expect(fnv1a64('\u00e9')).not.toBe(fnv1a64('e\u0301'));
    expect(fnv1a64('\u00e9')).not.toBe(fnv1a64('\u00c3\u00a9'));
  });
});

describe('Identifier', () => {
  it('should be deterministic across calls', () => {
    const a = Identifier.fromName<Sword>('iron_sword');
    const b = Identifier.fromName<Sword>('iron_sword');

    expect(a.equals(b)).toBe(true);
    expect(a.raw()).toBe(b.raw());
  });

  it('should not collide for distinct names in the corpus', () => {
    const names = [
      'iron_sword',
      'steel_sword',
      'iron_shield',
      'fireball',
      'frostbolt',
      'a',
      'b',
      'ab',
      'ba',
      'Iron_Sword',
    ];
    const hashes = new Set(names.map((name) => Identifier.fromName(name).raw()));

    expect(hashes.size).toBe(names.length);
  });

  it('should round-trip a raw hash', () => {
    const id = Identifier.fromRaw(42n);
    expect(id.raw()).toBe(42n);
    expect(id.equals(Identifier.fromRaw(42n))).toBe(true);
  });

  it('should wrap raw values into the unsigned 64-bit range', () => {
    expect(Identifier.fromRaw(-1n).raw()).toBe(0xffffffffffffffffn);
  });

  it('should render as upper-case hex', () => {
    expect(Identifier.fromName('a').toString()).toBe('AF63DC4C8601EC8C');
  });

  it('should pad small hashes to sixteen digits', () => {
    expect(Identifier.fromRaw(1n).toString()).toBe('0000000000000001');
    expect(Identifier.fromRaw(0xabcn).toString()).toBe('0000000000000ABC');
  });

  it('should keep the hash when erased', () => {
    const id = Identifier.fromName<Sword>('iron_sword');
    expect(id.erase().raw()).toBe(id.raw());
  });
});

describe('NamedIdentifier', () => {
  it('should preserve the exact input name', () => {
    const name = '  Épée de Fer / v2 ';
    expect(NamedIdentifier.fromName(name).name()).toBe(name);
  });

  it('should compare equal to the plain identifier of the same name', () => {
    const named = NamedIdentifier.fromName<Sword>('iron_sword');
    expect(named.equals(Identifier.fromName<Sword>('iron_sword'))).toBe(true);
    expect(named.id().raw()).toBe(fnv1a64('iron_sword'));
  });

  it('should display name and hash', () => {
    expect(NamedIdentifier.fromName('a').toString()).toBe('a#AF63DC4C8601EC8C');
  });

  it('should serialize as its name', () => {
    expect(JSON.stringify({ id: NamedIdentifier.fromName('iron_sword') })).toBe(
      '{"id":"iron_sword"}'
    );
  });
});

describe('toIdentifier', () => {
  it('should accept names, identifiers and named identifiers', () => {
    const expected = fnv1a64('fireball');

    expect(toIdentifier('fireball').raw()).toBe(expected);
    expect(toIdentifier(Identifier.fromName('fireball')).raw()).toBe(expected);
    expect(toIdentifier(NamedIdentifier.fromName('fireball')).raw()).toBe(expected);
  });
});
