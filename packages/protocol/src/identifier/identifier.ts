// Prototype identifiers
//
// An Identifier is the FNV-1a hash of a human-readable name. The type
// parameter only exists at compile time so that an Identifier<Sword> cannot be
// handed to a registry of shields.

import { fnv1a64 } from './fnv.js';

/**
 * Stable 64-bit identifier of a value of type `T`.
 */
export class Identifier<T = unknown> {
  declare private readonly marker?: T;

  private constructor(private readonly hash: bigint) {}

  /**
   * Create an identifier from a human-readable name.
   */
  static fromName<T = unknown>(name: string): Identifier<T> {
    return new Identifier<T>(fnv1a64(name));
  }

  /**
   * Create an identifier from a raw hash. Values outside the unsigned 64-bit
   * range are wrapped.
   */
  static fromRaw<T = unknown>(hash: bigint): Identifier<T> {
    return new Identifier<T>(BigInt.asUintN(64, hash));
  }

  raw(): bigint {
    return this.hash;
  }

  equals(other: Identifier<T>): boolean {
    return this.hash === other.raw();
  }

  /**
   * Drop the static type tag, e.g. for type-heterogeneous storage.
   */
  erase(): ErasedIdentifier {
    return Identifier.fromRaw(this.hash);
  }

  toString(): string {
    return this.hash.toString(16).toUpperCase().padStart(16, '0');
  }

  toJSON(): string {
    return this.hash.toString();
  }
}

/**
 * Identifier that keeps the name it was hashed from.
 *
 * Equality only looks at the hash; the name is carried for display and for
 * writing the record back out.
 */
export class NamedIdentifier<T = unknown> {
  private readonly identifier: Identifier<T>;

  private constructor(private readonly source: string) {
    this.identifier = Identifier.fromName<T>(source);
  }

  static fromName<T = unknown>(name: string): NamedIdentifier<T> {
    return new NamedIdentifier<T>(name);
  }

  name(): string {
    return this.source;
  }

  id(): Identifier<T> {
    return this.identifier;
  }

  raw(): bigint {
    return this.identifier.raw();
  }

  equals(other: NamedIdentifier<T> | Identifier<T>): boolean {
    return this.identifier.raw() === other.raw();
  }

  erase(): ErasedNamedIdentifier {
    return NamedIdentifier.fromName(this.source);
  }

  toString(): string {
    return `${this.source}#${this.identifier.toString()}`;
  }

  toJSON(): string {
    return this.source;
  }
}

export type ErasedIdentifier = Identifier<unknown>;
export type ErasedNamedIdentifier = NamedIdentifier<unknown>;

/**
 * Anything that resolves to an identifier of `T`.
 */
export type IdentifierLike<T> = Identifier<T> | NamedIdentifier<T> | string;

/**
 * Normalize a name, identifier or named identifier to a plain identifier.
 */
export function toIdentifier<T>(value: IdentifierLike<T>): Identifier<T> {
  if (typeof value === 'string') {
    return Identifier.fromName<T>(value);
  }
  if (value instanceof NamedIdentifier) {
    return value.id();
  }
  return value;
}
