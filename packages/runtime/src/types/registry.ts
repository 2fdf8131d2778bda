// Type Registry - maps document discriminants to prototype types
//
// Written during setup only. Once sealed, registration throws and the registry
// is read-only for the rest of the context's life.

import type { OnDiskRecord, PrototypeSchemaEntry } from '@protoforge/protocol';
import { DuplicateDiscriminantError, RegistrySealedError } from '../errors.js';
import { deserializeRecord, type DeserializeContext } from '../pipeline/index.js';
import type { ErasedPrototypeRecord, ErasedTypeHandle } from './handle.js';

/**
 * Everything the loader and the schema generator need about a registered type.
 */
export type PrototypeType = {
  readonly discriminant: string;
  readonly handle: ErasedTypeHandle;
  deserialize(record: OnDiskRecord, context: DeserializeContext): ErasedPrototypeRecord;
  schemaEntry(): PrototypeSchemaEntry;
};

function createPrototypeType(discriminant: string, handle: ErasedTypeHandle): PrototypeType {
  return {
    discriminant,
    handle,
    deserialize: (record, context) => deserializeRecord(handle, record, context),
    schemaEntry: () => ({ discriminant, title: handle.title, schema: handle.schema }),
  };
}

export class TypeRegistry {
  private readonly byDiscriminant = new Map<string, PrototypeType>();
  private sealed = false;

  /**
   * Register a type under a discriminant.
   *
   * @throws RegistrySealedError after seal()
   * @throws DuplicateDiscriminantError if the discriminant is taken
   */
  register(discriminant: string, handle: ErasedTypeHandle): void {
    if (this.sealed) {
      throw new RegistrySealedError(discriminant);
    }
    if (this.byDiscriminant.has(discriminant)) {
      throw new DuplicateDiscriminantError(discriminant);
    }
    this.byDiscriminant.set(discriminant, createPrototypeType(discriminant, handle));
  }

  /**
   * Look up the handle registered under a discriminant.
   */
  resolve(discriminant: string): ErasedTypeHandle | undefined {
    return this.byDiscriminant.get(discriminant)?.handle;
  }

  /**
   * The type registered under a discriminant, with its deserializer.
   */
  lookup(discriminant: string): PrototypeType | undefined {
    return this.byDiscriminant.get(discriminant);
  }

  /**
   * The first registration of a handle.
   */
  describe(handle: ErasedTypeHandle): PrototypeType | undefined {
    for (const type of this.byDiscriminant.values()) {
      if (type.handle === handle) return type;
    }
    return undefined;
  }

  /**
   * All registrations, in registration order.
   */
  types(): PrototypeType[] {
    return Array.from(this.byDiscriminant.values());
  }

  getDiscriminants(): string[] {
    return Array.from(this.byDiscriminant.keys());
  }

  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }
}
