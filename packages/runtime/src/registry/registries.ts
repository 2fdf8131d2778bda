// Prototype Registries - per-type record storage
//
// One collection per registered type, keyed by identifier hash. Records are
// stored erased and recovered through the owning TypeHandle on the way out.
// Nothing here emits events; the RegMut facade does that after a successful
// mutation.

import {
  Identifier,
  NamedIdentifier,
  toIdentifier,
  type IdentifierLike,
} from '@protoforge/protocol';
import {
  DuplicateIdentifierError,
  PrototypeNotFoundError,
  UnregisteredTypeError,
} from '../errors.js';
import { silentLogger, type Logger } from '../logging/index.js';
import type {
  ErasedPrototypeRecord,
  ErasedTypeHandle,
  PrototypeRecord,
  TypeHandle,
} from '../types/index.js';
import { EventBus, type EventHandler } from './events.js';

// --- Event Types ---

export type RegistryEventKind = 'added' | 'removed';

export type RegistryEvent<D> = {
  kind: RegistryEventKind;
  id: Identifier<D>;
  record: PrototypeRecord<D>;
};

export type ErasedRegistryEvent = RegistryEvent<unknown>;

/**
 * Render an identifier for error messages, with its name when known.
 */
export function displayIdentifier(id: IdentifierLike<unknown>): string {
  return typeof id === 'string' ? NamedIdentifier.fromName(id).toString() : id.toString();
}

// --- Registries ---

export class PrototypeRegistries {
  private readonly collections = new Map<ErasedTypeHandle, Map<bigint, ErasedPrototypeRecord>>();
  private readonly events: EventBus<ErasedTypeHandle, ErasedRegistryEvent>;

  constructor(logger: Logger = silentLogger) {
    this.events = new EventBus(logger);
  }

  /**
   * Create the collection for a type. Calling it again is a no-op.
   */
  newRegistryFor(handle: ErasedTypeHandle): void {
    if (!this.collections.has(handle)) {
      this.collections.set(handle, new Map());
    }
  }

  hasRegistryFor(handle: ErasedTypeHandle): boolean {
    return this.collections.has(handle);
  }

  private collection(handle: ErasedTypeHandle): Map<bigint, ErasedPrototypeRecord> {
    const collection = this.collections.get(handle);
    if (!collection) {
      throw new UnregisteredTypeError(handle.title);
    }
    return collection;
  }

  /**
   * Insert a record.
   *
   * @throws DuplicateIdentifierError if the identifier is taken; the stored record is kept
   * @throws UnregisteredTypeError if the type has no registry
   */
  insert<D>(handle: TypeHandle<D>, id: IdentifierLike<D>, record: PrototypeRecord<D>): void {
    const collection = this.collection(handle);
    const key = toIdentifier(id).raw();
    if (collection.has(key)) {
      throw new DuplicateIdentifierError(handle.title, displayIdentifier(id));
    }
    collection.set(key, handle.claim(record));
  }

  get<D>(handle: TypeHandle<D>, id: IdentifierLike<D>): PrototypeRecord<D> | undefined {
    const stored = this.collections.get(handle)?.get(toIdentifier(id).raw());
    return stored && handle.owns(stored) ? stored : undefined;
  }

  /**
   * Look a record up by the name its identifier was hashed from.
   */
  getByName<D>(handle: TypeHandle<D>, name: string): PrototypeRecord<D> | undefined {
    return this.get(handle, Identifier.fromName<D>(name));
  }

  has<D>(handle: TypeHandle<D>, id: IdentifierLike<D>): boolean {
    return this.get(handle, id) !== undefined;
  }

  /**
   * Remove and return a record.
   *
   * @throws PrototypeNotFoundError if there is no record under the identifier
   * @throws UnregisteredTypeError if the type has no registry
   */
  remove<D>(handle: TypeHandle<D>, id: IdentifierLike<D>): PrototypeRecord<D> {
    const collection = this.collection(handle);
    const key = toIdentifier(id).raw();
    const stored = collection.get(key);
    if (!stored || !handle.owns(stored)) {
      throw new PrototypeNotFoundError(handle.title, displayIdentifier(id));
    }
    collection.delete(key);
    return stored;
  }

  removeByName<D>(handle: TypeHandle<D>, name: string): PrototypeRecord<D> {
    return this.remove(handle, NamedIdentifier.fromName<D>(name));
  }

  ids<D>(handle: TypeHandle<D>): Identifier<D>[] {
    const collection = this.collections.get(handle);
    return collection ? Array.from(collection.keys(), (key) => Identifier.fromRaw<D>(key)) : [];
  }

  records<D>(handle: TypeHandle<D>): PrototypeRecord<D>[] {
    const collection = this.collections.get(handle);
    if (!collection) return [];
    return Array.from(collection.values()).filter((record) => handle.owns(record));
  }

  size(handle: ErasedTypeHandle): number {
    return this.collections.get(handle)?.size ?? 0;
  }

  /**
   * Empty one type's collection, or every collection. Collections stay registered.
   */
  clear(handle?: ErasedTypeHandle): void {
    if (handle) {
      this.collections.get(handle)?.clear();
      return;
    }
    for (const collection of this.collections.values()) {
      collection.clear();
    }
  }

  // --- Events ---

  subscribe<D>(handle: TypeHandle<D>, handler: EventHandler<RegistryEvent<D>>): () => void {
    return this.events.subscribe(handle, (event) => {
      if (handle.owns(event.record)) {
        handler({ kind: event.kind, id: Identifier.fromRaw<D>(event.id.raw()), record: event.record });
      }
    });
  }

  publish(handle: ErasedTypeHandle, event: ErasedRegistryEvent): void {
    this.events.publish(handle, event);
  }

  subscriberCount(handle: ErasedTypeHandle): number {
    return this.events.subscriberCount(handle);
  }

  /**
   * Drop every collection and subscription.
   */
  dispose(): void {
    this.collections.clear();
    this.events.clear();
  }
}
