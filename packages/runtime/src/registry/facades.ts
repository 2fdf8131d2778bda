// Typed registry facades handed to collaborators
//
// Reg<D> only reads. RegMut<D> also mutates, and announces each successful
// insert or removal to the type's subscribers.

import { Identifier, toIdentifier, type IdentifierLike } from '@protoforge/protocol';
import type { PrototypeRecord, TypeHandle } from '../types/index.js';
import type { PrototypeRegistries } from './registries.js';

/**
 * Read-only view of one type's registry.
 */
export class Reg<D> {
  constructor(
    protected readonly registries: PrototypeRegistries,
    readonly handle: TypeHandle<D>
  ) {}

  get(id: IdentifierLike<D>): PrototypeRecord<D> | undefined {
    return this.registries.get(this.handle, id);
  }

  getByName(name: string): PrototypeRecord<D> | undefined {
    return this.registries.getByName(this.handle, name);
  }

  has(id: IdentifierLike<D>): boolean {
    return this.registries.has(this.handle, id);
  }

  ids(): Identifier<D>[] {
    return this.registries.ids(this.handle);
  }

  records(): PrototypeRecord<D>[] {
    return this.registries.records(this.handle);
  }

  get size(): number {
    return this.registries.size(this.handle);
  }
}

/**
 * Mutable view of one type's registry.
 */
export class RegMut<D> extends Reg<D> {
  /**
   * @throws DuplicateIdentifierError if the identifier is taken
   */
  insert(id: IdentifierLike<D>, record: PrototypeRecord<D>): void {
    this.registries.insert(this.handle, id, record);
    this.registries.publish(this.handle, { kind: 'added', id: toIdentifier(id), record });
  }

  /**
   * Insert a record under its own name.
   */
  add(record: PrototypeRecord<D>): void {
    this.insert(record.name, record);
  }

  /**
   * @throws PrototypeNotFoundError if nothing is stored under the identifier
   */
  remove(id: IdentifierLike<D>): PrototypeRecord<D> {
    const record = this.registries.remove(this.handle, id);
    this.registries.publish(this.handle, { kind: 'removed', id: toIdentifier(id), record });
    return record;
  }

  removeByName(name: string): PrototypeRecord<D> {
    return this.remove(name);
  }

  /**
   * Remove every record, announcing each removal.
   */
  clear(): void {
    for (const id of this.ids()) {
      this.remove(id);
    }
  }
}
