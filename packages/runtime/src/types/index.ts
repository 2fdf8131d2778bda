export {
  TypeHandle,
  definePrototype,
  type PrototypeRecord,
  type ErasedPrototypeRecord,
  type ErasedTypeHandle,
  type PrototypeDefinition,
} from './handle.js';
export { TypeRegistry, type PrototypeType } from './registry.js';
