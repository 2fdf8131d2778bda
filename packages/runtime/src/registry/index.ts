export {
  PrototypeRegistries,
  displayIdentifier,
  type RegistryEvent,
  type RegistryEventKind,
  type ErasedRegistryEvent,
} from './registries.js';
export { Reg, RegMut } from './facades.js';
export { EventBus, type EventHandler } from './events.js';
