// @protoforge/runtime
// Type registration, deserialization, registries and document loading

// Context (owns everything below)
export {
  PrototypeContext,
  createPrototypeContext,
  type ContextState,
  type PrototypeContextOptions,
} from './context.js';

// Error types
export {
  UnknownDiscriminantError,
  DuplicateIdentifierError,
  PrototypeNotFoundError,
  UnregisteredTypeError,
  DuplicateDiscriminantError,
  RegistrySealedError,
  ReservedFieldError,
  ContextStateError,
  DocumentReadError,
  ConfigError,
} from './errors.js';

// Prototype types
export {
  TypeHandle,
  TypeRegistry,
  definePrototype,
  type PrototypeRecord,
  type ErasedPrototypeRecord,
  type ErasedTypeHandle,
  type PrototypeDefinition,
  type PrototypeType,
} from './types/index.js';

// Deserialization
export { deserializeRecord, type DeserializeContext } from './pipeline/index.js';

// Registries and events
export {
  PrototypeRegistries,
  Reg,
  RegMut,
  EventBus,
  displayIdentifier,
  type EventHandler,
  type RegistryEvent,
  type RegistryEventKind,
  type ErasedRegistryEvent,
} from './registry/index.js';

// Loading
export {
  PrototypeLoader,
  type PrototypeLoaderOptions,
  type DocumentLoadReport,
  type DocumentStatus,
  type FolderLoadReport,
  type RecordFailure,
} from './loading/index.js';

// Logging
export {
  createConsoleLogger,
  createCapturingLogger,
  silentLogger,
  errorData,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logging/index.js';

// Configuration
export { loadConfig, type ProtoforgeConfig } from './config/index.js';
