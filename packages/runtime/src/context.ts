// Prototype Context - owns every piece of prototype state
//
// Lifecycle:
//   setup     register types
//   start()   seal the type registry, enable loading
//   running   load documents, read and mutate registries
//   dispose() drop records and subscriptions

import { buildPrototypeSchema, stringifySchema, type JsonSchema } from '@protoforge/protocol';
import {
  createFilesystemByteLoader,
  createFilesystemSource,
  type AssetLoader,
  type DocumentSource,
} from '@protoforge/sources';
import type { ProtoforgeConfig } from './config/index.js';
import { ContextStateError } from './errors.js';
import { PrototypeLoader, type FolderLoadReport } from './loading/index.js';
import { createConsoleLogger, silentLogger, type Logger } from './logging/index.js';
import {
  PrototypeRegistries,
  Reg,
  RegMut,
  type EventHandler,
  type RegistryEvent,
} from './registry/index.js';
import { TypeRegistry, type TypeHandle } from './types/index.js';

export type ContextState = 'setup' | 'running' | 'disposed';

export type PrototypeContextOptions = {
  source: DocumentSource;
  assets: AssetLoader;
  logger?: Logger;
  /** Directory loadAll() reads; defaults to "prototypes" */
  prototypeDir?: string;
};

export class PrototypeContext {
  readonly types = new TypeRegistry();
  readonly registries: PrototypeRegistries;
  readonly logger: Logger;

  private readonly prototypeDir: string;
  private readonly documentLoader: PrototypeLoader;
  private state: ContextState = 'setup';

  constructor(options: PrototypeContextOptions) {
    this.logger = options.logger ?? silentLogger;
    this.prototypeDir = options.prototypeDir ?? 'prototypes';
    this.registries = new PrototypeRegistries(this.logger);
    this.documentLoader = new PrototypeLoader({
      source: options.source,
      assets: options.assets,
      types: this.types,
      registries: this.registries,
      logger: this.logger,
    });
  }

  get status(): ContextState {
    return this.state;
  }

  /**
   * Register a prototype type under its discriminant and create its registry.
   *
   * @throws RegistrySealedError once the context has started
   */
  register<D>(handle: TypeHandle<D>): this {
    this.assertNot('disposed', 'register types');
    this.types.register(handle.discriminant, handle);
    this.registries.newRegistryFor(handle);
    this.logger.debug('Registered prototype type', {
      discriminant: handle.discriminant,
      title: handle.title,
    });
    return this;
  }

  /**
   * Finish setup. Type registration is closed from here on.
   */
  start(): this {
    if (this.state !== 'setup') {
      throw new ContextStateError(`Cannot start a context that is ${this.state}`);
    }
    this.types.seal();
    this.state = 'running';
    this.logger.info('Prototype context started', {
      types: this.types.getDiscriminants().length,
    });
    return this;
  }

  /**
   * The document loader. Only available while running.
   */
  get loader(): PrototypeLoader {
    this.assertRunning('load documents');
    return this.documentLoader;
  }

  /**
   * Load every document below the configured prototype directory.
   */
  async loadAll(): Promise<FolderLoadReport> {
    return this.loader.loadFolder(this.prototypeDir);
  }

  reg<D>(handle: TypeHandle<D>): Reg<D> {
    this.assertNot('disposed', 'read registries');
    return new Reg(this.registries, handle);
  }

  regMut<D>(handle: TypeHandle<D>): RegMut<D> {
    this.assertRunning('modify registries');
    return new RegMut(this.registries, handle);
  }

  /**
   * Receive `added` and `removed` events for one type.
   *
   * @returns Unsubscribe function
   */
  subscribe<D>(handle: TypeHandle<D>, handler: EventHandler<RegistryEvent<D>>): () => void {
    this.assertNot('disposed', 'subscribe');
    return this.registries.subscribe(handle, handler);
  }

  /**
   * JSON Schema covering every registered type.
   */
  schema(): JsonSchema {
    return buildPrototypeSchema(this.types.types().map((type) => type.schemaEntry()));
  }

  emitSchema(): string {
    return stringifySchema(this.schema());
  }

  dispose(): void {
    if (this.state === 'disposed') return;
    this.registries.dispose();
    this.state = 'disposed';
    this.logger.info('Prototype context disposed');
  }

  private assertRunning(action: string): void {
    if (this.state !== 'running') {
      throw new ContextStateError(`Cannot ${action}: context is ${this.state}`);
    }
  }

  private assertNot(state: ContextState, action: string): void {
    if (this.state === state) {
      throw new ContextStateError(`Cannot ${action}: context is ${this.state}`);
    }
  }
}

/**
 * Create a context reading documents and assets from the filesystem.
 */
export function createPrototypeContext(
  config: ProtoforgeConfig,
  options: { logger?: Logger } = {}
): PrototypeContext {
  return new PrototypeContext({
    source: createFilesystemSource(config.assetRoot, { extensions: config.extensions }),
    assets: createFilesystemByteLoader(config.assetRoot),
    logger: options.logger ?? createConsoleLogger(config.logLevel),
    prototypeDir: config.prototypeDir,
  });
}
