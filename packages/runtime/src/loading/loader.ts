// Prototype Loader - read documents and fill the registries
//
// Each document goes through one synchronous pass: parse, then for every
// record resolve its type, deserialize and insert. A bad record is reported
// and skipped without affecting its siblings; a malformed document is
// reported and skipped as a whole.
//
// Records are tracked by the document that inserted them, so a document can
// be unloaded or reloaded. Every load, reload and unload of a path advances
// that path's generation; a read that finishes after its generation was
// superseded is discarded before it touches the registries.

import {
  MalformedDocumentError,
  NamedIdentifier,
  ProtoError,
  parseDocument,
  toAssetPath,
  type OnDiskRecord,
} from '@protoforge/protocol';
import type { AssetLoader, DocumentSource } from '@protoforge/sources';
import {
  DocumentReadError,
  DuplicateIdentifierError,
  UnknownDiscriminantError,
  UnregisteredTypeError,
} from '../errors.js';
import { errorData, silentLogger, type Logger } from '../logging/index.js';
import { RegMut, displayIdentifier, type PrototypeRegistries } from '../registry/index.js';
import type { ErasedPrototypeRecord, ErasedTypeHandle, TypeRegistry } from '../types/index.js';

// --- Types ---

export type DocumentStatus = 'loaded' | 'malformed' | 'unreadable' | 'superseded';

/**
 * A record that was skipped
 */
export type RecordFailure = {
  /** Position of the record in its document */
  index: number;
  type: string;
  name: string;
  error: ProtoError;
};

/**
 * Result of loading a single document
 */
export type DocumentLoadReport = {
  path: string;
  status: DocumentStatus;

  /** Names of the inserted records, in document order */
  inserted: string[];

  failures: RecordFailure[];

  /** Why the document as a whole was skipped */
  error?: ProtoError;
};

/**
 * Result of loading every document below a directory
 */
export type FolderLoadReport = {
  dir: string;
  documents: DocumentLoadReport[];
  inserted: number;
  failed: number;
};

export type PrototypeLoaderOptions = {
  source: DocumentSource;
  assets: AssetLoader;
  types: TypeRegistry;
  registries: PrototypeRegistries;
  logger?: Logger;
};

type TrackedRecord = {
  handle: ErasedTypeHandle;
  record: ErasedPrototypeRecord;
};

// --- Loader ---

export class PrototypeLoader {
  private readonly source: DocumentSource;
  private readonly assets: AssetLoader;
  private readonly types: TypeRegistry;
  private readonly registries: PrototypeRegistries;
  private readonly logger: Logger;

  private readonly documents = new Map<string, TrackedRecord[]>();
  private readonly generations = new Map<string, number>();

  constructor(options: PrototypeLoaderOptions) {
    this.source = options.source;
    this.assets = options.assets;
    this.types = options.types;
    this.registries = options.registries;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Load a document whose content is already in hand.
   */
  loadDocument(path: string, content: Uint8Array | string): DocumentLoadReport {
    const documentPath = toAssetPath(path);
    this.advance(documentPath);
    return this.ingest(documentPath, content);
  }

  /**
   * Read a document from the source and load it.
   */
  async loadFile(path: string): Promise<DocumentLoadReport> {
    const documentPath = toAssetPath(path);
    const generation = this.advance(documentPath);

    let content: Uint8Array;
    try {
      content = await this.source.readDocument(documentPath);
    } catch (error) {
      if (this.isSuperseded(documentPath, generation)) {
        return this.superseded(documentPath);
      }
      const failure = new DocumentReadError(documentPath, { cause: error });
      this.logger.error('Failed to read prototype document', {
        path: documentPath,
        ...errorData(failure),
      });
      return { path: documentPath, status: 'unreadable', inserted: [], failures: [], error: failure };
    }

    if (this.isSuperseded(documentPath, generation)) {
      return this.superseded(documentPath);
    }
    return this.ingest(documentPath, content);
  }

  /**
   * Load every document below a directory, in sorted path order.
   *
   * @throws DocumentReadError if the directory cannot be listed
   */
  async loadFolder(dir: string): Promise<FolderLoadReport> {
    let paths: string[];
    try {
      paths = await this.source.listDocuments(dir);
    } catch (error) {
      throw new DocumentReadError(dir, { cause: error });
    }

    const documents: DocumentLoadReport[] = [];
    for (const path of paths) {
      documents.push(await this.loadFile(path));
    }

    const report: FolderLoadReport = {
      dir,
      documents,
      inserted: documents.reduce((sum, doc) => sum + doc.inserted.length, 0),
      failed: documents.reduce((sum, doc) => sum + doc.failures.length, 0),
    };
    this.logger.info('Loaded prototype folder', {
      dir,
      documents: documents.length,
      inserted: report.inserted,
      failed: report.failed,
    });
    return report;
  }

  /**
   * Remove the records a document inserted, then load it again.
   */
  async reloadDocument(path: string): Promise<DocumentLoadReport> {
    this.unloadDocument(path);
    return this.loadFile(path);
  }

  /**
   * Remove the records a document inserted and discard any load of it still
   * in flight.
   *
   * Records replaced or removed by someone else since are left alone.
   *
   * @returns The number of records removed
   */
  unloadDocument(path: string): number {
    const documentPath = toAssetPath(path);
    this.advance(documentPath);

    const tracked = this.documents.get(documentPath) ?? [];
    this.documents.delete(documentPath);

    let removed = 0;
    for (const { handle, record } of tracked) {
      if (this.registries.get(handle, record.name) === record) {
        new RegMut(this.registries, handle).remove(record.name);
        removed++;
      }
    }

    if (tracked.length > 0) {
      this.logger.info('Unloaded prototype document', { path: documentPath, removed });
    }
    return removed;
  }

  /**
   * Paths of the documents that currently own records.
   */
  loadedDocuments(): string[] {
    return Array.from(this.documents.keys()).sort();
  }

  private advance(path: string): number {
    const next = (this.generations.get(path) ?? 0) + 1;
    this.generations.set(path, next);
    return next;
  }

  private isSuperseded(path: string, generation: number): boolean {
    return this.generations.get(path) !== generation;
  }

  private superseded(path: string): DocumentLoadReport {
    this.logger.debug('Discarding superseded load', { path });
    return { path, status: 'superseded', inserted: [], failures: [] };
  }

  /**
   * Reject a record the registry would refuse before any of its assets load.
   */
  private assertInsertable(handle: ErasedTypeHandle, name: string): void {
    if (!this.registries.hasRegistryFor(handle)) {
      throw new UnregisteredTypeError(handle.title);
    }
    const id = NamedIdentifier.fromName(name);
    if (this.registries.has(handle, id)) {
      throw new DuplicateIdentifierError(handle.title, displayIdentifier(id));
    }
  }

  private ingest(path: string, content: Uint8Array | string): DocumentLoadReport {
    let records: OnDiskRecord[];
    try {
      records = parseDocument(content, path).records;
    } catch (error) {
      if (error instanceof MalformedDocumentError) {
        this.logger.error('Malformed prototype document', { path, ...errorData(error) });
        return { path, status: 'malformed', inserted: [], failures: [], error };
      }
      throw error;
    }

    const inserted: string[] = [];
    const failures: RecordFailure[] = [];
    const tracked = this.documents.get(path) ?? [];

    records.forEach((raw, index) => {
      const type = this.types.lookup(raw.type);
      if (!type) {
        this.logger.warn('Skipping prototype with unknown type', {
          path,
          index,
          type: raw.type,
          name: raw.name,
        });
        failures.push({
          index,
          type: raw.type,
          name: raw.name,
          error: new UnknownDiscriminantError(raw.type),
        });
        return;
      }

      try {
        this.assertInsertable(type.handle, raw.name);
        const record = type.deserialize(raw, { sourcePath: path, assets: this.assets });
        new RegMut(this.registries, type.handle).insert(record.name, record);
        tracked.push({ handle: type.handle, record });
        inserted.push(raw.name);
        this.logger.debug('Inserted prototype', { path, type: raw.type, id: record.name.toString() });
      } catch (error) {
        if (!(error instanceof ProtoError)) throw error;
        this.logger.error('Failed to load prototype', {
          path,
          index,
          type: raw.type,
          name: raw.name,
          ...errorData(error),
        });
        failures.push({ index, type: raw.type, name: raw.name, error });
      }
    });

    if (tracked.length > 0) {
      this.documents.set(path, tracked);
    }
    this.logger.info('Loaded prototype document', {
      path,
      inserted: inserted.length,
      failed: failures.length,
    });
    return { path, status: 'loaded', inserted, failures };
  }
}
