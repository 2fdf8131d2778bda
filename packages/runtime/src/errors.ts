// Runtime error types
//
// Every error carries a stable code (see ProtoError). Per-record failures are
// collected into load reports by the loader; registry failures are thrown to
// the caller of insert/remove.

import { ProtoError } from '@protoforge/protocol';

/**
 * A record names a discriminant no prototype type was registered under.
 */
export class UnknownDiscriminantError extends ProtoError {
  readonly discriminant: string;

  constructor(discriminant: string) {
    super('UNKNOWN_DISCRIMINANT', `No prototype type registered for discriminant "${discriminant}"`);
    this.name = 'UnknownDiscriminantError';
    this.discriminant = discriminant;
  }
}

/**
 * An identifier is already present in a type's registry.
 * The original entry is kept.
 */
export class DuplicateIdentifierError extends ProtoError {
  readonly typeTitle: string;
  readonly identifier: string;

  constructor(typeTitle: string, identifier: string) {
    super('DUPLICATE_IDENTIFIER', `Duplicate ${typeTitle} prototype: ${identifier}`);
    this.name = 'DuplicateIdentifierError';
    this.typeTitle = typeTitle;
    this.identifier = identifier;
  }
}

/**
 * Error when a prototype does not exist
 */
export class PrototypeNotFoundError extends ProtoError {
  readonly typeTitle: string;
  readonly identifier: string;

  constructor(typeTitle: string, identifier: string) {
    super('NOT_FOUND', `${typeTitle} prototype not found: ${identifier}`);
    this.name = 'PrototypeNotFoundError';
    this.typeTitle = typeTitle;
    this.identifier = identifier;
  }
}

/**
 * Error when a registry is used for a type that was never registered
 */
export class UnregisteredTypeError extends ProtoError {
  readonly typeTitle: string;

  constructor(typeTitle: string) {
    super('UNREGISTERED_TYPE', `Prototype type ${typeTitle} has no registry`);
    this.name = 'UnregisteredTypeError';
    this.typeTitle = typeTitle;
  }
}

/**
 * Error when two types claim the same discriminant
 */
export class DuplicateDiscriminantError extends ProtoError {
  readonly discriminant: string;

  constructor(discriminant: string) {
    super('DUPLICATE_DISCRIMINANT', `Discriminant already registered: ${discriminant}`);
    this.name = 'DuplicateDiscriminantError';
    this.discriminant = discriminant;
  }
}

/**
 * Error when registering a type after setup has finished
 */
export class RegistrySealedError extends ProtoError {
  readonly discriminant: string;

  constructor(discriminant: string) {
    super(
      'REGISTRY_SEALED',
      `Cannot register "${discriminant}": type registration is closed once the context has started`
    );
    this.name = 'RegistrySealedError';
    this.discriminant = discriminant;
  }
}

/**
 * A payload shape declares a field the record header owns.
 */
export class ReservedFieldError extends ProtoError {
  readonly field: string;

  constructor(typeTitle: string, field: string) {
    super('RESERVED_FIELD', `Prototype type ${typeTitle} declares reserved field "${field}"`);
    this.name = 'ReservedFieldError';
    this.field = field;
  }
}

/**
 * Error when a context operation is called in the wrong lifecycle phase
 */
export class ContextStateError extends ProtoError {
  constructor(message: string) {
    super('CONTEXT_STATE', message);
    this.name = 'ContextStateError';
  }
}

/**
 * A document could not be read from its source.
 */
export class DocumentReadError extends ProtoError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('DOCUMENT_READ', `Failed to read prototype document ${path}${detail}`, options);
    this.name = 'DocumentReadError';
    this.path = path;
  }
}

/**
 * Invalid configuration.
 */
export class ConfigError extends ProtoError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
