// Protocol error types

/**
 * Base class for all prototype errors.
 * Carries a stable code for programmatic handling and logging.
 */
export class ProtoError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtoError';
    this.code = code;
  }
}

/**
 * The document is not valid JSON, or matches neither a single record nor a
 * list of records. Fatal to the whole document.
 */
export class MalformedDocumentError extends ProtoError {
  readonly sourcePath?: string;

  constructor(reason: string, options?: { sourcePath?: string; cause?: unknown }) {
    super(
      'MALFORMED_DOCUMENT',
      options?.sourcePath
        ? `Malformed prototype document ${options.sourcePath}: ${reason}`
        : `Malformed prototype document: ${reason}`,
      { cause: options?.cause }
    );
    this.name = 'MalformedDocumentError';
    this.sourcePath = options?.sourcePath;
  }
}

/**
 * A payload field could not be coerced to its declared type.
 * Aborts only the record being built.
 */
export class FieldDeserializationError extends ProtoError {
  /** Dotted path of the offending field, empty for the payload itself */
  readonly field: string;
  readonly reason: string;

  constructor(field: string, reason: string, options?: { cause?: unknown }) {
    super(
      'FIELD_DESERIALIZATION',
      field ? `Invalid value for field "${field}": ${reason}` : `Invalid payload: ${reason}`,
      options
    );
    this.name = 'FieldDeserializationError';
    this.field = field;
    this.reason = reason;
  }
}

/**
 * A shape cannot be described as JSON Schema.
 */
export class SchemaGenerationError extends ProtoError {
  constructor(message: string) {
    super('SCHEMA_GENERATION', message);
    this.name = 'SchemaGenerationError';
  }
}

/**
 * Format a field path the way error messages and reports show it.
 */
export function formatFieldPath(path: ReadonlyArray<string | number>): string {
  return path
    .map((segment, index) =>
      typeof segment === 'number' ? `[${segment}]` : index === 0 ? segment : `.${segment}`
    )
    .join('');
}

/**
 * An asset reference cannot be resolved to a path inside the asset root.
 */
export class InvalidAssetPathError extends ProtoError {
  readonly reference: string;

  constructor(reference: string, reason: string) {
    super('INVALID_ASSET_PATH', `Invalid asset path "${reference}": ${reason}`);
    this.name = 'InvalidAssetPathError';
    this.reference = reference;
  }
}
