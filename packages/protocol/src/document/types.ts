// Prototype document types
//
// A document holds one record or a list of records:
//   { "type": "<discriminant>", "name": "<string>", "tags": [...], ...payload }

/**
 * A record as read from disk, before its payload is given a shape.
 */
export type OnDiskRecord = {
  /** Discriminant naming the registered prototype type */
  type: string;

  /** Human-readable name the identifier is derived from */
  name: string;

  tags: string[];

  /** Every other field of the record, untouched */
  payload: Record<string, unknown>;
};

/**
 * Result of parsing a document.
 */
export type ParsedDocument = {
  /** Whether the document was written as a list or a single record */
  kind: 'list' | 'single';
  records: OnDiskRecord[];
};

/**
 * Keys the record header owns; everything else is payload.
 */
export const RECORD_HEADER_KEYS = ['type', 'name', 'tags'] as const;

/**
 * File extensions recognised as prototype documents.
 */
export const PROTOTYPE_EXTENSIONS = [
  '.proto.json',
  '.protos.json',
  '.prototype.json',
  '.prototypes.json',
] as const;

/**
 * Check whether a file name carries one of the given document extensions.
 */
export function isPrototypeDocument(
  fileName: string,
  extensions: readonly string[] = PROTOTYPE_EXTENSIONS
): boolean {
  const lower = fileName.toLowerCase();
  return extensions.some((ext) => lower.endsWith(ext));
}
