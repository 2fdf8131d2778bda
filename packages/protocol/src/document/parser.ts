// Prototype document parser
//
// Parsing is shape-agnostic: it only splits each record into its header and an
// opaque payload. Giving the payload a shape is the pipeline's job.

import { z } from 'zod';
import { MalformedDocumentError, formatFieldPath } from '../errors.js';
import type { OnDiskRecord, ParsedDocument } from './types.js';

const RawRecordSchema = z
  .object({
    type: z.string(),
    name: z.string(),
    tags: z.array(z.string()).default([]),
  })
  .passthrough();

const RawRecordListSchema = z.array(RawRecordSchema);

type RawRecord = z.infer<typeof RawRecordSchema>;

const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Describe a zod error in one line.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = formatFieldPath(issue.path);
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

function toOnDiskRecord(raw: RawRecord): OnDiskRecord {
  const { type, name, tags, ...payload } = raw;
  return { type, name, tags, payload };
}

/**
 * Decode raw bytes as UTF-8 text. A leading byte order mark is dropped.
 */
export function decodeDocument(bytes: Uint8Array | string, sourcePath?: string): string {
  if (typeof bytes === 'string') {
    return bytes.charCodeAt(0) === 0xfeff ? bytes.slice(1) : bytes;
  }
  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new MalformedDocumentError('document is not valid UTF-8', { sourcePath, cause: error });
  }
}

/**
 * Parse a prototype document.
 *
 * A list of records is tried first, then a single record; the document is
 * rejected only when neither matches.
 *
 * @throws MalformedDocumentError if the bytes are not JSON or match neither shape
 */
export function parseDocument(bytes: Uint8Array | string, sourcePath?: string): ParsedDocument {
  const text = decodeDocument(bytes, sourcePath);

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedDocumentError(message, { sourcePath, cause: error });
  }

  const list = RawRecordListSchema.safeParse(json);
  if (list.success) {
    return { kind: 'list', records: list.data.map(toOnDiskRecord) };
  }

  const single = RawRecordSchema.safeParse(json);
  if (single.success) {
    return { kind: 'single', records: [toOnDiskRecord(single.data)] };
  }

  // Report against the shape the author evidently meant
  const cause = Array.isArray(json) ? list.error : single.error;
  throw new MalformedDocumentError(formatZodError(cause), { sourcePath, cause });
}
