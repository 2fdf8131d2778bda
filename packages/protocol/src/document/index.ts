export { parseDocument, decodeDocument, formatZodError } from './parser.js';
export {
  isPrototypeDocument,
  PROTOTYPE_EXTENSIONS,
  RECORD_HEADER_KEYS,
  type OnDiskRecord,
  type ParsedDocument,
} from './types.js';
