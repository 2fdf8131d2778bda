export { SchemaGenerator, definitionRef } from './generator.js';
export {
  buildPrototypeSchema,
  stringifySchema,
  PROTOTYPE_ANY,
  PROTOTYPE_NAME,
  type PrototypeSchemaEntry,
} from './document.js';
export { DRAFT_07, type JsonSchema, type JsonSchemaType } from './types.js';
