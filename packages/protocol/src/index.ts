// @protoforge/protocol
// Identifiers, document format, prototype shapes and schema generation

// Errors
export {
  ProtoError,
  MalformedDocumentError,
  FieldDeserializationError,
  SchemaGenerationError,
  InvalidAssetPathError,
  formatFieldPath,
} from './errors.js';

// Identifiers
export {
  fnv1a64,
  FNV_OFFSET_BASIS_64,
  FNV_PRIME_64,
  Identifier,
  NamedIdentifier,
  toIdentifier,
  type ErasedIdentifier,
  type ErasedNamedIdentifier,
  type IdentifierLike,
} from './identifier/index.js';

// Documents
export {
  parseDocument,
  decodeDocument,
  formatZodError,
  isPrototypeDocument,
  PROTOTYPE_EXTENSIONS,
  RECORD_HEADER_KEYS,
  type OnDiskRecord,
  type ParsedDocument,
} from './document/index.js';

// Assets
export {
  AssetHandle,
  resolveAssetPath,
  toAssetPath,
  type AssetResolver,
  type AssetStatus,
} from './assets/index.js';

// Shapes
export {
  named,
  getShapeMeta,
  withShapeMeta,
  isAssetShape,
  assetRef,
  idRef,
  vector,
  flatten,
  variants,
  unit,
  resolveReferences,
  type ShapeMeta,
  type ShapeKind,
  type VariantSpec,
  type VariantOutput,
  type ReferenceContext,
} from './shapes/index.js';

// Schema generation
export {
  SchemaGenerator,
  definitionRef,
  buildPrototypeSchema,
  stringifySchema,
  DRAFT_07,
  PROTOTYPE_ANY,
  PROTOTYPE_NAME,
  type JsonSchema,
  type JsonSchemaType,
  type PrototypeSchemaEntry,
} from './schema/index.js';
