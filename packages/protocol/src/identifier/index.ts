export { fnv1a64, FNV_OFFSET_BASIS_64, FNV_PRIME_64 } from './fnv.js';
export {
  Identifier,
  NamedIdentifier,
  toIdentifier,
  type ErasedIdentifier,
  type ErasedNamedIdentifier,
  type IdentifierLike,
} from './identifier.js';
