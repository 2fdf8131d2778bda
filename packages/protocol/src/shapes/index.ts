export {
  named,
  getShapeMeta,
  withShapeMeta,
  isAssetShape,
  type ShapeMeta,
  type ShapeKind,
} from './meta.js';
export { assetRef, idRef, vector, flatten } from './fields.js';
export { variants, unit, type VariantSpec, type VariantOutput } from './variants.js';
export { resolveReferences, type ReferenceContext } from './references.js';
