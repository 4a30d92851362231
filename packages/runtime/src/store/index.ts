// Entity Store module

export {
  EntityStore,
  buildEntityStore,
  mergeDeclarationSource,
  splitAttributeLine,
  type BuildEntityStoreOptions,
  type BuildEntityStoreResult,
  type MergeSourceOptions,
} from './store.js';

export {
  applyAttribute,
  attributeKind,
  parseStatus,
  type ApplyAttributeOptions,
  type AttributeKind,
} from './attributes.js';

export {
  createEntity,
  deriveActiveState,
  refreshEntity,
  hasName,
  addUniqueName,
} from './entity.js';

export { sectionEntityType } from './sections.js';
