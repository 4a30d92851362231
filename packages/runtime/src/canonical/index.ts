export {
  CanonicalNameResolver,
  resolveCanonicalNames,
  flatCanonicalName,
  type CanonicalNameOptions,
  type CanonicalNamesResult,
} from './canonical-names.js';
