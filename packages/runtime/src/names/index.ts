export {
  NameIndex,
  buildNameIndex,
  nameTokens,
  entryOwners,
  PRIORITY_RANK,
  type NameIndexOptions,
} from './name-index.js';

export {
  LogicalIdentities,
  entityIdentity,
  playerIdentity,
  toRef,
  refKey,
} from './identity.js';
