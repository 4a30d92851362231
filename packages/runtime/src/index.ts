// @worldkeep/runtime
// Entity merge, canonical naming, name resolution and event overlay

// World pipeline (sources → store → names → index → resolver → overlay)
export {
  buildWorld,
  loadWorld,
  type BuildWorldInput,
  type LoadWorldOptions,
  type World,
} from './world.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  EntityNotFoundError,
  UnresolvedReferenceError,
  AmbiguousReferenceError,
  type RuntimeErrorCode,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createLogger,
  createConsoleLogger,
  createCapturingLogger,
  withContext,
  type EngineLogger,
  type LogEntry,
  type LogLevel,
  type LogSink,
} from './logging.js';

// Configuration
export {
  resolveEngineConfig,
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
  type EngineConfigOptions,
} from './config.js';

// Entity store
export {
  EntityStore,
  buildEntityStore,
  mergeDeclarationSource,
  splitAttributeLine,
  applyAttribute,
  attributeKind,
  parseStatus,
  createEntity,
  deriveActiveState,
  refreshEntity,
  sectionEntityType,
  type BuildEntityStoreOptions,
  type BuildEntityStoreResult,
  type MergeSourceOptions,
  type ApplyAttributeOptions,
  type AttributeKind,
} from './store/index.js';

// Canonical names
export {
  CanonicalNameResolver,
  resolveCanonicalNames,
  flatCanonicalName,
  type CanonicalNameOptions,
  type CanonicalNamesResult,
} from './canonical/index.js';

// Name index
export {
  NameIndex,
  LogicalIdentities,
  buildNameIndex,
  nameTokens,
  entityIdentity,
  playerIdentity,
  type NameIndexOptions,
} from './names/index.js';

// Resolution
export {
  EntityResolver,
  createEntityResolver,
  BkTree,
  levenshtein,
  distanceThreshold,
  stripSuffixes,
  reverseAlternations,
  type EntityResolverOptions,
  type ResolveManyResult,
  type ResolveManySummary,
} from './resolver/index.js';

// Event overlay
export {
  applyChangeRecords,
  orderChangeRecords,
  type ApplyChangeRecordsOptions,
  type OverlayResult,
  type SkippedRecord,
} from './overlay/index.js';
