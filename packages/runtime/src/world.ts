// World pipeline - ties the store, canonical names, name index, resolver and overlay together
//
// declaration sources → entity store → canonical names → name index → resolver → change records
//
// Change records can add aliases and move locations, so when the overlay
// touches anything the canonical names, the index and the resolver are
// rebuilt over the final state.

import type {
  ChangeRecord,
  DeclarationSource,
  PlayerRecord,
  ProcessingWarning,
} from '@worldkeep/protocol';
import {
  bundle,
  createInMemoryEntityRepository,
  type EntityRepository,
} from '@worldkeep/repositories';
import { consoleLogger, silentLogger, withContext, type EngineLogger } from './logging.js';
import { resolveEngineConfig, type EngineConfig, type EngineConfigOptions } from './config.js';
import { buildEntityStore, type EntityStore } from './store/index.js';
import { resolveCanonicalNames } from './canonical/index.js';
import { buildNameIndex, type NameIndex } from './names/index.js';
import { createEntityResolver, type EntityResolver } from './resolver/index.js';
import { applyChangeRecords, type OverlayResult } from './overlay/index.js';

/**
 * Input for building a world
 */
export type BuildWorldInput = {
  /**
   * Declaration sources, lowest precedence first
   */
  sources: readonly DeclarationSource[];
  players?: readonly PlayerRecord[];
  events?: readonly ChangeRecord[];
  config?: EngineConfigOptions;

  /**
   * Logger for every stage (default: console)
   */
  logger?: EngineLogger;
};

/**
 * A built world
 */
export type World = {
  store: EntityStore;
  index: NameIndex;
  resolver: EntityResolver;
  overlay: OverlayResult;
  repository: EntityRepository;
  config: EngineConfig;

  /**
   * Warnings from every stage, in pipeline order
   */
  warnings: ProcessingWarning[];
  durationMs: number;
};

function indexAndResolver(
  store: EntityStore,
  players: readonly PlayerRecord[],
  config: EngineConfig,
  logger: EngineLogger
): { index: NameIndex; resolver: EntityResolver; warnings: ProcessingWarning[] } {
  // Cycle warnings are logged by the caller once the final pass is known
  const { warnings } = resolveCanonicalNames(store, { activeOn: config.activeOn, logger: silentLogger });
  const index = buildNameIndex(store.list(), {
    players,
    activeOn: config.activeOn,
    minTokenLength: config.minTokenLength,
    logger,
  });
  const resolver = createEntityResolver(index, {
    minStemLength: config.minStemLength,
    cacheResults: config.cacheResults,
    fuzzy: config.fuzzy,
    logger,
  });
  return { index, resolver, warnings };
}

/**
 * Build a world from declaration sources, player records and change records.
 *
 * Per-item problems never throw; they come back as warnings.
 *
 * @throws ValidationError when the configuration is invalid
 *
 * @example
 * ```typescript
 * const world = buildWorld({ sources: [base, campaign], events, config: { activeOn: '2026-03-01' } });
 * world.resolver.resolve('Kormowi');
 * ```
 */
export function buildWorld(input: BuildWorldInput): World {
  const startTime = Date.now();
  const { sources, players = [], events = [], logger = consoleLogger } = input;
  const config = resolveEngineConfig(input.config);
  const warnings: ProcessingWarning[] = [];

  const built = buildEntityStore(sources, { activeOn: config.activeOn, logger });
  const { store } = built;
  warnings.push(...built.warnings);

  let stage = indexAndResolver(store, players, config, logger);
  const overlay = applyChangeRecords(store, events, {
    resolver: stage.resolver,
    activeOn: config.activeOn,
    logger,
  });

  if (overlay.touched.length > 0) {
    stage = indexAndResolver(store, players, config, logger);
  }
  for (const warning of stage.warnings) {
    logger.warn(warning.message, { code: warning.code, ...warning.context });
  }
  warnings.push(...stage.warnings, ...overlay.warnings);

  return {
    store,
    index: stage.index,
    resolver: stage.resolver,
    overlay,
    repository: createInMemoryEntityRepository(store.list()),
    config,
    warnings,
    durationMs: Date.now() - startTime,
  };
}

/**
 * Options for loading a world from a bundle
 */
export type LoadWorldOptions = {
  /**
   * Overrides the manifest's config, key by key
   */
  config?: EngineConfigOptions;
  logger?: EngineLogger;
};

/**
 * Import a world bundle and build it.
 *
 * @throws Error when the bundle is missing files or fails validation
 */
export async function loadWorld(
  reader: bundle.BundleReader,
  bundlePath: string,
  options: LoadWorldOptions = {}
): Promise<World> {
  const imported = await bundle.importWorldBundle(reader, bundlePath);
  return buildWorld({
    sources: imported.sources,
    players: imported.players,
    events: imported.events,
    config: { ...imported.manifest.config, ...options.config },
    logger: withContext(options.logger ?? consoleLogger, { bundle: bundlePath }),
  });
}
