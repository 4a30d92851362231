// Entity Store
//
// Merges declaration sources into one set of entities. Sources are applied
// in the order the caller lists them, lowest precedence first: every source
// appends to the same histories, and the later source wins ties once the
// histories are sorted. A name declared twice is one entity.

import type {
  DeclarationSource,
  Entity,
  EntityDeclaration,
  EntityType,
  InstantInput,
  ProcessingWarning,
} from '@worldkeep/protocol';
import type { EngineLogger } from '../logging.js';
import { silentLogger } from '../logging.js';
import { EntityNotFoundError } from '../errors.js';
import { applyAttribute } from './attributes.js';
import { addUniqueName, createEntity, refreshEntity } from './entity.js';
import { sectionEntityType } from './sections.js';

/**
 * The merged set of entities, keyed case-insensitively by every name.
 */
export class EntityStore {
  private readonly byName = new Map<string, Entity>();
  private readonly byAnyName = new Map<string, Entity[]>();

  get size(): number {
    return this.byName.size;
  }

  /**
   * Get an entity by its primary name.
   */
  get(name: string): Entity | undefined {
    return this.byName.get(name.trim().toLowerCase());
  }

  /**
   * Find an entity by primary name, then by any alias or generic name.
   * When several entities share an alias, the first declared wins.
   */
  find(name: string): Entity | undefined {
    const key = name.trim().toLowerCase();
    return this.byName.get(key) ?? this.byAnyName.get(key)?.[0];
  }

  /**
   * Every entity carrying the name, primary or secondary.
   */
  findAll(name: string): Entity[] {
    const key = name.trim().toLowerCase();
    const primary = this.byName.get(key);
    const others = this.byAnyName.get(key) ?? [];
    return primary ? [primary, ...others.filter((entity) => entity !== primary)] : [...others];
  }

  /**
   * Get an entity by primary name or alias.
   *
   * @throws EntityNotFoundError when no entity carries the name
   */
  require(name: string): Entity {
    const entity = this.find(name);
    if (!entity) {
      throw new EntityNotFoundError(name);
    }
    return entity;
  }

  /**
   * Entities in the order they were first declared.
   */
  list(): Entity[] {
    return Array.from(this.byName.values());
  }

  /**
   * Create an entity. Returns the existing one if the name is taken.
   */
  create(name: string, type: EntityType): Entity {
    const existing = this.get(name);
    if (existing) {
      return existing;
    }
    const entity = createEntity(name.trim(), type);
    this.byName.set(entity.name.toLowerCase(), entity);
    return entity;
  }

  /**
   * Record a secondary name so find() can reach the entity through it.
   */
  registerName(entity: Entity, name: string): void {
    const key = name.trim().toLowerCase();
    if (key === entity.name.toLowerCase()) {
      return;
    }
    const owners = this.byAnyName.get(key) ?? [];
    if (!owners.includes(entity)) {
      owners.push(entity);
      this.byAnyName.set(key, owners);
    }
  }

  /**
   * Sort every history and re-derive active state for all entities.
   */
  refreshAll(activeOn?: InstantInput): void {
    for (const entity of this.byName.values()) {
      refreshEntity(entity, activeOn);
    }
  }
}

export type MergeSourceOptions = {
  logger?: EngineLogger;
};

/**
 * Options for building a store
 */
export type BuildEntityStoreOptions = MergeSourceOptions & {
  /**
   * Instant the active state of every entity is derived for
   */
  activeOn?: InstantInput;

  /**
   * Store to merge into (default: a new, empty store)
   */
  store?: EntityStore;
};

export type BuildEntityStoreResult = {
  store: EntityStore;
  warnings: ProcessingWarning[];
};

/**
 * Split a declaration line on its first colon and join its continuation.
 *
 * @returns The key and value, or undefined when the line has no key
 */
export function splitAttributeLine(
  text: string,
  continuation: readonly string[] = []
): { key: string; value: string } | undefined {
  const colon = text.indexOf(':');
  if (colon < 0) {
    return undefined;
  }

  const key = text.slice(0, colon).trim();
  if (!key) {
    return undefined;
  }

  const value = [text.slice(colon + 1), ...continuation]
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join('\n');

  return { key, value };
}

function mergeDeclaration(
  store: EntityStore,
  declaration: EntityDeclaration,
  type: EntityType,
  sourceId: string
): ProcessingWarning[] {
  const warnings: ProcessingWarning[] = [];
  const name = declaration.name.trim();
  const existing = store.get(name);

  if (existing && existing.type !== type) {
    warnings.push({
      code: 'TYPE_CONFLICT',
      message: `${existing.name} is declared as ${type} in ${sourceId} but was first declared as ${existing.type}`,
      context: { entity: existing.name, source: sourceId, declaredType: type, keptType: existing.type },
    });
  }

  const entity = existing ?? store.create(name, type);
  addUniqueName(entity.sources, sourceId);

  for (const line of declaration.lines) {
    const attribute = splitAttributeLine(line.text, line.continuation);
    if (!attribute) {
      warnings.push({
        code: 'MALFORMED_LINE',
        message: `Skipping line without a key on ${entity.name}: "${line.text.trim()}"`,
        context: { entity: entity.name, source: sourceId, line: line.text },
      });
      continue;
    }

    const lineWarnings = applyAttribute(entity, attribute.key, attribute.value, {
      onName: (owner, alias) => store.registerName(owner, alias),
    });
    for (const warning of lineWarnings) {
      warnings.push({ ...warning, context: { ...warning.context, source: sourceId } });
    }
  }

  return warnings;
}

/**
 * Merge one declaration source into a store.
 *
 * Histories are left unsorted; call store.refreshAll() (or use
 * buildEntityStore) once every source is in.
 */
export function mergeDeclarationSource(
  store: EntityStore,
  source: DeclarationSource,
  options: MergeSourceOptions = {}
): ProcessingWarning[] {
  const { logger = silentLogger } = options;
  const warnings: ProcessingWarning[] = [];

  for (const section of source.sections) {
    const type = sectionEntityType(section.label);
    if (!type) {
      logger.debug(`Skipping section "${section.label}" in ${source.id}`, {
        source: source.id,
        entities: section.entities.length,
      });
      continue;
    }

    for (const declaration of section.entities) {
      warnings.push(...mergeDeclaration(store, declaration, type, source.id));
    }
  }

  for (const warning of warnings) {
    logger.warn(warning.message, { code: warning.code, ...warning.context });
  }

  return warnings;
}

/**
 * Build an entity store from declaration sources.
 *
 * @param sources - Sources in precedence order, lowest first
 *
 * @example
 * ```typescript
 * const { store } = buildEntityStore([base, campaign], { activeOn: '2026-03-01' });
 * store.require('Sandro').active.aliases;
 * ```
 */
export function buildEntityStore(
  sources: readonly DeclarationSource[],
  options: BuildEntityStoreOptions = {}
): BuildEntityStoreResult {
  const store = options.store ?? new EntityStore();
  const warnings: ProcessingWarning[] = [];

  for (const source of sources) {
    warnings.push(...mergeDeclarationSource(store, source, options));
  }

  store.refreshAll(options.activeOn);
  options.logger?.info('Entity store built', {
    sources: sources.length,
    entities: store.size,
    warnings: warnings.length,
  });

  return { store, warnings };
}
