// Canonical Name Resolver
//
// Locations get a path built from their containment chain:
// "Location/Erathia/Zamek Steadwick". Everything else gets "{Type}/{Name}".
// The chain is walked by name with a visited set; any entity whose ancestry
// runs into a cycle falls back to its flat form, whatever order the
// entities are resolved in.

import {
  activeValue,
  activeValues,
  type Entity,
  type InstantInput,
  type ProcessingWarning,
} from '@worldkeep/protocol';
import type { EngineLogger } from '../logging.js';
import { silentLogger } from '../logging.js';
import type { EntityStore } from '../store/index.js';

export type CanonicalNameOptions = {
  /**
   * Instant the containment links are read at
   */
  activeOn?: InstantInput;
  logger?: EngineLogger;
};

export type CanonicalNamesResult = {
  /**
   * Canonical name per entity, keyed by lower-cased primary name
   */
  names: Map<string, string>;
  warnings: ProcessingWarning[];
};

export function flatCanonicalName(entity: Pick<Entity, 'type' | 'name'>): string {
  return `${entity.type}/${entity.name}`;
}

/**
 * Resolves canonical names over one store, memoizing every path it computes
 * so shared ancestors are walked once.
 */
export class CanonicalNameResolver {
  // null marks an entity whose ancestry contains a cycle
  private readonly memo = new Map<string, string | null>();
  private readonly containedBy = new Map<string, Entity>();
  private readonly activeOn?: InstantInput;
  private readonly logger: EngineLogger;
  readonly warnings: ProcessingWarning[] = [];

  constructor(
    private readonly store: EntityStore,
    options: CanonicalNameOptions = {}
  ) {
    this.activeOn = options.activeOn;
    this.logger = options.logger ?? silentLogger;

    for (const entity of store.list()) {
      if (entity.type !== 'Location') continue;
      for (const child of entity.contains) {
        const key = child.toLowerCase();
        if (key !== entity.name.toLowerCase() && !this.containedBy.has(key)) {
          this.containedBy.set(key, entity);
        }
      }
    }
  }

  /**
   * Canonical name of an entity. Writes it to entity.canonicalName.
   */
  resolve(entity: Entity): string {
    let path = this.walk(entity, new Set());
    if (path === null) {
      path = flatCanonicalName(entity);
      const warning: ProcessingWarning = {
        code: 'CONTAINMENT_CYCLE',
        message: `Containment cycle above ${entity.name}; using ${path}`,
        context: { entity: entity.name },
      };
      this.warnings.push(warning);
      this.logger.warn(warning.message, warning.context);
    }

    entity.canonicalName = path;
    return path;
  }

  /**
   * Name of the entity's container at the configured instant: the active
   * location, else the first active access link, else a location listing it
   * in its contents.
   */
  parentOf(entity: Entity): string | undefined {
    const location = activeValue(entity.histories.location, this.activeOn);
    if (location) return location;

    const [accessLink] = activeValues(entity.histories.accessLinks, this.activeOn);
    if (accessLink) return accessLink;

    return this.containedBy.get(entity.name.toLowerCase())?.name;
  }

  private walk(entity: Entity, visited: Set<string>): string | null {
    const key = entity.name.toLowerCase();
    const memoized = this.memo.get(key);
    if (memoized !== undefined) {
      return memoized;
    }
    if (visited.has(key)) {
      return null;
    }
    visited.add(key);

    const path = this.pathOf(entity, visited);
    this.memo.set(key, path);
    return path;
  }

  private pathOf(entity: Entity, visited: Set<string>): string | null {
    if (entity.type !== 'Location') {
      return flatCanonicalName(entity);
    }

    const parentName = this.parentOf(entity);
    if (!parentName) {
      return flatCanonicalName(entity);
    }

    const parent = this.store.find(parentName);
    if (!parent || parent.type !== 'Location') {
      // Unknown containers still show up in the path
      return `Location/${parentName}/${entity.name}`;
    }

    const parentPath = this.walk(parent, visited);
    return parentPath === null ? null : `${parentPath}/${entity.name}`;
  }
}

/**
 * Resolve the canonical name of every entity in a store.
 */
export function resolveCanonicalNames(
  store: EntityStore,
  options: CanonicalNameOptions = {}
): CanonicalNamesResult {
  const resolver = new CanonicalNameResolver(store, options);
  const names = new Map<string, string>();

  for (const entity of store.list()) {
    names.set(entity.name.toLowerCase(), resolver.resolve(entity));
  }

  return { names, warnings: resolver.warnings };
}
