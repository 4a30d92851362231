// In-memory repository implementation
//
// Serves a merged world straight from the entity objects the runtime
// built. Useful for tests and for tools that load a bundle once and query
// it many times. Nothing is persisted.

import {
  activeValue,
  activeValues,
  normalizeAttributeKey,
  sortHistory,
  type Entity,
  type History,
} from '@worldkeep/protocol';
import type { EntityFilter, EntityRepository, PropertyHistory } from '../interfaces/index.js';

function sameName(a: string | null | undefined, b: string): boolean {
  return a !== null && a !== undefined && a.toLowerCase() === b.toLowerCase();
}

function matches(entity: Entity, filter: EntityFilter): boolean {
  const { histories } = entity;
  const { activeOn } = filter;

  if (filter.type && entity.type !== filter.type) {
    return false;
  }
  if (filter.status && (activeValue(histories.status, activeOn) ?? 'Active') !== filter.status) {
    return false;
  }
  if (filter.location && !sameName(activeValue(histories.location, activeOn), filter.location)) {
    return false;
  }
  if (filter.owner && !sameName(activeValue(histories.owner, activeOn), filter.owner)) {
    return false;
  }
  if (filter.group) {
    const group = filter.group;
    if (!activeValues(histories.groups, activeOn).some((candidate) => sameName(candidate, group))) {
      return false;
    }
  }
  return true;
}

/**
 * Create a read-only repository over a list of merged entities.
 *
 * @param entities - Entities in declaration order
 */
export function createInMemoryEntityRepository(entities: readonly Entity[]): EntityRepository {
  const byName = new Map<string, Entity>();
  const byAnyName = new Map<string, Entity>();

  for (const entity of entities) {
    byName.set(entity.name.toLowerCase(), entity);
  }
  for (const entity of entities) {
    for (const name of entity.names) {
      const key = name.toLowerCase();
      if (!byAnyName.has(key)) {
        byAnyName.set(key, entity);
      }
    }
  }

  const lookup = (name: string): Entity | null => byName.get(name.trim().toLowerCase()) ?? null;

  return {
    async get(name) {
      return lookup(name);
    },

    async findByName(name) {
      const key = name.trim().toLowerCase();
      return byName.get(key) ?? byAnyName.get(key) ?? null;
    },

    async query(filter) {
      let result = entities.filter((entity) => matches(entity, filter));
      if (filter.offset) {
        result = result.slice(filter.offset);
      }
      if (filter.limit) {
        result = result.slice(0, filter.limit);
      }
      return result;
    },

    async list() {
      return [...entities];
    },

    async count() {
      return entities.length;
    },

    async getHistory(name, property): Promise<PropertyHistory | null> {
      const entity = lookup(name);
      return entity ? sortHistory<string | number>(entity.histories[property]) : null;
    },

    async getOverrideHistory(name, tag): Promise<History<string> | null> {
      const entity = lookup(name);
      if (!entity) return null;
      return sortHistory(entity.overrides[normalizeAttributeKey(tag)] ?? []);
    },
  };
}
