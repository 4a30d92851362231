// Entity records and their active-state projection

import {
  activeValue,
  activeValues,
  sortHistory,
  toTimestamp,
  type ActiveState,
  type Entity,
  type EntityType,
  type InstantInput,
} from '@worldkeep/protocol';

/**
 * Create an empty entity with default status and no history.
 */
export function createEntity(name: string, type: EntityType): Entity {
  return {
    name,
    type,
    names: [name],
    canonicalName: null,
    histories: {
      location: [],
      accessLinks: [],
      typeOverride: [],
      owner: [],
      groups: [],
      status: [],
      quantity: [],
      aliases: [],
    },
    genericNames: [],
    contains: [],
    overrides: {},
    sources: [],
    active: emptyActiveState(),
  };
}

function emptyActiveState(): ActiveState {
  return {
    activeOn: null,
    location: null,
    accessLinks: [],
    typeOverride: null,
    owner: null,
    groups: [],
    status: 'Active',
    quantity: null,
    aliases: [],
    overrides: {},
  };
}

/**
 * Case-insensitive membership test for name lists.
 */
export function hasName(names: readonly string[], name: string): boolean {
  const needle = name.toLowerCase();
  return names.some((candidate) => candidate.toLowerCase() === needle);
}

/**
 * Add a string to a name list unless it is already there in any casing.
 *
 * @returns true when the list changed
 */
export function addUniqueName(names: string[], name: string): boolean {
  if (!name || hasName(names, name)) {
    return false;
  }
  names.push(name);
  return true;
}

/**
 * Project an entity's histories as of an instant.
 */
export function deriveActiveState(entity: Entity, activeOn?: InstantInput): ActiveState {
  const { histories } = entity;
  const overrides: Record<string, string> = {};
  for (const [key, history] of Object.entries(entity.overrides)) {
    const value = activeValue(history, activeOn);
    if (value !== undefined) {
      overrides[key] = value;
    }
  }

  return {
    activeOn: activeOn === undefined ? null : toTimestamp(activeOn),
    location: activeValue(histories.location, activeOn) ?? null,
    accessLinks: activeValues(histories.accessLinks, activeOn),
    typeOverride: activeValue(histories.typeOverride, activeOn) ?? null,
    owner: activeValue(histories.owner, activeOn) ?? null,
    groups: activeValues(histories.groups, activeOn),
    status: activeValue(histories.status, activeOn) ?? 'Active',
    quantity: activeValue(histories.quantity, activeOn) ?? null,
    aliases: activeValues(histories.aliases, activeOn),
    overrides,
  };
}

/**
 * Sort every history of an entity by validFrom and re-derive its active state.
 */
export function refreshEntity(entity: Entity, activeOn?: InstantInput): void {
  const { histories } = entity;
  histories.location = sortHistory(histories.location);
  histories.accessLinks = sortHistory(histories.accessLinks);
  histories.typeOverride = sortHistory(histories.typeOverride);
  histories.owner = sortHistory(histories.owner);
  histories.groups = sortHistory(histories.groups);
  histories.status = sortHistory(histories.status);
  histories.quantity = sortHistory(histories.quantity);
  histories.aliases = sortHistory(histories.aliases);

  for (const key of Object.keys(entity.overrides)) {
    entity.overrides[key] = sortHistory(entity.overrides[key]);
  }

  entity.active = deriveActiveState(entity, activeOn);
}
