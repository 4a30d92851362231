// Entity types - named world records with temporally scoped attributes

import type { Timestamp } from './common.js';

/**
 * The fixed set of entity kinds a registry can hold.
 */
export const ENTITY_TYPES = [
  'NPC',
  'Organization',
  'Location',
  'Player',
  'PlayerCharacter',
  'Item',
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export const ENTITY_STATUSES = ['Active', 'Inactive', 'Removed'] as const;

/**
 * Lifecycle status. Entities are never deleted; removal is a status entry.
 */
export type EntityStatus = (typeof ENTITY_STATUSES)[number];

/**
 * A value paired with an optional validity range.
 *
 * `validFrom = null` means active since the dawn of time,
 * `validTo = null` means active indefinitely.
 */
export type TimeScoped<T> = {
  value: T;
  validFrom: Timestamp | null;
  validTo: Timestamp | null;
};

/**
 * Append-only list of scoped values for one property.
 */
export type History<T> = TimeScoped<T>[];

/**
 * Histories of the attributes the engine knows how to interpret.
 */
export type EntityHistories = {
  location: History<string>;
  accessLinks: History<string>;
  typeOverride: History<string>;
  owner: History<string>;
  groups: History<string>;
  status: History<EntityStatus>;
  quantity: History<number>;
  aliases: History<string>;
};

export type HistoryProperty = keyof EntityHistories;

/**
 * Projection of an entity's histories as of one instant.
 */
export type ActiveState = {
  /**
   * Instant the projection was derived for (null = unscoped)
   */
  activeOn: Timestamp | null;
  location: string | null;
  accessLinks: string[];
  typeOverride: string | null;
  owner: string | null;
  groups: string[];
  status: EntityStatus;
  quantity: number | null;
  aliases: string[];

  /**
   * Last active value of every generic override tag
   */
  overrides: Record<string, string>;
};

/**
 * An Entity is the unit of identity in the registry.
 *
 * Two declarations using the same name (case-insensitive) denote the same
 * entity; their contributions are unioned, never replaced.
 */
export type Entity = {
  /**
   * Primary display name, the identity key
   */
  name: string;

  type: EntityType;

  /**
   * Every string that resolves to this entity: name, aliases, generic names.
   * Unique case-insensitively.
   */
  names: string[];

  /**
   * Derived path-form identifier, e.g. "Location/Erathia/Zamek Steadwick"
   */
  canonicalName: string | null;

  histories: EntityHistories;

  /**
   * Generic secondary names ("innkeeper"), untemporal
   */
  genericNames: string[];

  /**
   * Names of child entities; a containment hint, not authoritative
   */
  contains: string[];

  /**
   * Histories of every tag the engine does not interpret
   */
  overrides: Record<string, History<string>>;

  /**
   * Ids of the declaration sources that contributed to this entity
   */
  sources: string[];

  active: ActiveState;
};
