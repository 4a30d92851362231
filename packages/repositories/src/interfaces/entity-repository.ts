import type {
  Entity,
  EntityStatus,
  EntityType,
  History,
  HistoryProperty,
  InstantInput,
} from '@worldkeep/protocol';

/**
 * A property history as served by a repository
 */
export type PropertyHistory = History<string | number>;

/**
 * Filter for querying Entities.
 *
 * Temporal fields (status, group, location, owner) match the value active
 * at `activeOn`. Without it the query is unscoped: the latest location,
 * owner and status count, and every group the entity ever joined.
 */
export type EntityFilter = {
  type?: EntityType;
  status?: EntityStatus;
  group?: string;
  location?: string;
  owner?: string;
  activeOn?: InstantInput;
  limit?: number;
  offset?: number;
};

/**
 * Read-only repository over a merged world.
 *
 * Name lookups are case-insensitive. Implementations never mutate the
 * entities they serve.
 */
export interface EntityRepository {
  /**
   * Get an Entity by its primary name
   */
  get(name: string): Promise<Entity | null>;

  /**
   * Get an Entity by primary name, alias or generic name
   */
  findByName(name: string): Promise<Entity | null>;

  /**
   * Query Entities with filters, in declaration order
   */
  query(filter: EntityFilter): Promise<Entity[]>;

  /**
   * All Entities in declaration order
   */
  list(): Promise<Entity[]>;

  count(): Promise<number>;

  /**
   * The sorted history of one property, or null for an unknown entity
   */
  getHistory(name: string, property: HistoryProperty): Promise<PropertyHistory | null>;

  /**
   * The sorted history of a free-form override tag
   */
  getOverrideHistory(name: string, tag: string): Promise<History<string> | null>;
}
