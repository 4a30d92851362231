// Identity types - anything a name can resolve to

import type { EntityType } from './entities.js';

/**
 * Player records live outside the entity store but share its namespace.
 */
export type PlayerRecord = {
  name: string;
  aliases: string[];
};

export type IdentityKind = 'entity' | 'player';

/**
 * Logical kind of an identity. Player records report 'Player'.
 */
export type OwnerType = EntityType;

/**
 * The capability the name index works over. Entities and player records
 * both expose it, so indexing never branches on the concrete type.
 */
export type Identity = {
  kind: IdentityKind;
  name: string;
  names: string[];
  ownerType: OwnerType;
};

/**
 * A lightweight reference to an identity.
 */
export type EntityRef = {
  kind: IdentityKind;
  name: string;
  ownerType: OwnerType;
};
