// Identities - the one shape the name index works over

import type { Entity, EntityRef, Identity, PlayerRecord } from '@worldkeep/protocol';

export function entityIdentity(entity: Entity): Identity {
  return {
    kind: 'entity',
    name: entity.name,
    names: entity.names,
    ownerType: entity.type,
  };
}

export function playerIdentity(player: PlayerRecord): Identity {
  const names = [player.name];
  for (const alias of player.aliases) {
    if (!names.some((name) => name.toLowerCase() === alias.toLowerCase())) {
      names.push(alias);
    }
  }
  return { kind: 'player', name: player.name, names, ownerType: 'Player' };
}

export function toRef(identity: Identity): EntityRef {
  return { kind: identity.kind, name: identity.name, ownerType: identity.ownerType };
}

/**
 * Key identifying a concrete identity: its kind plus its lower-cased name.
 */
export function refKey(ref: Pick<EntityRef, 'kind' | 'name'>): string {
  return `${ref.kind}:${ref.name.toLowerCase()}`;
}

/**
 * Maps identities to logical owners.
 *
 * A Player record and a Player or PlayerCharacter entity sharing any name
 * are the same person, so they share one logical id (the player's).
 * Every other identity is its own logical owner.
 */
export class LogicalIdentities {
  private readonly playersByName = new Map<string, Identity>();
  private readonly logicalIds = new Map<string, string>();
  private readonly identities = new Map<string, Identity>();

  constructor(identities: readonly Identity[]) {
    for (const identity of identities) {
      if (identity.kind !== 'player') continue;
      for (const name of identity.names) {
        const key = name.toLowerCase();
        if (!this.playersByName.has(key)) {
          this.playersByName.set(key, identity);
        }
      }
    }

    for (const identity of identities) {
      this.identities.set(refKey(identity), identity);
      this.logicalIds.set(refKey(identity), this.computeLogicalId(identity));
    }
  }

  private computeLogicalId(identity: Identity): string {
    if (identity.kind === 'player') {
      return refKey(identity);
    }
    if (identity.ownerType === 'Player' || identity.ownerType === 'PlayerCharacter') {
      for (const name of identity.names) {
        const player = this.playersByName.get(name.toLowerCase());
        if (player) {
          return refKey(player);
        }
      }
    }
    return refKey(identity);
  }

  /**
   * Logical owner of a reference; unknown references are their own owner.
   */
  logicalId(ref: Pick<EntityRef, 'kind' | 'name'>): string {
    return this.logicalIds.get(refKey(ref)) ?? refKey(ref);
  }

  same(a: Pick<EntityRef, 'kind' | 'name'>, b: Pick<EntityRef, 'kind' | 'name'>): boolean {
    return this.logicalId(a) === this.logicalId(b);
  }

  get(ref: Pick<EntityRef, 'kind' | 'name'>): Identity | undefined {
    return this.identities.get(refKey(ref));
  }
}
