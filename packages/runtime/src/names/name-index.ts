// Name Index
//
// Reverse lookup from every known name, alias and name token to the
// identity that owns it. Full names and aliases outrank single tokens.
// Distinct owners at the same priority make a key ambiguous; the index
// never picks one of them.

import {
  activeValues,
  type Entity,
  type EntityRef,
  type Identity,
  type IndexPriority,
  type InstantInput,
  type NameIndexEntry,
  type PlayerRecord,
} from '@worldkeep/protocol';
import type { EngineLogger } from '../logging.js';
import { silentLogger } from '../logging.js';
import { DEFAULT_ENGINE_CONFIG } from '../config.js';
import { LogicalIdentities, entityIdentity, playerIdentity, toRef } from './identity.js';

export const PRIORITY_RANK: Record<IndexPriority, number> = {
  fullNameOrAlias: 2,
  token: 1,
};

export type NameIndexOptions = {
  /**
   * Identity records that live outside the entity store
   */
  players?: readonly PlayerRecord[];

  /**
   * Only aliases active at this instant are indexed
   */
  activeOn?: InstantInput;

  /**
   * Shortest token of a multi-word name that gets its own key (default 3)
   */
  minTokenLength?: number;

  logger?: EngineLogger;
};

/**
 * Split a name into its tokens, trimming punctuation around each.
 */
export function nameTokens(name: string): string[] {
  return name
    .split(/\s+/)
    .map((token) => token.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ''))
    .filter((token) => token.length > 0);
}

/**
 * Read-only name index. Built once by buildNameIndex; entries are frozen.
 */
export class NameIndex {
  constructor(
    private readonly entries: ReadonlyMap<string, NameIndexEntry>,
    readonly identities: LogicalIdentities
  ) {}

  get size(): number {
    return this.entries.size;
  }

  /**
   * Case-insensitive exact lookup.
   */
  lookup(key: string): NameIndexEntry | undefined {
    return this.entries.get(key.trim().toLowerCase());
  }

  /**
   * Every key, lower-cased.
   */
  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  values(): NameIndexEntry[] {
    return Array.from(this.entries.values());
  }
}

class NameIndexBuilder {
  private readonly entries = new Map<string, NameIndexEntry>();

  constructor(private readonly identities: LogicalIdentities) {}

  write(key: string, identity: Identity, priority: IndexPriority): void {
    const normalized = key.trim().toLowerCase();
    if (!normalized) return;

    const ref = toRef(identity);
    const existing = this.entries.get(normalized);

    if (!existing || PRIORITY_RANK[priority] > PRIORITY_RANK[existing.priority]) {
      this.entries.set(normalized, {
        key: key.trim(),
        owner: ref,
        ownerType: ref.ownerType,
        priority,
        ambiguous: false,
        owners: [ref],
      });
      return;
    }

    if (PRIORITY_RANK[priority] < PRIORITY_RANK[existing.priority]) {
      return;
    }

    const sameOwner = existing.owners.findIndex((owner) => this.identities.same(owner, ref));
    if (sameOwner < 0) {
      existing.owners.push(ref);
      existing.ambiguous = true;
      return;
    }

    // Player records take precedence over the entities that mirror them
    if (ref.kind === 'player' && existing.owners[sameOwner].kind !== 'player') {
      const replaced = existing.owners[sameOwner];
      existing.owners[sameOwner] = ref;
      if (existing.owner === replaced) {
        existing.owner = ref;
        existing.ownerType = ref.ownerType;
      }
    }
  }

  build(): NameIndex {
    for (const entry of this.entries.values()) {
      Object.freeze(entry.owners);
      Object.freeze(entry);
    }
    return new NameIndex(this.entries, this.identities);
  }
}

function indexIdentity(
  builder: NameIndexBuilder,
  identity: Identity,
  fullNames: readonly string[],
  tokenNames: readonly string[],
  minTokenLength: number
): void {
  for (const name of fullNames) {
    builder.write(name, identity, 'fullNameOrAlias');
  }

  for (const name of fullNames) {
    const tokens = nameTokens(name);
    if (tokens.length < 2) continue;
    for (const token of tokens) {
      if (token.length >= minTokenLength) {
        builder.write(token, identity, 'token');
      }
    }
  }

  for (const name of tokenNames) {
    builder.write(name, identity, 'token');
  }
}

/**
 * Build the name index over entities and player records.
 *
 * Keys per entity: its name, its active aliases and its canonical name at
 * full priority; tokens of its multi-word names and its generic names at
 * token priority. Player records contribute their name and aliases.
 */
export function buildNameIndex(
  entities: readonly Entity[],
  options: NameIndexOptions = {}
): NameIndex {
  const {
    players = [],
    activeOn,
    minTokenLength = DEFAULT_ENGINE_CONFIG.minTokenLength,
    logger = silentLogger,
  } = options;

  const entityIdentities = entities.map(entityIdentity);
  const playerIdentities = players.map(playerIdentity);
  const identities = new LogicalIdentities([...entityIdentities, ...playerIdentities]);
  const builder = new NameIndexBuilder(identities);

  entities.forEach((entity, i) => {
    const fullNames = [entity.name, ...activeValues(entity.histories.aliases, activeOn)];
    indexIdentity(builder, entityIdentities[i], fullNames, entity.genericNames, minTokenLength);
    if (entity.canonicalName) {
      builder.write(entity.canonicalName, entityIdentities[i], 'fullNameOrAlias');
    }
  });

  for (const identity of playerIdentities) {
    indexIdentity(builder, identity, identity.names, [], minTokenLength);
  }

  const index = builder.build();
  const ambiguous = index.values().filter((entry) => entry.ambiguous).length;
  logger.info('Name index built', {
    entities: entities.length,
    players: players.length,
    keys: index.size,
    ambiguous,
  });

  return index;
}

/**
 * Owners of an entry that pass an optional owner-type filter.
 */
export function entryOwners(entry: NameIndexEntry, ownerType?: EntityRef['ownerType']): EntityRef[] {
  return ownerType ? entry.owners.filter((owner) => owner.ownerType === ownerType) : [...entry.owners];
}
