// Stem index
//
// Every name index key is filed under itself and under each stem left by
// stripping one case ending, so a declined query can meet its base form
// halfway ("sandrem" -> "sandr" <- "sandro").

import type { EntityRef, IndexPriority, NameIndexEntry } from '@worldkeep/protocol';
import { PRIORITY_RANK, type LogicalIdentities } from '../names/index.js';
import { stripSuffixes } from './morphology.js';

type StemPosting = {
  key: string;
  owner: EntityRef;
  priority: IndexPriority;
};

export type StemMatch = {
  owner: EntityRef;
  key: string;
  priority: IndexPriority;
};

export type StemLookup =
  | { status: 'hit'; match: StemMatch }
  | { status: 'ambiguous'; owners: EntityRef[] }
  | { status: 'miss' };

export class StemIndex {
  private readonly postings = new Map<string, StemPosting[]>();

  constructor(
    entries: Iterable<NameIndexEntry>,
    private readonly identities: LogicalIdentities,
    minStemLength: number
  ) {
    for (const entry of entries) {
      const key = entry.key.toLowerCase();
      for (const stem of [key, ...stripSuffixes(key, minStemLength)]) {
        for (const owner of entry.owners) {
          this.post(stem, { key: entry.key, owner, priority: entry.priority });
        }
      }
    }
  }

  get size(): number {
    return this.postings.size;
  }

  private post(stem: string, posting: StemPosting): void {
    const postings = this.postings.get(stem);
    if (postings) {
      postings.push(posting);
    } else {
      this.postings.set(stem, [posting]);
    }
  }

  /**
   * Look a stem up. Only postings at the best priority present count;
   * two distinct logical owners there make the stem ambiguous.
   */
  lookup(stem: string, ownerType?: EntityRef['ownerType']): StemLookup {
    const postings = (this.postings.get(stem) ?? []).filter(
      (posting) => !ownerType || posting.owner.ownerType === ownerType
    );
    if (postings.length === 0) {
      return { status: 'miss' };
    }

    const bestRank = Math.max(...postings.map((posting) => PRIORITY_RANK[posting.priority]));
    const best = postings.filter((posting) => PRIORITY_RANK[posting.priority] === bestRank);

    const byLogicalOwner = new Map<string, StemPosting>();
    for (const posting of best) {
      const id = this.identities.logicalId(posting.owner);
      const seen = byLogicalOwner.get(id);
      // The player record stands for everything that mirrors it
      if (!seen || (posting.owner.kind === 'player' && seen.owner.kind !== 'player')) {
        byLogicalOwner.set(id, posting);
      }
    }

    const owners = Array.from(byLogicalOwner.values());
    if (owners.length > 1) {
      return { status: 'ambiguous', owners: owners.map((posting) => posting.owner) };
    }

    const [match] = owners;
    return { status: 'hit', match: { owner: match.owner, key: match.key, priority: match.priority } };
  }
}
