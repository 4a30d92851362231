// Name index and resolution result types

import type { EntityRef, OwnerType } from './identity.js';

/**
 * Index priorities, strongest first.
 */
export type IndexPriority = 'fullNameOrAlias' | 'token';

export type NameIndexEntry = {
  /**
   * The key as first written (lookup is case-insensitive)
   */
  key: string;
  owner: EntityRef;
  ownerType: OwnerType;
  priority: IndexPriority;

  /**
   * True when distinct owners claim this key at the same priority
   */
  ambiguous: boolean;
  owners: EntityRef[];
};

export type ResolutionConfidence = 'exact' | 'morphological' | 'fuzzy';

/**
 * Pipeline stage that produced a hit.
 */
export type ResolutionStage = 'exact' | 'suffix' | 'alternation' | 'distance';

export type ResolvedResult = {
  status: 'resolved';
  query: string;
  owner: EntityRef;
  confidence: ResolutionConfidence;
  stage: ResolutionStage;

  /**
   * Index key or stem that matched
   */
  matchedKey: string;

  /**
   * Edit distance for fuzzy hits
   */
  distance?: number;

  /**
   * Other owners that matched equally well at the distance stage
   */
  ties: EntityRef[];
};

export type UnresolvedResult = {
  status: 'unresolved';
  query: string;

  /**
   * Owners of the ambiguous key or stem that stopped the search, if any
   */
  ambiguousOwners: EntityRef[];
};

export type ResolutionResult = ResolvedResult | UnresolvedResult;

export type ResolveOptions = {
  /**
   * Only accept owners of this kind
   */
  ownerType?: OwnerType;
};
