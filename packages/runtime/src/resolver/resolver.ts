// Entity Resolver
//
// Turns free text from session notes into an identity. Four stages run in
// order and the first hit wins:
//
//   1. exact        - name index lookup
//   2. suffix       - strip one case ending, look the stem up
//   3. alternation  - also undo a consonant alternation, look up again
//   4. distance     - BK-tree search within a length-scaled edit distance
//
// Ambiguous keys never resolve. The resolver is read-only once built.

import type {
  EntityRef,
  NameIndexEntry,
  OwnerType,
  ResolutionConfidence,
  ResolutionResult,
  ResolutionStage,
  ResolvedResult,
  ResolveOptions,
  UnresolvedResult,
} from '@worldkeep/protocol';
import type { EngineLogger } from '../logging.js';
import { silentLogger } from '../logging.js';
import { DEFAULT_ENGINE_CONFIG } from '../config.js';
import { AmbiguousReferenceError, UnresolvedReferenceError } from '../errors.js';
import { PRIORITY_RANK, entryOwners, type NameIndex } from '../names/index.js';
import { BkTree } from './bk-tree.js';
import { distanceThreshold } from './levenshtein.js';
import { reverseAlternations, stripSuffixes } from './morphology.js';
import { StemIndex, type StemLookup } from './stem-index.js';

const STAGE_CONFIDENCE: Record<ResolutionStage, ResolutionConfidence> = {
  exact: 'exact',
  suffix: 'morphological',
  alternation: 'morphological',
  distance: 'fuzzy',
};

export type EntityResolverOptions = {
  /**
   * Shortest stem the morphological stages look up (default 3)
   */
  minStemLength?: number;

  /**
   * Cache results per query and owner type (default true)
   */
  cacheResults?: boolean;

  /**
   * Run the edit-distance stage (default true)
   */
  fuzzy?: boolean;

  logger?: EngineLogger;
};

export type ResolveManySummary = {
  total: number;
  resolved: number;
  unresolved: number;
  byConfidence: Record<ResolutionConfidence, number>;
};

export type ResolveManyResult = {
  results: ResolutionResult[];
  summary: ResolveManySummary;
};

type DistanceCandidate = {
  entry: NameIndexEntry;
  owner: EntityRef;
  distance: number;
};

function compareCandidates(a: DistanceCandidate, b: DistanceCandidate): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  const rank = PRIORITY_RANK[b.entry.priority] - PRIORITY_RANK[a.entry.priority];
  if (rank !== 0) return rank;
  if (a.entry.key.length !== b.entry.key.length) return a.entry.key.length - b.entry.key.length;
  const left = a.entry.key.toLowerCase();
  const right = b.entry.key.toLowerCase();
  return left < right ? -1 : left > right ? 1 : 0;
}

export class EntityResolver {
  private readonly stems: StemIndex;
  private readonly tree: BkTree;
  private readonly cache = new Map<string, ResolutionResult>();
  private readonly minStemLength: number;
  private readonly cacheResults: boolean;
  private readonly fuzzy: boolean;
  private readonly logger: EngineLogger;

  constructor(
    readonly index: NameIndex,
    options: EntityResolverOptions = {}
  ) {
    this.minStemLength = options.minStemLength ?? DEFAULT_ENGINE_CONFIG.minStemLength;
    this.cacheResults = options.cacheResults ?? DEFAULT_ENGINE_CONFIG.cacheResults;
    this.fuzzy = options.fuzzy ?? DEFAULT_ENGINE_CONFIG.fuzzy;
    this.logger = options.logger ?? silentLogger;

    this.stems = new StemIndex(index.values(), index.identities, this.minStemLength);
    this.tree = BkTree.from(index.keys());
  }

  /**
   * Resolve a query to a single identity.
   *
   * @example
   * ```typescript
   * const result = resolver.resolve('Sandrem');
   * // { status: 'resolved', owner: { kind: 'entity', name: 'Sandro', ... }, confidence: 'morphological', ... }
   * ```
   */
  resolve(query: string, options: ResolveOptions = {}): ResolutionResult {
    const cacheKey = `${options.ownerType ?? '*'}|${query}`;
    const cached = this.cacheResults ? this.cache.get(cacheKey) : undefined;
    if (cached) {
      return cached;
    }

    const result = this.run(query, options.ownerType);
    if (this.cacheResults) {
      this.cache.set(cacheKey, result);
    }

    if (result.status === 'unresolved') {
      this.logger.debug(`Unresolved reference "${query}"`, {
        ownerType: options.ownerType,
        ambiguousOwners: result.ambiguousOwners.map((owner) => owner.name),
      });
    }

    return result;
  }

  /**
   * Resolve a batch of queries and summarise the outcome.
   */
  resolveMany(queries: readonly string[], options: ResolveOptions = {}): ResolveManyResult {
    const summary: ResolveManySummary = {
      total: queries.length,
      resolved: 0,
      unresolved: 0,
      byConfidence: { exact: 0, morphological: 0, fuzzy: 0 },
    };

    const results = queries.map((query) => {
      const result = this.resolve(query, options);
      if (result.status === 'resolved') {
        summary.resolved++;
        summary.byConfidence[result.confidence]++;
      } else {
        summary.unresolved++;
      }
      return result;
    });

    return { results, summary };
  }

  /**
   * Resolve a query or throw.
   *
   * @throws AmbiguousReferenceError when the query names an ambiguous key
   * @throws UnresolvedReferenceError when nothing matches
   */
  resolveOrThrow(query: string, options: ResolveOptions = {}): ResolvedResult {
    const result = this.resolve(query, options);
    if (result.status === 'resolved') {
      return result;
    }
    if (result.ambiguousOwners.length > 0) {
      throw new AmbiguousReferenceError(query, result.ambiguousOwners);
    }
    throw new UnresolvedReferenceError(query);
  }

  /**
   * Drop cached results.
   */
  clearCache(): void {
    this.cache.clear();
  }

  private run(query: string, ownerType?: OwnerType): ResolutionResult {
    const normalized = query.trim().toLowerCase();
    const unresolved: UnresolvedResult = { status: 'unresolved', query, ambiguousOwners: [] };
    if (!normalized) {
      return unresolved;
    }

    // 1. Exact. An ambiguous key that concerns the requested owner type ends the search.
    const entry = this.index.lookup(normalized);
    if (entry) {
      const owners = entryOwners(entry, ownerType);
      if (entry.ambiguous && owners.length > 0) {
        return { ...unresolved, ambiguousOwners: [...entry.owners] };
      }
      if (!entry.ambiguous && owners.length > 0) {
        return this.resolved(query, 'exact', owners[0], entry.key);
      }
    }

    // 2. Suffix stripping
    const suffixLookup = this.firstStemLookup(stripSuffixes(normalized, this.minStemLength), ownerType);
    if (suffixLookup.status === 'hit') {
      return this.resolved(query, 'suffix', suffixLookup.match.owner, suffixLookup.match.key);
    }
    if (suffixLookup.status === 'ambiguous') {
      return { ...unresolved, ambiguousOwners: suffixLookup.owners };
    }

    // 3. Stem alternation
    const alternationLookup = this.firstStemLookup(
      reverseAlternations(normalized, this.minStemLength),
      ownerType
    );
    if (alternationLookup.status === 'hit') {
      return this.resolved(query, 'alternation', alternationLookup.match.owner, alternationLookup.match.key);
    }
    if (alternationLookup.status === 'ambiguous') {
      return { ...unresolved, ambiguousOwners: alternationLookup.owners };
    }

    // 4. Edit distance
    if (this.fuzzy) {
      const hit = this.nearest(normalized, ownerType);
      if (hit) {
        const { candidate, ties } = hit;
        return this.resolved(query, 'distance', candidate.owner, candidate.entry.key, candidate.distance, ties);
      }
    }

    return unresolved;
  }

  /**
   * First stem that is not a miss, in candidate order.
   */
  private firstStemLookup(stems: readonly string[], ownerType?: OwnerType): StemLookup {
    for (const stem of stems) {
      const lookup = this.stems.lookup(stem, ownerType);
      if (lookup.status !== 'miss') {
        return lookup;
      }
    }
    return { status: 'miss' };
  }

  private nearest(
    query: string,
    ownerType?: OwnerType
  ): { candidate: DistanceCandidate; ties: EntityRef[] } | undefined {
    // A key can be at most half again as long as the query, so its threshold never exceeds half the query
    const radius = Math.max(1, Math.floor(query.length / 2));
    const candidates: DistanceCandidate[] = [];

    for (const match of this.tree.search(query, radius)) {
      const entry = this.index.lookup(match.term);
      if (!entry || entry.ambiguous) continue;

      const [owner] = entryOwners(entry, ownerType);
      if (!owner) continue;

      const threshold = distanceThreshold(match.term.length);
      if (Math.abs(match.term.length - query.length) > threshold) continue;
      if (match.distance > threshold) continue;

      candidates.push({ entry, owner, distance: match.distance });
    }

    if (candidates.length === 0) {
      return undefined;
    }

    candidates.sort(compareCandidates);
    const [best] = candidates;
    const ties: EntityRef[] = [];
    for (const candidate of candidates.slice(1)) {
      if (candidate.distance !== best.distance) break;
      if (candidate.entry.priority !== best.entry.priority) continue;
      if (this.index.identities.same(candidate.owner, best.owner)) continue;
      if (ties.some((tie) => this.index.identities.same(tie, candidate.owner))) continue;
      ties.push(candidate.owner);
    }

    return { candidate: best, ties };
  }

  private resolved(
    query: string,
    stage: ResolutionStage,
    owner: EntityRef,
    matchedKey: string,
    distance?: number,
    ties: EntityRef[] = []
  ): ResolvedResult {
    const result: ResolvedResult = {
      status: 'resolved',
      query,
      owner,
      confidence: STAGE_CONFIDENCE[stage],
      stage,
      matchedKey,
      ties,
    };
    if (distance !== undefined) {
      result.distance = distance;
    }
    return result;
  }
}

/**
 * Build a resolver over a name index.
 */
export function createEntityResolver(index: NameIndex, options: EntityResolverOptions = {}): EntityResolver {
  const resolver = new EntityResolver(index, options);
  (options.logger ?? silentLogger).info('Entity resolver built', {
    keys: index.size,
    fuzzy: options.fuzzy ?? DEFAULT_ENGINE_CONFIG.fuzzy,
  });
  return resolver;
}
