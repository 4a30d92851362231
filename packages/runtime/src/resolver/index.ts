export {
  EntityResolver,
  createEntityResolver,
  type EntityResolverOptions,
  type ResolveManyResult,
  type ResolveManySummary,
} from './resolver.js';

export { BkTree, type BkMatch, type Metric } from './bk-tree.js';
export { levenshtein, distanceThreshold } from './levenshtein.js';
export {
  INFLECTION_SUFFIXES,
  STEM_ALTERNATIONS,
  stripSuffixes,
  reverseAlternations,
  type AlternationRule,
} from './morphology.js';
export { StemIndex, type StemLookup, type StemMatch } from './stem-index.js';
