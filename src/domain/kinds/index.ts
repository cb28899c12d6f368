export {
  createSearchKind,
  searchGetKind,
  searchPostKind,
  emptySearchAggregate,
  fromSearchQuery,
  withSearchSuccess,
  mergeSearch,
  exportSearch,
} from './search.js';
export type { SearchAggregate, SearchMethod } from './search.js';
export {
  multiSearchKind,
  fromFederatedSearch,
  withMultiSearchSuccess,
  mergeMultiSearch,
  exportMultiSearch,
} from './multi-search.js';
export type { MultiSearchAggregate } from './multi-search.js';
export {
  createSimilarKind,
  similarGetKind,
  similarPostKind,
  fromSimilarQuery,
  withSimilarSuccess,
  mergeSimilar,
  exportSimilar,
} from './similar.js';
export type { SimilarAggregate } from './similar.js';
export { createOccurrenceKind, healthSeenKind } from './occurrence.js';
export type { OccurrenceAggregate } from './occurrence.js';
export { analyzeFilter, hasFilter } from './filter.js';
export type { FilterFacts, FilterSyntax } from './filter.js';
