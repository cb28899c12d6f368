export * from './analytics/index.js';
export * from './kinds/index.js';
export * from './statistics.js';
export {
  DEFAULT_SEARCH_OFFSET,
  DEFAULT_SEARCH_LIMIT,
  DEFAULT_CROP_LENGTH,
  DEFAULT_CROP_MARKER,
  DEFAULT_HIGHLIGHT_PRE_TAG,
  DEFAULT_HIGHLIGHT_POST_TAG,
  DEFAULT_SEMANTIC_RATIO,
  isFinitePagination,
} from './search.js';
export type {
  MatchingStrategy,
  HybridQuery,
  SearchQuery,
  SearchQueryWithIndex,
  FederatedSearch,
  SimilarQuery,
  SearchResult,
  SimilarResult,
  SearchEngine,
} from './search.js';
