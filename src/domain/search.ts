/**
 * Search request and result shapes the telemetry kinds are built from.
 *
 * Fields that have a server-side default are required here; the HTTP
 * schemas fill them in before a query reaches a kind constructor.
 */

export const DEFAULT_SEARCH_OFFSET = 0;
export const DEFAULT_SEARCH_LIMIT = 20;
export const DEFAULT_CROP_LENGTH = 10;
export const DEFAULT_CROP_MARKER = '…';
export const DEFAULT_HIGHLIGHT_PRE_TAG = '<em>';
export const DEFAULT_HIGHLIGHT_POST_TAG = '</em>';
export const DEFAULT_SEMANTIC_RATIO = 0.5;

export type MatchingStrategy = 'last' | 'all' | 'frequency';

export interface HybridQuery {
  semanticRatio: number;
  embedder?: string | undefined;
}

export interface SearchQuery {
  q?: string | undefined;
  vector?: number[] | undefined;
  offset: number;
  limit: number;
  page?: number | undefined;
  hitsPerPage?: number | undefined;
  attributesToRetrieve?: string[] | undefined;
  retrieveVectors: boolean;
  attributesToCrop?: string[] | undefined;
  cropLength: number;
  attributesToHighlight?: string[] | undefined;
  showMatchesPosition: boolean;
  showRankingScore: boolean;
  showRankingScoreDetails: boolean;
  /** A filter string, or an array of strings / nested string arrays. */
  filter?: unknown;
  sort?: string[] | undefined;
  distinct?: string | undefined;
  facets?: string[] | undefined;
  highlightPreTag: string;
  highlightPostTag: string;
  cropMarker: string;
  matchingStrategy: MatchingStrategy;
  attributesToSearchOn?: string[] | undefined;
  hybrid?: HybridQuery | undefined;
  rankingScoreThreshold?: number | undefined;
  locales?: string[] | undefined;
}

/** Finite (page-based) pagination is requested by `page` or `hitsPerPage`. */
export function isFinitePagination(query: Pick<SearchQuery, 'page' | 'hitsPerPage'>): boolean {
  return query.page !== undefined || query.hitsPerPage !== undefined;
}

export interface SearchQueryWithIndex extends SearchQuery {
  indexUid: string;
  federationOptions?: { weight: number } | undefined;
}

export interface FederatedSearch {
  queries: SearchQueryWithIndex[];
  federation?: { limit: number; offset: number } | undefined;
}

export interface SimilarQuery {
  id: string;
  embedder?: string | undefined;
  offset: number;
  limit: number;
  attributesToRetrieve?: string[] | undefined;
  retrieveVectors: boolean;
  showRankingScore: boolean;
  showRankingScoreDetails: boolean;
  filter?: unknown;
  rankingScoreThreshold?: number | undefined;
}

export interface SearchResult {
  hits: unknown[];
  query: string;
  processingTimeMs: number;
  degraded: boolean;
  usedNegativeOperator: boolean;
}

export interface SimilarResult {
  id: string;
  hits: unknown[];
  processingTimeMs: number;
}

/**
 * The search backend the HTTP layer delegates to.
 * Provided by the host; telemetry only observes it.
 */
export interface SearchEngine {
  search(indexUid: string, query: SearchQuery): Promise<SearchResult>;
  multiSearch(search: FederatedSearch): Promise<unknown>;
  similar(indexUid: string, query: SimilarQuery): Promise<SimilarResult>;
}
