import { defineAggregateKind } from '../analytics/aggregate.js';
import type { AggregateKind } from '../analytics/aggregate.js';
import type { EventProperties } from '../analytics/types.js';
import {
  DEFAULT_CROP_LENGTH,
  DEFAULT_CROP_MARKER,
  DEFAULT_HIGHLIGHT_POST_TAG,
  DEFAULT_HIGHLIGHT_PRE_TAG,
  DEFAULT_SEARCH_LIMIT,
  DEFAULT_SEMANTIC_RATIO,
  isFinitePagination,
} from '../search.js';
import type { SearchQuery, SearchResult } from '../search.js';
import {
  formatRatio,
  mergeFrequencies,
  mostUsed,
  percentile99,
  saturatingAdd,
  saturatingSub,
  unionSorted,
} from '../statistics.js';
import type { FrequencyTable } from '../statistics.js';
import { analyzeFilter, hasFilter } from './filter.js';

export type SearchMethod = 'GET' | 'POST';

/** Rollup of single-index search requests. */
export interface SearchAggregate {
  // requests
  readonly total_received: number;
  readonly total_succeeded: number;
  readonly total_degraded: number;
  readonly total_used_negative_operator: number;
  readonly time_spent: readonly number[];

  // sort
  readonly sort_with_geo_point: boolean;
  readonly sort_sum_of_criteria_terms: number;
  readonly sort_total_number_of_criteria: number;

  // distinct
  readonly distinct: boolean;

  // filter: the sum grows by the number of terms, the total by one, per filtered request
  readonly filter_with_geo_radius: boolean;
  readonly filter_with_geo_bounding_box: boolean;
  readonly filter_sum_of_criteria_terms: number;
  readonly filter_total_number_of_criteria: number;
  readonly used_syntax: FrequencyTable;

  // attributes_to_search_on
  readonly attributes_to_search_on_total_number_of_uses: number;

  // q
  readonly max_terms_number: number;

  // vector / hybrid
  readonly max_vector_size: number;
  /** Whether a non-default semantic ratio was requested. */
  readonly semantic_ratio: boolean;
  readonly hybrid: boolean;
  readonly retrieve_vectors: boolean;

  readonly matching_strategy: FrequencyTable;
  readonly locales: ReadonlySet<string>;

  // pagination
  readonly max_limit: number;
  readonly max_offset: number;
  readonly finite_pagination: number;

  // formatting
  readonly max_attributes_to_retrieve: number;
  readonly max_attributes_to_highlight: number;
  readonly highlight_pre_tag: boolean;
  readonly highlight_post_tag: boolean;
  readonly max_attributes_to_crop: number;
  readonly crop_marker: boolean;
  readonly show_matches_position: boolean;
  readonly crop_length: boolean;

  // facets
  readonly facets_sum_of_terms: number;
  readonly facets_total_number_of_facets: number;

  // scoring
  readonly show_ranking_score: boolean;
  readonly show_ranking_score_details: boolean;
  readonly ranking_score_threshold: boolean;
}

export function emptySearchAggregate(): SearchAggregate {
  return {
    total_received: 0,
    total_succeeded: 0,
    total_degraded: 0,
    total_used_negative_operator: 0,
    time_spent: [],
    sort_with_geo_point: false,
    sort_sum_of_criteria_terms: 0,
    sort_total_number_of_criteria: 0,
    distinct: false,
    filter_with_geo_radius: false,
    filter_with_geo_bounding_box: false,
    filter_sum_of_criteria_terms: 0,
    filter_total_number_of_criteria: 0,
    used_syntax: new Map(),
    attributes_to_search_on_total_number_of_uses: 0,
    max_terms_number: 0,
    max_vector_size: 0,
    semantic_ratio: false,
    hybrid: false,
    retrieve_vectors: false,
    matching_strategy: new Map(),
    locales: new Set(),
    max_limit: 0,
    max_offset: 0,
    finite_pagination: 0,
    max_attributes_to_retrieve: 0,
    max_attributes_to_highlight: 0,
    highlight_pre_tag: false,
    highlight_post_tag: false,
    max_attributes_to_crop: 0,
    crop_marker: false,
    show_matches_position: false,
    crop_length: false,
    facets_sum_of_terms: 0,
    facets_total_number_of_facets: 0,
    show_ranking_score: false,
    show_ranking_score_details: false,
    ranking_score_threshold: false,
  };
}

/** Builds the aggregate for one received (not yet answered) search. */
export function fromSearchQuery(query: SearchQuery): SearchAggregate {
  const base = emptySearchAggregate();

  const sort = query.sort;
  const filter = hasFilter(query.filter) ? analyzeFilter(query.filter) : null;

  const finite = isFinitePagination(query);
  const finiteLimit = query.hitsPerPage ?? DEFAULT_SEARCH_LIMIT;

  return {
    ...base,
    total_received: 1,

    sort_total_number_of_criteria: sort ? 1 : 0,
    sort_with_geo_point: sort ? sort.some((s) => s.includes('_geoPoint(')) : false,
    sort_sum_of_criteria_terms: sort ? sort.length : 0,

    distinct: query.distinct !== undefined,

    filter_total_number_of_criteria: filter ? 1 : 0,
    used_syntax: filter ? new Map<string, number>([[filter.syntax, 1]]) : base.used_syntax,
    filter_with_geo_radius: filter?.withGeoRadius ?? false,
    filter_with_geo_bounding_box: filter?.withGeoBoundingBox ?? false,
    filter_sum_of_criteria_terms: filter?.criteriaTerms ?? 0,

    attributes_to_search_on_total_number_of_uses: query.attributesToSearchOn ? 1 : 0,

    max_terms_number: query.q ? query.q.split(/\s+/).filter(Boolean).length : 0,

    max_vector_size: query.vector?.length ?? 0,
    retrieve_vectors: query.retrieveVectors,
    semantic_ratio: query.hybrid ? query.hybrid.semanticRatio !== DEFAULT_SEMANTIC_RATIO : false,
    hybrid: query.hybrid !== undefined,

    max_limit: finite ? finiteLimit : query.limit,
    max_offset: finite ? saturatingSub(query.page ?? 1, 1) * finiteLimit : query.offset,
    finite_pagination: finite ? 1 : 0,

    matching_strategy: new Map<string, number>([[query.matchingStrategy, 1]]),
    locales: new Set(query.locales ?? []),

    max_attributes_to_retrieve: query.attributesToRetrieve?.length ?? 0,
    max_attributes_to_highlight: query.attributesToHighlight?.length ?? 0,
    max_attributes_to_crop: query.attributesToCrop?.length ?? 0,
    highlight_pre_tag: query.highlightPreTag !== DEFAULT_HIGHLIGHT_PRE_TAG,
    highlight_post_tag: query.highlightPostTag !== DEFAULT_HIGHLIGHT_POST_TAG,
    crop_marker: query.cropMarker !== DEFAULT_CROP_MARKER,
    crop_length: query.cropLength !== DEFAULT_CROP_LENGTH,
    show_matches_position: query.showMatchesPosition,

    facets_sum_of_terms: query.facets?.length ?? 0,
    facets_total_number_of_facets: query.facets ? 1 : 0,

    show_ranking_score: query.showRankingScore,
    show_ranking_score_details: query.showRankingScoreDetails,
    ranking_score_threshold: query.rankingScoreThreshold !== undefined,
  };
}

/** Records the outcome of a successful search. */
export function withSearchSuccess(aggregate: SearchAggregate, result: SearchResult): SearchAggregate {
  return {
    ...aggregate,
    total_succeeded: saturatingAdd(aggregate.total_succeeded, 1),
    total_degraded: result.degraded
      ? saturatingAdd(aggregate.total_degraded, 1)
      : aggregate.total_degraded,
    total_used_negative_operator: result.usedNegativeOperator
      ? saturatingAdd(aggregate.total_used_negative_operator, 1)
      : aggregate.total_used_negative_operator,
    time_spent: [...aggregate.time_spent, result.processingTimeMs],
  };
}

// Spelled out field by field: leaving one out is a compile error.
export function mergeSearch(a: SearchAggregate, b: SearchAggregate): SearchAggregate {
  return {
    total_received: saturatingAdd(a.total_received, b.total_received),
    total_succeeded: saturatingAdd(a.total_succeeded, b.total_succeeded),
    total_degraded: saturatingAdd(a.total_degraded, b.total_degraded),
    total_used_negative_operator: saturatingAdd(a.total_used_negative_operator, b.total_used_negative_operator),
    time_spent: [...a.time_spent, ...b.time_spent],

    sort_with_geo_point: a.sort_with_geo_point || b.sort_with_geo_point,
    sort_sum_of_criteria_terms: saturatingAdd(a.sort_sum_of_criteria_terms, b.sort_sum_of_criteria_terms),
    sort_total_number_of_criteria: saturatingAdd(a.sort_total_number_of_criteria, b.sort_total_number_of_criteria),

    distinct: a.distinct || b.distinct,

    filter_with_geo_radius: a.filter_with_geo_radius || b.filter_with_geo_radius,
    filter_with_geo_bounding_box: a.filter_with_geo_bounding_box || b.filter_with_geo_bounding_box,
    filter_sum_of_criteria_terms: saturatingAdd(a.filter_sum_of_criteria_terms, b.filter_sum_of_criteria_terms),
    filter_total_number_of_criteria: saturatingAdd(a.filter_total_number_of_criteria, b.filter_total_number_of_criteria),
    used_syntax: mergeFrequencies(a.used_syntax, b.used_syntax),

    attributes_to_search_on_total_number_of_uses: saturatingAdd(
      a.attributes_to_search_on_total_number_of_uses,
      b.attributes_to_search_on_total_number_of_uses,
    ),

    max_terms_number: Math.max(a.max_terms_number, b.max_terms_number),

    max_vector_size: Math.max(a.max_vector_size, b.max_vector_size),
    semantic_ratio: a.semantic_ratio || b.semantic_ratio,
    hybrid: a.hybrid || b.hybrid,
    retrieve_vectors: a.retrieve_vectors || b.retrieve_vectors,

    matching_strategy: mergeFrequencies(a.matching_strategy, b.matching_strategy),
    locales: new Set([...a.locales, ...b.locales]),

    max_limit: Math.max(a.max_limit, b.max_limit),
    max_offset: Math.max(a.max_offset, b.max_offset),
    finite_pagination: saturatingAdd(a.finite_pagination, b.finite_pagination),

    max_attributes_to_retrieve: Math.max(a.max_attributes_to_retrieve, b.max_attributes_to_retrieve),
    max_attributes_to_highlight: Math.max(a.max_attributes_to_highlight, b.max_attributes_to_highlight),
    highlight_pre_tag: a.highlight_pre_tag || b.highlight_pre_tag,
    highlight_post_tag: a.highlight_post_tag || b.highlight_post_tag,
    max_attributes_to_crop: Math.max(a.max_attributes_to_crop, b.max_attributes_to_crop),
    crop_marker: a.crop_marker || b.crop_marker,
    show_matches_position: a.show_matches_position || b.show_matches_position,
    crop_length: a.crop_length || b.crop_length,

    facets_sum_of_terms: saturatingAdd(a.facets_sum_of_terms, b.facets_sum_of_terms),
    facets_total_number_of_facets: saturatingAdd(a.facets_total_number_of_facets, b.facets_total_number_of_facets),

    show_ranking_score: a.show_ranking_score || b.show_ranking_score,
    show_ranking_score_details: a.show_ranking_score_details || b.show_ranking_score_details,
    ranking_score_threshold: a.ranking_score_threshold || b.ranking_score_threshold,
  };
}

export function exportSearch(aggregate: SearchAggregate): EventProperties {
  const p99 = percentile99(aggregate.time_spent);

  return {
    requests: {
      '99th_response_time': p99 === null ? null : String(Math.trunc(p99)),
      total_succeeded: aggregate.total_succeeded,
      total_failed: saturatingSub(aggregate.total_received, aggregate.total_succeeded),
      total_received: aggregate.total_received,
      total_degraded: aggregate.total_degraded,
      total_used_negative_operator: aggregate.total_used_negative_operator,
    },
    sort: {
      with_geoPoint: aggregate.sort_with_geo_point,
      avg_criteria_number: formatRatio(aggregate.sort_sum_of_criteria_terms, aggregate.sort_total_number_of_criteria),
    },
    distinct: aggregate.distinct,
    filter: {
      with_geoRadius: aggregate.filter_with_geo_radius,
      with_geoBoundingBox: aggregate.filter_with_geo_bounding_box,
      avg_criteria_number: formatRatio(aggregate.filter_sum_of_criteria_terms, aggregate.filter_total_number_of_criteria),
      most_used_syntax: mostUsed(aggregate.used_syntax),
    },
    attributes_to_search_on: {
      total_number_of_uses: aggregate.attributes_to_search_on_total_number_of_uses,
    },
    q: {
      max_terms_number: aggregate.max_terms_number,
    },
    vector: {
      max_vector_size: aggregate.max_vector_size,
      retrieve_vectors: aggregate.retrieve_vectors,
    },
    hybrid: {
      enabled: aggregate.hybrid,
      semantic_ratio: aggregate.semantic_ratio,
    },
    pagination: {
      max_limit: aggregate.max_limit,
      max_offset: aggregate.max_offset,
      most_used_navigation:
        aggregate.finite_pagination > Math.floor(aggregate.total_received / 2) ? 'exhaustive' : 'estimated',
    },
    formatting: {
      max_attributes_to_retrieve: aggregate.max_attributes_to_retrieve,
      max_attributes_to_highlight: aggregate.max_attributes_to_highlight,
      highlight_pre_tag: aggregate.highlight_pre_tag,
      highlight_post_tag: aggregate.highlight_post_tag,
      max_attributes_to_crop: aggregate.max_attributes_to_crop,
      crop_marker: aggregate.crop_marker,
      show_matches_position: aggregate.show_matches_position,
      crop_length: aggregate.crop_length,
    },
    facets: {
      avg_facets_number: formatRatio(aggregate.facets_sum_of_terms, aggregate.facets_total_number_of_facets),
    },
    matching_strategy: {
      most_used_strategy: mostUsed(aggregate.matching_strategy),
    },
    locales: unionSorted(aggregate.locales, []),
    scoring: {
      show_ranking_score: aggregate.show_ranking_score,
      show_ranking_score_details: aggregate.show_ranking_score_details,
      ranking_score_threshold: aggregate.ranking_score_threshold,
    },
  };
}

/** One kind per HTTP method, so GET and POST searches roll up separately. */
export function createSearchKind(method: SearchMethod): AggregateKind<SearchAggregate> {
  return defineAggregateKind<SearchAggregate>({
    tag: `search-${method.toLowerCase()}`,
    name: `Documents Searched ${method}`,
    merge: mergeSearch,
    export: exportSearch,
  });
}

export const searchGetKind = createSearchKind('GET');
export const searchPostKind = createSearchKind('POST');
