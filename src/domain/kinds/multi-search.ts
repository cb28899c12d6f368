import { defineAggregateKind } from '../analytics/aggregate.js';
import type { EventProperties } from '../analytics/types.js';
import type { FederatedSearch } from '../search.js';
import { saturatingAdd, saturatingSub } from '../statistics.js';

/** Rollup of multi-search requests. */
export interface MultiSearchAggregate {
  readonly total_received: number;
  readonly total_succeeded: number;
  /** Sum of distinct indexes per request; averaged over `total_received`. */
  readonly total_distinct_index_count: number;
  /** Requests that targeted exactly one index. */
  readonly total_single_index: number;
  /** Sum of queries per request; averaged over `total_received`. */
  readonly total_search_count: number;
  readonly show_ranking_score: boolean;
  readonly show_ranking_score_details: boolean;
  readonly use_federation: boolean;
}

export function fromFederatedSearch(search: FederatedSearch): MultiSearchAggregate {
  const distinctIndexes = new Set(search.queries.map((query) => query.indexUid));

  return {
    total_received: 1,
    total_succeeded: 0,
    total_distinct_index_count: distinctIndexes.size,
    total_single_index: distinctIndexes.size === 1 ? 1 : 0,
    total_search_count: search.queries.length,
    show_ranking_score: search.queries.some((query) => query.showRankingScore),
    show_ranking_score_details: search.queries.some((query) => query.showRankingScoreDetails),
    use_federation: search.federation !== undefined,
  };
}

export function withMultiSearchSuccess(aggregate: MultiSearchAggregate): MultiSearchAggregate {
  return { ...aggregate, total_succeeded: saturatingAdd(aggregate.total_succeeded, 1) };
}

export function mergeMultiSearch(a: MultiSearchAggregate, b: MultiSearchAggregate): MultiSearchAggregate {
  return {
    total_received: saturatingAdd(a.total_received, b.total_received),
    total_succeeded: saturatingAdd(a.total_succeeded, b.total_succeeded),
    total_distinct_index_count: saturatingAdd(a.total_distinct_index_count, b.total_distinct_index_count),
    total_single_index: saturatingAdd(a.total_single_index, b.total_single_index),
    total_search_count: saturatingAdd(a.total_search_count, b.total_search_count),
    show_ranking_score: a.show_ranking_score || b.show_ranking_score,
    show_ranking_score_details: a.show_ranking_score_details || b.show_ranking_score_details,
    use_federation: a.use_federation || b.use_federation,
  };
}

export function exportMultiSearch(aggregate: MultiSearchAggregate): EventProperties {
  return {
    requests: {
      total_succeeded: aggregate.total_succeeded,
      total_failed: saturatingSub(aggregate.total_received, aggregate.total_succeeded),
      total_received: aggregate.total_received,
    },
    indexes: {
      total_single_index: aggregate.total_single_index,
      total_distinct_index_count: aggregate.total_distinct_index_count,
      avg_distinct_index_count: aggregate.total_distinct_index_count / aggregate.total_received,
    },
    searches: {
      total_search_count: aggregate.total_search_count,
      avg_search_count: aggregate.total_search_count / aggregate.total_received,
    },
    scoring: {
      show_ranking_score: aggregate.show_ranking_score,
      show_ranking_score_details: aggregate.show_ranking_score_details,
    },
    federation: {
      use_federation: aggregate.use_federation,
    },
  };
}

export const multiSearchKind = defineAggregateKind<MultiSearchAggregate>({
  tag: 'multi-search-post',
  name: 'Documents Searched by Multi-Search POST',
  merge: mergeMultiSearch,
  export: exportMultiSearch,
});
