import { defineAggregateKind } from '../analytics/aggregate.js';
import type { AggregateKind } from '../analytics/aggregate.js';
import type { EventProperties } from '../analytics/types.js';
import type { SimilarQuery, SimilarResult } from '../search.js';
import {
  formatRatio,
  mergeFrequencies,
  mostUsed,
  percentile99,
  saturatingAdd,
  saturatingSub,
} from '../statistics.js';
import type { FrequencyTable } from '../statistics.js';
import { analyzeFilter, hasFilter } from './filter.js';
import type { SearchMethod } from './search.js';

/** Rollup of similar-documents requests. */
export interface SimilarAggregate {
  readonly total_received: number;
  readonly total_succeeded: number;
  readonly time_spent: readonly number[];

  readonly filter_with_geo_radius: boolean;
  readonly filter_with_geo_bounding_box: boolean;
  readonly filter_sum_of_criteria_terms: number;
  readonly filter_total_number_of_criteria: number;
  readonly used_syntax: FrequencyTable;

  readonly retrieve_vectors: boolean;

  readonly max_limit: number;
  readonly max_offset: number;

  readonly max_attributes_to_retrieve: number;

  readonly show_ranking_score: boolean;
  readonly show_ranking_score_details: boolean;
  readonly ranking_score_threshold: boolean;
}

export function fromSimilarQuery(query: SimilarQuery): SimilarAggregate {
  const filter = hasFilter(query.filter) ? analyzeFilter(query.filter) : null;

  return {
    total_received: 1,
    total_succeeded: 0,
    time_spent: [],

    filter_with_geo_radius: filter?.withGeoRadius ?? false,
    filter_with_geo_bounding_box: filter?.withGeoBoundingBox ?? false,
    filter_sum_of_criteria_terms: filter?.criteriaTerms ?? 0,
    filter_total_number_of_criteria: filter ? 1 : 0,
    used_syntax: filter ? new Map<string, number>([[filter.syntax, 1]]) : new Map<string, number>(),

    retrieve_vectors: query.retrieveVectors,

    max_limit: query.limit,
    max_offset: query.offset,

    max_attributes_to_retrieve: query.attributesToRetrieve?.length ?? 0,

    show_ranking_score: query.showRankingScore,
    show_ranking_score_details: query.showRankingScoreDetails,
    ranking_score_threshold: query.rankingScoreThreshold !== undefined,
  };
}

export function withSimilarSuccess(aggregate: SimilarAggregate, result: SimilarResult): SimilarAggregate {
  return {
    ...aggregate,
    total_succeeded: saturatingAdd(aggregate.total_succeeded, 1),
    time_spent: [...aggregate.time_spent, result.processingTimeMs],
  };
}

export function mergeSimilar(a: SimilarAggregate, b: SimilarAggregate): SimilarAggregate {
  return {
    total_received: saturatingAdd(a.total_received, b.total_received),
    total_succeeded: saturatingAdd(a.total_succeeded, b.total_succeeded),
    time_spent: [...a.time_spent, ...b.time_spent],

    filter_with_geo_radius: a.filter_with_geo_radius || b.filter_with_geo_radius,
    filter_with_geo_bounding_box: a.filter_with_geo_bounding_box || b.filter_with_geo_bounding_box,
    filter_sum_of_criteria_terms: saturatingAdd(a.filter_sum_of_criteria_terms, b.filter_sum_of_criteria_terms),
    filter_total_number_of_criteria: saturatingAdd(a.filter_total_number_of_criteria, b.filter_total_number_of_criteria),
    used_syntax: mergeFrequencies(a.used_syntax, b.used_syntax),

    retrieve_vectors: a.retrieve_vectors || b.retrieve_vectors,

    max_limit: Math.max(a.max_limit, b.max_limit),
    max_offset: Math.max(a.max_offset, b.max_offset),

    max_attributes_to_retrieve: Math.max(a.max_attributes_to_retrieve, b.max_attributes_to_retrieve),

    show_ranking_score: a.show_ranking_score || b.show_ranking_score,
    show_ranking_score_details: a.show_ranking_score_details || b.show_ranking_score_details,
    ranking_score_threshold: a.ranking_score_threshold || b.ranking_score_threshold,
  };
}

export function exportSimilar(aggregate: SimilarAggregate): EventProperties {
  const p99 = percentile99(aggregate.time_spent);

  return {
    requests: {
      '99th_response_time': p99 === null ? null : String(Math.trunc(p99)),
      total_succeeded: aggregate.total_succeeded,
      total_failed: saturatingSub(aggregate.total_received, aggregate.total_succeeded),
      total_received: aggregate.total_received,
    },
    filter: {
      with_geoRadius: aggregate.filter_with_geo_radius,
      with_geoBoundingBox: aggregate.filter_with_geo_bounding_box,
      avg_criteria_number: formatRatio(aggregate.filter_sum_of_criteria_terms, aggregate.filter_total_number_of_criteria),
      most_used_syntax: mostUsed(aggregate.used_syntax),
    },
    vector: {
      retrieve_vectors: aggregate.retrieve_vectors,
    },
    pagination: {
      max_limit: aggregate.max_limit,
      max_offset: aggregate.max_offset,
    },
    formatting: {
      max_attributes_to_retrieve: aggregate.max_attributes_to_retrieve,
    },
    scoring: {
      show_ranking_score: aggregate.show_ranking_score,
      show_ranking_score_details: aggregate.show_ranking_score_details,
      ranking_score_threshold: aggregate.ranking_score_threshold,
    },
  };
}

export function createSimilarKind(method: SearchMethod): AggregateKind<SimilarAggregate> {
  return defineAggregateKind<SimilarAggregate>({
    tag: `similar-${method.toLowerCase()}`,
    name: `Similar ${method}`,
    merge: mergeSimilar,
    export: exportSimilar,
  });
}

export const similarGetKind = createSimilarKind('GET');
export const similarPostKind = createSimilarKind('POST');
