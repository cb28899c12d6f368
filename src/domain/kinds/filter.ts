/** Separator between filter criteria: `AND ` or ` OR`. */
const CRITERIA_SEPARATOR = /AND | OR/;

export type FilterSyntax = 'string' | 'array' | 'mixed' | 'none';

export interface FilterFacts {
  readonly syntax: FilterSyntax;
  readonly withGeoRadius: boolean;
  readonly withGeoBoundingBox: boolean;
  /** Number of criteria terms in the serialised filter. */
  readonly criteriaTerms: number;
}

function syntaxOf(filter: unknown): FilterSyntax {
  if (typeof filter === 'string') return 'string';
  if (Array.isArray(filter)) {
    const mixed = filter.some((value) => CRITERIA_SEPARATOR.test(JSON.stringify(value) ?? ''));
    return mixed ? 'mixed' : 'array';
  }
  return 'none';
}

/**
 * Extracts the usage facts of a filter expression.
 * Works on the JSON form of the filter, so string filters keep their quotes.
 */
export function analyzeFilter(filter: unknown): FilterFacts {
  const serialized = JSON.stringify(filter) ?? '';
  return {
    syntax: syntaxOf(filter),
    withGeoRadius: serialized.includes('_geoRadius('),
    withGeoBoundingBox: serialized.includes('_geoBoundingBox('),
    criteriaTerms: serialized.split(CRITERIA_SEPARATOR).length,
  };
}

/** `null` is treated the same as an absent filter. */
export function hasFilter(filter: unknown): boolean {
  return filter !== undefined && filter !== null;
}
