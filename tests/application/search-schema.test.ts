import { describe, it, expect } from 'vitest';
import {
  indexParamsSchema,
  multiSearchBodySchema,
  searchBodySchema,
  searchQueryStringSchema,
  similarBodySchema,
  similarQueryStringSchema,
} from '../../src/application/search-schema.js';
import { exportSearch, fromSearchQuery } from '../../src/domain/index.js';

describe('searchBodySchema', () => {
  it('fills server defaults', () => {
    const parsed = searchBodySchema.parse({ q: 'hello' });
    expect(parsed).toEqual({
      q: 'hello',
      offset: 0,
      limit: 20,
      retrieveVectors: false,
      cropLength: 10,
      showMatchesPosition: false,
      showRankingScore: false,
      showRankingScoreDetails: false,
      highlightPreTag: '<em>',
      highlightPostTag: '</em>',
      cropMarker: '…',
      matchingStrategy: 'last',
    });
  });

  it('accepts nested array filters', () => {
    const parsed = searchBodySchema.parse({ filter: ['a = 1', ['b = 2', 'c = 3']] });
    expect(parsed.filter).toEqual(['a = 1', ['b = 2', 'c = 3']]);
  });

  it('defaults the hybrid semantic ratio', () => {
    expect(searchBodySchema.parse({ hybrid: { embedder: 'default' } }).hybrid).toEqual({
      embedder: 'default',
      semanticRatio: 0.5,
    });
  });

  it('rejects unknown fields and bad values', () => {
    expect(searchBodySchema.safeParse({ unknownField: true }).success).toBe(false);
    expect(searchBodySchema.safeParse({ limit: -1 }).success).toBe(false);
    expect(searchBodySchema.safeParse({ matchingStrategy: 'sometimes' }).success).toBe(false);
  });

  it('treats a null q as absent', () => {
    expect(searchBodySchema.parse({ q: null }).q).toBeUndefined();
  });
});

describe('searchQueryStringSchema', () => {
  it('coerces numbers, lists and booleans', () => {
    const parsed = searchQueryStringSchema.parse({
      q: 'hello',
      limit: '5',
      page: '2',
      attributesToRetrieve: 'title, overview',
      showRankingScore: 'true',
      vector: '0.5,1.5',
    });

    expect(parsed.limit).toBe(5);
    expect(parsed.page).toBe(2);
    expect(parsed.attributesToRetrieve).toEqual(['title', 'overview']);
    expect(parsed.showRankingScore).toBe(true);
    expect(parsed.vector).toEqual([0.5, 1.5]);
    expect(parsed.hybrid).toBeUndefined();
  });

  it('decodes a JSON array filter and keeps an expression as text', () => {
    expect(searchQueryStringSchema.parse({ filter: '["a = 1",["b = 2"]]' }).filter).toEqual(['a = 1', ['b = 2']]);
    expect(searchQueryStringSchema.parse({ filter: 'a = 1 AND b = 2' }).filter).toBe('a = 1 AND b = 2');
  });

  it('rejects a malformed JSON filter', () => {
    expect(searchQueryStringSchema.safeParse({ filter: '[oops' }).success).toBe(false);
  });

  it('builds the hybrid query from its two parameters', () => {
    expect(searchQueryStringSchema.parse({ hybridEmbedder: 'default' }).hybrid).toEqual({
      embedder: 'default',
      semanticRatio: 0.5,
    });
    expect(searchQueryStringSchema.parse({ hybridSemanticRatio: '0.9' }).hybrid).toEqual({
      embedder: undefined,
      semanticRatio: 0.9,
    });
  });

  it('rejects a non-numeric vector', () => {
    expect(searchQueryStringSchema.safeParse({ vector: '1,two' }).success).toBe(false);
  });

  it('keeps a geo point sort criterion in one piece', () => {
    const parsed = searchQueryStringSchema.parse({ sort: '_geoPoint(48.8,2.3):asc,year:desc' });

    expect(parsed.sort).toEqual(['_geoPoint(48.8,2.3):asc', 'year:desc']);
    expect(exportSearch(fromSearchQuery(parsed))).toMatchObject({
      sort: { with_geoPoint: true, avg_criteria_number: '2.00' },
    });
  });
});

describe('multiSearchBodySchema', () => {
  it('requires an index uid per query', () => {
    expect(multiSearchBodySchema.safeParse({ queries: [{ q: 'x' }] }).success).toBe(false);
  });

  it('defaults federation and federation options', () => {
    const parsed = multiSearchBodySchema.parse({
      queries: [{ indexUid: 'movies', federationOptions: {} }],
      federation: {},
    });
    expect(parsed.federation).toEqual({ limit: 20, offset: 0 });
    expect(parsed.queries[0]?.federationOptions).toEqual({ weight: 1 });
  });
});

describe('similar schemas', () => {
  it('turns a numeric id into a string', () => {
    expect(similarBodySchema.parse({ id: 42 }).id).toBe('42');
  });

  it('requires an id in the query string', () => {
    expect(similarQueryStringSchema.safeParse({}).success).toBe(false);
    expect(similarQueryStringSchema.parse({ id: 'doc-1', limit: '3' }).limit).toBe(3);
  });
});

describe('indexParamsSchema', () => {
  it('accepts alphanumerics, hyphens and underscores only', () => {
    expect(indexParamsSchema.safeParse({ indexUid: 'movies_2024-fr' }).success).toBe(true);
    expect(indexParamsSchema.safeParse({ indexUid: 'movies/../etc' }).success).toBe(false);
  });
});
