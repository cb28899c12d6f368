import { z } from 'zod';
import {
  DEFAULT_CROP_LENGTH,
  DEFAULT_CROP_MARKER,
  DEFAULT_HIGHLIGHT_POST_TAG,
  DEFAULT_HIGHLIGHT_PRE_TAG,
  DEFAULT_SEARCH_LIMIT,
  DEFAULT_SEARCH_OFFSET,
  DEFAULT_SEMANTIC_RATIO,
} from '../domain/index.js';

/*
 * Request schemas for the search routes.
 *
 * POST bodies are JSON and reject unknown fields. GET query strings are
 * coerced: numbers from text, lists from comma-separated text, booleans
 * from "true"/"false".
 */

const stringList = z.array(z.string());

/** Filter: a string, or an array mixing strings and arrays of strings. */
const filterSchema = z.union([z.string(), z.array(z.union([z.string(), stringList]))]).nullable();

const hybridSchema = z.object({
  semanticRatio: z.number().min(0).max(1).default(DEFAULT_SEMANTIC_RATIO),
  embedder: z.string().optional(),
});

const nonNegativeInt = z.number().int().nonnegative();
const positiveInt = z.number().int().positive();

const searchFields = {
  q: z.string().nullable().transform((v) => v ?? undefined).optional(),
  vector: z.array(z.number()).optional(),
  offset: nonNegativeInt.default(DEFAULT_SEARCH_OFFSET),
  limit: nonNegativeInt.default(DEFAULT_SEARCH_LIMIT),
  page: positiveInt.optional(),
  hitsPerPage: nonNegativeInt.optional(),
  attributesToRetrieve: stringList.optional(),
  retrieveVectors: z.boolean().default(false),
  attributesToCrop: stringList.optional(),
  cropLength: nonNegativeInt.default(DEFAULT_CROP_LENGTH),
  attributesToHighlight: stringList.optional(),
  showMatchesPosition: z.boolean().default(false),
  showRankingScore: z.boolean().default(false),
  showRankingScoreDetails: z.boolean().default(false),
  filter: filterSchema.optional(),
  sort: stringList.optional(),
  distinct: z.string().optional(),
  facets: stringList.optional(),
  highlightPreTag: z.string().default(DEFAULT_HIGHLIGHT_PRE_TAG),
  highlightPostTag: z.string().default(DEFAULT_HIGHLIGHT_POST_TAG),
  cropMarker: z.string().default(DEFAULT_CROP_MARKER),
  matchingStrategy: z.enum(['last', 'all', 'frequency']).default('last'),
  attributesToSearchOn: stringList.optional(),
  hybrid: hybridSchema.optional(),
  rankingScoreThreshold: z.number().min(0).max(1).optional(),
  locales: stringList.optional(),
};

/** Body of `POST /indexes/:indexUid/search`. */
export const searchBodySchema = z.object(searchFields).strict();

export type SearchBody = z.infer<typeof searchBodySchema>;

/** One entry of `POST /multi-search`. */
export const searchQueryWithIndexSchema = z
  .object({
    ...searchFields,
    indexUid: z.string().min(1),
    federationOptions: z.object({ weight: z.number().positive().default(1) }).optional(),
  })
  .strict();

export const multiSearchBodySchema = z
  .object({
    queries: z.array(searchQueryWithIndexSchema),
    federation: z
      .object({
        limit: nonNegativeInt.default(DEFAULT_SEARCH_LIMIT),
        offset: nonNegativeInt.default(DEFAULT_SEARCH_OFFSET),
      })
      .optional(),
  })
  .strict();

export type MultiSearchBody = z.infer<typeof multiSearchBodySchema>;

const similarFields = {
  id: z.union([z.string().min(1), z.number().int()]).transform(String),
  embedder: z.string().optional(),
  offset: nonNegativeInt.default(DEFAULT_SEARCH_OFFSET),
  limit: nonNegativeInt.default(DEFAULT_SEARCH_LIMIT),
  attributesToRetrieve: stringList.optional(),
  retrieveVectors: z.boolean().default(false),
  showRankingScore: z.boolean().default(false),
  showRankingScoreDetails: z.boolean().default(false),
  filter: filterSchema.optional(),
  rankingScoreThreshold: z.number().min(0).max(1).optional(),
};

/** Body of `POST /indexes/:indexUid/similar`. */
export const similarBodySchema = z.object(similarFields).strict();

export type SimilarBody = z.infer<typeof similarBodySchema>;

// ---------------------------------------------------------------------------
// Query-string variants
// ---------------------------------------------------------------------------

const csv = z
  .string()
  .transform((v) => v.split(',').map((s) => s.trim()).filter((s) => s !== ''));

/** Like `csv`, but a comma inside parentheses, as in `_geoPoint(lat,lng):asc`, does not split. */
const sortCsv = z.string().transform((v) => {
  const criteria: string[] = [];
  let depth = 0;
  let current = '';
  for (const ch of v) {
    if (ch === '(') depth++;
    else if (ch === ')') depth = Math.max(0, depth - 1);
    else if (ch === ',' && depth === 0) {
      criteria.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  criteria.push(current);
  return criteria.map((s) => s.trim()).filter((s) => s !== '');
});

const queryBool = z.enum(['true', 'false']).transform((v) => v === 'true');

const queryNonNegativeInt = z.coerce.number().int().nonnegative();

const queryVector = z.string().transform((v, ctx) => {
  const values = v.split(',').map((s) => Number(s.trim()));
  if (values.some((n) => !Number.isFinite(n))) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'vector must be a comma-separated list of numbers' });
    return z.NEVER;
  }
  return values;
});

/**
 * GET filters arrive as text; a JSON array is decoded, anything else is
 * kept as a filter expression.
 */
const queryFilter = z.string().transform((v, ctx) => {
  if (!v.trimStart().startsWith('[')) return v;
  let decoded: unknown;
  try {
    decoded = JSON.parse(v);
  } catch (err: unknown) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `filter is not valid JSON: ${String(err)}` });
    return z.NEVER;
  }
  const parsed = filterSchema.safeParse(decoded);
  if (!parsed.success) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'filter array must contain strings or arrays of strings' });
    return z.NEVER;
  }
  return parsed.data;
});

/** Query string of `GET /indexes/:indexUid/search`. */
export const searchQueryStringSchema = z
  .object({
    q: z.string().optional(),
    vector: queryVector.optional(),
    offset: queryNonNegativeInt.default(DEFAULT_SEARCH_OFFSET),
    limit: queryNonNegativeInt.default(DEFAULT_SEARCH_LIMIT),
    page: z.coerce.number().int().positive().optional(),
    hitsPerPage: queryNonNegativeInt.optional(),
    attributesToRetrieve: csv.optional(),
    retrieveVectors: queryBool.default('false'),
    attributesToCrop: csv.optional(),
    cropLength: queryNonNegativeInt.default(DEFAULT_CROP_LENGTH),
    attributesToHighlight: csv.optional(),
    showMatchesPosition: queryBool.default('false'),
    showRankingScore: queryBool.default('false'),
    showRankingScoreDetails: queryBool.default('false'),
    filter: queryFilter.optional(),
    sort: sortCsv.optional(),
    distinct: z.string().optional(),
    facets: csv.optional(),
    highlightPreTag: z.string().default(DEFAULT_HIGHLIGHT_PRE_TAG),
    highlightPostTag: z.string().default(DEFAULT_HIGHLIGHT_POST_TAG),
    cropMarker: z.string().default(DEFAULT_CROP_MARKER),
    matchingStrategy: z.enum(['last', 'all', 'frequency']).default('last'),
    attributesToSearchOn: csv.optional(),
    hybridEmbedder: z.string().optional(),
    hybridSemanticRatio: z.coerce.number().min(0).max(1).optional(),
    rankingScoreThreshold: z.coerce.number().min(0).max(1).optional(),
    locales: csv.optional(),
  })
  .transform(({ hybridEmbedder, hybridSemanticRatio, ...rest }) => ({
    ...rest,
    hybrid:
      hybridEmbedder !== undefined || hybridSemanticRatio !== undefined
        ? { embedder: hybridEmbedder, semanticRatio: hybridSemanticRatio ?? DEFAULT_SEMANTIC_RATIO }
        : undefined,
  }));

/** Query string of `GET /indexes/:indexUid/similar`. */
export const similarQueryStringSchema = z.object({
  id: z.string().min(1),
  embedder: z.string().optional(),
  offset: queryNonNegativeInt.default(DEFAULT_SEARCH_OFFSET),
  limit: queryNonNegativeInt.default(DEFAULT_SEARCH_LIMIT),
  attributesToRetrieve: csv.optional(),
  retrieveVectors: queryBool.default('false'),
  showRankingScore: queryBool.default('false'),
  showRankingScoreDetails: queryBool.default('false'),
  filter: queryFilter.optional(),
  rankingScoreThreshold: z.coerce.number().min(0).max(1).optional(),
});

export const indexParamsSchema = z.object({
  indexUid: z.string().regex(/^[A-Za-z0-9_-]+$/, 'Index uid may only contain alphanumerics, hyphens and underscores'),
});
