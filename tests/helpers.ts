import { pino } from 'pino';
import type { Logger } from 'pino';
import {
  DEFAULT_CROP_LENGTH,
  DEFAULT_CROP_MARKER,
  DEFAULT_HIGHLIGHT_POST_TAG,
  DEFAULT_HIGHLIGHT_PRE_TAG,
  DEFAULT_SEARCH_LIMIT,
  DEFAULT_SEARCH_OFFSET,
} from '../src/domain/index.js';
import type {
  AnalyticsRecord,
  DeliverySink,
  SearchQuery,
  SearchResult,
  SimilarQuery,
  TrackRecord,
} from '../src/domain/index.js';

export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/** A search query with every server default filled in. */
export function makeSearchQuery(overrides: Partial<SearchQuery> = {}): SearchQuery {
  return {
    offset: DEFAULT_SEARCH_OFFSET,
    limit: DEFAULT_SEARCH_LIMIT,
    retrieveVectors: false,
    cropLength: DEFAULT_CROP_LENGTH,
    showMatchesPosition: false,
    showRankingScore: false,
    showRankingScoreDetails: false,
    highlightPreTag: DEFAULT_HIGHLIGHT_PRE_TAG,
    highlightPostTag: DEFAULT_HIGHLIGHT_POST_TAG,
    cropMarker: DEFAULT_CROP_MARKER,
    matchingStrategy: 'last',
    ...overrides,
  };
}

export function makeSimilarQuery(overrides: Partial<SimilarQuery> = {}): SimilarQuery {
  return {
    id: 'doc-1',
    offset: DEFAULT_SEARCH_OFFSET,
    limit: DEFAULT_SEARCH_LIMIT,
    retrieveVectors: false,
    showRankingScore: false,
    showRankingScoreDetails: false,
    ...overrides,
  };
}

export function makeSearchResult(overrides: Partial<SearchResult> = {}): SearchResult {
  return {
    hits: [],
    query: '',
    processingTimeMs: 1,
    degraded: false,
    usedNegativeOperator: false,
    ...overrides,
  };
}

/** In-memory sink that keeps everything pushed, and counts flushes. */
export class RecordingSink implements DeliverySink {
  readonly records: AnalyticsRecord[] = [];
  flushes = 0;
  failPush = false;
  failFlush = false;

  async push(record: AnalyticsRecord): Promise<void> {
    if (this.failPush) throw new Error('push refused');
    this.records.push(record);
  }

  async flush(): Promise<void> {
    this.flushes++;
    if (this.failFlush) throw new Error('flush refused');
  }

  tracks(): TrackRecord[] {
    return this.records.filter((r): r is TrackRecord => r.type === 'track');
  }
}
