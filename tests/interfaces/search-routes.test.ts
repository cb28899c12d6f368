import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { Analytics } from '../../src/application/index.js';
import type {
  AggregateKind,
  EventProperties,
  FederatedSearch,
  SearchEngine,
  SearchQuery,
  SimilarQuery,
} from '../../src/domain/index.js';
import { analyticsPlugin, extractSources, searchRoutes } from '../../src/interfaces/http/index.js';
import { makeSearchResult } from '../helpers.js';

interface Published {
  tag: string;
  name: string;
  payload: object;
  properties: EventProperties;
  sources: string[];
}

class RecordingAnalytics implements Analytics {
  readonly instance_uid = 'instance-1';
  readonly published: Published[] = [];
  closed = 0;

  publish<P extends object>(kind: AggregateKind<P>, payload: P, sources: Iterable<string>): boolean {
    this.published.push({
      tag: kind.tag,
      name: kind.name,
      payload,
      properties: kind.export(payload),
      sources: [...sources],
    });
    return true;
  }

  async close(): Promise<void> {
    this.closed++;
  }
}

function fakeEngine() {
  return {
    search: vi.fn(async (_indexUid: string, query: SearchQuery) =>
      makeSearchResult({ query: query.q ?? '', processingTimeMs: 4 }),
    ),
    multiSearch: vi.fn(async (_search: FederatedSearch): Promise<unknown> => ({ results: [] })),
    similar: vi.fn(async (_indexUid: string, query: SimilarQuery) => ({
      id: query.id,
      hits: [],
      processingTimeMs: 2,
    })),
  } satisfies SearchEngine;
}

describe('search routes', () => {
  let app: FastifyInstance;
  let analytics: RecordingAnalytics;
  let engine: ReturnType<typeof fakeEngine>;

  beforeEach(async () => {
    analytics = new RecordingAnalytics();
    engine = fakeEngine();
    app = Fastify({ logger: false });
    await app.register(analyticsPlugin, { analytics });
    await app.register(searchRoutes, { engine });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('serves a GET search and reports it', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/indexes/movies/search?q=hello%20world&limit=5&sort=year:desc',
      headers: { 'x-search-client': 'sdk-js/1.0' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ query: 'hello world', processingTimeMs: 4 });
    expect(engine.search).toHaveBeenCalledWith('movies', expect.objectContaining({ q: 'hello world', limit: 5 }));

    expect(analytics.published).toHaveLength(1);
    const [event] = analytics.published;
    expect(event?.name).toBe('Documents Searched GET');
    expect(event?.sources).toEqual(['sdk-js/1.0']);
    expect(event?.properties).toMatchObject({
      requests: { '99th_response_time': '4', total_received: 1, total_succeeded: 1, total_failed: 0 },
      sort: { with_geoPoint: false },
      q: { max_terms_number: 2 },
    });
  });

  it('serves a POST search with an empty body', async () => {
    const res = await app.inject({ method: 'POST', url: '/indexes/movies/search', payload: {} });

    expect(res.statusCode).toBe(200);
    expect(analytics.published[0]?.name).toBe('Documents Searched POST');
  });

  it('still reports a search the engine failed', async () => {
    engine.search.mockRejectedValueOnce(new Error('index not found'));

    const res = await app.inject({
      method: 'POST',
      url: '/indexes/movies/search',
      payload: { q: 'hello' },
      headers: { 'user-agent': 'curl/8.0' },
    });

    expect(res.statusCode).toBe(500);
    expect(analytics.published).toHaveLength(1);
    expect(analytics.published[0]?.sources).toEqual(['curl/8.0']);
    expect(analytics.published[0]?.properties).toMatchObject({
      requests: { '99th_response_time': null, total_received: 1, total_succeeded: 0, total_failed: 1 },
    });
  });

  it('rejects an unknown search parameter without reporting', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/indexes/movies/search',
      payload: { q: 'hello', colour: 'blue' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: 'Validation failed' });
    expect(engine.search).not.toHaveBeenCalled();
    expect(analytics.published).toHaveLength(0);
  });

  it('rejects an invalid index uid', async () => {
    const res = await app.inject({ method: 'GET', url: '/indexes/mov!es/search' });

    expect(res.statusCode).toBe(400);
    expect(analytics.published).toHaveLength(0);
  });

  it('reports a multi-search', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/multi-search',
      payload: {
        queries: [
          { indexUid: 'movies', q: 'a' },
          { indexUid: 'movies', q: 'b' },
          { indexUid: 'books', q: 'c' },
        ],
      },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ results: [] });
    expect(analytics.published[0]?.name).toBe('Documents Searched by Multi-Search POST');
    expect(analytics.published[0]?.payload).toMatchObject({
      total_received: 1,
      total_succeeded: 1,
      total_distinct_index_count: 2,
      total_single_index: 0,
      total_search_count: 3,
    });
  });

  it('reports GET and POST similar requests separately', async () => {
    const get = await app.inject({ method: 'GET', url: '/indexes/movies/similar?id=42&limit=3' });
    const post = await app.inject({ method: 'POST', url: '/indexes/movies/similar', payload: { id: 42 } });

    expect(get.statusCode).toBe(200);
    expect(post.statusCode).toBe(200);
    expect(post.json()).toEqual({ id: '42', hits: [], processingTimeMs: 2 });
    expect(analytics.published.map((p) => p.name)).toEqual(['Similar GET', 'Similar POST']);
    expect(analytics.published[0]?.payload).toMatchObject({ total_received: 1, total_succeeded: 1, max_limit: 3 });
  });

  it('answers health checks and reports them', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'available' });
    expect(analytics.published[0]?.tag).toBe('health-seen');
    expect(analytics.published[0]?.properties).toEqual({});
  });

  it('closes the facade with the server', async () => {
    const own = new RecordingAnalytics();
    const server = Fastify({ logger: false });
    await server.register(analyticsPlugin, { analytics: own });
    await server.ready();

    await server.close();
    expect(own.closed).toBe(1);
  });
});

describe('extractSources', () => {
  it('prefers the client header over the user agent', () => {
    expect(extractSources({ headers: { 'x-search-client': 'sdk-go', 'user-agent': 'Go-http-client' } })).toEqual([
      'sdk-go',
    ]);
  });

  it('splits several labels', () => {
    expect(extractSources({ headers: { 'x-search-client': 'sdk-js/1.0 ; instant-search/4.2;' } })).toEqual([
      'sdk-js/1.0',
      'instant-search/4.2',
    ]);
  });

  it('falls back to unknown', () => {
    expect(extractSources({ headers: {} })).toEqual(['unknown']);
    expect(extractSources({ headers: { 'user-agent': ' ; ' } })).toEqual(['unknown']);
  });
});
