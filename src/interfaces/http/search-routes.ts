import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ZodError } from 'zod';
import {
  indexParamsSchema,
  multiSearchBodySchema,
  searchBodySchema,
  searchQueryStringSchema,
  similarBodySchema,
  similarQueryStringSchema,
} from '../../application/index.js';
import {
  fromFederatedSearch,
  fromSearchQuery,
  fromSimilarQuery,
  healthSeenKind,
  multiSearchKind,
  searchGetKind,
  searchPostKind,
  similarGetKind,
  similarPostKind,
  withMultiSearchSuccess,
  withSearchSuccess,
  withSimilarSuccess,
} from '../../domain/index.js';
import type {
  AggregateKind,
  SearchAggregate,
  SearchEngine,
  SearchQuery,
  SimilarAggregate,
  SimilarQuery,
} from '../../domain/index.js';
import { extractSources } from './request-sources.js';

export interface SearchRoutesOptions {
  engine: SearchEngine;
}

function validationFailed(reply: FastifyReply, error: ZodError): FastifyReply {
  return reply.status(400).send({
    error: 'Validation failed',
    issues: error.issues,
  });
}

/**
 * Search API routes. Each one reports a usage event, whether the engine
 * call succeeds or not.
 *
 * GET|POST /indexes/:indexUid/search  : single-index search
 * POST     /multi-search              : several queries, optionally federated
 * GET|POST /indexes/:indexUid/similar : documents similar to a given one
 * GET      /health                    : liveness
 */
async function searchRoutes(fastify: FastifyInstance, opts: SearchRoutesOptions): Promise<void> {
  const { engine } = opts;

  async function search(
    request: FastifyRequest,
    kind: AggregateKind<SearchAggregate>,
    indexUid: string,
    query: SearchQuery,
  ) {
    let aggregate = fromSearchQuery(query);
    try {
      const result = await engine.search(indexUid, query);
      aggregate = withSearchSuccess(aggregate, result);
      return result;
    } finally {
      fastify.analytics.publish(kind, aggregate, extractSources(request));
    }
  }

  async function similar(
    request: FastifyRequest,
    kind: AggregateKind<SimilarAggregate>,
    indexUid: string,
    query: SimilarQuery,
  ) {
    let aggregate = fromSimilarQuery(query);
    try {
      const result = await engine.similar(indexUid, query);
      aggregate = withSimilarSuccess(aggregate, result);
      return result;
    } finally {
      fastify.analytics.publish(kind, aggregate, extractSources(request));
    }
  }

  fastify.get('/indexes/:indexUid/search', async (request: FastifyRequest, reply: FastifyReply) => {
    const params = indexParamsSchema.safeParse(request.params);
    if (!params.success) return validationFailed(reply, params.error);

    const query = searchQueryStringSchema.safeParse(request.query);
    if (!query.success) return validationFailed(reply, query.error);

    const result = await search(request, searchGetKind, params.data.indexUid, query.data);
    return reply.status(200).send(result);
  });

  fastify.post('/indexes/:indexUid/search', async (request: FastifyRequest, reply: FastifyReply) => {
    const params = indexParamsSchema.safeParse(request.params);
    if (!params.success) return validationFailed(reply, params.error);

    const body = searchBodySchema.safeParse(request.body ?? {});
    if (!body.success) return validationFailed(reply, body.error);

    const result = await search(request, searchPostKind, params.data.indexUid, body.data);
    return reply.status(200).send(result);
  });

  fastify.post('/multi-search', async (request: FastifyRequest, reply: FastifyReply) => {
    const body = multiSearchBodySchema.safeParse(request.body);
    if (!body.success) return validationFailed(reply, body.error);

    let aggregate = fromFederatedSearch(body.data);
    let result: unknown;
    try {
      result = await engine.multiSearch(body.data);
      aggregate = withMultiSearchSuccess(aggregate);
    } finally {
      fastify.analytics.publish(multiSearchKind, aggregate, extractSources(request));
    }
    return reply.status(200).send(result);
  });

  fastify.get('/indexes/:indexUid/similar', async (request: FastifyRequest, reply: FastifyReply) => {
    const params = indexParamsSchema.safeParse(request.params);
    if (!params.success) return validationFailed(reply, params.error);

    const query = similarQueryStringSchema.safeParse(request.query);
    if (!query.success) return validationFailed(reply, query.error);

    const result = await similar(request, similarGetKind, params.data.indexUid, query.data);
    return reply.status(200).send(result);
  });

  fastify.post('/indexes/:indexUid/similar', async (request: FastifyRequest, reply: FastifyReply) => {
    const params = indexParamsSchema.safeParse(request.params);
    if (!params.success) return validationFailed(reply, params.error);

    const body = similarBodySchema.safeParse(request.body);
    if (!body.success) return validationFailed(reply, body.error);

    const result = await similar(request, similarPostKind, params.data.indexUid, body.data);
    return reply.status(200).send(result);
  });

  fastify.get('/health', async (request: FastifyRequest, reply: FastifyReply) => {
    fastify.analytics.publish(healthSeenKind, {}, extractSources(request));
    return reply.status(200).send({ status: 'available' });
  });
}

export default fp(searchRoutes, {
  name: 'search-routes',
  dependencies: ['analytics'],
  fastify: '5.x',
});
