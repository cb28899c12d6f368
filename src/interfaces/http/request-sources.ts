import type { FastifyRequest } from 'fastify';

export const CLIENT_HEADER = 'x-search-client';
export const UNKNOWN_SOURCE = 'unknown';

function headerValue(value: string | string[] | undefined): string | undefined {
  if (Array.isArray(value)) return value.length > 0 ? value.join(';') : undefined;
  return value;
}

/**
 * Caller labels for an event.
 *
 * SDKs identify themselves through `X-Search-Client`; other callers fall
 * back to their `User-Agent`. Several labels may be `;`-separated.
 */
export function extractSources(request: Pick<FastifyRequest, 'headers'>): string[] {
  const raw =
    headerValue(request.headers[CLIENT_HEADER])
    ?? headerValue(request.headers['user-agent'])
    ?? UNKNOWN_SOURCE;

  const sources = raw
    .split(';')
    .map((s) => s.trim())
    .filter((s) => s !== '');

  return sources.length > 0 ? sources : [UNKNOWN_SOURCE];
}
