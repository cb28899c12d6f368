import type { BoundAggregate } from './aggregate.js';
import type { EventProperties, TrackRecord } from './types.js';
import { saturatingAdd, unionSorted } from '../statistics.js';

/**
 * Engine-visible wrapper around one bound payload.
 *
 * `first_seen` is the earliest occurrence folded in and never moves
 * forward; `occurrences` counts original events and saturates.
 */
export interface Envelope {
  readonly kind: string;
  readonly aggregate: BoundAggregate;
  readonly first_seen: Date;
  readonly sources: ReadonlySet<string>;
  readonly occurrences: number;
}

export interface EnvelopeOptions {
  sources?: Iterable<string>;
  first_seen?: Date;
  occurrences?: number;
}

/** Wraps a single, freshly observed event. */
export function createEnvelope(aggregate: BoundAggregate, opts: EnvelopeOptions = {}): Envelope {
  return {
    kind: aggregate.tag,
    aggregate,
    first_seen: opts.first_seen ?? new Date(),
    sources: new Set(opts.sources ?? []),
    occurrences: opts.occurrences ?? 1,
  };
}

/**
 * Folds `incoming` into `existing`.
 * Returns `null` if the payloads turn out not to be mergeable.
 */
export function mergeEnvelopes(existing: Envelope, incoming: Envelope): Envelope | null {
  const aggregate = existing.aggregate.tryMerge(incoming.aggregate);
  if (aggregate === null) return null;

  return {
    kind: existing.kind,
    aggregate,
    first_seen: incoming.first_seen < existing.first_seen ? incoming.first_seen : existing.first_seen,
    sources: new Set([...existing.sources, ...incoming.sources]),
    occurrences: saturatingAdd(existing.occurrences, incoming.occurrences),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Exports the payload and back-fills the `user-agent` list and
 * `requests.total_received` when the kind left them unset.
 *
 * Returns `null` if the payload was already exported.
 */
export function exportEnvelope(envelope: Envelope, user_id: string): TrackRecord | null {
  const exported = envelope.aggregate.export();
  if (exported === null) return null;

  const properties: EventProperties = { ...exported };

  if (properties['user-agent'] === undefined || properties['user-agent'] === null) {
    properties['user-agent'] = unionSorted(envelope.sources, []);
  }

  const requests = isRecord(properties['requests']) ? { ...properties['requests'] } : {};
  if (requests['total_received'] === undefined || requests['total_received'] === null) {
    requests['total_received'] = envelope.occurrences;
  }
  properties['requests'] = requests;

  return {
    type: 'track',
    user_id,
    event: envelope.aggregate.name,
    properties,
    timestamp: envelope.first_seen.toISOString(),
  };
}
