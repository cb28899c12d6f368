import { defineAggregateKind } from '../analytics/aggregate.js';
import type { AggregateKind } from '../analytics/aggregate.js';

/** Payload of a kind that only counts how often it was seen. */
export type OccurrenceAggregate = Readonly<Record<string, never>>;

/**
 * Defines a kind with no fields of its own.
 *
 * Its export is empty: the `user-agent` list and `requests.total_received`
 * come entirely from the envelope back-fill.
 */
export function createOccurrenceKind(tag: string, name: string): AggregateKind<OccurrenceAggregate> {
  return defineAggregateKind<OccurrenceAggregate>({
    tag,
    name,
    merge: () => ({}),
    export: () => ({}),
  });
}

export const healthSeenKind = createOccurrenceKind('health-seen', 'Health Seen');
