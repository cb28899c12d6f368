import { describe, it, expect } from 'vitest';
import {
  createEnvelope,
  defineAggregateKind,
  exportEnvelope,
  mergeEnvelopes,
} from '../../src/domain/analytics/index.js';
import { createOccurrenceKind } from '../../src/domain/kinds/occurrence.js';
import { MAX_COUNT } from '../../src/domain/statistics.js';

interface Counter {
  readonly count: number;
}

const counterKind = defineAggregateKind<Counter>({
  tag: 'counter',
  name: 'Counter Seen',
  merge: (a, b) => ({ count: a.count + b.count }),
  export: (p) => ({ count: p.count }),
});

const otherKind = defineAggregateKind<Counter>({
  tag: 'counter',
  name: 'Impostor',
  merge: (a, b) => ({ count: a.count + b.count }),
  export: (p) => ({ count: p.count }),
});

describe('defineAggregateKind', () => {
  it('merges two payloads bound by the same kind', () => {
    const merged = counterKind.bind({ count: 2 }).tryMerge(counterKind.bind({ count: 3 }));
    expect(merged?.export()).toEqual({ count: 5 });
  });

  it('refuses a payload bound by another kind, even with the same tag', () => {
    const merged = counterKind.bind({ count: 2 }).tryMerge(otherKind.bind({ count: 3 }));
    expect(merged).toBeNull();
  });

  it('exports only once', () => {
    const bound = counterKind.bind({ count: 1 });
    expect(bound.export()).toEqual({ count: 1 });
    expect(bound.export()).toBeNull();
  });

  it('refuses to merge an exported payload', () => {
    const bound = counterKind.bind({ count: 1 });
    bound.export();
    expect(counterKind.bind({ count: 1 }).tryMerge(bound)).toBeNull();
  });

  it('carries the kind name and tag', () => {
    const bound = counterKind.bind({ count: 1 });
    expect(bound.tag).toBe('counter');
    expect(bound.name).toBe('Counter Seen');
  });
});

describe('mergeEnvelopes', () => {
  const early = new Date('2026-03-01T10:00:00.000Z');
  const late = new Date('2026-03-01T10:30:00.000Z');

  it('keeps the earliest first_seen whichever side it is on', () => {
    const a = createEnvelope(counterKind.bind({ count: 1 }), { first_seen: late });
    const b = createEnvelope(counterKind.bind({ count: 1 }), { first_seen: early });
    expect(mergeEnvelopes(a, b)?.first_seen).toEqual(early);

    const c = createEnvelope(counterKind.bind({ count: 1 }), { first_seen: early });
    const d = createEnvelope(counterKind.bind({ count: 1 }), { first_seen: late });
    expect(mergeEnvelopes(c, d)?.first_seen).toEqual(early);
  });

  it('unions sources and adds occurrences', () => {
    const a = createEnvelope(counterKind.bind({ count: 1 }), { sources: ['curl/8.0', 'sdk-js'] });
    const b = createEnvelope(counterKind.bind({ count: 1 }), { sources: ['sdk-js', 'sdk-py'] });
    const merged = mergeEnvelopes(a, b);
    expect(merged?.occurrences).toBe(2);
    expect([...(merged?.sources ?? [])].sort()).toEqual(['curl/8.0', 'sdk-js', 'sdk-py']);
  });

  it('saturates the occurrence count', () => {
    const a = createEnvelope(counterKind.bind({ count: 1 }), { occurrences: MAX_COUNT });
    const b = createEnvelope(counterKind.bind({ count: 1 }));
    expect(mergeEnvelopes(a, b)?.occurrences).toBe(MAX_COUNT);
  });

  it('returns null on a kind mismatch', () => {
    const a = createEnvelope(counterKind.bind({ count: 1 }));
    const b = createEnvelope(otherKind.bind({ count: 1 }));
    expect(mergeEnvelopes(a, b)).toBeNull();
  });
});

describe('exportEnvelope', () => {
  const healthKind = createOccurrenceKind('health-seen', 'Health Seen');
  const firstSeen = new Date('2026-03-01T10:00:00.000Z');

  it('back-fills user-agent and requests.total_received for an empty export', () => {
    const envelope = createEnvelope(healthKind.bind({}), {
      sources: ['sdk-py', 'curl/8.0'],
      first_seen: firstSeen,
      occurrences: 7,
    });

    expect(exportEnvelope(envelope, 'instance-1')).toEqual({
      type: 'track',
      user_id: 'instance-1',
      event: 'Health Seen',
      properties: {
        'user-agent': ['curl/8.0', 'sdk-py'],
        requests: { total_received: 7 },
      },
      timestamp: '2026-03-01T10:00:00.000Z',
    });
  });

  it('keeps values the kind already populated', () => {
    const kind = defineAggregateKind<Counter>({
      tag: 'explicit',
      name: 'Explicit',
      merge: (a, b) => ({ count: a.count + b.count }),
      export: (p) => ({ 'user-agent': ['own'], requests: { total_received: p.count, total_failed: 0 } }),
    });
    const envelope = createEnvelope(kind.bind({ count: 42 }), { sources: ['curl/8.0'], occurrences: 3 });

    expect(exportEnvelope(envelope, 'instance-1')?.properties).toEqual({
      'user-agent': ['own'],
      requests: { total_received: 42, total_failed: 0 },
    });
  });

  it('back-fills fields the kind set to null', () => {
    const kind = defineAggregateKind<Counter>({
      tag: 'nulls',
      name: 'Nulls',
      merge: (a, b) => ({ count: a.count + b.count }),
      export: () => ({ 'user-agent': null, requests: { total_received: null } }),
    });
    const envelope = createEnvelope(kind.bind({ count: 1 }), { sources: ['sdk-js'], occurrences: 2 });

    expect(exportEnvelope(envelope, 'instance-1')?.properties).toEqual({
      'user-agent': ['sdk-js'],
      requests: { total_received: 2 },
    });
  });

  it('returns null once the payload was drained', () => {
    const envelope = createEnvelope(healthKind.bind({}));
    exportEnvelope(envelope, 'instance-1');
    expect(exportEnvelope(envelope, 'instance-1')).toBeNull();
  });
});
