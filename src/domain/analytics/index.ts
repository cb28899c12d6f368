export type {
  EventProperties,
  TrackRecord,
  IdentifyRecord,
  AnalyticsRecord,
  DeliverySink,
  SnapshotSource,
  RuntimeFeatures,
  InstanceStats,
  InstanceStatsSource,
  AggregateDefinition,
} from './types.js';
export { defineAggregateKind } from './aggregate.js';
export type { AggregateKind, BoundAggregate } from './aggregate.js';
export { createEnvelope, mergeEnvelopes, exportEnvelope } from './envelope.js';
export type { Envelope, EnvelopeOptions } from './envelope.js';
