export { AggregationStore } from './aggregation-store.js';
export { Mailbox } from './mailbox.js';
export { AnalyticsActor, ONE_HOUR_MS } from './analytics-actor.js';
export type { ActorState, AnalyticsActorOptions } from './analytics-actor.js';
export {
  AggregatingAnalytics,
  NoopAnalytics,
  createAnalytics,
  MAILBOX_CAPACITY,
  TOTAL_LAUNCH_USER,
  LAUNCHED_EVENT,
} from './analytics.js';
export type { Analytics, AnalyticsDeps, AggregatingAnalyticsOptions } from './analytics.js';
export {
  searchBodySchema,
  searchQueryWithIndexSchema,
  multiSearchBodySchema,
  similarBodySchema,
  searchQueryStringSchema,
  similarQueryStringSchema,
  indexParamsSchema,
} from './search-schema.js';
export type { SearchBody, MultiSearchBody, SimilarBody } from './search-schema.js';
