export { loadAnalyticsConfig, DEFAULT_ANALYTICS_CONFIG } from './config/index.js';
export type { AnalyticsConfig, ServerOptions, TelemetryTransport } from './config/index.js';
export {
  createDeliverySink,
  createHttpBatchSink,
  createRedisStreamSink,
  toWireMessage,
  TELEMETRY_STREAM_KEY,
} from './delivery/index.js';
export type { SinkFactory, HttpBatchSinkOptions, RedisStreamSinkOptions } from './delivery/index.js';
export { findInstanceUid, writeInstanceUid, configUidPath } from './identity/index.js';
export type { IdentityOptions } from './identity/index.js';
export { SnapshotProvider, computeInfos } from './snapshot/index.js';
export type { SnapshotProviderOptions, SystemFacts, Infos } from './snapshot/index.js';
