import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { DeliverySink } from '../../domain/index.js';
import type { AnalyticsConfig } from '../config/index.js';
import { createHttpBatchSink } from './http-batch-sink.js';
import { createRedisStreamSink } from './redis-stream-sink.js';

export { createHttpBatchSink, toWireMessage, DEFAULT_MAX_BATCH_SIZE, DEFAULT_TIMEOUT_MS } from './http-batch-sink.js';
export type { HttpBatchSinkOptions } from './http-batch-sink.js';
export { createRedisStreamSink, TELEMETRY_STREAM_KEY, DEFAULT_STREAM_MAXLEN } from './redis-stream-sink.js';
export type { RedisStreamSinkOptions } from './redis-stream-sink.js';

export type SinkFactory = (config: AnalyticsConfig, log: Logger) => DeliverySink;

/**
 * Builds the sink selected by `config.transport`.
 *
 * The Redis client connects lazily, on the first flush.
 */
export const createDeliverySink: SinkFactory = (config, log) => {
  if (config.transport === 'redis') {
    const redis = new Redis(config.redis_url, {
      lazyConnect: true,
      maxRetriesPerRequest: 1,
      enableReadyCheck: true,
    });
    redis.on('error', (err: unknown) => {
      log.debug({ err }, 'Telemetry Redis connection error');
    });
    return createRedisStreamSink(redis, log, { ownsConnection: true });
  }

  return createHttpBatchSink({ endpoint: config.endpoint, write_key: config.write_key }, log);
};
