import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { AnalyticsRecord, DeliverySink } from '../../domain/index.js';

export const TELEMETRY_STREAM_KEY = 'telemetry_stream';
export const DEFAULT_STREAM_MAXLEN = 10_000;

export interface RedisStreamSinkOptions {
  streamKey?: string;
  maxLen?: number;
  /** Quit the connection on `close()`. Off when the client is shared. */
  ownsConnection?: boolean;
}

/**
 * Sink that relays records to a local collector through a Redis Stream.
 *
 * Records are buffered and appended on `flush()` in one pipeline. Each
 * entry is a flat field/value list; the record itself is JSON-serialized
 * since stream values must be strings.
 */
export function createRedisStreamSink(
  redis: Redis,
  log: Logger,
  opts: RedisStreamSinkOptions = {},
): DeliverySink {
  const streamKey = opts.streamKey ?? TELEMETRY_STREAM_KEY;
  const maxLen = opts.maxLen ?? DEFAULT_STREAM_MAXLEN;

  let buffer: AnalyticsRecord[] = [];

  return {
    async push(record: AnalyticsRecord): Promise<void> {
      buffer.push(record);
    },

    async flush(): Promise<void> {
      if (buffer.length === 0) return;

      const records = buffer;
      buffer = [];

      const pipeline = redis.pipeline();
      for (const record of records) {
        pipeline.xadd(
          streamKey,
          'MAXLEN', '~', maxLen,
          '*',
          'type', record.type,
          'user_id', record.user_id,
          'record', JSON.stringify(record),
        );
      }

      const results = await pipeline.exec();
      const failed = (results ?? []).find(([err]) => err !== null);
      if (failed) {
        throw failed[0] ?? new Error('Telemetry stream append failed');
      }

      log.debug({ stream: streamKey, count: records.length }, 'Telemetry appended to stream');
    },

    async close(): Promise<void> {
      if (opts.ownsConnection) {
        await redis.quit();
      }
    },
  };
}
