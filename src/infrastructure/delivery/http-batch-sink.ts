import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { AnalyticsRecord, DeliverySink } from '../../domain/index.js';

export const DEFAULT_MAX_BATCH_SIZE = 100;
export const DEFAULT_TIMEOUT_MS = 10_000;

export interface HttpBatchSinkOptions {
  endpoint: string;
  write_key: string;
  maxBatchSize?: number;
  timeoutMs?: number;
  /** Injected for tests; defaults to the global `fetch`. */
  fetch?: typeof fetch;
}

/** One message as the collector expects it on the wire. */
interface WireMessage {
  type: AnalyticsRecord['type'];
  messageId: string;
  userId: string;
  event?: string;
  properties?: Record<string, unknown>;
  traits?: Record<string, unknown>;
  context?: Record<string, unknown>;
  timestamp?: string;
}

export function toWireMessage(record: AnalyticsRecord): WireMessage {
  if (record.type === 'track') {
    return {
      type: 'track',
      messageId: randomUUID(),
      userId: record.user_id,
      event: record.event,
      properties: record.properties,
      ...(record.timestamp !== undefined ? { timestamp: record.timestamp } : {}),
    };
  }
  return {
    type: 'identify',
    messageId: randomUUID(),
    userId: record.user_id,
    traits: record.traits,
    ...(record.context !== undefined ? { context: record.context } : {}),
  };
}

/**
 * Sink that batches records and POSTs them to `<endpoint>/v1/batch`.
 *
 * Throws at construction when the endpoint is not a URL or the write key
 * is empty; the caller then runs without telemetry.
 */
export function createHttpBatchSink(opts: HttpBatchSinkOptions, log: Logger): DeliverySink {
  const url = new URL('/v1/batch', opts.endpoint);
  if (opts.write_key.trim() === '') {
    throw new Error('Telemetry write key must not be empty');
  }

  const maxBatchSize = opts.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE;
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const doFetch = opts.fetch ?? fetch;
  const authorization = `Basic ${Buffer.from(`${opts.write_key}:`).toString('base64')}`;

  let buffer: WireMessage[] = [];

  async function flush(): Promise<void> {
    if (buffer.length === 0) return;

    const batch = buffer;
    buffer = [];

    const response = await doFetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: authorization,
      },
      body: JSON.stringify({ batch, sentAt: new Date().toISOString() }),
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Telemetry endpoint returned ${response.status}`);
    }

    log.debug({ count: batch.length }, 'Telemetry batch sent');
  }

  return {
    async push(record: AnalyticsRecord): Promise<void> {
      buffer.push(toWireMessage(record));
      if (buffer.length >= maxBatchSize) {
        await flush();
      }
    },
    flush,
  };
}
