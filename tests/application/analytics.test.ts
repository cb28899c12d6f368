import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, mkdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  AggregatingAnalytics,
  NoopAnalytics,
  createAnalytics,
  LAUNCHED_EVENT,
  TOTAL_LAUNCH_USER,
} from '../../src/application/analytics.js';
import { healthSeenKind } from '../../src/domain/kinds/occurrence.js';
import type { InstanceStatsSource } from '../../src/domain/analytics/index.js';
import { DEFAULT_ANALYTICS_CONFIG } from '../../src/infrastructure/config/index.js';
import type { AnalyticsConfig } from '../../src/infrastructure/config/index.js';
import { RecordingSink, silentLogger } from '../helpers.js';

const EXISTING_UID = '5f0c7a4e-2b7d-4c1e-9a3f-8d6b2e1c0f47';
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

const stats: InstanceStatsSource = {
  collect: async () => ({
    database_size: 0,
    indexes: [],
    features: {
      vector_store: false,
      metrics: false,
      logs_route: false,
      edit_documents_by_function: false,
      contains_filter: false,
    },
  }),
};

describe('createAnalytics', () => {
  let root: string;
  let dbPath: string;
  let configDir: string;
  let config: AnalyticsConfig;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'analytics-test-'));
    dbPath = join(root, 'data.ms');
    configDir = join(root, 'config');
    await mkdir(dbPath);
    config = {
      ...DEFAULT_ANALYTICS_CONFIG,
      server: { ...DEFAULT_ANALYTICS_CONFIG.server, db_path: dbPath },
    };
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('returns a no-op facade when analytics is disabled', async () => {
    const analytics = await createAnalytics(
      { ...config, no_analytics: true },
      { log: silentLogger(), stats, identity: { configDir } },
    );

    expect(analytics).toBeInstanceOf(NoopAnalytics);
    expect(analytics.instance_uid).toBeNull();
    expect(analytics.publish(healthSeenKind, {}, ['sdk-js'])).toBe(false);
  });

  it('announces the first launch and persists a fresh uid', async () => {
    const sink = new RecordingSink();
    const analytics = await createAnalytics(config, {
      log: silentLogger(),
      stats,
      identity: { configDir },
      sinkFactory: () => sink,
    });

    expect(analytics).toBeInstanceOf(AggregatingAnalytics);
    expect(analytics.instance_uid).toMatch(UUID_PATTERN);
    expect(sink.records).toEqual([
      { type: 'track', user_id: TOTAL_LAUNCH_USER, event: LAUNCHED_EVENT, properties: {} },
      { type: 'track', user_id: analytics.instance_uid, event: LAUNCHED_EVENT, properties: {} },
    ]);
    // Only the shared launch is flushed right away.
    expect(sink.flushes).toBe(1);
    expect(await readFile(join(dbPath, 'instance-uid'), 'utf-8')).toBe(analytics.instance_uid);

    await analytics.close();
  });

  it('reuses a persisted uid and skips the launch events', async () => {
    await writeFile(join(dbPath, 'instance-uid'), EXISTING_UID, 'utf-8');
    const sink = new RecordingSink();

    const analytics = await createAnalytics(config, {
      log: silentLogger(),
      stats,
      identity: { configDir },
      sinkFactory: () => sink,
    });

    expect(analytics.instance_uid).toBe(EXISTING_UID);
    expect(sink.records).toEqual([]);
    expect(analytics.publish(healthSeenKind, {}, ['sdk-js'])).toBe(true);

    await analytics.close();
  });

  it('falls back to a no-op facade when the sink cannot be built', async () => {
    const analytics = await createAnalytics(config, {
      log: silentLogger(),
      stats,
      identity: { configDir },
      sinkFactory: () => {
        throw new Error('bad endpoint');
      },
    });

    expect(analytics).toBeInstanceOf(NoopAnalytics);
    expect(analytics.instance_uid).toMatch(UUID_PATTERN);
    expect(analytics.publish(healthSeenKind, {}, ['sdk-js'])).toBe(false);
  });

  it('stops the actor when the host signal aborts', async () => {
    const controller = new AbortController();
    const sink = new RecordingSink();
    const analytics = await createAnalytics(config, {
      log: silentLogger(),
      stats,
      identity: { configDir },
      sinkFactory: () => sink,
      signal: controller.signal,
    });

    controller.abort();
    await expect(analytics.close()).resolves.toBeUndefined();
  });

  it('detaches from the host signal once closed', async () => {
    const controller = new AbortController();
    const removeListener = vi.spyOn(controller.signal, 'removeEventListener');
    const analytics = await createAnalytics(config, {
      log: silentLogger(),
      stats,
      identity: { configDir },
      sinkFactory: () => new RecordingSink(),
      signal: controller.signal,
    });

    await analytics.close();

    expect(removeListener).toHaveBeenCalledWith('abort', expect.any(Function));
  });
});
