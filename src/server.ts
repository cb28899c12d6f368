import Fastify from 'fastify';
import { pino } from 'pino';
import type { Logger } from 'pino';
import { createAnalytics } from './application/index.js';
import type { Analytics } from './application/index.js';
import type { InstanceStatsSource, SearchEngine } from './domain/index.js';
import { loadAnalyticsConfig } from './infrastructure/index.js';
import type { AnalyticsConfig } from './infrastructure/index.js';
import { analyticsPlugin, searchRoutes } from './interfaces/http/index.js';

export interface BuildServerOptions {
  engine: SearchEngine;
  /** Instance statistics reported in the hourly snapshot. */
  stats: InstanceStatsSource;
  /** Prebuilt facade; when absent one is created from `config`. */
  analytics?: Analytics;
  config?: AnalyticsConfig;
  logger?: Logger;
}

/**
 * Assembles the Fastify app.
 *
 * Order:
 * 1) Logger and configuration
 * 2) Telemetry (never fails startup)
 * 3) Routes
 *
 * The caller owns `listen()` and `close()`; closing the server stops the
 * aggregator.
 */
export async function buildServer(opts: BuildServerOptions) {
  const config = opts.config ?? loadAnalyticsConfig();
  const log = opts.logger ?? pino({ level: config.server.log_level });

  const fastify = Fastify({ loggerInstance: log });

  const analytics = opts.analytics ?? (await createAnalytics(config, { log, stats: opts.stats }));

  await fastify.register(analyticsPlugin, { analytics });
  await fastify.register(searchRoutes, { engine: opts.engine });

  return fastify;
}
