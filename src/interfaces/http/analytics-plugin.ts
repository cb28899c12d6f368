import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Analytics } from '../../application/index.js';

export interface AnalyticsPluginOptions {
  analytics: Analytics;
}

/**
 * Fastify plugin that exposes the telemetry facade.
 *
 * - Decorates `fastify.analytics` for the routes.
 * - Stops the aggregator when the server closes.
 */
async function analyticsPlugin(fastify: FastifyInstance, opts: AnalyticsPluginOptions): Promise<void> {
  const { analytics } = opts;

  fastify.decorate('analytics', analytics);

  fastify.addHook('onClose', async () => {
    await analytics.close();
    fastify.log.info('Analytics stopped');
  });
}

export default fp(analyticsPlugin, {
  name: 'analytics',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    analytics: Analytics;
  }
}
