export { loadAnalyticsConfig, DEFAULT_ANALYTICS_CONFIG } from './analytics-config.js';
export type { AnalyticsConfig, LogMode, ServerOptions, TelemetryTransport } from './analytics-config.js';
