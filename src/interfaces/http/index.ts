export { default as analyticsPlugin } from './analytics-plugin.js';
export type { AnalyticsPluginOptions } from './analytics-plugin.js';
export { default as searchRoutes } from './search-routes.js';
export type { SearchRoutesOptions } from './search-routes.js';
export { extractSources, CLIENT_HEADER, UNKNOWN_SOURCE } from './request-sources.js';
