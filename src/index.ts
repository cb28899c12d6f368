export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
export * from './interfaces/http/index.js';
export { buildServer } from './server.js';
export type { BuildServerOptions } from './server.js';
