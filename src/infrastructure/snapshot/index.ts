export { SnapshotProvider } from './snapshot-provider.js';
export type { SnapshotProviderOptions, SystemFacts } from './snapshot-provider.js';
export { computeInfos } from './infos.js';
export type { Infos } from './infos.js';
