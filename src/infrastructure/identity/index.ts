export { findInstanceUid, writeInstanceUid, configUidPath } from './instance-uid.js';
export type { IdentityOptions } from './instance-uid.js';
