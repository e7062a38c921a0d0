/**
 * Command exports
 */

export { statusCommand, type StatusOptions } from './status.js';
export { diffCommand, type DiffOptions } from './diff.js';
export { syncCommand, type SyncOptions } from './sync.js';
