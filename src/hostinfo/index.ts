/**
 * hostinfo
 *
 * Point-in-time CPU and host system information, normalized into a Snapshot
 * whose every leaf is a value or the "N/A" sentinel.
 */

export * from './types/index.js';
export * from './errors.js';
export * from './config.js';
export * from './locale.js';
export * from './format/index.js';
export * from './probes/index.js';
export * from './cpu-collector/index.js';
export * from './system-collector/index.js';
export * from './snapshot.js';
export * from './report/index.js';
