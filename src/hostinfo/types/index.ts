/**
 * hostinfo - Type Definitions
 */

export * from './snapshot.js';
export * from './platform-probes.js';
