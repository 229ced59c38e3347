export * from './safe-probe.js';
export * from './node-probes.js';
