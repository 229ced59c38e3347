/**
 * CPU Collector Component
 *
 * Brand, architecture, core counts, frequency, utilization, feature flags and
 * cache sizes, each probed independently.
 */

export * from './cpu-collector.js';
