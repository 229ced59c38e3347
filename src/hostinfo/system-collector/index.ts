/**
 * System Collector Component
 */

export * from './system-collector.js';
