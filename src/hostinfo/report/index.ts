export * from './json.js';
export * from './table.js';
export * from './wrap.js';
