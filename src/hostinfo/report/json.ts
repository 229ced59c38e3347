import type { Snapshot } from '../types/index.js';

export function formatJson(snapshot: Snapshot): string {
  return JSON.stringify(snapshot, null, 2);
}
