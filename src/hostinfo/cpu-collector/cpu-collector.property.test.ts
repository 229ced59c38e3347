/**
 * Property-Based Tests for cache size selection and cpuinfo parsing
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { parseCpuFeatures, selectCacheLabels } from './cpu-collector.js';
import { parseCacheSize } from '../format/index.js';
import { cacheEntryArbitrary, propertyTestConfig } from '../test-setup.js';

describe('selectCacheLabels properties', () => {
  it('reports, for every level, a label whose size is the maximum seen at that level', () => {
    fc.assert(
      fc.property(fc.array(cacheEntryArbitrary, { maxLength: 12 }), (entries) => {
        const labels = selectCacheLabels(entries);

        for (const key of ['L1', 'L2', 'L3'] as const) {
          const label = labels[key];
          const level = key.slice(1);
          const sizes = entries.filter(entry => entry.level === level).map(entry => parseCacheSize(entry.size) ?? 0);

          if (sizes.length === 0) {
            expect(label).toBe('N/A');
          } else {
            expect(entries.some(entry => entry.level === level && entry.size === label)).toBe(true);
            expect(parseCacheSize(label)).toBe(Math.max(...sizes));
          }
        }
      }),
      propertyTestConfig
    );
  });

  it('does not depend on entries for other levels', () => {
    fc.assert(
      fc.property(
        fc.array(cacheEntryArbitrary, { maxLength: 8 }),
        fc.array(cacheEntryArbitrary.map(entry => ({ ...entry, level: '4' })), { maxLength: 4 }),
        (entries, extra) => {
          expect(selectCacheLabels([...entries, ...extra])).toEqual(selectCacheLabels(entries));
        }
      ),
      propertyTestConfig
    );
  });
});

describe('parseCpuFeatures properties', () => {
  it('returns the flag tokens in source order', () => {
    fc.assert(
      fc.property(
        fc.array(fc.stringMatching(/^[a-z0-9_]{1,12}$/), { minLength: 1, maxLength: 30 }),
        (flags) => {
          const content = `processor\t: 0\nflags\t\t: ${flags.join(' ')}\n`;
          expect(parseCpuFeatures(content)).toEqual(flags);
        }
      ),
      propertyTestConfig
    );
  });
});
