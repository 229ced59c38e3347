/**
 * Property-Based Tests for the primitive formatters
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { formatBytes, formatDuration } from './format.js';
import { byteCountArbitrary, propertyTestConfig, secondCountArbitrary } from '../test-setup.js';

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];

describe('formatBytes properties', () => {
  it('picks the largest unit that keeps the scaled value below 1024 and round-trips within 1%', () => {
    fc.assert(
      fc.property(byteCountArbitrary, (value) => {
        const match = /^(\d+\.\d{2}) (B|KB|MB|GB|TB|PB)$/.exec(formatBytes(value));
        expect(match).not.toBeNull();
        if (!match) return;

        const [, amount, unit] = match;
        const exponent = UNITS.indexOf(unit);
        const scaled = value / 1024 ** exponent;

        if (unit !== 'PB') {
          expect(scaled).toBeLessThan(1024);
        }
        if (exponent > 0) {
          expect(scaled).toBeGreaterThanOrEqual(1);
        }
        expect(Math.abs(Number(amount) * 1024 ** exponent - value)).toBeLessThanOrEqual(0.01 * value);
      }),
      propertyTestConfig
    );
  });

  it('returns the sentinel for any negative input', () => {
    fc.assert(
      fc.property(fc.double({ max: -Number.MIN_VALUE, noNaN: true }), (value) => {
        expect(formatBytes(value)).toBe('N/A');
      }),
      propertyTestConfig
    );
  });
});

describe('formatDuration properties', () => {
  it('recombines into the original second count', () => {
    fc.assert(
      fc.property(secondCountArbitrary, (seconds) => {
        const match = /^(?:(\d+)d )?(\d{2}):(\d{2}):(\d{2})$/.exec(formatDuration(seconds));
        expect(match).not.toBeNull();
        if (!match) return;

        const [, days = '0', hours, minutes, secs] = match;
        expect(Number(hours)).toBeLessThan(24);
        expect(Number(minutes)).toBeLessThan(60);
        expect(Number(secs)).toBeLessThan(60);
        expect(Number(days) * 86400 + Number(hours) * 3600 + Number(minutes) * 60 + Number(secs)).toBe(seconds);
      }),
      propertyTestConfig
    );
  });

  it('omits the day part exactly when less than a day has passed', () => {
    fc.assert(
      fc.property(secondCountArbitrary, (seconds) => {
        expect(formatDuration(seconds).includes('d ')).toBe(seconds >= 86400);
      }),
      propertyTestConfig
    );
  });
});
