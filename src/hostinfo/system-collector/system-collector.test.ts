/**
 * System Collector Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { SystemCollector, collectSystem, deriveMemory, deriveUptime } from './system-collector.js';
import {
  FIXED_NOW_MS,
  FIXED_UPTIME_SECONDS,
  createFailingProbes,
  createFakeProbes,
  fixedClock,
  unavailable,
} from '../test-setup.js';
import type { PlatformProbes } from '../types/index.js';

vi.mock('../../logging/subsystem.js', () => ({
  createSubsystemLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

const UNKNOWN_MEMORY = {
  total_bytes: 'N/A',
  available_bytes: 'N/A',
  total_human: 'N/A',
  available_human: 'N/A',
};

function collector(probes: Partial<PlatformProbes> = {}, dayLabel?: string): SystemCollector {
  return new SystemCollector({ probes: createFakeProbes(probes), clock: fixedClock, dayLabel });
}

describe('SystemCollector', () => {
  it('assembles a complete record', async () => {
    await expect(collector().collect()).resolves.toEqual({
      os: { name: 'Linux', release: '6.1.0', version: '#1 SMP' },
      hostname: 'test-host',
      uptime_seconds: FIXED_UPTIME_SECONDS,
      uptime_human: '1d 02:03:04',
      memory: {
        total_bytes: 17179869184,
        available_bytes: 8589934592,
        total_human: '16.00 GB',
        available_human: '8.00 GB',
      },
    });
  });

  describe('OS identity', () => {
    it('falls back field by field when the unified probe leaves gaps', async () => {
      const system = collector({ osIdentity: async () => ({ name: '', release: '6.2.0' }) });
      await expect(system.getOsIdentity()).resolves.toEqual({
        name: 'linux',
        release: '6.2.0',
        version: 'fallback-build',
      });
    });

    it('uses the fallbacks when the unified probe fails', async () => {
      const system = collector({ osIdentity: unavailable('osIdentity') });
      await expect(system.getOsIdentity()).resolves.toEqual({
        name: 'linux',
        release: '6.1.0-fallback',
        version: 'fallback-build',
      });
    });

    it('defaults each field to the sentinel when every source is empty', async () => {
      const system = collector({
        osIdentity: async () => ({ name: 'Linux' }),
        osFallbacks: {
          name: unavailable('osName'),
          release: async () => '',
          version: unavailable('osVersion'),
        },
      });
      await expect(system.getOsIdentity()).resolves.toEqual({ name: 'Linux', release: 'N/A', version: 'N/A' });
    });
  });

  describe('hostname', () => {
    it('returns the sentinel for an empty or failing probe', async () => {
      await expect(collector({ hostname: async () => '' }).getHostname()).resolves.toBe('N/A');
      await expect(collector({ hostname: unavailable('hostname') }).getHostname()).resolves.toBe('N/A');
    });
  });

  describe('uptime', () => {
    it('uses the localized day label', async () => {
      await expect(collector({}, 'д').getUptime()).resolves.toEqual({
        uptime_seconds: FIXED_UPTIME_SECONDS,
        uptime_human: '1д 02:03:04',
      });
    });

    it('clamps a boot time in the future to zero', async () => {
      const system = collector({ bootTime: async () => FIXED_NOW_MS / 1000 + 60 });
      await expect(system.getUptime()).resolves.toEqual({ uptime_seconds: 0, uptime_human: '00:00:00' });
    });

    it('sets both fields to the sentinel together when the boot time is unavailable', async () => {
      const both = { uptime_seconds: 'N/A', uptime_human: 'N/A' };
      await expect(collector({ bootTime: unavailable('bootTime') }).getUptime()).resolves.toEqual(both);
      await expect(collector({ bootTime: async () => Number.NaN }).getUptime()).resolves.toEqual(both);
    });
  });

  describe('memory', () => {
    it('sets all four fields to the sentinel when the probe fails, leaving other fields intact', async () => {
      const record = await collector({ virtualMemory: unavailable('virtualMemory') }).collect();

      expect(record.memory).toEqual(UNKNOWN_MEMORY);
      expect(record.hostname).toBe('test-host');
      expect(record.uptime_seconds).toBe(FIXED_UPTIME_SECONDS);
    });

    it('sets all four fields to the sentinel when the probe returns nothing', async () => {
      await expect(collector({ virtualMemory: async () => null }).getMemory()).resolves.toEqual(UNKNOWN_MEMORY);
    });
  });

  it('fills every field with the sentinel when all probes fail', async () => {
    await expect(collectSystem({ probes: createFailingProbes(), clock: fixedClock })).resolves.toEqual({
      os: { name: 'N/A', release: 'N/A', version: 'N/A' },
      hostname: 'N/A',
      uptime_seconds: 'N/A',
      uptime_human: 'N/A',
      memory: UNKNOWN_MEMORY,
    });
  });
});

describe('deriveUptime', () => {
  it('truncates fractional seconds', () => {
    expect(deriveUptime(1000.75, 1_000_000 * 1000)).toEqual({ uptime_seconds: 998999, uptime_human: '11d 13:29:59' });
  });

  it('rejects non-numeric boot times', () => {
    expect(deriveUptime('1700000000', FIXED_NOW_MS)).toEqual({ uptime_seconds: 'N/A', uptime_human: 'N/A' });
  });
});

describe('deriveMemory', () => {
  it('requires both figures', () => {
    expect(deriveMemory({ total: 1024 })).toEqual(UNKNOWN_MEMORY);
    expect(deriveMemory({ available: 1024 })).toEqual(UNKNOWN_MEMORY);
  });

  it('rejects negative figures', () => {
    expect(deriveMemory({ total: 1024, available: -1 })).toEqual(UNKNOWN_MEMORY);
  });

  it('truncates fractional byte counts before formatting', () => {
    expect(deriveMemory({ total: 1536.9, available: 0 })).toEqual({
      total_bytes: 1536,
      available_bytes: 0,
      total_human: '1.50 KB',
      available_human: '0.00 B',
    });
  });
});
