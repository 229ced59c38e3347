/**
 * Shared test utilities: fake probe sets, cpuinfo/cache fixtures on disk and
 * fast-check generators.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as fc from 'fast-check';
import { ProbeUnavailableError } from './errors.js';
import type { PlatformProbes, Snapshot } from './types/index.js';

/** 2024-01-15T12:00:00Z */
export const FIXED_NOW_MS = Date.UTC(2024, 0, 15, 12, 0, 0);

/** 1 day, 2 hours, 3 minutes, 4 seconds */
export const FIXED_UPTIME_SECONDS = 93784;

export const fixedClock = (): number => FIXED_NOW_MS;

export function createFakeProbes(overrides: Partial<PlatformProbes> = {}): PlatformProbes {
  return {
    processorName: async () => 'Example CPU X9',
    machine: async () => 'x86_64',
    physicalCores: async () => 8,
    logicalProcessors: async () => 16,
    cpuFrequency: async () => ({ current: 3400.456, min: 800, max: 5100 }),
    cpuUsage: async () => 12.34,
    bootTime: async () => FIXED_NOW_MS / 1000 - FIXED_UPTIME_SECONDS,
    virtualMemory: async () => ({ total: 17179869184, available: 8589934592 }),
    hostname: async () => 'test-host',
    osIdentity: async () => ({ name: 'Linux', release: '6.1.0', version: '#1 SMP' }),
    osFallbacks: {
      name: async () => 'linux',
      release: async () => '6.1.0-fallback',
      version: async () => 'fallback-build',
    },
    ...overrides,
  };
}

/** A fully populated snapshot as the fake probes would produce it */
export const SAMPLE_SNAPSHOT: Snapshot = {
  cpu: {
    brand: 'Example CPU X9',
    architecture: 'x86_64',
    physical_cores: 8,
    logical_processors: 16,
    frequency: { current: 3400.46, min: 800, max: 5100 },
    usage_percent: 12.3,
    features: ['fpu', 'vme', 'sse2'],
    cache: { L1: '32K', L2: '1M', L3: '16M' },
  },
  system: {
    os: { name: 'Linux', release: '6.1.0', version: '#1 SMP' },
    hostname: 'test-host',
    uptime_seconds: 93784,
    uptime_human: '1d 02:03:04',
    memory: {
      total_bytes: 17179869184,
      available_bytes: 8589934592,
      total_human: '16.00 GB',
      available_human: '8.00 GB',
    },
  },
};

export function unavailable(probe: string): () => Promise<never> {
  return async () => {
    throw new ProbeUnavailableError(probe, 'not available in test');
  };
}

/** Every probe rejects */
export function createFailingProbes(): PlatformProbes {
  return {
    processorName: unavailable('processorName'),
    machine: unavailable('machine'),
    physicalCores: unavailable('physicalCores'),
    logicalProcessors: unavailable('logicalProcessors'),
    cpuFrequency: unavailable('cpuFrequency'),
    cpuUsage: unavailable('cpuUsage'),
    bootTime: unavailable('bootTime'),
    virtualMemory: unavailable('virtualMemory'),
    hostname: unavailable('hostname'),
    osIdentity: unavailable('osIdentity'),
    osFallbacks: {
      name: unavailable('osName'),
      release: unavailable('osRelease'),
      version: unavailable('osVersion'),
    },
  };
}

export interface CacheIndexFixture {
  level?: string;
  size?: string;
}

/**
 * Temporary directory holding a cpuinfo file and a cache topology tree
 */
export class HostFixture {
  readonly root: string;
  readonly cpuinfoPath: string;
  readonly cacheDir: string;

  constructor() {
    this.root = mkdtempSync(join(tmpdir(), 'hostinfo-test-'));
    this.cpuinfoPath = join(this.root, 'cpuinfo');
    this.cacheDir = join(this.root, 'cache');
  }

  writeCpuinfo(content: string): this {
    writeFileSync(this.cpuinfoPath, content, 'utf8');
    return this;
  }

  writeCacheIndex(name: string, entry: CacheIndexFixture): this {
    const dir = join(this.cacheDir, name);
    mkdirSync(dir, { recursive: true });
    if (entry.level !== undefined) {
      writeFileSync(join(dir, 'level'), `${entry.level}\n`, 'utf8');
    }
    if (entry.size !== undefined) {
      writeFileSync(join(dir, 'size'), `${entry.size}\n`, 'utf8');
    }
    return this;
  }

  cleanup(): void {
    rmSync(this.root, { recursive: true, force: true });
  }
}

export const X86_CPUINFO = [
  'processor\t: 0',
  'vendor_id\t: GenuineExample',
  'model name\t: Example CPU X9 @ 3.40GHz',
  'flags\t\t: fpu vme de pse tsc msr sse sse2',
  '',
].join('\n');

export const ARM_CPUINFO = [
  'processor\t: 0',
  'BogoMIPS\t: 108.00',
  'Features\t: fp asimd evtstrm crc32 cpuid',
  'CPU implementer\t: 0x41',
  '',
].join('\n');

/**
 * Fast-check generators
 */

export const byteCountArbitrary = fc.oneof(
  fc.integer({ min: 0, max: 1024 ** 3 }),
  fc.integer({ min: 0, max: Number.MAX_SAFE_INTEGER }),
  fc.double({ min: 1, max: 1e21, noNaN: true }).map(Math.floor)
);

export const secondCountArbitrary = fc.integer({ min: 0, max: 400 * 365 * 86400 });

export const cacheEntryArbitrary = fc.record({
  level: fc.constantFrom('1', '2', '3'),
  size: fc
    .tuple(fc.integer({ min: 1, max: 4096 }), fc.constantFrom('K', 'M', 'k', 'm'))
    .map(([amount, unit]) => `${amount}${unit}`),
});

export const propertyTestConfig = {
  numRuns: 200,
};
