/**
 * CPU Collector
 *
 * Builds a CpuRecord from independent probes: platform APIs for brand,
 * architecture, core counts, frequency and utilization, plus the cpuinfo
 * pseudo-file and the cache topology directory for details the APIs lack.
 * Every probe degrades to the sentinel on its own.
 */

import { existsSync, readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { DEFAULT_HOSTINFO_CONFIG, resolveConfig } from '../config.js';
import { parseCacheSize, roundTo } from '../format/index.js';
import { createNodeProbes, safeProbe } from '../probes/index.js';
import { UNKNOWN } from '../types/index.js';
import type {
  CacheLevel,
  CpuFrequencyRecord,
  CpuRecord,
  OrUnknown,
  PlatformProbes,
} from '../types/index.js';

/**
 * Bare architecture tokens some platforms return in place of a model name.
 * Fixed policy; do not extend by pattern.
 */
export const GENERIC_CPU_NAMES: ReadonlySet<string> = new Set([
  'x86_64',
  'amd64',
  'arm64',
  'aarch64',
  'i386',
  'i686',
]);

export interface CpuCollectorOptions {
  probes: PlatformProbes;
  cpuinfoPath: string;
  cacheDir: string;
  usageSampleMs: number;
}

export interface CacheIndexEntry {
  level: string;
  size: string;
}

export function isGenericCpuName(name: string): boolean {
  return GENERIC_CPU_NAMES.has(name.trim().toLowerCase());
}

/**
 * Extracts the "model name" value from cpuinfo content
 */
export function parseModelName(content: string): string | null {
  const match = /^model name\s*:\s*(.+)$/m.exec(content);
  return match ? match[1].trim() : null;
}

/**
 * Extracts feature flags from cpuinfo content. x86 kernels list them under
 * "flags", ARM kernels under "Features".
 */
export function parseCpuFeatures(content: string): string[] | null {
  const match = /^flags\s*:\s*(.+)$/m.exec(content) ?? /^Features\s*:\s*(.+)$/m.exec(content);
  if (!match) {
    return null;
  }
  const features = match[1].split(/\s+/).filter(item => item.length > 0);
  return features.length > 0 ? features : null;
}

/**
 * Picks, per level, the size label with the largest byte count. Entries whose
 * size cannot be parsed are ignored.
 */
export function selectCacheLabels(entries: Iterable<CacheIndexEntry>): Record<CacheLevel, string> {
  const bestSizes = new Map<string, number>();
  const bestLabels = new Map<string, string>();

  for (const { level, size } of entries) {
    const levelKey = `L${level}`;
    const sizeBytes = parseCacheSize(size);
    if (sizeBytes === null) {
      continue;
    }
    const current = bestSizes.get(levelKey);
    if (current === undefined || sizeBytes > current) {
      bestSizes.set(levelKey, sizeBytes);
      bestLabels.set(levelKey, size);
    }
  }

  return {
    L1: bestLabels.get('L1') ?? UNKNOWN,
    L2: bestLabels.get('L2') ?? UNKNOWN,
    L3: bestLabels.get('L3') ?? UNKNOWN,
  };
}

function allUnknownCache(): Record<CacheLevel, string> {
  return { L1: UNKNOWN, L2: UNKNOWN, L3: UNKNOWN };
}

function toInteger(value: unknown): OrUnknown<number> {
  return typeof value === 'number' && Number.isInteger(value) ? value : UNKNOWN;
}

function toRounded(value: unknown, decimals: number): OrUnknown<number> {
  return typeof value === 'number' && Number.isFinite(value) ? roundTo(value, decimals) : UNKNOWN;
}

export class CpuCollector {
  private readonly options: CpuCollectorOptions;
  private readonly logger = createSubsystemLogger('hostinfo/cpu');

  constructor(options: Partial<CpuCollectorOptions> = {}) {
    // The environment is only consulted for options the caller left out
    const missing =
      options.cpuinfoPath === undefined || options.cacheDir === undefined || options.usageSampleMs === undefined;
    const config = missing ? resolveConfig() : DEFAULT_HOSTINFO_CONFIG;
    this.options = {
      probes: options.probes ?? createNodeProbes(),
      cpuinfoPath: options.cpuinfoPath ?? config.cpuinfoPath,
      cacheDir: options.cacheDir ?? config.cacheDir,
      usageSampleMs: options.usageSampleMs ?? config.usageSampleMs,
    };
  }

  /**
   * Collects the CPU record. Never rejects.
   */
  async collect(): Promise<CpuRecord> {
    const brand = await this.getBrand();
    const architecture = await this.getArchitecture();
    const physicalCores = await this.getCoreCount('physical');
    const logicalProcessors = await this.getCoreCount('logical');
    const frequency = await this.getFrequency();
    const usagePercent = await this.getUsage();
    const features = await this.getFeatures();
    const cache = await this.getCacheSizes();

    this.logger.debug('CPU record collected', { brand, architecture });

    return {
      brand,
      architecture,
      physical_cores: physicalCores,
      logical_processors: logicalProcessors,
      frequency,
      usage_percent: usagePercent,
      features,
      cache,
    };
  }

  /**
   * Platform processor name first; cpuinfo "model name" when the platform
   * answers with nothing or a bare architecture token
   */
  async getBrand(): Promise<string> {
    const name = await safeProbe(() => this.options.probes.processorName(), '', 'processorName');
    const trimmed = name.trim();
    if (trimmed !== '' && !isGenericCpuName(trimmed)) {
      return trimmed;
    }

    const { cpuinfoPath } = this.options;
    if (!existsSync(cpuinfoPath)) {
      return UNKNOWN;
    }
    return safeProbe(() => parseModelName(readFileSync(cpuinfoPath, 'utf8')) ?? UNKNOWN, UNKNOWN, 'cpuinfo:model');
  }

  async getArchitecture(): Promise<string> {
    return safeProbe(async () => (await this.options.probes.machine()) || UNKNOWN, UNKNOWN, 'machine');
  }

  async getCoreCount(kind: 'physical' | 'logical'): Promise<OrUnknown<number>> {
    const { probes } = this.options;
    const value = await safeProbe(
      () => (kind === 'physical' ? probes.physicalCores() : probes.logicalProcessors()),
      null,
      `${kind}Cores`
    );
    return toInteger(value);
  }

  async getFrequency(): Promise<CpuFrequencyRecord> {
    const reading = await safeProbe(() => this.options.probes.cpuFrequency(), null, 'cpuFrequency');
    if (!reading) {
      return { current: UNKNOWN, min: UNKNOWN, max: UNKNOWN };
    }
    return {
      current: toRounded(reading.current, 2),
      min: toRounded(reading.min, 2),
      max: toRounded(reading.max, 2),
    };
  }

  /**
   * Utilization over the configured sampling window; the wait is deliberate
   */
  async getUsage(): Promise<OrUnknown<number>> {
    const { probes, usageSampleMs } = this.options;
    const value = await safeProbe(() => probes.cpuUsage(usageSampleMs), null, 'cpuUsage');
    return toRounded(value, 1);
  }

  async getFeatures(): Promise<OrUnknown<string[]>> {
    const { cpuinfoPath } = this.options;
    if (!existsSync(cpuinfoPath)) {
      return UNKNOWN;
    }
    return safeProbe(() => parseCpuFeatures(readFileSync(cpuinfoPath, 'utf8')) ?? UNKNOWN, UNKNOWN, 'cpuinfo:flags');
  }

  async getCacheSizes(): Promise<Record<CacheLevel, string>> {
    const { cacheDir } = this.options;
    if (!existsSync(cacheDir)) {
      return allUnknownCache();
    }
    const entries = await safeProbe(() => this.readCacheEntries(cacheDir), [], 'cacheTopology');
    return selectCacheLabels(entries);
  }

  private readCacheEntries(cacheDir: string): CacheIndexEntry[] {
    const entries: CacheIndexEntry[] = [];

    const indexNames = readdirSync(cacheDir)
      .filter(name => name.startsWith('index'))
      .sort();

    for (const name of indexNames) {
      const levelPath = join(cacheDir, name, 'level');
      const sizePath = join(cacheDir, name, 'size');
      if (!existsSync(levelPath) || !existsSync(sizePath)) {
        continue;
      }
      try {
        entries.push({
          level: readFileSync(levelPath, 'utf8').trim(),
          size: readFileSync(sizePath, 'utf8').trim(),
        });
      } catch (error) {
        this.logger.debug(`Skipping unreadable cache entry ${name}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return entries;
  }
}

export async function collectCpu(options: Partial<CpuCollectorOptions> = {}): Promise<CpuRecord> {
  return new CpuCollector(options).collect();
}
