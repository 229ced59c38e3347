/**
 * System Collector
 *
 * OS identity, hostname, uptime and memory. Uptime and memory are derived
 * groups: their raw and human-readable fields are set together or not at all.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import { formatBytes, formatDuration } from '../format/index.js';
import { createNodeProbes, firstNonEmpty, safeProbe } from '../probes/index.js';
import { UNKNOWN } from '../types/index.js';
import type {
  Clock,
  MemoryReading,
  MemoryRecord,
  OsIdentity,
  OsRecord,
  PlatformProbes,
  SystemRecord,
} from '../types/index.js';

export interface SystemCollectorOptions {
  probes: PlatformProbes;
  /** Source of "now" for uptime, in epoch milliseconds */
  clock: Clock;
  /** Day suffix used in uptime_human */
  dayLabel: string;
}

export interface UptimeFields {
  uptime_seconds: SystemRecord['uptime_seconds'];
  uptime_human: string;
}

const UNKNOWN_MEMORY: MemoryRecord = {
  total_bytes: UNKNOWN,
  available_bytes: UNKNOWN,
  total_human: UNKNOWN,
  available_human: UNKNOWN,
};

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Derives both uptime fields from a boot timestamp (epoch seconds)
 */
export function deriveUptime(bootTime: unknown, nowMs: number, dayLabel = 'd'): UptimeFields {
  if (!isFiniteNumber(bootTime)) {
    return { uptime_seconds: UNKNOWN, uptime_human: UNKNOWN };
  }
  const seconds = Math.max(0, Math.trunc(nowMs / 1000 - bootTime));
  return { uptime_seconds: seconds, uptime_human: formatDuration(seconds, dayLabel) };
}

/**
 * Derives the memory quadruple from a total/available reading
 */
export function deriveMemory(reading: Partial<MemoryReading> | null): MemoryRecord {
  if (!reading) {
    return UNKNOWN_MEMORY;
  }
  const { total, available } = reading;
  if (!isFiniteNumber(total) || !isFiniteNumber(available) || total < 0 || available < 0) {
    return UNKNOWN_MEMORY;
  }

  const totalBytes = Math.trunc(total);
  const availableBytes = Math.trunc(available);
  return {
    total_bytes: totalBytes,
    available_bytes: availableBytes,
    total_human: formatBytes(totalBytes),
    available_human: formatBytes(availableBytes),
  };
}

export class SystemCollector {
  private readonly options: SystemCollectorOptions;
  private readonly logger = createSubsystemLogger('hostinfo/system');

  constructor(options: Partial<SystemCollectorOptions> = {}) {
    this.options = {
      probes: options.probes ?? createNodeProbes(),
      clock: options.clock ?? Date.now,
      dayLabel: options.dayLabel ?? 'd',
    };
  }

  /**
   * Collects the system record. Never rejects.
   */
  async collect(): Promise<SystemRecord> {
    const os = await this.getOsIdentity();
    const hostname = await this.getHostname();
    const uptime = await this.getUptime();
    const memory = await this.getMemory();

    this.logger.debug('System record collected', { os: os.name, hostname });

    return {
      os,
      hostname,
      uptime_seconds: uptime.uptime_seconds,
      uptime_human: uptime.uptime_human,
      memory,
    };
  }

  /**
   * Unified identity probe first, then the per-field fallbacks
   */
  async getOsIdentity(): Promise<OsRecord> {
    const { probes } = this.options;
    const noIdentity: Partial<OsIdentity> = {};
    const unified = await safeProbe(() => probes.osIdentity(), noIdentity, 'osIdentity');

    const name = await firstNonEmpty([() => unified.name, () => probes.osFallbacks.name()], 'os:name');
    const release = await firstNonEmpty([() => unified.release, () => probes.osFallbacks.release()], 'os:release');
    const version = await firstNonEmpty([() => unified.version, () => probes.osFallbacks.version()], 'os:version');

    return {
      name: name || UNKNOWN,
      release: release || UNKNOWN,
      version: version || UNKNOWN,
    };
  }

  async getHostname(): Promise<string> {
    const hostname = await safeProbe(() => this.options.probes.hostname(), UNKNOWN, 'hostname');
    return hostname || UNKNOWN;
  }

  async getUptime(): Promise<UptimeFields> {
    const { probes, clock, dayLabel } = this.options;
    const bootTime = await safeProbe(() => probes.bootTime(), null, 'bootTime');
    return deriveUptime(bootTime, clock(), dayLabel);
  }

  async getMemory(): Promise<MemoryRecord> {
    const reading = await safeProbe(() => this.options.probes.virtualMemory(), null, 'virtualMemory');
    return deriveMemory(reading);
  }
}

export async function collectSystem(options: Partial<SystemCollectorOptions> = {}): Promise<SystemRecord> {
  return new SystemCollector(options).collect();
}
