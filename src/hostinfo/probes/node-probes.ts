/**
 * Node Platform Probes
 *
 * Default PlatformProbes backed by Node's os module and systeminformation.
 * Probes throw ProbeUnavailableError when a source answers with nothing usable.
 */

import os from 'node:os';
import { setTimeout as sleep } from 'node:timers/promises';
import si from 'systeminformation';
import { ProbeUnavailableError } from '../errors.js';
import type { FrequencyReading, MemoryReading, OsIdentity, PlatformProbes } from '../types/index.js';

export interface CpuTimesTotals {
  idle: number;
  total: number;
}

function readCpuTimes(): CpuTimesTotals {
  const cpus = os.cpus();
  if (cpus.length === 0) {
    throw new ProbeUnavailableError('cpuUsage', 'no per-CPU time counters');
  }

  let idle = 0;
  let total = 0;
  for (const { times } of cpus) {
    idle += times.idle;
    total += times.user + times.nice + times.sys + times.idle + times.irq;
  }
  return { idle, total };
}

/**
 * Computes utilization between two readings of the per-CPU time counters.
 * Counters that did not advance give no measurement.
 */
export function usageBetween(first: CpuTimesTotals, second: CpuTimesTotals): number {
  const totalDiff = second.total - first.total;
  const idleDiff = second.idle - first.idle;
  if (totalDiff <= 0) {
    throw new ProbeUnavailableError('cpuUsage', 'counters did not advance');
  }
  return Math.max(0, Math.min(100, ((totalDiff - idleDiff) / totalDiff) * 100));
}

/** systeminformation reports speeds in GHz and uses 0 for "unknown" */
function ghzToMhz(value: number | undefined): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return null;
  }
  return value * 1000;
}

export function createNodeProbes(): PlatformProbes {
  return {
    async processorName() {
      const [first] = os.cpus();
      return first?.model ?? '';
    },

    async machine() {
      return os.machine();
    },

    async physicalCores() {
      const cpu = await si.cpu();
      return cpu.physicalCores;
    },

    async logicalProcessors() {
      const count = os.cpus().length;
      if (count === 0) {
        throw new ProbeUnavailableError('logicalProcessors', 'os.cpus() returned no entries');
      }
      return count;
    },

    async cpuFrequency(): Promise<FrequencyReading | null> {
      const speed = await si.cpuCurrentSpeed();
      const reading: FrequencyReading = {
        current: ghzToMhz(speed.avg),
        min: ghzToMhz(speed.min),
        max: ghzToMhz(speed.max),
      };
      if (reading.current === null && reading.min === null && reading.max === null) {
        return null;
      }
      return reading;
    },

    async cpuUsage(intervalMs: number) {
      const first = readCpuTimes();
      await sleep(intervalMs);
      const second = readCpuTimes();
      return usageBetween(first, second);
    },

    async bootTime() {
      return Date.now() / 1000 - os.uptime();
    },

    async virtualMemory(): Promise<MemoryReading | null> {
      const mem = await si.mem();
      return { total: mem.total, available: mem.available };
    },

    async hostname() {
      return os.hostname();
    },

    async osIdentity(): Promise<Partial<OsIdentity>> {
      return {
        name: os.type(),
        release: os.release(),
        version: os.version(),
      };
    },

    osFallbacks: {
      async name() {
        return (await si.osInfo()).platform;
      },
      async release() {
        return (await si.osInfo()).kernel;
      },
      async version() {
        const info = await si.osInfo();
        return info.build || info.release;
      },
    },
  };
}
