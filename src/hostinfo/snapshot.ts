/**
 * Snapshot Assembler
 *
 * One collection run: the CPU record, then the system record, frozen into the
 * single value the report layer consumes.
 */

import { createSubsystemLogger } from '../logging/subsystem.js';
import { isCompleteConfig, resolveConfig, type HostInfoConfig } from './config.js';
import { CpuCollector } from './cpu-collector/index.js';
import { getLocaleStrings } from './locale.js';
import { createNodeProbes } from './probes/index.js';
import { SystemCollector } from './system-collector/index.js';
import type { Clock, PlatformProbes, Snapshot } from './types/index.js';

const log = createSubsystemLogger('hostinfo/snapshot');

export interface SnapshotOptions {
  probes?: PlatformProbes;
  clock?: Clock;
  config?: Partial<HostInfoConfig>;
}

export async function collectSnapshot(options: SnapshotOptions = {}): Promise<Snapshot> {
  const config = options.config && isCompleteConfig(options.config) ? options.config : resolveConfig(options.config);
  const probes = options.probes ?? createNodeProbes();
  const startedAt = Date.now();

  const cpu = await new CpuCollector({
    probes,
    cpuinfoPath: config.cpuinfoPath,
    cacheDir: config.cacheDir,
    usageSampleMs: config.usageSampleMs,
  }).collect();

  const system = await new SystemCollector({
    probes,
    clock: options.clock ?? Date.now,
    dayLabel: getLocaleStrings(config.locale).daySuffix,
  }).collect();

  log.debug('Snapshot collected', { durationMs: Date.now() - startedAt });

  return Object.freeze({ cpu, system });
}
