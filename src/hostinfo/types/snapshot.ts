/**
 * Snapshot Schema
 *
 * The normalized shape every collection run produces. Each leaf holds either a
 * real value or the UNKNOWN sentinel; no field is ever omitted or null. Keys
 * are the snake_case names written by `--json`.
 */

/** Placeholder for any value that could not be determined */
export const UNKNOWN = 'N/A' as const;

export type Unknown = typeof UNKNOWN;

export type OrUnknown<T> = T | Unknown;

export type CacheLevel = 'L1' | 'L2' | 'L3';

export interface CpuFrequencyRecord {
  /** Current frequency in MHz */
  readonly current: OrUnknown<number>;
  /** Minimum frequency in MHz */
  readonly min: OrUnknown<number>;
  /** Maximum frequency in MHz */
  readonly max: OrUnknown<number>;
}

export interface CpuRecord {
  readonly brand: string;
  readonly architecture: string;
  readonly physical_cores: OrUnknown<number>;
  readonly logical_processors: OrUnknown<number>;
  readonly frequency: CpuFrequencyRecord;
  /** Utilization over the sampling window, 0-100 */
  readonly usage_percent: OrUnknown<number>;
  /** Feature flags in the order the source lists them */
  readonly features: OrUnknown<readonly string[]>;
  /** Largest reported size label per level, e.g. "1024K" */
  readonly cache: Readonly<Record<CacheLevel, string>>;
}

export interface OsRecord {
  readonly name: string;
  readonly release: string;
  readonly version: string;
}

export interface MemoryRecord {
  readonly total_bytes: OrUnknown<number>;
  readonly available_bytes: OrUnknown<number>;
  readonly total_human: string;
  readonly available_human: string;
}

export interface SystemRecord {
  readonly os: OsRecord;
  readonly hostname: string;
  readonly uptime_seconds: OrUnknown<number>;
  readonly uptime_human: string;
  readonly memory: MemoryRecord;
}

export interface Snapshot {
  readonly cpu: CpuRecord;
  readonly system: SystemRecord;
}
