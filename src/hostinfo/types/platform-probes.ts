/**
 * Platform Probe Interfaces
 *
 * The platform APIs the collectors query. Each method is one probe and may
 * throw or reject when the underlying source is unavailable.
 */

export interface FrequencyReading {
  /** MHz; null or undefined when the platform does not report it */
  current?: number | null;
  min?: number | null;
  max?: number | null;
}

export interface MemoryReading {
  /** Bytes */
  total: number;
  /** Bytes */
  available: number;
}

export interface OsIdentity {
  name: string;
  release: string;
  version: string;
}

export interface OsFieldProbes {
  name(): Promise<string>;
  release(): Promise<string>;
  version(): Promise<string>;
}

export interface PlatformProbes {
  /** Processor model name as the OS reports it */
  processorName(): Promise<string>;
  /** Machine architecture token, e.g. "x86_64" */
  machine(): Promise<string>;
  physicalCores(): Promise<number>;
  logicalProcessors(): Promise<number>;
  cpuFrequency(): Promise<FrequencyReading | null>;
  /** Samples utilization over `intervalMs` and returns a percentage */
  cpuUsage(intervalMs: number): Promise<number>;
  /** Boot time in seconds since the epoch */
  bootTime(): Promise<number>;
  virtualMemory(): Promise<MemoryReading | null>;
  hostname(): Promise<string>;
  /** Unified identity probe; fields may come back empty */
  osIdentity(): Promise<Partial<OsIdentity>>;
  /** Narrower per-field probes consulted when the unified one leaves a gap */
  osFallbacks: OsFieldProbes;
}

/** Milliseconds since the epoch */
export type Clock = () => number;
