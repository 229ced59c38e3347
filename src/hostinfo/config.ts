/**
 * hostinfo Configuration
 *
 * Defaults merged with environment variables and explicit overrides, in that
 * order of precedence (overrides win).
 */

import { createSubsystemLogger, isLogLevel, type LogLevel } from '../logging/subsystem.js';

const log = createSubsystemLogger('hostinfo/config');

export const LOCALES = ['en', 'bg'] as const;

export type LocaleCode = (typeof LOCALES)[number];

export interface HostInfoConfig {
  /** Per-processor info pseudo-file */
  cpuinfoPath: string;
  /** Cache topology directory holding index* entries */
  cacheDir: string;
  /** Utilization sampling window in milliseconds */
  usageSampleMs: number;
  logLevel: LogLevel;
  locale: LocaleCode;
}

export const DEFAULT_HOSTINFO_CONFIG: HostInfoConfig = {
  cpuinfoPath: '/proc/cpuinfo',
  cacheDir: '/sys/devices/system/cpu/cpu0/cache',
  usageSampleMs: 100,
  logLevel: 'warn',
  locale: 'en',
};

export function isLocaleCode(value: string): value is LocaleCode {
  return LOCALES.some(locale => locale === value);
}

/**
 * Reads HOSTINFO_* variables. Unset or invalid values are left out so the
 * defaults apply.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<HostInfoConfig> {
  const config: Partial<HostInfoConfig> = {};

  if (env.HOSTINFO_CPUINFO_PATH) {
    config.cpuinfoPath = env.HOSTINFO_CPUINFO_PATH;
  }
  if (env.HOSTINFO_CACHE_DIR) {
    config.cacheDir = env.HOSTINFO_CACHE_DIR;
  }

  const sampleMs = env.HOSTINFO_USAGE_SAMPLE_MS;
  if (sampleMs !== undefined) {
    const parsed = Number(sampleMs);
    if (Number.isInteger(parsed) && parsed > 0) {
      config.usageSampleMs = parsed;
    } else {
      log.warn('Ignoring invalid HOSTINFO_USAGE_SAMPLE_MS', { value: sampleMs });
    }
  }

  const logLevel = env.HOSTINFO_LOG_LEVEL;
  if (logLevel !== undefined) {
    if (isLogLevel(logLevel)) {
      config.logLevel = logLevel;
    } else {
      log.warn('Ignoring invalid HOSTINFO_LOG_LEVEL', { value: logLevel });
    }
  }

  const locale = env.HOSTINFO_LANG;
  if (locale !== undefined) {
    if (isLocaleCode(locale)) {
      config.locale = locale;
    } else {
      log.warn('Ignoring unsupported HOSTINFO_LANG', { value: locale });
    }
  }

  return config;
}

export function isCompleteConfig(config: Partial<HostInfoConfig>): config is HostInfoConfig {
  return (
    config.cpuinfoPath !== undefined &&
    config.cacheDir !== undefined &&
    config.usageSampleMs !== undefined &&
    config.logLevel !== undefined &&
    config.locale !== undefined
  );
}

export function resolveConfig(
  overrides: Partial<HostInfoConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): HostInfoConfig {
  return {
    ...DEFAULT_HOSTINFO_CONFIG,
    ...configFromEnv(env),
    ...overrides,
  };
}
