/**
 * Primitive Formatters
 *
 * Pure conversions from raw quantities to display strings. Out-of-range input
 * yields the sentinel instead of throwing.
 */

import { UNKNOWN } from '../types/index.js';

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

const CACHE_UNIT_MULTIPLIERS: Record<string, number> = {
  K: 1024,
  M: 1024 ** 2,
  G: 1024 ** 3,
};

// toFixed() turns to exponent notation from 1e21 on
const TWO_DECIMALS = new Intl.NumberFormat('en-US', {
  useGrouping: false,
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/**
 * Byte count to a two-decimal string in the largest unit that keeps the value
 * below 1024, e.g. 1536 -> "1.50 KB"
 */
export function formatBytes(value: unknown): string {
  if (!isNonNegativeNumber(value)) {
    return UNKNOWN;
  }

  let size = value;
  for (const unit of BYTE_UNITS) {
    if (size < 1024) {
      return `${TWO_DECIMALS.format(size)} ${unit}`;
    }
    size /= 1024;
  }
  return `${TWO_DECIMALS.format(size)} PB`;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Second count to "HH:MM:SS", or "{days}{dayLabel} HH:MM:SS" past one day
 */
export function formatDuration(seconds: unknown, dayLabel = 'd'): string {
  if (!isNonNegativeNumber(seconds)) {
    return UNKNOWN;
  }

  const total = Math.trunc(seconds);
  const days = Math.floor(total / 86400);
  let remainder = total % 86400;
  const hours = Math.floor(remainder / 3600);
  remainder %= 3600;
  const minutes = Math.floor(remainder / 60);
  const secs = remainder % 60;

  const clock = `${pad2(hours)}:${pad2(minutes)}:${pad2(secs)}`;
  return days > 0 ? `${days}${dayLabel} ${clock}` : clock;
}

/**
 * Parses cache size text such as "32K", "1M" or "1.5M" into bytes.
 * Returns null for anything else.
 */
export function parseCacheSize(text: string): number | null {
  const match = /^(\d+(?:\.\d+)?)([KMG])$/i.exec(text.trim());
  if (!match) {
    return null;
  }
  const [, amount, unit] = match;
  const multiplier = CACHE_UNIT_MULTIPLIERS[unit.toUpperCase()] ?? 1;
  return Math.trunc(Number(amount) * multiplier);
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
