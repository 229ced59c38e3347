/**
 * Table Report
 *
 * Renders a Snapshot as two bordered sections (CPU and system). Compact mode
 * shows the headline rows; verbose adds raw numbers, flags and cache sizes.
 */

import { Chalk } from 'chalk';
import { getLocaleStrings, type LocaleStrings } from '../locale.js';
import type { LocaleCode } from '../config.js';
import { UNKNOWN } from '../types/index.js';
import type { CpuRecord, Snapshot, SystemRecord } from '../types/index.js';
import { wrapText } from './wrap.js';

/** Wider values wrap onto continuation lines */
export const MAX_VALUE_WIDTH = 70;

export interface TableOptions {
  verbose: boolean;
  color: boolean;
  locale: LocaleCode;
}

export type TableRow = readonly [label: string, value: string];

const DEFAULT_TABLE_OPTIONS: TableOptions = {
  verbose: false,
  color: true,
  locale: 'en',
};

/**
 * Generic leaf rendering: booleans become yes/no, absent values the sentinel
 */
export function renderValue(value: unknown, strings: LocaleStrings): string {
  if (value === null || value === undefined) {
    return UNKNOWN;
  }
  if (typeof value === 'boolean') {
    return value ? strings.yes : strings.no;
  }
  return String(value);
}

export function formatFrequencySummary(frequency: CpuRecord['frequency'], strings: LocaleStrings): string {
  const current = renderValue(frequency.current, strings);
  const min = renderValue(frequency.min, strings);
  const max = renderValue(frequency.max, strings);

  if (min === UNKNOWN && max === UNKNOWN) {
    return current;
  }
  return `${current} (${strings.summaryMin}: ${min}, ${strings.summaryMax}: ${max})`;
}

export function formatPercent(value: unknown, strings: LocaleStrings): string {
  if (typeof value === 'number') {
    return `${value.toFixed(1)}%`;
  }
  return renderValue(value, strings);
}

export function formatFeatureList(features: CpuRecord['features'], strings: LocaleStrings): string {
  if (!Array.isArray(features)) {
    return renderValue(features, strings);
  }
  return features.length > 0 ? features.join(', ') : UNKNOWN;
}

export function formatCache(cache: CpuRecord['cache']): string {
  return `L1: ${cache.L1}, L2: ${cache.L2}, L3: ${cache.L3}`;
}

export function buildCpuRows(cpu: CpuRecord, verbose: boolean, strings: LocaleStrings): TableRow[] {
  const labels = strings.cpu;
  const rows: TableRow[] = [
    [labels.brand, renderValue(cpu.brand, strings)],
    [labels.architecture, renderValue(cpu.architecture, strings)],
    [labels.physicalCores, renderValue(cpu.physical_cores, strings)],
    [labels.logicalProcessors, renderValue(cpu.logical_processors, strings)],
    [labels.frequency, formatFrequencySummary(cpu.frequency, strings)],
    [labels.usage, formatPercent(cpu.usage_percent, strings)],
  ];

  if (verbose) {
    rows.push(
      [labels.frequencyMin, renderValue(cpu.frequency.min, strings)],
      [labels.frequencyMax, renderValue(cpu.frequency.max, strings)],
      [labels.features, formatFeatureList(cpu.features, strings)],
      [labels.cache, formatCache(cpu.cache)]
    );
  }
  return rows;
}

export function buildSystemRows(system: SystemRecord, verbose: boolean, strings: LocaleStrings): TableRow[] {
  const labels = strings.system;
  const { os, memory } = system;
  const rows: TableRow[] = [
    [labels.os, `${os.name} ${os.release}`],
    [labels.osVersion, renderValue(os.version, strings)],
    [labels.hostname, renderValue(system.hostname, strings)],
    [labels.uptime, renderValue(system.uptime_human, strings)],
    [labels.memoryTotal, renderValue(memory.total_human, strings)],
    [labels.memoryAvailable, renderValue(memory.available_human, strings)],
  ];

  if (verbose) {
    rows.push(
      [labels.uptimeSeconds, renderValue(system.uptime_seconds, strings)],
      [labels.memoryTotalBytes, renderValue(memory.total_bytes, strings)],
      [labels.memoryAvailableBytes, renderValue(memory.available_bytes, strings)]
    );
  }
  return rows;
}

/**
 * Draws one bordered two-column table
 */
export function renderRows(rows: readonly TableRow[], strings: LocaleStrings): string {
  const labelHeader = strings.parameter;
  const valueHeader = strings.value;

  const labelWidth = Math.max(labelHeader.length, ...rows.map(([label]) => label.length));
  const valueWidth = Math.min(
    Math.max(valueHeader.length, ...rows.map(([, value]) => value.length)),
    MAX_VALUE_WIDTH
  );

  const border = `+${'-'.repeat(labelWidth + 2)}+${'-'.repeat(valueWidth + 2)}+`;
  const line = (label: string, value: string): string =>
    `| ${label.padEnd(labelWidth)} | ${value.padEnd(valueWidth)} |`;

  const lines = [border, line(labelHeader, valueHeader), border];
  for (const [label, value] of rows) {
    const chunks = wrapText(value, valueWidth);
    (chunks.length > 0 ? chunks : ['']).forEach((chunk, index) => {
      lines.push(line(index === 0 ? label : '', chunk));
    });
  }
  lines.push(border);
  return lines.join('\n');
}

function formatSection(title: string, rows: readonly TableRow[], strings: LocaleStrings, color: boolean): string {
  const header = color ? new Chalk({ level: 1 }).bold.cyan(title) : title;
  return `${header}\n${renderRows(rows, strings)}`;
}

export function formatTable(snapshot: Snapshot, options: Partial<TableOptions> = {}): string {
  const { verbose, color, locale } = { ...DEFAULT_TABLE_OPTIONS, ...options };
  const strings = getLocaleStrings(locale);

  return [
    formatSection(strings.sections.cpu, buildCpuRows(snapshot.cpu, verbose, strings), strings, color),
    formatSection(strings.sections.system, buildSystemRows(snapshot.system, verbose, strings), strings, color),
  ].join('\n\n');
}
