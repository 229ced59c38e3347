/**
 * Display strings for each supported locale
 */

import type { LocaleCode } from './config.js';

export interface LocaleStrings {
  yes: string;
  no: string;
  /** Suffix after the day count in durations, e.g. "3d 04:05:06" */
  daySuffix: string;
  parameter: string;
  value: string;
  sections: {
    cpu: string;
    system: string;
  };
  /** Words inside the frequency summary, "3400 (min: 800, max: 4200)" */
  summaryMin: string;
  summaryMax: string;
  cpu: {
    brand: string;
    architecture: string;
    physicalCores: string;
    logicalProcessors: string;
    frequency: string;
    usage: string;
    frequencyMin: string;
    frequencyMax: string;
    features: string;
    cache: string;
  };
  system: {
    os: string;
    osVersion: string;
    hostname: string;
    uptime: string;
    memoryTotal: string;
    memoryAvailable: string;
    uptimeSeconds: string;
    memoryTotalBytes: string;
    memoryAvailableBytes: string;
  };
}

export const LOCALE_STRINGS: Record<LocaleCode, LocaleStrings> = {
  en: {
    yes: 'Yes',
    no: 'No',
    daySuffix: 'd',
    parameter: 'Parameter',
    value: 'Value',
    sections: { cpu: 'CPU', system: 'SYSTEM' },
    summaryMin: 'min',
    summaryMax: 'max',
    cpu: {
      brand: 'Model/Brand',
      architecture: 'Architecture',
      physicalCores: 'Physical cores',
      logicalProcessors: 'Logical threads',
      frequency: 'Frequency (MHz)',
      usage: 'Usage',
      frequencyMin: 'Frequency min (MHz)',
      frequencyMax: 'Frequency max (MHz)',
      features: 'Features/Flags',
      cache: 'CPU Cache',
    },
    system: {
      os: 'OS',
      osVersion: 'OS version',
      hostname: 'Hostname',
      uptime: 'Uptime',
      memoryTotal: 'RAM total',
      memoryAvailable: 'RAM available',
      uptimeSeconds: 'Uptime (sec)',
      memoryTotalBytes: 'RAM total (bytes)',
      memoryAvailableBytes: 'RAM available (bytes)',
    },
  },
  bg: {
    yes: 'Да',
    no: 'Не',
    daySuffix: 'д',
    parameter: 'Параметър',
    value: 'Стойност',
    sections: { cpu: 'CPU', system: 'СИСТЕМА' },
    summaryMin: 'мин',
    summaryMax: 'макс',
    cpu: {
      brand: 'Модел/Бранд',
      architecture: 'Архитектура',
      physicalCores: 'Физически ядра',
      logicalProcessors: 'Логически нишки',
      frequency: 'Честота (MHz)',
      usage: 'Натоварване',
      frequencyMin: 'Честота мин (MHz)',
      frequencyMax: 'Честота макс (MHz)',
      features: 'Функции/Флагове',
      cache: 'CPU Cache',
    },
    system: {
      os: 'ОС',
      osVersion: 'OS версия',
      hostname: 'Hostname',
      uptime: 'Uptime',
      memoryTotal: 'RAM общо',
      memoryAvailable: 'RAM свободно',
      uptimeSeconds: 'Uptime (сек)',
      memoryTotalBytes: 'RAM общо (байтове)',
      memoryAvailableBytes: 'RAM свободно (байтове)',
    },
  },
};

export function getLocaleStrings(locale: LocaleCode): LocaleStrings {
  return LOCALE_STRINGS[locale];
}
