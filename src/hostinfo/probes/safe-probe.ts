/**
 * Safe Probe Wrapper
 *
 * Runs a single probe and substitutes a fallback on any failure, so one
 * unavailable source never aborts collection of the others.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import { describeError } from '../errors.js';

const log = createSubsystemLogger('hostinfo/probe');

export type Probe<T> = () => T | Promise<T>;

export async function safeProbe<T, F>(probe: Probe<T>, fallback: F, label = 'anonymous'): Promise<T | F> {
  try {
    return await probe();
  } catch (error) {
    log.debug(`Probe ${label} failed, using fallback`, describeError(error));
    return fallback;
  }
}

/**
 * Evaluates probes in order and returns the first non-empty string.
 * Failing probes count as empty.
 */
export async function firstNonEmpty(probes: ReadonlyArray<Probe<string | undefined>>, label: string): Promise<string> {
  for (const probe of probes) {
    const value = await safeProbe(probe, undefined, label);
    if (typeof value === 'string' && value.trim() !== '') {
      return value;
    }
  }
  return '';
}
