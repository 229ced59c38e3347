/**
 * Subsystem Logging
 *
 * Every module logs through a logger scoped to its subsystem name, e.g.
 *     const log = createSubsystemLogger('hostinfo/cpu');
 *
 * Output goes to stderr so stdout stays reserved for the report itself.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type LogLevel = LevelWithSilent;

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface SubsystemLogger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

let root: Logger | null = null;

function getRootLogger(): Logger {
  if (!root) {
    root = pino({ level: 'warn', base: undefined }, pino.destination(2));
  }
  return root;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Changes the level of the root logger. Existing subsystem loggers follow it.
 */
export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
}

function toBindings(meta: unknown): Record<string, unknown> {
  if (meta === undefined) {
    return {};
  }
  if (meta instanceof Error) {
    return { err: meta };
  }
  if (typeof meta === 'object' && meta !== null && !Array.isArray(meta)) {
    return { ...meta };
  }
  return { meta };
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  // Resolved per call so setLogLevel() applies to loggers created earlier
  const child = (): Logger => getRootLogger().child({ subsystem });

  return {
    debug: (message, meta) => child().debug(toBindings(meta), message),
    info: (message, meta) => child().info(toBindings(meta), message),
    warn: (message, meta) => child().warn(toBindings(meta), message),
    error: (message, meta) => child().error(toBindings(meta), message),
  };
}
