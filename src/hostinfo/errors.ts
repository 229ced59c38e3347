/**
 * Typed errors. The `code` is what gets logged when a probe degrades to the
 * sentinel.
 */

export class HostInfoError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A platform API, pseudo-file or library call produced nothing usable. */
export class ProbeUnavailableError extends HostInfoError {
  constructor(probe: string, reason: string) {
    super(`Probe "${probe}" unavailable: ${reason}`, 'PROBE_UNAVAILABLE', { probe, reason });
  }
}

export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof HostInfoError) {
    return { code: error.code, error: error.message, ...error.details };
  }
  return { error: error instanceof Error ? error.message : String(error) };
}
