/**
 * Error taxonomy for the daemon and its workflow
 */

import type { DaemonHandle } from '../types/index.js';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class MissingConfigError extends ConfigurationError {
  constructor(public readonly configFile: string) {
    super(`No monitor configuration found at ${configFile}. Run 'ferry-monitor config' first`);
    this.name = 'MissingConfigError';
  }
}

export class IncompleteBookingConfigError extends ConfigurationError {
  constructor(public readonly missingFields: string[]) {
    super(`Auto-booking requires credential and payment fields: missing ${missingFields.join(', ')}`);
    this.name = 'IncompleteBookingConfigError';
  }
}

export class DryRunConfirmationError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'DryRunConfirmationError';
  }
}

export class AlreadyRunningError extends Error {
  constructor(public readonly handle: DaemonHandle) {
    super(`Ferry monitor is already running (PID: ${handle.pid})`);
    this.name = 'AlreadyRunningError';
  }
}

export class StartInProgressError extends Error {
  constructor(public readonly lockFile: string) {
    super(`Another start is in progress (lock: ${lockFile})`);
    this.name = 'StartInProgressError';
  }
}

export class NotRunningError extends Error {
  constructor(public readonly staleHandle: DaemonHandle | null) {
    super(
      staleHandle
        ? `Ferry monitor is not running (stale handle for PID ${staleHandle.pid} cleared)`
        : 'Ferry monitor is not running (no handle)'
    );
    this.name = 'NotRunningError';
  }
}

export class NoLogsError extends Error {
  constructor(public readonly logFile: string) {
    super(`No logs found at ${logFile}`);
    this.name = 'NoLogsError';
  }
}

export class ProbeTimeoutError extends Error {
  constructor(
    message: string,
    public readonly elapsed: number | null = null,
    public readonly checks: number | null = null
  ) {
    super(message);
    this.name = 'ProbeTimeoutError';
  }
}

export class ProbeInvocationError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null = null
  ) {
    super(message);
    this.name = 'ProbeInvocationError';
  }
}

export class BookingFailureError extends Error {
  constructor(
    message: string,
    public readonly failedStep: string | null = null
  ) {
    super(message);
    this.name = 'BookingFailureError';
  }
}

/**
 * Render an unknown thrown value as a single line
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
