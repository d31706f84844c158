/**
 * Booking executor: invokes the external booking-automation command
 *
 * Every parameter, secrets included, travels in the child's environment.
 * Nothing sensitive is placed in its argument list.
 */

import type {
  BookingConfig,
  BookingCredentials,
  BookingOutcome,
  CommandConfig,
  MonitorConfig,
} from '../types/index.js';
import { BookingOutcomeSchema } from '../config/schema.js';
import {
  lastLine,
  runCommand,
  type CommandResult,
  type CommandRunner,
} from '../infrastructure/process/command.js';
import type { LogSink } from '../utils/logger.js';
import { BookingFailureError, describeError } from './errors.js';

/**
 * Marker line after which the command prints its JSON result
 */
export const RESULT_MARKER = '__RESULT__';

export interface BookingRequest {
  monitor: MonitorConfig;
  booking: BookingConfig;
  /** Already resolved, no `env:` references */
  credentials: BookingCredentials;
}

/**
 * Executor interface.
 * Resolves with the reported outcome (successful or not); rejects with
 * BookingFailureError when no outcome could be obtained at all.
 */
export interface BookingExecutor {
  book(request: BookingRequest, signal?: AbortSignal): Promise<BookingOutcome>;
}

/**
 * Environment passed to the booking command
 */
export function buildBookingEnv(request: BookingRequest, headless: boolean): Record<string, string> {
  const { monitor, booking, credentials } = request;
  return {
    DEPARTURE: monitor.departure,
    ARRIVAL: monitor.arrival,
    DATE: booking.bookingDate,
    SAILING_TIME: monitor.time,
    ADULTS: String(monitor.adults),
    CHILDREN: String(monitor.children),
    SENIORS: String(monitor.seniors),
    VEHICLE_HEIGHT: booking.vehicleHeight,
    VEHICLE_LENGTH: booking.vehicleLength,
    BC_FERRIES_EMAIL: credentials.email,
    BC_FERRIES_PASSWORD: credentials.password,
    CC_NAME: credentials.cardName,
    CC_NUMBER: credentials.cardNumber,
    CC_EXPIRY: credentials.cardExpiry,
    CC_CVV: credentials.cardCvv,
    CC_ADDRESS: credentials.address,
    CC_CITY: credentials.city,
    CC_PROVINCE: credentials.province,
    CC_POSTAL: credentials.postalCode,
    CC_COUNTRY: credentials.country,
    DRY_RUN: String(booking.dryRun),
    HEADLESS: String(headless),
  };
}

/**
 * Split command output into progress lines and the trailing result payload
 */
export function parseBookingOutput(stdout: string): {
  progress: string[];
  outcome: BookingOutcome | null;
} {
  const markerAt = stdout.lastIndexOf(RESULT_MARKER);
  const head = markerAt === -1 ? stdout : stdout.slice(0, markerAt);
  const progress = head
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);

  if (markerAt === -1) {
    return { progress, outcome: null };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(stdout.slice(markerAt + RESULT_MARKER.length));
  } catch {
    return { progress, outcome: null };
  }

  const parsed = BookingOutcomeSchema.safeParse(raw);
  return { progress, outcome: parsed.success ? parsed.data : null };
}

/**
 * Process-based executor implementation
 */
export class ProcessExecutor implements BookingExecutor {
  constructor(
    private command: CommandConfig & { headless: boolean },
    private logger?: LogSink,
    private run: CommandRunner = runCommand
  ) {}

  async book(request: BookingRequest, signal?: AbortSignal): Promise<BookingOutcome> {
    const env = { ...process.env, ...buildBookingEnv(request, this.command.headless) };

    let result: CommandResult;
    try {
      result = await this.run(this.command.command, this.command.args, { env, signal });
    } catch (error) {
      throw new BookingFailureError(`Could not run ${this.command.command}: ${describeError(error)}`);
    }

    const { progress, outcome } = parseBookingOutput(result.stdout);
    for (const line of progress) {
      this.logger?.debug(`[executor] ${line}`);
    }

    if (!outcome) {
      const detail = lastLine(result.stderr) ?? progress[progress.length - 1] ?? null;
      throw new BookingFailureError(
        `${this.command.command} exited with code ${result.exitCode} without a result${detail ? `: ${detail}` : ''}`
      );
    }

    if (outcome.success && result.exitCode !== 0) {
      return {
        ...outcome,
        success: false,
        error: outcome.error ?? `Reported success but exited with code ${result.exitCode}`,
      };
    }

    return outcome;
  }
}

/**
 * Create a new executor
 */
export function createExecutor(
  command: CommandConfig & { headless: boolean },
  logger?: LogSink,
  run?: CommandRunner
): BookingExecutor {
  return new ProcessExecutor(command, logger, run);
}
