/**
 * Workflow Runner: the detached worker's control loop
 *
 *   MONITORING -> AVAILABLE -> [BOOKING -> BOOKED | BOOKING_FAILED] -> DONE
 *   MONITORING -> TIMED_OUT -> DONE, or back to MONITORING in continuous mode
 *
 * Each transition appends a log line and rewrites the status snapshot before
 * the next blocking call. Terminal transitions also write the result record.
 * Failures of the prober and executor end up in those files; they are never
 * thrown out of run().
 */

import type {
  BookingOutcome,
  MonitorConfig,
  ProbeResult,
  ResultRecord,
  StatusSnapshot,
  StoredConfig,
  WorkflowPhase,
} from '../types/index.js';
import type { LogSink } from '../utils/logger.js';
import { sleep as defaultSleep } from '../utils/sleep.js';
import { DEFAULT_CLICK_URL } from '../config/schema.js';
import type { AvailabilityProber } from './prober.js';
import type { BookingExecutor } from './executor.js';
import type { Notifier } from './notifier.js';
import type { StateStore } from './state-store.js';
import { missingCredentialFields, resolveCredentials } from './config-store.js';
import {
  BookingFailureError,
  ProbeInvocationError,
  ProbeTimeoutError,
  describeError,
} from './errors.js';

export interface WorkflowDependencies {
  store: StateStore;
  prober: AvailabilityProber;
  executor: BookingExecutor;
  notifier: Notifier;
  logger: LogSink;
  cooldownMs: number;
  clickUrl?: string;
  pid?: number;
  env?: NodeJS.ProcessEnv;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * How one monitoring cycle ended
 */
export type CycleOutcome =
  | { kind: 'completed'; result: ResultRecord }
  | { kind: 'booked'; result: ResultRecord }
  | { kind: 'booking-failed'; result: ResultRecord }
  | { kind: 'timed-out'; error: ProbeTimeoutError | ProbeInvocationError }
  | { kind: 'aborted' };

export class WorkflowRunner {
  private readonly pid: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private deps: WorkflowDependencies) {
    this.pid = deps.pid ?? process.pid;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Run until a terminal state, or until the signal aborts.
   * Returns the last result record written, or null if none was.
   */
  async run(config: StoredConfig, signal?: AbortSignal): Promise<ResultRecord | null> {
    const { monitor } = config;
    const { logger, cooldownMs } = this.deps;
    let last: ResultRecord | null = null;
    let cycle = 0;

    while (!signal?.aborted) {
      cycle += 1;
      const outcome = await this.runCycle(config, cycle, signal);

      if (outcome.kind === 'aborted') break;

      if (outcome.kind === 'timed-out') {
        if (!monitor.continuous) {
          last = this.buildResult({
            success: false,
            phase: 'failed',
            error: describeError(outcome.error),
          });
          await this.finish(monitor, cycle, last, `Monitoring ended without availability: ${outcome.error.message}`);
          return last;
        }
      } else {
        last = outcome.result;
        // A confirmed booking is never repeated, whatever the mode
        if (!monitor.continuous || outcome.kind === 'booked') return last;
      }

      logger.info(`Continuous mode: next cycle in ${Math.round(cooldownMs / 1000)}s`);
      await this.sleep(cooldownMs, signal);
    }

    logger.info('Workflow stopped');
    return last;
  }

  /**
   * One MONITORING pass and whatever it leads to
   */
  async runCycle(config: StoredConfig, cycle: number, signal?: AbortSignal): Promise<CycleOutcome> {
    const { monitor } = config;
    const { prober, logger } = this.deps;

    await this.transition(
      'monitoring',
      monitor,
      cycle,
      `Cycle ${cycle}: monitoring ${monitor.departure} -> ${monitor.arrival} on ${monitor.date} at ${monitor.time}`
    );

    let availability: ProbeResult;
    try {
      availability = await prober.probe(monitor, signal);
    } catch (error) {
      if (signal?.aborted) return { kind: 'aborted' };

      if (error instanceof ProbeTimeoutError) {
        logger.warn(`Timed out: ${error.message}`);
        return { kind: 'timed-out', error };
      }

      const invocationError =
        error instanceof ProbeInvocationError
          ? error
          : new ProbeInvocationError(describeError(error));
      logger.error(`Probe invocation failed: ${invocationError.message}`);
      return { kind: 'timed-out', error: invocationError };
    }

    if (signal?.aborted) return { kind: 'aborted' };

    logger.info(
      `Ferry became AVAILABLE! (after ${Math.round(availability.elapsed)}s, ${availability.checks} checks)`
    );
    await this.notify(
      `Ferry available: ${monitor.departure} -> ${monitor.arrival}`,
      `${monitor.date} at ${monitor.time} is available${monitor.autoBook ? ', booking now' : ''}.`
    );

    if (!monitor.autoBook) {
      const result = this.buildResult({ success: true, phase: 'completed', availability });
      await this.finish(monitor, cycle, result, 'Availability found, auto-booking disabled');
      return { kind: 'completed', result };
    }

    // Availability is on record before the executor starts
    await this.deps.store.writeResult(
      this.buildResult({ success: false, phase: 'booking', availability })
    );
    await this.transition('booking', monitor, cycle, 'Auto-booking enabled, triggering booking');

    const booking = await this.book(config, signal);
    if (signal?.aborted) return { kind: 'aborted' };

    if (booking.success) {
      const result = this.buildResult({
        success: true,
        phase: 'completed',
        availability,
        booking,
        confirmationNumber: booking.confirmationNumber,
      });
      await this.finish(
        monitor,
        cycle,
        result,
        `BOOKING SUCCESSFUL (confirmation: ${booking.confirmationNumber ?? 'none'})`
      );
      return { kind: 'booked', result };
    }

    const failure = new BookingFailureError(
      booking.error ?? 'Booking failed',
      booking.failedStep
    );
    const result = this.buildResult({
      success: false,
      phase: 'failed',
      availability,
      booking,
      error: describeError(failure),
    });
    await this.finish(
      monitor,
      cycle,
      result,
      `BOOKING FAILED${failure.failedStep ? ` at step '${failure.failedStep}'` : ''}: ${failure.message}`
    );
    return { kind: 'booking-failed', result };
  }

  /**
   * Invoke the executor once; every failure becomes an unsuccessful outcome
   */
  private async book(config: StoredConfig, signal?: AbortSignal): Promise<BookingOutcome> {
    const { booking, credentials, monitor } = config;
    const env = this.deps.env ?? process.env;

    const missing = missingCredentialFields(credentials, env);
    if (!booking || !credentials || missing.length > 0) {
      return failedOutcome(
        `Booking configuration incomplete: missing ${booking ? missing.join(', ') : 'booking'}`
      );
    }

    this.deps.logger.info(
      `Executing booking for ${booking.bookingDate} (${booking.dryRun ? 'DRY RUN' : 'LIVE'})`
    );

    try {
      return await this.deps.executor.book(
        { monitor, booking, credentials: resolveCredentials(credentials, env) },
        signal
      );
    } catch (error) {
      return failedOutcome(error instanceof Error ? error.message : String(error));
    }
  }

  private async transition(
    phase: WorkflowPhase,
    monitor: MonitorConfig,
    cycle: number,
    message: string
  ): Promise<void> {
    this.deps.logger.info(`[${phase}] ${message}`);

    const snapshot: StatusSnapshot = {
      phase,
      cycle,
      updatedAt: new Date().toISOString(),
      pid: this.pid,
      route: { departure: monitor.departure, arrival: monitor.arrival },
      schedule: { date: monitor.date, time: monitor.time },
      message,
    };
    await this.deps.store.writeStatus(snapshot);
  }

  private async finish(
    monitor: MonitorConfig,
    cycle: number,
    result: ResultRecord,
    message: string
  ): Promise<void> {
    await this.deps.store.writeResult(result);
    await this.transition(result.phase, monitor, cycle, message);
    await this.notify(
      result.success ? 'Ferry monitor: success' : 'Ferry monitor: failed',
      message
    );
  }

  private async notify(title: string, body: string): Promise<void> {
    try {
      await this.deps.notifier.send({
        title,
        body,
        clickUrl: this.deps.clickUrl ?? DEFAULT_CLICK_URL,
      });
    } catch (error) {
      this.deps.logger.warn(`Notification skipped: ${describeError(error)}`);
    }
  }

  private buildResult(fields: {
    success: boolean;
    phase: WorkflowPhase;
    availability?: ProbeResult;
    booking?: BookingOutcome;
    confirmationNumber?: string | null;
    error?: string;
  }): ResultRecord {
    return {
      success: fields.success,
      timestamp: new Date().toISOString(),
      phase: fields.phase,
      available: fields.availability !== undefined,
      availability: fields.availability ?? null,
      confirmationNumber: fields.confirmationNumber ?? null,
      booking: fields.booking ?? null,
      error: fields.error ?? null,
    };
  }
}

function failedOutcome(error: string): BookingOutcome {
  return { success: false, confirmationNumber: null, failedStep: null, error };
}
