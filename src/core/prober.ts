/**
 * Availability prober: invokes the external availability-check command
 *
 * The command blocks until the sailing is available or its timeout elapses
 * and reports through its exit code:
 *   0 - available, 1 - timed out, anything else - invocation error
 */

import type { CommandConfig, MonitorConfig, ProbeResult } from '../types/index.js';
import { ProbeResultSchema } from '../config/schema.js';
import {
  lastLine,
  runCommand,
  type CommandResult,
  type CommandRunner,
} from '../infrastructure/process/command.js';
import { ProbeInvocationError, ProbeTimeoutError, describeError } from './errors.js';

/**
 * Prober interface.
 * Resolves when available; rejects with ProbeTimeoutError or ProbeInvocationError otherwise.
 */
export interface AvailabilityProber {
  probe(config: MonitorConfig, signal?: AbortSignal): Promise<ProbeResult>;
}

const EXIT_AVAILABLE = 0;
const EXIT_TIMEOUT = 1;

/**
 * Command-line arguments for a probe run
 */
export function buildProbeArgs(config: MonitorConfig): string[] {
  return [
    '--from', config.departure,
    '--to', config.arrival,
    '--date', config.date,
    '--time', config.time,
    '--adults', String(config.adults),
    '--children', String(config.children),
    '--seniors', String(config.seniors),
    '--infants', String(config.infants),
    config.vehicle ? '--vehicle' : '--no-vehicle',
    '--poll-interval', String(config.pollInterval),
    '--timeout', String(config.timeout),
    '--json',
  ];
}

/**
 * Parse the JSON document the command prints on stdout
 */
export function parseProbeOutput(stdout: string): ProbeResult | null {
  const start = stdout.indexOf('{');
  const end = stdout.lastIndexOf('}');
  if (start === -1 || end < start) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(stdout.slice(start, end + 1));
  } catch {
    return null;
  }

  const parsed = ProbeResultSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Process-based prober implementation
 */
export class ProcessProber implements AvailabilityProber {
  constructor(
    private command: CommandConfig,
    private run: CommandRunner = runCommand
  ) {}

  async probe(config: MonitorConfig, signal?: AbortSignal): Promise<ProbeResult> {
    const args = [...this.command.args, ...buildProbeArgs(config)];

    let result: CommandResult;
    try {
      result = await this.run(this.command.command, args, { signal });
    } catch (error) {
      throw new ProbeInvocationError(`Could not run ${this.command.command}: ${describeError(error)}`);
    }

    const payload = parseProbeOutput(result.stdout);

    if (result.exitCode === EXIT_AVAILABLE) {
      if (!payload?.available) {
        throw new ProbeInvocationError(
          `${this.command.command} exited 0 without an availability payload`,
          result.exitCode
        );
      }
      return payload;
    }

    if (result.exitCode === EXIT_TIMEOUT) {
      const elapsed = payload ? Math.round(payload.elapsed) : null;
      throw new ProbeTimeoutError(
        elapsed !== null
          ? `Not available after ${elapsed}s (${payload?.checks ?? 0} checks)`
          : 'Not available before timeout',
        payload?.elapsed ?? null,
        payload?.checks ?? null
      );
    }

    const detail = lastLine(result.stderr) ?? lastLine(result.stdout);
    const how = result.signal ? `killed by ${result.signal}` : `exited with code ${result.exitCode}`;
    throw new ProbeInvocationError(
      `${this.command.command} ${how}${detail ? `: ${detail}` : ''}`,
      result.exitCode
    );
  }
}

/**
 * Create a new prober
 */
export function createProber(command: CommandConfig, run?: CommandRunner): AvailabilityProber {
  return new ProcessProber(command, run);
}
