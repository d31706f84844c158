/**
 * Human-readable output for the CLI
 */

import type { DaemonStatus, ResultRecord, StatusSnapshot } from '../types/index.js';

const NOT_RUNNING_DETAIL: Record<Extract<DaemonStatus, { state: 'NOT_RUNNING' }>['reason'], string> = {
  'never-started': 'never started',
  exited: 'exited',
  'stale-handle-cleared': 'stale handle cleared',
};

function formatSnapshot(snapshot: StatusSnapshot): string[] {
  return [
    `Phase: ${snapshot.phase} (cycle ${snapshot.cycle}, updated ${snapshot.updatedAt})`,
    `Route: ${snapshot.route.departure} -> ${snapshot.route.arrival}`,
    `Sailing: ${snapshot.schedule.date} at ${snapshot.schedule.time}`,
    `Last event: ${snapshot.message}`,
  ];
}

export function formatResult(result: ResultRecord): string[] {
  const lines = [
    `Last result: ${result.success ? 'SUCCESS' : 'FAILURE'} (${result.phase}, ${result.timestamp})`,
    `  Available: ${result.available ? 'yes' : 'no'}`,
  ];
  if (result.booking) {
    lines.push(
      `  Booking: ${result.booking.success ? 'succeeded' : 'failed'}` +
        (result.booking.failedStep ? ` at step '${result.booking.failedStep}'` : '')
    );
  }
  if (result.confirmationNumber) {
    lines.push(`  Confirmation: ${result.confirmationNumber}`);
  }
  if (result.error) {
    lines.push(`  Error: ${result.error}`);
  }
  return lines;
}

export function formatStatus(status: DaemonStatus): string[] {
  if (status.state === 'RUNNING') {
    const lines = [`Status: RUNNING (PID: ${status.handle.pid}, since ${status.handle.startedAt})`];
    if (status.snapshot) lines.push(...formatSnapshot(status.snapshot));
    if (status.config) {
      lines.push('', 'Configuration:', JSON.stringify(status.config, null, 2));
    }
    return lines;
  }

  const lines = [`Status: NOT RUNNING (${NOT_RUNNING_DETAIL[status.reason]})`];
  if (status.staleHandle) {
    lines.push(`Previous worker PID ${status.staleHandle.pid} ended without clearing its handle`);
  }
  if (status.snapshot) lines.push(...formatSnapshot(status.snapshot));
  if (status.result) lines.push(...formatResult(status.result));
  return lines;
}
