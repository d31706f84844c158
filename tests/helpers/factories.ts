import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { vi } from 'vitest';
import type {
  BookingConfig,
  BookingCredentials,
  MonitorConfig,
  ProbeResult,
  StoredConfig,
} from '../../src/types/index.js';

export function buildMonitorConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
  return {
    departure: 'Departure Bay',
    arrival: 'Horseshoe Bay',
    date: '10/15/2025',
    time: '1:20 pm',
    adults: 2,
    children: 0,
    seniors: 0,
    infants: 0,
    vehicle: true,
    pollInterval: 60,
    timeout: 3600,
    continuous: false,
    autoBook: false,
    ...overrides,
  };
}

export function buildBookingConfig(overrides: Partial<BookingConfig> = {}): BookingConfig {
  return {
    bookingDate: '2025-10-15',
    vehicleHeight: 'under_7ft',
    vehicleLength: 'under_20ft',
    dryRun: true,
    ...overrides,
  };
}

export function buildCredentials(overrides: Partial<BookingCredentials> = {}): BookingCredentials {
  return {
    email: 'traveller@example.test',
    password: 'test-secret',
    cardName: 'Test Traveller',
    cardNumber: '0000000000000000',
    cardExpiry: '01/30',
    cardCvv: '000',
    address: '1 Test Street',
    city: 'Nanaimo',
    province: 'British Columbia',
    postalCode: 'V0V 0V0',
    country: 'Canada',
    ...overrides,
  };
}

export function buildStoredConfig(
  monitor: Partial<MonitorConfig> = {},
  options: { booking?: Partial<BookingConfig>; credentials?: Partial<BookingCredentials> } = {}
): StoredConfig {
  const config = buildMonitorConfig(monitor);
  if (!config.autoBook) {
    return { monitor: config, booking: null, credentials: null };
  }
  return {
    monitor: config,
    booking: buildBookingConfig(options.booking),
    credentials: buildCredentials(options.credentials),
  };
}

export function buildProbeResult(overrides: Partial<ProbeResult> = {}): ProbeResult {
  return {
    available: true,
    sailing: { time: '1:20 pm' },
    elapsed: 120,
    checks: 2,
    price: '$57.45',
    status: 'AVAILABLE',
    ...overrides,
  };
}

export function createLoggerMock() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'ferry-monitor-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
