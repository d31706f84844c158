/**
 * Core type definitions for Ferry Monitor
 */

/**
 * Vehicle height bucket understood by the booking executor
 */
export type VehicleHeight = 'under_7ft' | '7ft_to_8ft' | 'over_8ft';

/**
 * Vehicle length bucket understood by the booking executor
 */
export type VehicleLength = 'under_20ft' | '20ft_to_22ft' | 'over_22ft';

/**
 * Monitoring parameters
 */
export interface MonitorConfig {
  departure: string;
  arrival: string;
  date: string;
  time: string;
  adults: number;
  children: number;
  seniors: number;
  infants: number;
  vehicle: boolean;
  pollInterval: number; // seconds
  timeout: number; // seconds
  continuous: boolean;
  autoBook: boolean;
}

/**
 * Non-secret booking parameters (only meaningful when autoBook is set)
 */
export interface BookingConfig {
  bookingDate: string;
  vehicleHeight: VehicleHeight;
  vehicleLength: VehicleLength;
  dryRun: boolean;
}

/**
 * Account and payment secrets.
 * Values may be literals or `env:NAME` references.
 */
export interface BookingCredentials {
  email: string;
  password: string;
  cardName: string;
  cardNumber: string;
  cardExpiry: string;
  cardCvv: string;
  address: string;
  city: string;
  province: string;
  postalCode: string;
  country: string;
}

/**
 * Everything the configuration store holds for one daemon
 */
export interface StoredConfig {
  monitor: MonitorConfig;
  booking: BookingConfig | null;
  credentials: BookingCredentials | null;
}

/**
 * Configuration with secrets removed, safe to print
 */
export interface RedactedConfig {
  monitor: MonitorConfig;
  booking: (BookingConfig & { email: string | null }) | null;
}

/**
 * Identity of the detached worker
 */
export interface DaemonHandle {
  pid: number;
  startedAt: string;
}

export type WorkflowPhase = 'monitoring' | 'booking' | 'completed' | 'failed';

/**
 * Latest state of the running workflow
 */
export interface StatusSnapshot {
  phase: WorkflowPhase;
  cycle: number;
  updatedAt: string;
  pid: number;
  route: { departure: string; arrival: string };
  schedule: { date: string; time: string };
  message: string;
}

/**
 * Structured payload reported by the availability prober
 */
export interface ProbeResult {
  available: boolean;
  sailing?: Record<string, unknown>;
  elapsed: number;
  checks: number;
  price?: string | number;
  status?: string;
  reason?: string;
}

/**
 * Structured payload reported by the booking executor
 */
export interface BookingOutcome {
  success: boolean;
  confirmationNumber: string | null;
  failedStep: string | null;
  error: string | null;
  raceCondition?: boolean;
}

/**
 * Authoritative record of what a run did
 */
export interface ResultRecord {
  success: boolean;
  timestamp: string;
  phase: WorkflowPhase;
  available: boolean;
  availability: ProbeResult | null;
  confirmationNumber: string | null;
  booking: BookingOutcome | null;
  error: string | null;
}

/**
 * Pending confirmation for disabling dry-run
 */
export interface DryRunToken {
  token: string;
  expiresAt: string;
}

export type NotRunningReason = 'never-started' | 'exited' | 'stale-handle-cleared';

/**
 * Answer to a status query
 */
export type DaemonStatus =
  | {
      state: 'RUNNING';
      handle: DaemonHandle;
      snapshot: StatusSnapshot | null;
      config: RedactedConfig | null;
    }
  | {
      state: 'NOT_RUNNING';
      reason: NotRunningReason;
      staleHandle: DaemonHandle | null;
      snapshot: StatusSnapshot | null;
      result: ResultRecord | null;
    };

/**
 * Notification message
 */
export interface NotificationMessage {
  title: string;
  body: string;
  clickUrl: string;
}

/**
 * Ntfy configuration
 */
export interface NtfyConfig {
  serverUrl: string;
  topic: string | null;
  priority: 'default' | 'low' | 'high' | 'urgent';
  tags: string[];
  clickUrl: string;
}

/**
 * External command configuration
 */
export interface CommandConfig {
  command: string;
  args: string[];
}

/**
 * Workflow timing configuration
 */
export interface WorkflowConfig {
  cooldownMs: number;
}

/**
 * Logging configuration
 */
export interface LoggingConfig {
  level: 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';
}

/**
 * Complete application settings
 */
export interface AppSettings {
  stateDir: string;
  workflow: WorkflowConfig;
  prober: CommandConfig;
  executor: CommandConfig & { headless: boolean };
  ntfy: NtfyConfig;
  logging: LoggingConfig;
}
