/**
 * Configuration schema validation using Zod
 *
 * The defaults declared here are the single default table for every
 * persisted field; nothing downstream supplies its own fallbacks.
 */

import { z } from 'zod';

/**
 * Polling faster than this risks upstream rate limits
 */
export const MIN_POLL_INTERVAL_SECONDS = 10;

export const DEFAULT_STATE_DIR = '/tmp/ferry-monitor';

export const DEFAULT_CLICK_URL = 'https://www.bcferries.com/';

// ---- Application settings ----

/**
 * Ntfy configuration schema
 */
export const NtfyConfigSchema = z.object({
  serverUrl: z.string().url().default('https://ntfy.sh'),
  topic: z.string().min(1).nullable().default(null),
  priority: z.enum(['default', 'low', 'high', 'urgent']).default('high'),
  tags: z.array(z.string()).default(['ferry']),
  clickUrl: z.string().url().default(DEFAULT_CLICK_URL),
});

/**
 * Workflow configuration schema
 */
export const WorkflowConfigSchema = z.object({
  cooldownMs: z.number().int().nonnegative().default(300_000),
});

/**
 * External command schemas
 */
export const ProberCommandSchema = z.object({
  command: z.string().min(1).default('wait-for-ferry'),
  args: z.array(z.string()).default([]),
});

export const ExecutorCommandSchema = z.object({
  command: z.string().min(1).default('bc-ferries-book'),
  args: z.array(z.string()).default([]),
  headless: z.boolean().default(true),
});

/**
 * Logging configuration schema
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']).default('INFO'),
});

/**
 * Complete application settings schema
 */
export const AppSettingsSchema = z.object({
  stateDir: z.string().min(1).default(DEFAULT_STATE_DIR),
  workflow: WorkflowConfigSchema.default({}),
  prober: ProberCommandSchema.default({}),
  executor: ExecutorCommandSchema.default({}),
  ntfy: NtfyConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type AppSettingsInput = z.input<typeof AppSettingsSchema>;

// ---- Monitor configuration (config.json) ----

/**
 * Monitoring parameters schema
 */
export const MonitorConfigSchema = z
  .object({
    departure: z.string().trim().min(1),
    arrival: z.string().trim().min(1),
    date: z.string().trim().min(1),
    time: z.string().trim().min(1),
    adults: z.number().int().nonnegative().default(1),
    children: z.number().int().nonnegative().default(0),
    seniors: z.number().int().nonnegative().default(0),
    infants: z.number().int().nonnegative().default(0),
    vehicle: z.boolean().default(true),
    pollInterval: z.number().int().min(MIN_POLL_INTERVAL_SECONDS).default(60),
    timeout: z.number().int().positive().default(3600),
    continuous: z.boolean().default(false),
    autoBook: z.boolean().default(false),
  })
  .refine((c) => c.adults + c.children + c.seniors > 0, {
    message: 'At least one passenger (adult, child or senior) is required',
    path: ['adults'],
  });

/**
 * Non-secret booking parameters schema.
 * bookingDate falls back to the monitoring date in the store.
 */
export const BookingConfigSchema = z.object({
  bookingDate: z.string().trim().min(1).optional(),
  vehicleHeight: z.enum(['under_7ft', '7ft_to_8ft', 'over_8ft']).default('under_7ft'),
  vehicleLength: z.enum(['under_20ft', '20ft_to_22ft', 'over_22ft']).default('under_20ft'),
  dryRun: z.boolean().default(true),
});

export const ConfigFileSchema = z.object({
  monitor: MonitorConfigSchema,
  booking: BookingConfigSchema.nullable().default(null),
});

/**
 * Secret material schema (credentials.json).
 * Empty strings are allowed here; completeness is checked before start.
 */
export const CredentialsSchema = z.object({
  email: z.string().default(''),
  password: z.string().default(''),
  cardName: z.string().default(''),
  cardNumber: z.string().default(''),
  cardExpiry: z.string().default(''),
  cardCvv: z.string().default(''),
  address: z.string().default(''),
  city: z.string().default(''),
  province: z.string().default('British Columbia'),
  postalCode: z.string().default(''),
  country: z.string().default('Canada'),
});

export type CredentialsInput = z.input<typeof CredentialsSchema>;

// ---- Runtime state files ----

export const DaemonHandleSchema = z.object({
  pid: z.number().int().positive(),
  startedAt: z.string(),
});

export const DryRunTokenSchema = z.object({
  token: z.string().min(1),
  expiresAt: z.string(),
});

const PhaseSchema = z.enum(['monitoring', 'booking', 'completed', 'failed']);

export const StatusSnapshotSchema = z.object({
  phase: PhaseSchema,
  cycle: z.number().int(),
  updatedAt: z.string(),
  pid: z.number().int(),
  route: z.object({ departure: z.string(), arrival: z.string() }),
  schedule: z.object({ date: z.string(), time: z.string() }),
  message: z.string(),
});

/**
 * Prober JSON payload. Unknown keys from the tool are kept.
 */
export const ProbeResultSchema = z
  .object({
    available: z.boolean(),
    sailing: z.record(z.unknown()).optional(),
    elapsed: z.number().default(0),
    checks: z.number().int().default(0),
    price: z.union([z.string(), z.number()]).optional(),
    status: z.string().optional(),
    reason: z.string().optional(),
  })
  .passthrough();

/**
 * Executor JSON payload
 */
export const BookingOutcomeSchema = z.object({
  success: z.boolean(),
  confirmationNumber: z.string().nullable().default(null),
  failedStep: z.string().nullable().default(null),
  error: z.string().nullable().default(null),
  raceCondition: z.boolean().optional(),
});

export const ResultRecordSchema = z.object({
  success: z.boolean(),
  timestamp: z.string(),
  phase: PhaseSchema,
  available: z.boolean(),
  availability: ProbeResultSchema.nullable(),
  confirmationNumber: z.string().nullable(),
  booking: BookingOutcomeSchema.nullable(),
  error: z.string().nullable(),
});
