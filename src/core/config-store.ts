/**
 * Configuration Store: monitor + booking parameters and booking secrets
 *
 * Operational settings live in config.json. Account and payment secrets live
 * in credentials.json (mode 0600) and may be `env:NAME` references instead of
 * cleartext, resolved from the environment of whichever process needs them.
 */

import { readFile, rm } from 'fs/promises';
import { z } from 'zod';
import type {
  BookingConfig,
  BookingCredentials,
  RedactedConfig,
  StoredConfig,
} from '../types/index.js';
import { ConfigFileSchema, CredentialsSchema } from '../config/schema.js';
import { formatZodError } from '../config/index.js';
import { ConfigurationError, IncompleteBookingConfigError } from './errors.js';
import { writeJsonFileAtomic, type StateStore } from './state-store.js';

const ENV_REFERENCE_PREFIX = 'env:';

/**
 * Credential fields that must resolve to a non-empty value before auto-booking
 */
export const REQUIRED_CREDENTIAL_FIELDS: readonly (keyof BookingCredentials)[] = [
  'email',
  'password',
  'cardName',
  'cardNumber',
  'cardExpiry',
  'cardCvv',
  'address',
  'city',
  'province',
  'postalCode',
];

const SaveConfigSchema = ConfigFileSchema.extend({
  credentials: CredentialsSchema.nullable().default(null),
});

export type SaveConfigInput = z.input<typeof SaveConfigSchema>;

/**
 * Validate a configuration document, either `{ monitor, booking, credentials }`
 * or the flat layout with monitoring fields at the top level
 */
export function parseConfigDocument(raw: unknown): SaveConfigInput {
  let doc: unknown = raw;
  if (typeof raw === 'object' && raw !== null && !('monitor' in raw)) {
    doc = {
      monitor: raw,
      booking: 'booking' in raw ? raw.booking : null,
      credentials: 'credentials' in raw ? raw.credentials : null,
    };
  }

  const parsed = SaveConfigSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ConfigurationError(`Configuration validation failed:\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

export class ConfigStore {
  constructor(private store: StateStore) {}

  get configFile(): string {
    return this.store.pathOf('config');
  }

  exists(): boolean {
    return this.store.exists('config');
  }

  /**
   * Load the stored configuration, or null if none has been written
   */
  async load(): Promise<StoredConfig | null> {
    const raw = await readJson(this.configFile);
    if (raw === undefined) return null;

    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid configuration in ${this.configFile}:\n${formatZodError(parsed.error)}`
      );
    }

    const { monitor, booking } = parsed.data;
    const bookingConfig: BookingConfig | null = booking
      ? { ...booking, bookingDate: booking.bookingDate ?? monitor.date }
      : null;

    return {
      monitor,
      booking: bookingConfig,
      credentials: await this.loadCredentials(),
    };
  }

  private async loadCredentials(): Promise<BookingCredentials | null> {
    const path = this.store.pathOf('credentials');
    const raw = await readJson(path);
    if (raw === undefined) return null;

    const parsed = CredentialsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid credentials in ${path}:\n${formatZodError(parsed.error)}`
      );
    }
    return parsed.data;
  }

  /**
   * Validate and persist a configuration, replacing whatever was stored
   */
  async save(input: SaveConfigInput): Promise<StoredConfig> {
    const parsed = SaveConfigSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigurationError(`Configuration validation failed:\n${formatZodError(parsed.error)}`);
    }
    const { credentials: secrets, ...file } = parsed.data;

    await this.store.ensureDir();
    await writeJsonFileAtomic(this.configFile, file);

    const credentialsFile = this.store.pathOf('credentials');
    if (secrets) {
      await writeJsonFileAtomic(credentialsFile, secrets, 0o600);
    } else {
      await rm(credentialsFile, { force: true });
    }

    return {
      monitor: file.monitor,
      booking: file.booking
        ? { ...file.booking, bookingDate: file.booking.bookingDate ?? file.monitor.date }
        : null,
      credentials: secrets,
    };
  }
}

async function readJson(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }

  try {
    return JSON.parse(content);
  } catch {
    throw new ConfigurationError(`${path} is not valid JSON`);
  }
}

/**
 * Resolve `env:NAME` references. Unset variables resolve to ''.
 */
export function resolveCredentials(
  credentials: BookingCredentials,
  env: NodeJS.ProcessEnv = process.env
): BookingCredentials {
  const resolve = (value: string): string =>
    value.startsWith(ENV_REFERENCE_PREFIX)
      ? env[value.slice(ENV_REFERENCE_PREFIX.length)] ?? ''
      : value;

  return {
    email: resolve(credentials.email),
    password: resolve(credentials.password),
    cardName: resolve(credentials.cardName),
    cardNumber: resolve(credentials.cardNumber),
    cardExpiry: resolve(credentials.cardExpiry),
    cardCvv: resolve(credentials.cardCvv),
    address: resolve(credentials.address),
    city: resolve(credentials.city),
    province: resolve(credentials.province),
    postalCode: resolve(credentials.postalCode),
    country: resolve(credentials.country),
  };
}

/**
 * Names of required credential fields that are empty after resolution
 */
export function missingCredentialFields(
  credentials: BookingCredentials | null,
  env: NodeJS.ProcessEnv = process.env
): string[] {
  if (!credentials) return [...REQUIRED_CREDENTIAL_FIELDS];
  const resolved = resolveCredentials(credentials, env);
  return REQUIRED_CREDENTIAL_FIELDS.filter((field) => resolved[field].trim() === '');
}

/**
 * Throw unless an auto-booking configuration is complete
 */
export function assertBookable(config: StoredConfig, env: NodeJS.ProcessEnv = process.env): void {
  if (!config.monitor.autoBook) return;

  const missing = missingCredentialFields(config.credentials, env);
  if (!config.booking) missing.unshift('booking');
  if (missing.length > 0) {
    throw new IncompleteBookingConfigError(missing);
  }
}

/**
 * Strip every secret from a stored configuration
 */
export function redactConfig(config: StoredConfig): RedactedConfig {
  return {
    monitor: config.monitor,
    booking: config.booking
      ? { ...config.booking, email: maskEmail(config.credentials?.email ?? '') }
      : null,
  };
}

/**
 * References are shown as-is; literal addresses keep only their first letter and domain
 */
function maskEmail(email: string): string | null {
  if (email === '') return null;
  if (email.startsWith(ENV_REFERENCE_PREFIX)) return email;
  const at = email.indexOf('@');
  if (at < 1) return '***';
  return `${email[0]}***${email.slice(at)}`;
}
