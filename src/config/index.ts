/**
 * Settings loader with YAML support and validation
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { AppSettings } from '../types/index.js';
import { AppSettingsSchema } from './schema.js';

/**
 * Default settings paths
 */
const DEFAULT_SETTINGS_PATHS = [
  './config/settings.yaml',
  './config/settings.yml',
  './settings.yaml',
  './settings.yml',
];

/**
 * Environment variable that relocates the state directory
 */
export const STATE_DIR_ENV = 'FERRY_MONITOR_DIR';

/**
 * Load settings from a YAML file.
 * Without an explicit path and without a default file, every field takes its default.
 */
export async function loadSettings(
  settingsPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<AppSettings> {
  if (settingsPath && !existsSync(settingsPath)) {
    throw new Error(`Settings file not found: ${settingsPath}`);
  }

  const path = settingsPath || findSettingsPath();
  const raw: unknown = path ? yaml.load(await readFile(path, 'utf-8')) : {};

  // An empty YAML document loads as undefined
  const settings = AppSettingsSchema.parse(raw ?? {});

  const stateDir = env[STATE_DIR_ENV];
  if (stateDir) {
    settings.stateDir = stateDir;
  }

  return settings;
}

/**
 * Find first existing settings file
 */
function findSettingsPath(): string | null {
  for (const path of DEFAULT_SETTINGS_PATHS) {
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Flatten a Zod error into one `path: message` line per issue
 */
export function formatZodError(err: z.ZodError): string {
  return err.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('\n');
}

/**
 * Load settings with error handling for CLI use
 */
export async function loadSettingsSafe(settingsPath?: string): Promise<{
  settings: AppSettings | null;
  error: string | null;
}> {
  try {
    const settings = await loadSettings(settingsPath);
    return { settings, error: null };
  } catch (err) {
    if (err instanceof z.ZodError) {
      return { settings: null, error: `Settings validation failed:\n${formatZodError(err)}` };
    }
    if (err instanceof yaml.YAMLException) {
      return { settings: null, error: `Settings file is not valid YAML: ${err.message}` };
    }
    if (err instanceof Error) {
      return { settings: null, error: err.message };
    }
    return { settings: null, error: 'Unknown error' };
  }
}
