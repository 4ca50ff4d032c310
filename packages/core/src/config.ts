/**
 * Data directory resolution and the config.json settings file.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ValidationError } from './errors.js';
import { readJsonDocument, writeJsonDocument } from './store/json-file.js';

export const CONFIG_FILE = 'config.json';
const APP_DIR = 'tinytask';

const ConfigSchema = z.object({
  /** Horizon of the "upcoming" due window, in days after today */
  upcomingDays: z.number().int().min(0).max(365).default(7),
  /** Joins tags into one cell on export */
  tagDelimiter: z.string().min(1).default(','),
});

export type TinyTaskConfig = z.output<typeof ConfigSchema>;

export const DEFAULT_CONFIG: TinyTaskConfig = ConfigSchema.parse({});

export const CONFIG_KEYS = ['upcomingDays', 'tagDelimiter'] as const;
export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some(k => k === key);
}

/** Returns the platform-appropriate default data directory */
export function getDefaultDataDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (platform === 'darwin') {
    return join(homedir(), 'Library', 'Application Support', APP_DIR);
  }
  if (platform === 'win32') {
    return join(env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), APP_DIR);
  }
  // Linux / other
  return join(env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), APP_DIR);
}

/** TINYTASK_HOME wins over the platform default */
export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env['TINYTASK_HOME'];
  return override ? override : getDefaultDataDir(process.platform, env);
}

export function getConfigPath(dataDir: string): string {
  return join(dataDir, CONFIG_FILE);
}

/** Missing file or keys fall back to defaults; a malformed file is a CorruptDataError */
export function loadConfig(dataDir: string): TinyTaskConfig {
  return readJsonDocument(getConfigPath(dataDir), ConfigSchema) ?? { ...DEFAULT_CONFIG };
}

export function saveConfig(dataDir: string, config: TinyTaskConfig): void {
  writeJsonDocument(getConfigPath(dataDir), config);
}

/** Parse a raw string for `key` and return the updated config */
export function setConfigValue(config: TinyTaskConfig, key: string, raw: string): TinyTaskConfig {
  if (!isConfigKey(key)) {
    throw new ValidationError(`Unknown config key '${key}'. Use: ${CONFIG_KEYS.join(', ')}`, key);
  }

  const value = key === 'upcomingDays'
    ? (raw.trim() === '' ? NaN : Number(raw))
    : raw;

  const parsed = ConfigSchema.safeParse({ ...config, [key]: value });
  if (!parsed.success) {
    const reason = parsed.error.issues[0]?.message ?? 'invalid value';
    throw new ValidationError(`Invalid value for ${key}: ${reason}`, key);
  }
  return parsed.data;
}
