import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { ZipvaultValidationError } from '@zipvault/core';
import { parseBoolean, parseInteger } from './parse.js';

const STRING_KEYS = ['simple-url', 'chunked-url', 'token', 'state-dir'] as const;
const BOOLEAN_KEYS = ['enable-simple', 'enable-chunked', 'force-simple', 'force-chunked', 'use-sha256'] as const;

/** Whole-number keys with their accepted [min, max]. */
export const INTEGER_RANGES = {
  'simple-limit-mb': [1, 1_000_000],
  'chunked-limit-mb': [1, 1_000_000],
  'ceiling-mb': [1, 1_000_000],
  workers: [1, 64],
  retries: [0, 20],
  'compression-level': [0, 9],
} as const;

type StringKey = (typeof STRING_KEYS)[number];
type BooleanKey = (typeof BOOLEAN_KEYS)[number];
type IntegerKey = keyof typeof INTEGER_RANGES;
export type ConfigKey = StringKey | BooleanKey | IntegerKey;
export type ConfigValue = string | number | boolean;

export interface ZipvaultCliConfig
  extends Partial<Record<StringKey, string>>,
    Record<BooleanKey, boolean>,
    Record<IntegerKey, number> {}

const DEFAULT_CONFIG: ZipvaultCliConfig = {
  'simple-url': undefined,
  'chunked-url': undefined,
  token: undefined,
  'enable-simple': true,
  'enable-chunked': true,
  'force-simple': false,
  'force-chunked': false,
  'simple-limit-mb': 50,
  'chunked-limit-mb': 2000,
  'ceiling-mb': 1900,
  workers: 3,
  retries: 5,
  'compression-level': 6,
  'use-sha256': false,
  'state-dir': undefined,
};

const INTEGER_KEYS: readonly IntegerKey[] = ['simple-limit-mb', 'chunked-limit-mb', 'ceiling-mb', 'workers', 'retries', 'compression-level'];
export const CONFIG_KEYS: readonly ConfigKey[] = [...STRING_KEYS, ...BOOLEAN_KEYS, ...INTEGER_KEYS];

function isStringKey(key: string): key is StringKey {
  return STRING_KEYS.some(k => k === key);
}

function isBooleanKey(key: string): key is BooleanKey {
  return BOOLEAN_KEYS.some(k => k === key);
}

function isIntegerKey(key: string): key is IntegerKey {
  return INTEGER_KEYS.some(k => k === key);
}

export function isConfigKey(key: string): key is ConfigKey {
  return isStringKey(key) || isBooleanKey(key) || isIntegerKey(key);
}

export function getConfigDir(): string {
  if (process.platform === 'win32') {
    return path.join(process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming'), 'zipvault');
  }
  if (process.platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', 'zipvault');
  }
  return path.join(process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config'), 'zipvault');
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

/**
 * Read the settings file merged over the defaults. Entries that are unknown or
 * fail validation are ignored, as is a file that does not parse.
 */
export function readConfig(): ZipvaultCliConfig {
  const config = getDefaults();
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(getConfigPath(), 'utf-8'));
  } catch {
    return config;
  }
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) return config;

  for (const [key, value] of Object.entries(raw)) {
    if (isStringKey(key) && typeof value === 'string') {
      config[key] = value;
    } else if (isBooleanKey(key) && typeof value === 'boolean') {
      config[key] = value;
    } else if (isIntegerKey(key) && typeof value === 'number' && inRange(key, value)) {
      config[key] = value;
    }
  }
  return config;
}

export function writeConfig(config: ZipvaultCliConfig): void {
  const configPath = getConfigPath();
  const dir = path.dirname(configPath);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

export function getConfigValue(key: string): ConfigValue | undefined {
  validateConfigKey(key);
  if (!isConfigKey(key)) return undefined;
  return readConfig()[key];
}

export function setConfigValue(key: string, value: string): void {
  validateConfigKey(key);
  const config = readConfig();

  if (isStringKey(key)) {
    config[key] = parseStringValue(key, value);
  } else if (isBooleanKey(key)) {
    config[key] = parseBoolean(value, key);
  } else if (isIntegerKey(key)) {
    const [min, max] = INTEGER_RANGES[key];
    config[key] = parseInteger(value, key, min, max);
  }

  writeConfig(config);
}

/** Restore one key to its default. */
export function unsetConfigValue(key: string): void {
  validateConfigKey(key);
  const config = readConfig();
  const defaults = getDefaults();

  if (isStringKey(key)) {
    config[key] = defaults[key];
  } else if (isBooleanKey(key)) {
    config[key] = defaults[key];
  } else if (isIntegerKey(key)) {
    config[key] = defaults[key];
  }

  writeConfig(config);
}

export function resetConfig(): void {
  writeConfig(getDefaults());
}

export function validateConfigKey(key: string): void {
  if (!isConfigKey(key)) {
    throw new ZipvaultValidationError(`Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`);
  }
}

export function getDefaults(): ZipvaultCliConfig {
  return { ...DEFAULT_CONFIG };
}

function inRange(key: IntegerKey, value: number): boolean {
  const [min, max] = INTEGER_RANGES[key];
  return Number.isInteger(value) && value >= min && value <= max;
}

function parseStringValue(key: StringKey, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) throw new ZipvaultValidationError(`Invalid value for ${key}: value must not be empty.`);
  if (key === 'simple-url' || key === 'chunked-url') {
    if (!isHttpUrl(trimmed)) {
      throw new ZipvaultValidationError(`Invalid value for ${key}: "${value}". Must be an http(s) URL.`);
    }
    return trimmed.replace(/\/+$/, '');
  }
  if (key === 'state-dir') return path.resolve(trimmed);
  return trimmed;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
