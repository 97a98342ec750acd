import { ZipvaultValidationError } from '@zipvault/core';

/** Flags that never take a value, so a following positional is not swallowed. */
export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set([
  'help',
  'version',
  'quiet',
  'json',
  'force-simple',
  'force-chunked',
  'use-sha256',
  'keep-parts',
  'h',
  'v',
]);

export interface ParsedFlags {
  [key: string]: string | string[] | boolean | undefined;
}

export interface ParsedArgs {
  command: string;
  args: string[];
  flags: ParsedFlags;
}

function isBooleanFlag(arg: string, booleanFlags: ReadonlySet<string>): boolean {
  if (arg.startsWith('--no-')) return true;
  const key = arg.startsWith('--') ? arg.slice(2) : arg.slice(1);
  return booleanFlags.has(key);
}

export function parseArgs(argv: string[], booleanFlags: ReadonlySet<string> = BOOLEAN_FLAGS): ParsedArgs {
  // Skip node executable and script path
  const raw = argv.slice(2);

  // The command is the first positional that is not a flag value
  let command = '';
  let commandIndex = -1;
  for (let i = 0; i < raw.length; i++) {
    const arg = raw[i];
    if (arg === '--') break;
    if (arg.startsWith('-')) {
      if (!isBooleanFlag(arg, booleanFlags) && !arg.includes('=')) i++;
      continue;
    }
    command = arg;
    commandIndex = i;
    break;
  }

  const rest = commandIndex >= 0
    ? [...raw.slice(0, commandIndex), ...raw.slice(commandIndex + 1)]
    : raw;

  const args: string[] = [];
  const flags: ParsedFlags = {};

  const setFlag = (key: string, value: string): void => {
    const existing = flags[key];
    if (Array.isArray(existing)) {
      existing.push(value);
    } else if (typeof existing === 'string') {
      flags[key] = [existing, value];
    } else {
      flags[key] = value;
    }
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    if (arg === '--') {
      args.push(...rest.slice(i + 1));
      break;
    }

    if (arg.startsWith('--no-')) {
      flags[arg.slice(5)] = false;
      continue;
    }

    if (arg.startsWith('--') || (arg.startsWith('-') && arg.length === 2)) {
      const key = arg.startsWith('--') ? arg.slice(2) : arg.slice(1);
      const eq = key.indexOf('=');
      if (eq > 0) {
        setFlag(key.slice(0, eq), key.slice(eq + 1));
        continue;
      }

      const next = rest[i + 1];
      if (booleanFlags.has(key) || next === undefined || next.startsWith('-')) {
        flags[key] = true;
        continue;
      }

      i++;
      setFlag(key, next);
      continue;
    }

    args.push(arg);
  }

  return { command, args, flags };
}

export function getFlag(flags: ParsedFlags, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const val = flags[key];
    if (typeof val === 'string') return val;
    if (Array.isArray(val)) return val[val.length - 1];
  }
  return undefined;
}

export function getFlagBool(flags: ParsedFlags, ...keys: string[]): boolean | undefined {
  for (const key of keys) {
    const val = flags[key];
    if (typeof val === 'boolean') return val;
  }
  return undefined;
}

export function hasFlag(flags: ParsedFlags, ...keys: string[]): boolean {
  return keys.some(k => flags[k] !== undefined);
}

/**
 * Parse a whole number within [min, max]. `label` names the setting in the error.
 */
export function parseInteger(input: string, label: string, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const trimmed = input.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ZipvaultValidationError(`Invalid value for ${label}: "${input}". Must be a whole number.`);
  }
  const n = Number(trimmed);
  if (n < min || n > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `at least ${min}` : `between ${min} and ${max}`;
    throw new ZipvaultValidationError(`Invalid value for ${label}: "${input}". Must be ${range}.`);
  }
  return n;
}

const TRUE_WORDS = new Set(['true', 'on', 'yes', '1']);
const FALSE_WORDS = new Set(['false', 'off', 'no', '0']);

export function parseBoolean(input: string, label: string): boolean {
  const word = input.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  throw new ZipvaultValidationError(`Invalid value for ${label}: "${input}". Must be "true" or "false".`);
}

/** Megabytes as used throughout the settings: 1 MB = 1,000,000 bytes. */
export function megabytesToBytes(mb: number): number {
  return mb * 1_000_000;
}
