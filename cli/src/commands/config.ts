import type { ParsedFlags } from '../lib/parse.js';
import {
  readConfig,
  setConfigValue,
  unsetConfigValue,
  getConfigValue,
  resetConfig,
  getConfigPath,
  getDefaults,
  CONFIG_KEYS,
  type ConfigValue,
} from '../lib/config-store.js';
import { maskSecret } from '../lib/format.js';
import { printHeader, printKeyValue, printSuccess, dim, printBlank, printJson, isJson } from '../lib/output.js';
import { EXIT_SUCCESS, exitUsage } from '../lib/errors.js';

function display(key: string, value: ConfigValue | undefined): string {
  if (value === undefined) return dim('(not set)');
  if (key === 'token' && typeof value === 'string') return maskSecret(value);
  return String(value);
}

export async function run(args: string[], _flags: ParsedFlags): Promise<number> {
  const action = args[0];

  switch (action) {
    case 'set': {
      const key = args[1];
      const value = args.slice(2).join(' ');
      if (!key || !value) exitUsage('Usage: zipvault config set <key> <value>');
      setConfigValue(key, value);
      printSuccess(`${key} = ${display(key, getConfigValue(key))}`);
      break;
    }

    case 'get': {
      const key = args[1];
      if (!key) exitUsage('Usage: zipvault config get <key>');
      const val = getConfigValue(key);
      console.log(val !== undefined ? String(val) : dim('(not set)'));
      break;
    }

    case 'unset': {
      const key = args[1];
      if (!key) exitUsage('Usage: zipvault config unset <key>');
      unsetConfigValue(key);
      printSuccess(`${key} restored to its default.`);
      break;
    }

    case 'list': {
      const config = readConfig();
      const defaults = getDefaults();
      if (isJson()) {
        printJson({ ...config, token: config.token === undefined ? undefined : maskSecret(config.token) });
        break;
      }
      printHeader('zipvault configuration');

      for (const key of CONFIG_KEYS) {
        const val = config[key];
        const shown = display(key, val);
        printKeyValue(key, val === defaults[key] ? dim(shown) : shown);
      }

      printBlank();
      console.log(`  ${dim(`Config file: ${getConfigPath()}`)}`);
      if (process.env.ZIPVAULT_TOKEN) console.log(`  ${dim('ZIPVAULT_TOKEN is set and overrides token.')}`);
      printBlank();
      break;
    }

    case 'reset': {
      resetConfig();
      printSuccess('Configuration reset to defaults.');
      break;
    }

    case 'path': {
      console.log(getConfigPath());
      break;
    }

    default:
      exitUsage(
        action
          ? `Unknown config action: "${action}". Use: set, get, unset, list, reset, or path.`
          : 'Usage: zipvault config <set|get|unset|list|reset|path>',
      );
  }
  return EXIT_SUCCESS;
}
