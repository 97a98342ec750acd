import path from 'node:path';
import {
  Archiver,
  ChunkedBackend,
  JsonMetadataStore,
  SimpleBackend,
  TransferOrchestrator,
  ZipvaultValidationError,
  type BackendPolicy,
  type BackendSet,
  type FetchFn,
  type TransferOrchestratorOptions,
} from '@zipvault/core';
import { INTEGER_RANGES, getConfigDir, readConfig, type ZipvaultCliConfig } from './config-store.js';
import { getFlag, getFlagBool, megabytesToBytes, parseInteger, type ParsedFlags } from './parse.js';

/** Settings for one invocation: the config file, then ZIPVAULT_TOKEN, then flags. */
export interface CliSettings {
  simpleUrl?: string;
  chunkedUrl?: string;
  token?: string;
  policy: BackendPolicy;
  ceilingBytes: number;
  workers: number;
  retries: number;
  compressionLevel: number;
  useSha256: boolean;
  stateDir: string;
}

type IntegerSetting = keyof typeof INTEGER_RANGES;

function integerSetting(flags: ParsedFlags, config: ZipvaultCliConfig, key: IntegerSetting): number {
  const raw = getFlag(flags, key);
  if (raw === undefined) return config[key];
  const [min, max] = INTEGER_RANGES[key];
  return parseInteger(raw, `--${key}`, min, max);
}

export function resolveSettings(
  flags: ParsedFlags,
  env: NodeJS.ProcessEnv = process.env,
  config: ZipvaultCliConfig = readConfig(),
): CliSettings {
  const simpleUrl = getFlag(flags, 'simple-url') ?? config['simple-url'];
  const chunkedUrl = getFlag(flags, 'chunked-url') ?? config['chunked-url'];
  const token = env.ZIPVAULT_TOKEN || config.token;
  const stateDir = path.resolve(getFlag(flags, 'state-dir') ?? config['state-dir'] ?? path.join(getConfigDir(), 'state'));

  const policy: BackendPolicy = {
    simpleEnabled: config['enable-simple'] && simpleUrl !== undefined,
    chunkedEnabled: config['enable-chunked'] && chunkedUrl !== undefined,
    forceSimple: getFlagBool(flags, 'force-simple') ?? config['force-simple'],
    forceChunked: getFlagBool(flags, 'force-chunked') ?? config['force-chunked'],
    simpleCeilingBytes: megabytesToBytes(integerSetting(flags, config, 'simple-limit-mb')),
    chunkedCeilingBytes: megabytesToBytes(integerSetting(flags, config, 'chunked-limit-mb')),
  };

  return {
    simpleUrl,
    chunkedUrl,
    token,
    policy,
    ceilingBytes: megabytesToBytes(integerSetting(flags, config, 'ceiling-mb')),
    workers: integerSetting(flags, config, 'workers'),
    retries: integerSetting(flags, config, 'retries'),
    compressionLevel: integerSetting(flags, config, 'compression-level'),
    useSha256: getFlagBool(flags, 'use-sha256') ?? config['use-sha256'],
    stateDir,
  };
}

export function getStatePath(settings: CliSettings): string {
  return path.join(settings.stateDir, 'state.json');
}

export function getStagingRoot(settings: CliSettings): string {
  return path.join(settings.stateDir, 'staging');
}

/** Adapters for every enabled backend. Throws when none is usable. */
export function createBackends(settings: CliSettings, fetchFn?: FetchFn): BackendSet {
  const { policy, token } = settings;
  const backends: BackendSet = {};
  if (policy.simpleEnabled && settings.simpleUrl) {
    backends.simple = new SimpleBackend({
      baseUrl: settings.simpleUrl,
      token,
      maxObjectBytes: policy.simpleCeilingBytes,
      fetchFn,
    });
  }
  if (policy.chunkedEnabled && settings.chunkedUrl) {
    backends.chunked = new ChunkedBackend({
      baseUrl: settings.chunkedUrl,
      token,
      maxObjectBytes: policy.chunkedCeilingBytes,
      fetchFn,
    });
  }
  if (!backends.simple && !backends.chunked) {
    throw new ZipvaultValidationError(
      'No backend configured. Run: zipvault config set simple-url <url> (or chunked-url).',
      { code: 'NO_BACKEND' },
    );
  }
  return backends;
}

export interface Runtime {
  orchestrator: TransferOrchestrator;
  store: JsonMetadataStore;
}

export type RuntimeHooks = Pick<TransferOrchestratorOptions, 'onProgress' | 'onUnitSettled' | 'onItemChange'>;

export function createRuntime(settings: CliSettings, backends: BackendSet, hooks: RuntimeHooks = {}): Runtime {
  const store = new JsonMetadataStore(getStatePath(settings));
  const orchestrator = new TransferOrchestrator({
    backends,
    policy: settings.policy,
    store,
    workers: settings.workers,
    retry: { retries: settings.retries },
    ...hooks,
  });
  return { orchestrator, store };
}

export function createArchiver(settings: CliSettings): Archiver {
  return new Archiver({
    outputRoot: getStagingRoot(settings),
    compressionLevel: settings.compressionLevel,
  });
}
