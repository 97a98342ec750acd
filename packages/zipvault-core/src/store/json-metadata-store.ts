import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { classifyFsError, errorCodeOf } from '../errors.js';
import type { BackendVariant, MetadataStore, RemoteReference, SyncItem, SyncItemKind, SyncStatus } from '../types.js';

const STORE_VERSION = 1;

const STATUSES: readonly SyncStatus[] = ['Pending', 'Archiving', 'Queued', 'Uploading', 'Uploaded', 'Failed'];
const KINDS: readonly SyncItemKind[] = ['file', 'archive-part', 'folder'];

interface StoreFile {
  version: number;
  items: SyncItem[];
  lastBackupAt?: string;
}

/**
 * MetadataStore backed by one JSON file.
 *
 * A missing or empty file reads as no items. A file that cannot be parsed is
 * moved aside to `<name>.corrupt.json` and the store starts empty. Saves go
 * through a temporary file and a rename.
 */
export class JsonMetadataStore implements MetadataStore {
  readonly filePath: string;
  private lastBackupAt?: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async load(): Promise<SyncItem[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (err) {
      if (errorCodeOf(err) === 'ENOENT') return [];
      throw classifyFsError(err, this.filePath);
    }
    if (!raw.trim()) return [];

    const parsed = parseStoreFile(raw);
    if (!parsed) {
      await this.quarantine();
      return [];
    }
    this.lastBackupAt = parsed.lastBackupAt;
    return parsed.items;
  }

  async save(items: SyncItem[]): Promise<void> {
    const body: StoreFile = { version: STORE_VERSION, items, lastBackupAt: this.lastBackupAt };
    const tempPath = `${this.filePath}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(body, null, 2) + '\n', 'utf8');
      await rename(tempPath, this.filePath);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw classifyFsError(err, this.filePath);
    }
  }

  getLastBackupAt(): string | undefined {
    return this.lastBackupAt;
  }

  /** Takes effect with the next `save()`. */
  setLastBackupAt(when: Date | string): void {
    this.lastBackupAt = typeof when === 'string' ? when : when.toISOString();
  }

  private async quarantine(): Promise<void> {
    const parsed = path.parse(this.filePath);
    const target = path.join(parsed.dir, `${parsed.name}.corrupt.json`);
    try {
      await rename(this.filePath, target);
    } catch (err) {
      throw classifyFsError(err, this.filePath);
    }
  }
}

function parseStoreFile(raw: string): StoreFile | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(json) || !Array.isArray(json.items)) return null;
  const items: SyncItem[] = [];
  for (const candidate of json.items) {
    if (!isSyncItem(candidate)) return null;
    items.push(candidate);
  }
  const version = typeof json.version === 'number' ? json.version : STORE_VERSION;
  const lastBackupAt = typeof json.lastBackupAt === 'string' ? json.lastBackupAt : undefined;
  return { version, items, lastBackupAt };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(value: unknown, allowed: readonly T[]): value is T {
  return typeof value === 'string' && allowed.some((a) => a === value);
}

function isBackend(value: unknown): value is BackendVariant {
  return value === 'simple' || value === 'chunked';
}

function isRemoteReference(value: unknown): value is RemoteReference {
  return (
    isRecord(value) &&
    isBackend(value.backend) &&
    typeof value.objectId === 'string' &&
    typeof value.name === 'string' &&
    typeof value.sizeBytes === 'number'
  );
}

export function isSyncItem(value: unknown): value is SyncItem {
  return (
    isRecord(value) &&
    typeof value.sourcePath === 'string' &&
    isOneOf(value.kind, KINDS) &&
    typeof value.sizeBytes === 'number' &&
    typeof value.modifiedAt === 'number' &&
    isOneOf(value.status, STATUSES) &&
    (value.remote === undefined || isRemoteReference(value.remote)) &&
    (value.signature === undefined || typeof value.signature === 'string') &&
    (value.jobId === undefined || typeof value.jobId === 'string') &&
    (value.partIndex === undefined || typeof value.partIndex === 'number') &&
    (value.uploadedAt === undefined || typeof value.uploadedAt === 'string') &&
    (value.error === undefined ||
      (isRecord(value.error) && typeof value.error.kind === 'string' && typeof value.error.message === 'string'))
  );
}
