import { JsonMetadataStore, reconcileItems, type SyncItem, type SyncStatus } from '@zipvault/core';
import type { ParsedFlags } from '../lib/parse.js';
import { getStatePath, resolveSettings } from '../lib/runtime.js';
import { formatBytes, pluralize } from '../lib/format.js';
import { describeItemError } from '../lib/report.js';
import {
  printHeader,
  printKeyValue,
  printBlank,
  printJson,
  colorStatus,
  dim,
  isInteractive,
  isJson,
} from '../lib/output.js';
import { EXIT_SUCCESS } from '../lib/errors.js';

const STATUS_ORDER: readonly SyncStatus[] = ['Uploaded', 'Pending', 'Archiving', 'Queued', 'Uploading', 'Failed'];

/** Summarise what the state file records. Read-only: nothing is written back. */
export async function run(_args: string[], flags: ParsedFlags): Promise<number> {
  const settings = resolveSettings(flags);
  const statePath = getStatePath(settings);
  const store = new JsonMetadataStore(statePath);
  const { items } = reconcileItems(await store.load());
  const lastBackupAt = store.getLastBackupAt();

  if (isJson()) {
    printJson({ statePath, lastBackupAt, items });
    return EXIT_SUCCESS;
  }

  const counts = countByStatus(items);
  if (!isInteractive()) {
    console.log(STATUS_ORDER.map((s) => `${s}=${counts.get(s) ?? 0}`).join(' '));
    return EXIT_SUCCESS;
  }

  printHeader('zipvault status');
  printKeyValue('State file', dim(statePath));
  printKeyValue('Last backup', lastBackupAt ?? dim('never'));
  printKeyValue('Tracked items', String(items.length));
  for (const status of STATUS_ORDER) {
    const n = counts.get(status);
    if (n) printKeyValue(`  ${status}`, String(n));
  }

  const folders = items.filter((item) => item.kind === 'folder');
  if (folders.length > 0) {
    printBlank();
    console.log(`  ${dim('Folders')}`);
    for (const folder of folders) {
      const job = folder.jobId ? dim(` job ${folder.jobId}`) : '';
      console.log(`  ${colorStatus(folder.status)} ${folder.sourcePath} ${dim(`(${formatBytes(folder.sizeBytes)})`)}${job}`);
    }
  }

  const failed = items.filter((item) => item.status === 'Failed');
  if (failed.length > 0) {
    printBlank();
    console.log(`  ${dim(`${failed.length} failed ${pluralize(failed.length, 'item')}`)}`);
    for (const item of failed) {
      console.log(`  ${item.sourcePath}: ${describeItemError(item.error)}`);
    }
  }
  printBlank();
  return EXIT_SUCCESS;
}

export function countByStatus(items: readonly SyncItem[]): Map<SyncStatus, number> {
  const counts = new Map<SyncStatus, number>();
  for (const item of items) counts.set(item.status, (counts.get(item.status) ?? 0) + 1);
  return counts;
}
