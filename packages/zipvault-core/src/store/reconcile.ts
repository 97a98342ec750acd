import type { SyncItem, SyncStatus } from '../types.js';

const INTERRUPTED: ReadonlySet<SyncStatus> = new Set<SyncStatus>(['Archiving', 'Queued', 'Uploading']);

/**
 * Reset items a previous process left mid-flight back to Pending.
 * A transfer that finished remotely but was never recorded is uploaded again:
 * at worst a duplicate remote object, never a lost one.
 */
export function reconcileItems(items: readonly SyncItem[]): { items: SyncItem[]; changed: number } {
  let changed = 0;
  const out = items.map((item) => {
    if (!INTERRUPTED.has(item.status)) return { ...item };
    changed++;
    return { ...item, status: 'Pending' as const };
  });
  return { items: out, changed };
}
