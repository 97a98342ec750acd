import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { unpack, type UnpackResult } from '../archive/unpack.js';
import { ZipvaultValidationError } from '../errors.js';
import type { RunSummary, TransferOrchestrator } from '../transfer/orchestrator.js';
import type { PartLocator, SyncItem } from '../types.js';

export interface RestoreOptions {
  jobId: string;
  destDir: string;
  orchestrator: TransferOrchestrator;
  /** Where parts are downloaded; a temporary directory, removed afterwards, by default. */
  stagingDir?: string;
  signal?: AbortSignal;
}

export interface RestoreResult {
  summary: RunSummary;
  /** Present once every part downloaded and was unpacked. */
  unpacked?: UnpackResult;
  /** Part indexes absent from the store (never uploaded, or failed). */
  missingParts: number[];
}

/**
 * Download the uploaded parts of one backup job and unpack them into `destDir`.
 * Nothing is unpacked unless every part arrived intact.
 */
export async function runRestore(opts: RestoreOptions): Promise<RestoreResult> {
  const { orchestrator, jobId, signal } = opts;
  const items = await orchestrator.load();
  const parts = uploadedParts(items, jobId);
  if (parts.length === 0) {
    throw new ZipvaultValidationError(`No uploaded parts found for job ${jobId}.`, { code: 'JOB_NOT_FOUND' });
  }
  const missingParts = findMissingIndexes(items, jobId, parts);

  const ownsStaging = opts.stagingDir === undefined;
  const stagingDir = opts.stagingDir ?? (await mkdtemp(path.join(os.tmpdir(), `zipvault-${jobId}-`)));

  const onAbort = (): void => orchestrator.cancel('Restore cancelled.');
  if (signal?.aborted) onAbort();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const locators: PartLocator[] = parts.map(({ index, remote }) => {
      const destPath = path.join(stagingDir, remote.name);
      orchestrator.schedule({ direction: 'download', remote, destPath });
      return { index, path: destPath };
    });
    const summary = await orchestrator.run();
    if (summary.failed > 0 || summary.cancelled > 0 || summary.wasCancelled) {
      return { summary, missingParts };
    }
    const unpacked = await unpack(locators, opts.destDir, { signal });
    return { summary, unpacked, missingParts };
  } finally {
    signal?.removeEventListener('abort', onAbort);
    if (ownsStaging) await rm(stagingDir, { recursive: true, force: true });
  }
}

interface UploadedPart {
  index: number;
  remote: NonNullable<SyncItem['remote']>;
}

function uploadedParts(items: readonly SyncItem[], jobId: string): UploadedPart[] {
  const parts: UploadedPart[] = [];
  for (const item of items) {
    if (item.kind !== 'archive-part' || item.jobId !== jobId || item.status !== 'Uploaded') continue;
    if (!item.remote || item.partIndex === undefined) continue;
    parts.push({ index: item.partIndex, remote: item.remote });
  }
  return parts.sort((a, b) => a.index - b.index);
}

function findMissingIndexes(items: readonly SyncItem[], jobId: string, uploaded: UploadedPart[]): number[] {
  const have = new Set(uploaded.map((p) => p.index));
  let highest = 0;
  for (const item of items) {
    if (item.kind === 'archive-part' && item.jobId === jobId && item.partIndex !== undefined) {
      highest = Math.max(highest, item.partIndex);
    }
  }
  const missing: number[] = [];
  for (let i = 1; i <= highest; i++) {
    if (!have.has(i)) missing.push(i);
  }
  return missing;
}
