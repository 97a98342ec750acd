import path from 'node:path';
import type { ArchiveProgress, Archiver } from '../archive/archiver.js';
import type { SourceFile } from '../archive/planner.js';
import { DEFAULT_ARCHIVE_CEILING_BYTES } from '../constants.js';
import { isAbortError, type ZipvaultError } from '../errors.js';
import type { FeedResult, RunSummary, TransferOrchestrator } from '../transfer/orchestrator.js';
import type { ArchivePart, SyncItem, SyncStatus, TransferRequest } from '../types.js';

export interface BackupOptions {
  sourceDir: string;
  archiver: Archiver;
  orchestrator: TransferOrchestrator;
  ceilingBytes?: number;
  /** Part name prefix; defaults to the folder's name. */
  baseName?: string;
  signal?: AbortSignal;
  onArchiveProgress?: (progress: ArchiveProgress) => void;
  onEntryError?: (file: SourceFile, error: ZipvaultError) => void;
  /** Called once every part is uploaded. */
  onBackupComplete?: (completedAt: Date) => void;
}

export interface BackupResult {
  jobId?: string;
  /** Final state of the folder item. */
  status: SyncStatus;
  parts: ArchivePart[];
  entryErrors: Array<{ file: SourceFile; error: ZipvaultError }>;
  summary: RunSummary;
  /** Set when packing itself stopped, e.g. on a full disk. */
  packError?: unknown;
}

/**
 * Pack a folder and upload its parts as they are sealed.
 *
 * The folder is tracked as one item (Archiving, then Queued once every part is
 * handed over, then Uploaded or Failed); parts and unreadable files get items of
 * their own.
 */
export async function runBackup(opts: BackupOptions): Promise<BackupResult> {
  const { archiver, orchestrator, signal } = opts;
  const sourceDir = path.resolve(opts.sourceDir);
  const baseName = opts.baseName ?? (sanitizeBaseName(path.basename(sourceDir)) || 'Backup');

  await orchestrator.load();
  const previous = orchestrator.getItem(sourceDir);
  let folder: SyncItem = {
    ...previous,
    sourcePath: sourceDir,
    kind: 'folder',
    sizeBytes: previous?.sizeBytes ?? 0,
    modifiedAt: Date.now(),
    status: 'Archiving',
  };
  orchestrator.track(folder);

  const parts: ArchivePart[] = [];
  const entryErrors: BackupResult['entryErrors'] = [];
  let jobId: string | undefined;

  const partRequests = async function* (): AsyncGenerator<TransferRequest> {
    const run = archiver.pack(sourceDir, opts.ceilingBytes ?? DEFAULT_ARCHIVE_CEILING_BYTES, baseName, {
      signal,
      onStart: (info) => {
        jobId = info.jobId;
        folder = { ...folder, jobId: info.jobId, sizeBytes: info.bytesTotal };
        orchestrator.track(folder);
      },
      onProgress: opts.onArchiveProgress,
      onEntryError: (file, error) => {
        entryErrors.push({ file, error });
        orchestrator.reportFailure(
          { sourcePath: file.absolutePath, kind: 'file', sizeBytes: file.sizeBytes, modifiedAt: file.mtimeMs, status: 'Failed' },
          error
        );
        opts.onEntryError?.(file, error);
      },
    });
    for await (const part of run) {
      parts.push(part);
      yield { direction: 'upload', subject: { kind: 'part', part } };
    }
    folder = { ...folder, status: 'Queued' };
    orchestrator.track(folder);
  };

  const onAbort = (): void => orchestrator.cancel('Backup cancelled.');
  if (signal?.aborted) onAbort();
  signal?.addEventListener('abort', onAbort, { once: true });

  let summary: RunSummary;
  let fed: FeedResult;
  try {
    const feeding = orchestrator.feed(partRequests());
    summary = await orchestrator.run();
    fed = await feeding;
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }

  const partUnits = summary.units.filter((u) => u.request.direction === 'upload' && u.request.subject.kind === 'part');
  const firstFailure = partUnits.find((u) => u.state === 'failed');
  const cancelled = summary.wasCancelled || partUnits.some((u) => u.state === 'cancelled');

  let status: SyncStatus;
  if (fed.error !== undefined && !(cancelled && isAbortError(fed.error))) {
    status = 'Failed';
    orchestrator.reportFailure(folder, fed.error);
  } else if (cancelled || fed.error !== undefined) {
    status = 'Pending';
    orchestrator.track({ ...folder, status });
  } else if (firstFailure) {
    status = 'Failed';
    orchestrator.track({
      ...folder,
      status,
      error: firstFailure.error ?? { kind: 'Unknown', message: 'A part failed to upload.' },
    });
  } else {
    status = 'Uploaded';
    const completedAt = new Date();
    opts.onBackupComplete?.(completedAt);
    orchestrator.track({ ...folder, status, uploadedAt: completedAt.toISOString() });
  }

  const laterPersistError = await orchestrator.flush();
  const persistError = summary.persistError ?? laterPersistError;
  return {
    jobId,
    status,
    parts,
    entryErrors,
    summary: { ...summary, persistError },
    packError: fed.error,
  };
}

/** Base names end up in file names; keep them portable. */
export function sanitizeBaseName(name: string): string {
  return name.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^[._]+/, '');
}
