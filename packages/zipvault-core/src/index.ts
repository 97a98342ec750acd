export * from './constants.js';
export * from './errors.js';
export type * from './types.js';

export { Archiver, createJobId } from './archive/archiver.js';
export type { ArchiveProgress, ArchiverOptions, PackOptions } from './archive/archiver.js';
export {
  END_RECORD_BYTES,
  MAX_ENTRIES_PER_CONTAINER,
  compareRelativePaths,
  estimateEntryBytes,
  formatPartName,
  planContainers,
} from './archive/planner.js';
export type { ContainerPlan, PlannedContainer, RejectedFile, SourceFile } from './archive/planner.js';
export { resolveEntryPath, unpack } from './archive/unpack.js';
export type { UnpackOptions, UnpackResult } from './archive/unpack.js';
export { walkSourceTree } from './archive/walk.js';

export { ChunkedBackend } from './backends/chunked.js';
export type { ChunkedBackendOptions } from './backends/chunked.js';
export type { HttpBackendOptions } from './backends/http.js';
export { DEFAULT_BACKEND_POLICY, selectBackend } from './backends/select.js';
export { SimpleBackend } from './backends/simple.js';
export type { SimpleBackendOptions } from './backends/simple.js';

export { sha256File, sha256Hex } from './crypto/index.js';
export { NodeFileSource } from './source/file-source.js';

export { JsonMetadataStore, isSyncItem } from './store/json-metadata-store.js';
export { reconcileItems } from './store/reconcile.js';
export { isIgnoredFile, makeSignature, scanTrackedFiles } from './sync/scan.js';
export type { ScanOptions } from './sync/scan.js';

export { downloadToFile } from './transfer/download.js';
export { TransferOrchestrator } from './transfer/orchestrator.js';
export type { FeedResult, RunSummary, TransferOrchestratorOptions } from './transfer/orchestrator.js';
export { WorkQueue } from './transfer/work-queue.js';

export { runBackup, sanitizeBaseName } from './pipeline/backup.js';
export type { BackupOptions, BackupResult } from './pipeline/backup.js';
export { runRestore } from './pipeline/restore.js';
export type { RestoreOptions, RestoreResult } from './pipeline/restore.js';

export { computeBackoffDelay, resolveRetry } from './utils/backoff.js';
export type { ResolvedRetry } from './utils/backoff.js';
export { fetchJson, joinUrl, makeAbortSignal, request, sleep } from './utils/network.js';
export { PathLockTable } from './utils/path-lock.js';
export type { ReleaseFn } from './utils/path-lock.js';
export { CapacityExceededError, SizedWriter } from './utils/sized-writer.js';
export { StreamingZipWriter } from './zip/stream-zip.js';
export type { StreamingZipOptions } from './zip/stream-zip.js';
export { Crc32, crc32 } from './zip/crc32.js';
export { readZipDirectory, readZipEntry } from './zip/zip-reader.js';
export type { ZipEntryInfo } from './zip/zip-reader.js';
