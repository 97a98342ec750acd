import type { ErrorKind } from './errors.js';

export type BackendVariant = 'simple' | 'chunked';

export type SyncStatus = 'Pending' | 'Archiving' | 'Queued' | 'Uploading' | 'Uploaded' | 'Failed';

export type SyncItemKind = 'file' | 'archive-part' | 'folder';

export type TransferDirection = 'upload' | 'download';

/**
 * Backend-specific handle, sufficient to retrieve an object later.
 */
export interface RemoteReference {
  backend: BackendVariant;
  objectId: string;
  name: string;
  sizeBytes: number;
}

export interface SyncItemError {
  kind: ErrorKind;
  message: string;
  backend?: BackendVariant;
}

/**
 * One logical unit to protect: a tracked file, an archive part or a backed-up folder.
 */
export interface SyncItem {
  sourcePath: string;
  kind: SyncItemKind;
  sizeBytes: number;
  /** Last-modified time, milliseconds since the epoch. */
  modifiedAt: number;
  status: SyncStatus;
  remote?: RemoteReference;
  /** `size:mtimeSeconds:sha256` as computed by the change scan. */
  signature?: string;
  jobId?: string;
  partIndex?: number;
  uploadedAt?: string;
  error?: SyncItemError;
}

export interface ArchiveEntry {
  /** Path relative to the packed directory, `/`-separated. */
  relativePath: string;
  sizeBytes: number;
}

/**
 * One sealed, size-bounded ZIP container.
 */
export interface ArchivePart {
  /** Sequential index starting at 1. */
  index: number;
  jobId: string;
  fileName: string;
  path: string;
  sizeBytes: number;
  entries: ArchiveEntry[];
  /** True when a single entry alone exceeds the ceiling. */
  oversized: boolean;
}

/** What `unpack` needs to locate a part on disk. */
export type PartLocator = Pick<ArchivePart, 'index' | 'path'>;

export type TransferSubject =
  | { kind: 'part'; part: ArchivePart }
  | { kind: 'item'; item: SyncItem };

export interface UploadRequest {
  direction: 'upload';
  subject: TransferSubject;
}

export interface DownloadRequest {
  direction: 'download';
  remote: RemoteReference;
  /** Final location of the downloaded object. */
  destPath: string;
}

export type TransferRequest = UploadRequest | DownloadRequest;

export type TransferState = 'queued' | 'running' | 'succeeded' | 'failed' | 'cancelled';

/**
 * The orchestrator's working item. Discarded once its terminal state is recorded.
 */
export interface TransferUnit {
  id: string;
  request: TransferRequest;
  direction: TransferDirection;
  /** Lock key: the local path read from (upload) or written to (download). */
  sourcePath: string;
  sizeBytes: number;
  backend?: BackendVariant;
  bytesTransferred: number;
  attempts: number;
  state: TransferState;
  remote?: RemoteReference;
  error?: SyncItemError;
}

export interface ProgressEvent {
  unitId: string;
  direction: TransferDirection;
  sourcePath: string;
  backend?: BackendVariant;
  bytesDone: number;
  bytesTotal: number;
  /** Monotonic milliseconds (performance.now()). */
  timestamp: number;
  done: boolean;
}

/**
 * Random-access byte source for uploads.
 */
export interface FileSource {
  readonly name: string;
  readonly size: number;
  slice(start: number, end: number): FileSource;
  read(): Promise<Uint8Array>;
}

export interface AdapterTransferOptions {
  /**
   * Cancellation. Observed only at safe checkpoints: before the request for the
   * simple backend and at every chunk boundary for the chunked backend.
   */
  signal?: AbortSignal;
  /** Timeout applied to each individual network call. */
  timeoutMs?: number;
  onProgress?: (bytesDone: number, bytesTotal: number) => void;
}

/**
 * Transport capability. Both variants expose the same shape.
 */
export interface BackendAdapter {
  readonly variant: BackendVariant;
  readonly maxObjectBytes: number;
  put(source: FileSource, opts?: AdapterTransferOptions): Promise<RemoteReference>;
  get(ref: RemoteReference, opts?: AdapterTransferOptions): AsyncIterable<Uint8Array>;
}

export type BackendSet = Partial<Record<BackendVariant, BackendAdapter>>;

/**
 * Resolved backend settings. Raw settings files are parsed elsewhere.
 */
export interface BackendPolicy {
  simpleEnabled: boolean;
  chunkedEnabled: boolean;
  /** Prefer the simple backend whenever the object fits. */
  forceSimple: boolean;
  /** Skip the simple backend unless forceSimple is also set. */
  forceChunked: boolean;
  simpleCeilingBytes: number;
  chunkedCeilingBytes: number;
}

/**
 * Persistence of tracked items. Treated as externally synchronised.
 */
export interface MetadataStore {
  load(): Promise<SyncItem[]>;
  save(items: SyncItem[]): Promise<void>;
}

export interface RetryOptions {
  retries?: number;
  backoffMs?: number;
  maxBackoffMs?: number;
  /** Fraction of the delay randomised in both directions (0 disables jitter). */
  jitter?: number;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;
