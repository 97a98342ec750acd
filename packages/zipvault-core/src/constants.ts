/** Default ceiling for one archive part (bytes). */
export const DEFAULT_ARCHIVE_CEILING_BYTES = 1_900_000_000;

/** Default per-object ceiling of the simple backend (bytes). */
export const DEFAULT_SIMPLE_CEILING_BYTES = 50_000_000;

/** Default per-object ceiling of the chunked backend (bytes). */
export const DEFAULT_CHUNKED_CEILING_BYTES = 2_000_000_000;

/** Default chunk size for the chunked backend (bytes). */
export const DEFAULT_CHUNK_SIZE = 20 * 1024 * 1024;

/** Default number of parallel transfer workers. */
export const DEFAULT_TRANSFER_WORKERS = 3;

/** Default deflate level for archive entries (0 stores without compression). */
export const DEFAULT_COMPRESSION_LEVEL = 6;

export const DEFAULT_RETRY = {
  retries: 5,
  backoffMs: 1000,
  maxBackoffMs: 30000,
  jitter: 0.2,
} as const;

export const DEFAULT_TIMEOUTS = {
  requestMs: 30000,
  chunkMs: 120000,
  simpleUploadMs: 600000,
} as const;

/** Largest entry a ZIP without ZIP64 records can describe. */
export const MAX_ZIP_ENTRY_BYTES = 0xffffffff - 1;

/** File suffixes that are never tracked (partial downloads, editor temp files). */
export const IGNORED_SUFFIXES: readonly string[] = ['.tmp', '.crdownload', '.part', '.partial'];

/** Name prefix of lock files written by office suites. */
export const IGNORED_PREFIX = '~$';
