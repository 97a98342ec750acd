export type ErrorKind =
  | 'IOError'
  | 'SizeLimitExceeded'
  | 'TransientNetworkError'
  | 'AuthenticationError'
  | 'PermissionDenied'
  | 'IntegrityError'
  | 'DiskFull'
  | 'Validation'
  | 'Protocol'
  | 'Aborted'
  | 'Unknown';

export interface ZipvaultErrorOptions {
  code?: string;
  details?: unknown;
  cause?: unknown;
}

/**
 * Base class for every error raised by the core.
 * `kind` is the classification collaborators act on; `code` is a finer, stable identifier.
 */
export class ZipvaultError extends Error {
  readonly code: string;
  readonly details?: unknown;
  readonly kind: ErrorKind = 'Unknown';

  constructor(message: string, opts: ZipvaultErrorOptions = {}) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'ZipvaultError';
    this.code = opts.code ?? 'ZIPVAULT_ERROR';
    this.details = opts.details;
  }
}

export class ZipvaultValidationError extends ZipvaultError {
  override readonly kind: ErrorKind = 'Validation';

  constructor(message: string, opts: ZipvaultErrorOptions = {}) {
    super(message, { code: 'VALIDATION_ERROR', ...opts });
    this.name = 'ZipvaultValidationError';
  }
}

export class ZipvaultProtocolError extends ZipvaultError {
  override readonly kind: ErrorKind = 'Protocol';

  constructor(message: string, opts: ZipvaultErrorOptions = {}) {
    super(message, { code: 'PROTOCOL_ERROR', ...opts });
    this.name = 'ZipvaultProtocolError';
  }
}

/** Local filesystem read/write failure. Fatal to one file or unit, never to the run. */
export class ZipvaultIOError extends ZipvaultError {
  override readonly kind: ErrorKind = 'IOError';
  readonly path?: string;

  constructor(message: string, opts: ZipvaultErrorOptions & { path?: string } = {}) {
    super(message, { code: 'IO_ERROR', ...opts });
    this.name = 'ZipvaultIOError';
    this.path = opts.path;
  }
}

/** Destination disk exhausted. Aborts the whole run. */
export class DiskFullError extends ZipvaultIOError {
  override readonly kind: ErrorKind = 'DiskFull';

  constructor(message = 'Destination disk is full.', opts: ZipvaultErrorOptions & { path?: string } = {}) {
    super(message, { code: 'DISK_FULL', ...opts });
    this.name = 'DiskFullError';
  }
}

export class SizeLimitExceededError extends ZipvaultError {
  override readonly kind: ErrorKind = 'SizeLimitExceeded';
  readonly sizeBytes: number;
  readonly limitBytes?: number;

  constructor(message: string, opts: { sizeBytes: number; limitBytes?: number; details?: unknown }) {
    super(message, {
      code: 'SIZE_LIMIT_EXCEEDED',
      details: opts.details ?? { sizeBytes: opts.sizeBytes, limitBytes: opts.limitBytes },
    });
    this.name = 'SizeLimitExceededError';
    this.sizeBytes = opts.sizeBytes;
    this.limitBytes = opts.limitBytes;
  }
}

/** Timeout, connection reset or rate limiting. Retried with backoff. */
export class TransientNetworkError extends ZipvaultError {
  override readonly kind: ErrorKind = 'TransientNetworkError';
  /** Server-advertised delay before the next attempt, if any. */
  readonly retryAfterMs?: number;

  constructor(message: string, opts: ZipvaultErrorOptions & { retryAfterMs?: number } = {}) {
    super(message, { code: 'NETWORK_ERROR', ...opts });
    this.name = 'TransientNetworkError';
    this.retryAfterMs = opts.retryAfterMs;
  }
}

export class ZipvaultTimeoutError extends TransientNetworkError {
  constructor(message = 'Request timed out', opts: ZipvaultErrorOptions = {}) {
    super(message, { code: 'TIMEOUT_ERROR', ...opts });
    this.name = 'TimeoutError';
  }
}

/** Invalid or expired credentials. Never retried. */
export class AuthenticationError extends ZipvaultError {
  override readonly kind: ErrorKind = 'AuthenticationError';

  constructor(message = 'Authentication rejected by the backend.', opts: ZipvaultErrorOptions = {}) {
    super(message, { code: 'AUTH_ERROR', ...opts });
    this.name = 'AuthenticationError';
  }
}

/** Quota or permission denial. Never retried. */
export class PermissionDeniedError extends ZipvaultError {
  override readonly kind: ErrorKind = 'PermissionDenied';

  constructor(message = 'Permission or quota denied by the backend.', opts: ZipvaultErrorOptions = {}) {
    super(message, { code: 'PERMISSION_DENIED', ...opts });
    this.name = 'PermissionDeniedError';
  }
}

/** Byte count or content mismatch. Eligible for retry. */
export class IntegrityError extends ZipvaultError {
  override readonly kind: ErrorKind = 'IntegrityError';

  constructor(message: string, opts: ZipvaultErrorOptions = {}) {
    super(message, { code: 'INTEGRITY_ERROR', ...opts });
    this.name = 'IntegrityError';
  }
}

export class ZipvaultAbortError extends ZipvaultError {
  override readonly kind: ErrorKind = 'Aborted';

  constructor(message = 'Operation aborted', opts: ZipvaultErrorOptions = {}) {
    super(message, { code: 'ABORT_ERROR', ...opts });
    this.name = 'AbortError';
  }
}

export function isAbortError(err: unknown): boolean {
  if (err instanceof ZipvaultAbortError) return true;
  return err instanceof Error && (err.name === 'AbortError' || errorCodeOf(err) === 'ABORT_ERR');
}

/** Transient network failures and integrity mismatches may succeed on a later attempt. */
export function isRetryable(err: unknown): boolean {
  return err instanceof TransientNetworkError || err instanceof IntegrityError;
}

export function errorKindOf(err: unknown): ErrorKind {
  if (err instanceof ZipvaultError) return err.kind;
  if (isAbortError(err)) return 'Aborted';
  return 'Unknown';
}

export function parseRetryAfter(value: string | null | undefined, now = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const at = Date.parse(value);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

/**
 * Map a non-2xx HTTP status onto the error taxonomy.
 */
export function classifyHttpStatus(
  status: number,
  message: string,
  opts: { retryAfterMs?: number; details?: unknown; sizeBytes?: number } = {}
): ZipvaultError {
  const { retryAfterMs, details, sizeBytes } = opts;
  if (status === 401) return new AuthenticationError(message, { details });
  if (status === 403) return new PermissionDeniedError(message, { details });
  if (status === 413) return new SizeLimitExceededError(message, { sizeBytes: sizeBytes ?? 0, details });
  if (status === 408 || status === 425 || status === 429 || status >= 500) {
    return new TransientNetworkError(message, { details: { status, ...asRecord(details) }, retryAfterMs });
  }
  return new ZipvaultProtocolError(message, { details });
}

/**
 * Wrap a rejection from fetch() (DNS failure, reset connection, abort) in the taxonomy.
 */
export function classifyFetchError(err: unknown, message: string): ZipvaultError {
  if (err instanceof ZipvaultError) return err;
  if (isAbortError(err)) return new ZipvaultAbortError(message, { cause: err });
  return new TransientNetworkError(message, { cause: err });
}

const DISK_FULL_CODES = new Set(['ENOSPC', 'EDQUOT']);

export function classifyFsError(err: unknown, path: string, message?: string): ZipvaultIOError {
  if (err instanceof ZipvaultIOError) return err;
  const code = errorCodeOf(err);
  const text = message ?? (err instanceof Error ? err.message : String(err));
  if (code && DISK_FULL_CODES.has(code)) {
    return new DiskFullError(text, { path, cause: err });
  }
  return new ZipvaultIOError(text, { path, cause: err, details: code ? { fsCode: code } : undefined });
}

/** The string `code` of a Node system error, if present. */
export function errorCodeOf(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

function asRecord(value: unknown): object {
  return value && typeof value === 'object' ? value : {};
}
