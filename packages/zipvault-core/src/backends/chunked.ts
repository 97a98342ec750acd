import { DEFAULT_CHUNK_SIZE, DEFAULT_CHUNKED_CEILING_BYTES, DEFAULT_TIMEOUTS } from '../constants.js';
import { sha256Hex } from '../crypto/index.js';
import {
  IntegrityError,
  SizeLimitExceededError,
  TransientNetworkError,
  ZipvaultAbortError,
  ZipvaultProtocolError,
  ZipvaultValidationError,
  isAbortError,
  isRetryable,
} from '../errors.js';
import type {
  AdapterTransferOptions,
  BackendAdapter,
  FetchFn,
  FileSource,
  RemoteReference,
  RetryOptions,
  SleepFn,
} from '../types.js';
import { computeBackoffDelay, resolveRetry, type ResolvedRetry } from '../utils/backoff.js';
import { fetchJson, joinUrl, request, sleep } from '../utils/network.js';
import { authHeaders, httpError, readString, resolveFetch, validateBaseUrl, type HttpBackendOptions } from './http.js';

export interface ChunkedBackendOptions extends HttpBackendOptions {
  /** Bytes per chunk for both uploads and ranged downloads. */
  chunkSize?: number;
  /** Timeout for each chunk request. */
  chunkTimeoutMs?: number;
  /** Timeout for init/complete/cancel calls. */
  requestTimeoutMs?: number;
  /** Retries of a single chunk before the whole transfer fails. */
  chunkRetry?: RetryOptions;
  sleep?: SleepFn;
  random?: () => number;
}

/**
 * Chunked transport: init, fixed-size chunks with a SHA-256 header, complete.
 * Cancellation is checked at every chunk boundary.
 */
export class ChunkedBackend implements BackendAdapter {
  readonly variant = 'chunked' as const;
  readonly maxObjectBytes: number;
  readonly chunkSize: number;
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly fetchFn: FetchFn;
  private readonly chunkTimeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly chunkRetry: ResolvedRetry;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  constructor(opts: ChunkedBackendOptions) {
    const chunkSize = opts.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ZipvaultValidationError('Chunk size must be a positive integer.');
    }
    this.baseUrl = validateBaseUrl(opts.baseUrl);
    this.token = opts.token;
    this.fetchFn = resolveFetch(opts.fetchFn);
    this.maxObjectBytes = opts.maxObjectBytes ?? DEFAULT_CHUNKED_CEILING_BYTES;
    this.chunkSize = chunkSize;
    this.chunkTimeoutMs = opts.chunkTimeoutMs ?? DEFAULT_TIMEOUTS.chunkMs;
    this.requestTimeoutMs = opts.requestTimeoutMs ?? DEFAULT_TIMEOUTS.requestMs;
    this.chunkRetry = resolveRetry({ retries: 2, ...opts.chunkRetry });
    this.sleep = opts.sleep ?? sleep;
    this.random = opts.random ?? Math.random;
  }

  async put(source: FileSource, opts: AdapterTransferOptions = {}): Promise<RemoteReference> {
    const { signal, onProgress } = opts;
    const totalSize = source.size;
    if (totalSize > this.maxObjectBytes) {
      throw new SizeLimitExceededError(
        `${source.name} (${totalSize} bytes) exceeds the chunked backend limit of ${this.maxObjectBytes} bytes.`,
        { sizeBytes: totalSize, limitBytes: this.maxObjectBytes }
      );
    }
    throwIfAborted(signal);

    const totalChunks = Math.ceil(totalSize / this.chunkSize);
    const initRes = await fetchJson(this.fetchFn, joinUrl(this.baseUrl, 'upload/init'), {
      method: 'POST',
      timeoutMs: this.requestTimeoutMs,
      headers: this.jsonHeaders(),
      body: JSON.stringify({ name: source.name, totalSize, totalChunks, chunkSize: this.chunkSize }),
    });
    if (!initRes.res.ok) throw httpError(initRes.res, `Upload init for ${source.name}`, initRes, totalSize);
    const uploadId = readString(initRes.json, 'uploadId');
    if (!uploadId) throw new ZipvaultProtocolError('Upload init response did not include an uploadId.');

    try {
      onProgress?.(0, totalSize);
      for (let i = 0; i < totalChunks; i++) {
        throwIfAborted(signal);
        const start = i * this.chunkSize;
        const end = Math.min(start + this.chunkSize, totalSize);
        const data = await source.slice(start, end).read();
        const hashHex = sha256Hex(data);

        await this.withChunkRetry(signal, () =>
          request(this.fetchFn, joinUrl(this.baseUrl, 'upload/chunk'), {
            method: 'POST',
            timeoutMs: opts.timeoutMs ?? this.chunkTimeoutMs,
            headers: {
              ...authHeaders(this.token),
              'Content-Type': 'application/octet-stream',
              'X-Upload-ID': uploadId,
              'X-Chunk-Index': String(i),
              'X-Chunk-Hash': hashHex,
            },
            body: data,
          }, async (res) => {
            if (res.ok) return;
            const text = await res.text().catch(() => '');
            throw httpError(res, `Chunk ${i + 1} of ${totalChunks}`, { json: parseJson(text), text }, totalSize);
          })
        );
        onProgress?.(end, totalSize);
      }
      throwIfAborted(signal);

      const completeRes = await fetchJson(this.fetchFn, joinUrl(this.baseUrl, 'upload/complete'), {
        method: 'POST',
        timeoutMs: this.requestTimeoutMs,
        headers: this.jsonHeaders(),
        body: JSON.stringify({ uploadId }),
      });
      if (!completeRes.res.ok) throw httpError(completeRes.res, `Upload complete for ${source.name}`, completeRes, totalSize);
      const objectId = readString(completeRes.json, 'id');
      if (!objectId) throw new ZipvaultProtocolError('Upload complete response did not include an object id.');

      return { backend: this.variant, objectId, name: source.name, sizeBytes: totalSize };
    } catch (err) {
      await this.cancelUpload(uploadId);
      throw err;
    }
  }

  async *get(ref: RemoteReference, opts: AdapterTransferOptions = {}): AsyncGenerator<Uint8Array> {
    const { signal, onProgress } = opts;
    const url = joinUrl(this.baseUrl, `objects/${encodeURIComponent(ref.objectId)}`);
    onProgress?.(0, ref.sizeBytes);

    for (let start = 0; start < ref.sizeBytes; start += this.chunkSize) {
      throwIfAborted(signal);
      const end = Math.min(start + this.chunkSize, ref.sizeBytes);
      const chunk = await this.withChunkRetry(signal, () =>
        request(this.fetchFn, url, {
          method: 'GET',
          timeoutMs: opts.timeoutMs ?? this.chunkTimeoutMs,
          headers: { ...authHeaders(this.token), Range: `bytes=${start}-${end - 1}` },
        }, async (res) => {
          if (!res.ok) {
            const text = await res.text().catch(() => '');
            throw httpError(res, `Ranged download of ${ref.name}`, { json: parseJson(text), text });
          }
          const body = new Uint8Array(await res.arrayBuffer());
          // A server that ignores Range sends the whole object with 200.
          if (res.status === 200 && start === 0 && body.length === ref.sizeBytes) return body;
          if (body.length !== end - start) {
            throw new IntegrityError(
              `Range ${start}-${end - 1} of ${ref.name} returned ${body.length} bytes, expected ${end - start}.`,
              { details: { start, end, received: body.length } }
            );
          }
          return body;
        })
      );
      yield chunk;
      const done = start + chunk.length;
      onProgress?.(done, ref.sizeBytes);
      if (done >= ref.sizeBytes) break;
    }
  }

  private jsonHeaders(): Record<string, string> {
    return { ...authHeaders(this.token), 'Content-Type': 'application/json', Accept: 'application/json' };
  }

  /**
   * Retry one chunk request on transient failures. Backoff waits observe the
   * cancellation signal.
   */
  private async withChunkRetry<T>(signal: AbortSignal | undefined, fn: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (err) {
        if (isAbortError(err) || !isRetryable(err) || attempt > this.chunkRetry.retries) throw err;
        throwIfAborted(signal);
        const retryAfter = err instanceof TransientNetworkError ? err.retryAfterMs ?? 0 : 0;
        await this.sleep(Math.max(retryAfter, computeBackoffDelay(attempt, this.chunkRetry, this.random)), signal);
      }
    }
  }

  private async cancelUpload(uploadId: string): Promise<void> {
    try {
      await fetchJson(this.fetchFn, joinUrl(this.baseUrl, 'upload/cancel'), {
        method: 'POST',
        timeoutMs: 5000,
        headers: this.jsonHeaders(),
        body: JSON.stringify({ uploadId }),
      });
    } catch {
      // Best effort; the server expires abandoned uploads.
    }
  }
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw signal.reason ?? new ZipvaultAbortError();
}

function parseJson(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
