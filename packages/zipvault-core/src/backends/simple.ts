import { DEFAULT_SIMPLE_CEILING_BYTES, DEFAULT_TIMEOUTS } from '../constants.js';
import { sha256Hex } from '../crypto/index.js';
import {
  IntegrityError,
  SizeLimitExceededError,
  ZipvaultAbortError,
  ZipvaultError,
  ZipvaultProtocolError,
  ZipvaultTimeoutError,
  classifyFetchError,
} from '../errors.js';
import type {
  AdapterTransferOptions,
  BackendAdapter,
  FetchFn,
  FileSource,
  RemoteReference,
} from '../types.js';
import { fetchJson, joinUrl, makeAbortSignal } from '../utils/network.js';
import { authHeaders, httpError, readString, resolveFetch, validateBaseUrl, type HttpBackendOptions } from './http.js';

export interface SimpleBackendOptions extends HttpBackendOptions {
  /** Timeout for the single upload or download request. */
  timeoutMs?: number;
}

/**
 * Single-shot transport: one request per object.
 * Cancellation is honoured only before the request starts.
 */
export class SimpleBackend implements BackendAdapter {
  readonly variant = 'simple' as const;
  readonly maxObjectBytes: number;
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;

  constructor(opts: SimpleBackendOptions) {
    this.baseUrl = validateBaseUrl(opts.baseUrl);
    this.token = opts.token;
    this.fetchFn = resolveFetch(opts.fetchFn);
    this.maxObjectBytes = opts.maxObjectBytes ?? DEFAULT_SIMPLE_CEILING_BYTES;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUTS.simpleUploadMs;
  }

  async put(source: FileSource, opts: AdapterTransferOptions = {}): Promise<RemoteReference> {
    if (source.size > this.maxObjectBytes) {
      throw new SizeLimitExceededError(
        `${source.name} (${source.size} bytes) exceeds the simple backend limit of ${this.maxObjectBytes} bytes.`,
        { sizeBytes: source.size, limitBytes: this.maxObjectBytes }
      );
    }
    if (opts.signal?.aborted) throw opts.signal.reason ?? new ZipvaultAbortError();

    const data = await source.read();
    opts.onProgress?.(0, source.size);

    const { res, json, text } = await fetchJson(this.fetchFn, joinUrl(this.baseUrl, 'objects'), {
      method: 'POST',
      timeoutMs: opts.timeoutMs ?? this.timeoutMs,
      headers: {
        ...authHeaders(this.token),
        'Content-Type': 'application/octet-stream',
        Accept: 'application/json',
        'X-Object-Name': encodeURIComponent(source.name),
        'X-Content-Sha256': sha256Hex(data),
      },
      body: data,
    });
    if (!res.ok) throw httpError(res, `Upload of ${source.name}`, { json, text }, source.size);

    const objectId = readString(json, 'id');
    if (!objectId) throw new ZipvaultProtocolError('Upload response did not include an object id.');

    opts.onProgress?.(source.size, source.size);
    return { backend: this.variant, objectId, name: source.name, sizeBytes: source.size };
  }

  async *get(ref: RemoteReference, opts: AdapterTransferOptions = {}): AsyncGenerator<Uint8Array> {
    if (opts.signal?.aborted) throw opts.signal.reason ?? new ZipvaultAbortError();

    const timeoutMs = opts.timeoutMs ?? this.timeoutMs;
    const url = joinUrl(this.baseUrl, `objects/${encodeURIComponent(ref.objectId)}`);
    const { signal, cleanup, timedOut } = makeAbortSignal(undefined, timeoutMs);
    let received = 0;
    let release: (() => Promise<void>) | undefined;

    try {
      const res = await this.fetchFn(url, { method: 'GET', headers: authHeaders(this.token), signal });
      if (!res.ok) {
        const text = await res.text().catch(() => '');
        throw httpError(res, `Download of ${ref.name}`, { json: null, text });
      }
      if (!res.body) throw new ZipvaultProtocolError('Streaming response not available.');

      opts.onProgress?.(0, ref.sizeBytes);
      const reader = res.body.getReader();
      release = () => reader.cancel();
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        received += value.length;
        if (received > ref.sizeBytes) {
          throw new IntegrityError(`Download of ${ref.name} returned more than ${ref.sizeBytes} bytes.`);
        }
        opts.onProgress?.(received, ref.sizeBytes);
        yield value;
      }
    } catch (err) {
      if (err instanceof ZipvaultError) throw err;
      if (timedOut()) throw new ZipvaultTimeoutError(`Download of ${ref.name} timed out after ${timeoutMs}ms.`);
      throw classifyFetchError(err, `Download of ${ref.name} failed.`);
    } finally {
      // Releases the connection when the consumer stops early; already settled otherwise.
      await release?.().catch(() => undefined);
      cleanup();
    }
  }
}
