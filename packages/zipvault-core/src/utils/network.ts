import { ZipvaultAbortError, ZipvaultTimeoutError, classifyFetchError } from '../errors.js';
import type { FetchFn } from '../types.js';

export interface ScopedSignal {
  signal: AbortSignal;
  cleanup: () => void;
  /** True once the timeout (not the parent signal) fired. */
  timedOut: () => boolean;
}

/**
 * Derive a signal that aborts when the parent aborts or the timeout elapses.
 */
export function makeAbortSignal(parent?: AbortSignal, timeoutMs?: number): ScopedSignal {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | null = null;
  let fired = false;

  const onParentAbort = (): void => {
    controller.abort(parent?.reason ?? new ZipvaultAbortError());
  };

  if (parent) {
    if (parent.aborted) onParentAbort();
    else parent.addEventListener('abort', onParentAbort, { once: true });
  }

  if (timeoutMs !== undefined && Number.isFinite(timeoutMs) && timeoutMs > 0) {
    timer = setTimeout(() => {
      fired = true;
      controller.abort(new ZipvaultTimeoutError());
    }, timeoutMs);
  }

  return {
    signal: controller.signal,
    cleanup: () => {
      if (timer) clearTimeout(timer);
      timer = null;
      parent?.removeEventListener('abort', onParentAbort);
    },
    timedOut: () => fired,
  };
}

/**
 * Resolve after `ms`, or reject with the signal's reason once it aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason ?? new ZipvaultAbortError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason ?? new ZipvaultAbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RequestOptions {
  method?: string;
  headers?: Record<string, string>;
  body?: RequestInit['body'];
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * fetch() with a per-call timeout covering both the request and `consume`.
 * Rejections are mapped onto the error taxonomy: a fired timeout becomes a
 * ZipvaultTimeoutError, anything else network-level a TransientNetworkError.
 */
export async function request<T>(
  fetchFn: FetchFn,
  url: string,
  opts: RequestOptions,
  consume: (res: Response) => Promise<T>
): Promise<T> {
  const { timeoutMs, signal, ...init } = opts;
  const scoped = makeAbortSignal(signal, timeoutMs);
  try {
    const res = await fetchFn(url, { ...init, signal: scoped.signal });
    return await consume(res);
  } catch (err) {
    if (scoped.timedOut()) {
      throw new ZipvaultTimeoutError(`Request to ${url} timed out after ${timeoutMs}ms.`, { cause: err });
    }
    throw classifyFetchError(err, `Request to ${url} failed.`);
  } finally {
    scoped.cleanup();
  }
}

export async function fetchJson(
  fetchFn: FetchFn,
  url: string,
  opts: RequestOptions = {}
): Promise<{ res: Response; json: unknown; text: string }> {
  return request(fetchFn, url, opts, async (res) => {
    const text = await res.text();
    let json: unknown = null;
    if (text) {
      try {
        json = JSON.parse(text);
      } catch {
        json = null;
      }
    }
    return { res, json, text };
  });
}

export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
