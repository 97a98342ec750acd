import { ZipvaultError, ZipvaultValidationError, classifyHttpStatus, parseRetryAfter } from '../errors.js';
import type { FetchFn } from '../types.js';

export interface HttpBackendOptions {
  /** Root URL of the object service, e.g. `https://objects.example.com/v1`. */
  baseUrl: string;
  /** Sent as `Authorization: Bearer <token>`. */
  token?: string;
  /** Largest object this backend accepts. */
  maxObjectBytes?: number;
  /** Custom fetch implementation (defaults to global fetch). */
  fetchFn?: FetchFn;
}

export function resolveFetch(fetchFn?: FetchFn): FetchFn {
  const fn = fetchFn ?? globalThis.fetch;
  if (typeof fn !== 'function') {
    throw new ZipvaultValidationError('No fetch() implementation found.');
  }
  return fn;
}

export function validateBaseUrl(baseUrl: string): string {
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch {
    throw new ZipvaultValidationError(`Invalid backend URL: ${baseUrl}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ZipvaultValidationError(`Backend URL must use http or https: ${baseUrl}`);
  }
  return baseUrl.replace(/\/+$/, '');
}

export function authHeaders(token?: string): Record<string, string> {
  return token ? { Authorization: `Bearer ${token}` } : {};
}

/**
 * Error for a non-2xx response, classified by status. The server's `error`
 * field is used as the message when present.
 */
export function httpError(
  res: Response,
  what: string,
  body: { json: unknown; text: string },
  sizeBytes?: number
): ZipvaultError {
  const serverMessage = readString(body.json, 'error');
  const message = serverMessage ? `${what} failed: ${serverMessage}` : `${what} failed (HTTP ${res.status}).`;
  return classifyHttpStatus(res.status, message, {
    retryAfterMs: parseRetryAfter(res.headers.get('retry-after')),
    details: { status: res.status, bodySnippet: body.text.slice(0, 120) },
    sizeBytes,
  });
}

/** Read a string property from an untyped JSON value. */
export function readString(json: unknown, key: string): string | undefined {
  if (!json || typeof json !== 'object' || !(key in json)) return undefined;
  const value: unknown = Reflect.get(json, key);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}
