import { describe, it, expect } from 'vitest';
import {
  AuthenticationError,
  ChunkedBackend,
  IntegrityError,
  PermissionDeniedError,
  SimpleBackend,
  SizeLimitExceededError,
  TransientNetworkError,
  ZipvaultAbortError,
  ZipvaultProtocolError,
  ZipvaultValidationError,
  sha256Hex,
  type RemoteReference,
} from '../src/index.js';
import { MemorySource, collect, concatBytes, encoder, fakeFetch, headerOf, jsonResponse, recordingSleep } from './helpers.js';

const TOKEN = 'test-secret';

describe('SimpleBackend', () => {
  it('uploads an object in one request', async () => {
    const { fetchFn, calls } = fakeFetch(() => jsonResponse({ id: 'obj-1' }));
    const backend = new SimpleBackend({ baseUrl: 'https://simple.test/api/', token: TOKEN, fetchFn });
    const data = encoder.encode('hello');
    const progress: Array<[number, number]> = [];

    const ref = await backend.put(new MemorySource('part 1.zip', data), {
      onProgress: (done, total) => progress.push([done, total]),
    });

    expect(ref).toEqual({ backend: 'simple', objectId: 'obj-1', name: 'part 1.zip', sizeBytes: 5 });
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('https://simple.test/api/objects');
    expect(calls[0].init?.method).toBe('POST');
    expect(headerOf(calls[0], 'authorization')).toBe('Bearer test-secret');
    expect(headerOf(calls[0], 'x-object-name')).toBe('part%201.zip');
    expect(headerOf(calls[0], 'x-content-sha256')).toBe(sha256Hex(data));
    expect(progress).toEqual([
      [0, 5],
      [5, 5],
    ]);
  });

  it('rejects an oversized object before any request', async () => {
    const { fetchFn, calls } = fakeFetch(() => jsonResponse({ id: 'never' }));
    const backend = new SimpleBackend({ baseUrl: 'https://simple.test', fetchFn, maxObjectBytes: 4 });
    await expect(backend.put(new MemorySource('big.zip', encoder.encode('hello')))).rejects.toBeInstanceOf(
      SizeLimitExceededError
    );
    expect(calls).toHaveLength(0);
  });

  it('does not start once cancelled', async () => {
    const { fetchFn, calls } = fakeFetch(() => jsonResponse({ id: 'never' }));
    const backend = new SimpleBackend({ baseUrl: 'https://simple.test', fetchFn });
    const controller = new AbortController();
    controller.abort(new ZipvaultAbortError('stop'));
    await expect(
      backend.put(new MemorySource('a.zip', encoder.encode('a')), { signal: controller.signal })
    ).rejects.toThrow('stop');
    expect(calls).toHaveLength(0);
  });

  it('classifies error responses', async () => {
    const source = new MemorySource('a.zip', encoder.encode('a'));
    const respond = (res: Response): SimpleBackend =>
      new SimpleBackend({ baseUrl: 'https://simple.test', fetchFn: fakeFetch(() => res).fetchFn });

    const auth = await respond(jsonResponse({ error: 'token expired' }, 401)).put(source).catch((e: unknown) => e);
    expect(auth).toBeInstanceOf(AuthenticationError);
    expect(auth).toMatchObject({ message: 'Upload of a.zip failed: token expired' });

    const busy = await respond(jsonResponse({}, 503, { 'Retry-After': '7' })).put(source).catch((e: unknown) => e);
    expect(busy).toBeInstanceOf(TransientNetworkError);
    expect(busy).toMatchObject({ retryAfterMs: 7000, message: 'Upload of a.zip failed (HTTP 503).' });

    await expect(respond(jsonResponse({}, 200)).put(source)).rejects.toBeInstanceOf(ZipvaultProtocolError);
  });

  it('streams a download', async () => {
    const { fetchFn, calls } = fakeFetch(() => new Response('hello'));
    const backend = new SimpleBackend({ baseUrl: 'https://simple.test', token: TOKEN, fetchFn });
    const ref: RemoteReference = { backend: 'simple', objectId: 'obj/1', name: 'a.zip', sizeBytes: 5 };

    const bytes = concatBytes(await collect(backend.get(ref)));
    expect(new TextDecoder().decode(bytes)).toBe('hello');
    expect(calls[0].url).toBe('https://simple.test/objects/obj%2F1');
    expect(headerOf(calls[0], 'authorization')).toBe('Bearer test-secret');
  });

  it('releases the response body when the consumer stops early', async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('part-1'));
        controller.enqueue(encoder.encode('part-2'));
      },
      cancel() {
        cancelled = true;
      },
    });
    const { fetchFn } = fakeFetch(() => new Response(body));
    const backend = new SimpleBackend({ baseUrl: 'https://simple.test', fetchFn });
    const ref: RemoteReference = { backend: 'simple', objectId: 'obj-1', name: 'a.zip', sizeBytes: 12 };

    const seen: string[] = [];
    for await (const chunk of backend.get(ref)) {
      seen.push(new TextDecoder().decode(chunk));
      break;
    }
    expect(seen).toEqual(['part-1']);
    expect(cancelled).toBe(true);
  });

  it('fails a download that returns more than expected', async () => {
    const { fetchFn } = fakeFetch(() => new Response('hello'));
    const backend = new SimpleBackend({ baseUrl: 'https://simple.test', fetchFn });
    const ref: RemoteReference = { backend: 'simple', objectId: 'obj-1', name: 'a.zip', sizeBytes: 3 };
    await expect(collect(backend.get(ref))).rejects.toBeInstanceOf(IntegrityError);
  });

  it('accepts only http and https urls', () => {
    expect(() => new SimpleBackend({ baseUrl: 'ftp://simple.test' })).toThrow(ZipvaultValidationError);
    expect(() => new SimpleBackend({ baseUrl: 'not a url' })).toThrow(ZipvaultValidationError);
  });
});

describe('ChunkedBackend', () => {
  const data = encoder.encode('abcdefghij');

  function chunkedServer(chunkStatus: (index: number, attempt: number) => number = () => 200) {
    const attempts = new Map<string, number>();
    return fakeFetch((url, init) => {
      if (url.endsWith('/upload/init')) return jsonResponse({ uploadId: 'up-1' });
      if (url.endsWith('/upload/complete')) return jsonResponse({ id: 'obj-9' });
      if (url.endsWith('/upload/cancel')) return jsonResponse({ ok: true });
      const index = new Headers(init?.headers).get('x-chunk-index') ?? '';
      const attempt = (attempts.get(index) ?? 0) + 1;
      attempts.set(index, attempt);
      const status = chunkStatus(Number(index), attempt);
      return status === 200 ? new Response(null, { status }) : jsonResponse({ error: 'nope' }, status);
    });
  }

  it('uploads in fixed-size chunks between init and complete', async () => {
    const { fetchFn, calls } = chunkedServer();
    const backend = new ChunkedBackend({ baseUrl: 'https://chunked.test', token: TOKEN, fetchFn, chunkSize: 4 });
    const progress: Array<[number, number]> = [];

    const ref = await backend.put(new MemorySource('big.zip', data), {
      onProgress: (done, total) => progress.push([done, total]),
    });

    expect(ref).toEqual({ backend: 'chunked', objectId: 'obj-9', name: 'big.zip', sizeBytes: 10 });
    expect(calls.map((c) => c.url.replace('https://chunked.test/', ''))).toEqual([
      'upload/init',
      'upload/chunk',
      'upload/chunk',
      'upload/chunk',
      'upload/complete',
    ]);
    expect(JSON.parse(String(calls[0].init?.body))).toEqual({
      name: 'big.zip',
      totalSize: 10,
      totalChunks: 3,
      chunkSize: 4,
    });
    expect(calls.slice(1, 4).map((c) => headerOf(c, 'x-chunk-index'))).toEqual(['0', '1', '2']);
    expect(calls.slice(1, 4).map((c) => headerOf(c, 'x-chunk-hash'))).toEqual([
      sha256Hex(encoder.encode('abcd')),
      sha256Hex(encoder.encode('efgh')),
      sha256Hex(encoder.encode('ij')),
    ]);
    expect(calls.slice(1, 4).every((c) => headerOf(c, 'x-upload-id') === 'up-1')).toBe(true);
    expect(headerOf(calls[4], 'authorization')).toBe('Bearer test-secret');
    expect(JSON.parse(String(calls[4].init?.body))).toEqual({ uploadId: 'up-1' });
    expect(progress).toEqual([
      [0, 10],
      [4, 10],
      [8, 10],
      [10, 10],
    ]);
  });

  it('retries a transient chunk failure with backoff', async () => {
    const { fetchFn, calls } = chunkedServer((index, attempt) => (index === 1 && attempt === 1 ? 503 : 200));
    const { sleep, delays } = recordingSleep();
    const backend = new ChunkedBackend({
      baseUrl: 'https://chunked.test',
      fetchFn,
      chunkSize: 4,
      sleep,
      random: () => 0.5,
    });

    await backend.put(new MemorySource('big.zip', data));
    expect(delays).toEqual([1000]);
    expect(calls.map((c) => headerOf(c, 'x-chunk-index'))).toEqual([null, '0', '1', '1', '2', null]);
  });

  it('cancels the upload on a permanent failure', async () => {
    const { fetchFn, calls } = chunkedServer((index) => (index === 0 ? 403 : 200));
    const backend = new ChunkedBackend({ baseUrl: 'https://chunked.test', fetchFn, chunkSize: 4 });

    await expect(backend.put(new MemorySource('big.zip', data))).rejects.toBeInstanceOf(PermissionDeniedError);
    expect(calls.map((c) => c.url.replace('https://chunked.test/', ''))).toEqual([
      'upload/init',
      'upload/chunk',
      'upload/cancel',
    ]);
    expect(JSON.parse(String(calls[2].init?.body))).toEqual({ uploadId: 'up-1' });
  });

  it('stops at the next chunk boundary once cancelled', async () => {
    const { fetchFn, calls } = chunkedServer();
    const backend = new ChunkedBackend({ baseUrl: 'https://chunked.test', fetchFn, chunkSize: 4 });
    const controller = new AbortController();

    const err = await backend
      .put(new MemorySource('big.zip', data), {
        signal: controller.signal,
        onProgress: (done) => {
          if (done === 4) controller.abort(new ZipvaultAbortError('stop'));
        },
      })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ZipvaultAbortError);
    expect(calls.map((c) => c.url.replace('https://chunked.test/', ''))).toEqual([
      'upload/init',
      'upload/chunk',
      'upload/cancel',
    ]);
  });

  it('rejects an oversized object before any request', async () => {
    const { fetchFn, calls } = chunkedServer();
    const backend = new ChunkedBackend({ baseUrl: 'https://chunked.test', fetchFn, maxObjectBytes: 9 });
    await expect(backend.put(new MemorySource('big.zip', data))).rejects.toBeInstanceOf(SizeLimitExceededError);
    expect(calls).toHaveLength(0);
  });

  it('downloads with ranged requests', async () => {
    const { fetchFn, calls } = fakeFetch((_url, init) => {
      const range = new Headers(init?.headers).get('range') ?? '';
      const match = /^bytes=(\d+)-(\d+)$/.exec(range);
      const start = Number(match?.[1]);
      const end = Number(match?.[2]);
      return new Response(data.slice(start, end + 1), { status: 206 });
    });
    const backend = new ChunkedBackend({ baseUrl: 'https://chunked.test', fetchFn, chunkSize: 4 });
    const ref: RemoteReference = { backend: 'chunked', objectId: 'obj-9', name: 'big.zip', sizeBytes: 10 };

    const bytes = concatBytes(await collect(backend.get(ref)));
    expect(new TextDecoder().decode(bytes)).toBe('abcdefghij');
    expect(calls.map((c) => headerOf(c, 'range'))).toEqual(['bytes=0-3', 'bytes=4-7', 'bytes=8-9']);
  });

  it('accepts a server that ignores Range', async () => {
    const { fetchFn, calls } = fakeFetch(() => new Response(data, { status: 200 }));
    const backend = new ChunkedBackend({ baseUrl: 'https://chunked.test', fetchFn, chunkSize: 4 });
    const ref: RemoteReference = { backend: 'chunked', objectId: 'obj-9', name: 'big.zip', sizeBytes: 10 };

    const bytes = concatBytes(await collect(backend.get(ref)));
    expect(bytes).toEqual(data);
    expect(calls).toHaveLength(1);
  });

  it('fails a short range', async () => {
    const { fetchFn } = fakeFetch(() => new Response(encoder.encode('ab'), { status: 206 }));
    const backend = new ChunkedBackend({
      baseUrl: 'https://chunked.test',
      fetchFn,
      chunkSize: 4,
      chunkRetry: { retries: 0 },
    });
    const ref: RemoteReference = { backend: 'chunked', objectId: 'obj-9', name: 'big.zip', sizeBytes: 10 };
    await expect(collect(backend.get(ref))).rejects.toBeInstanceOf(IntegrityError);
  });

  it('requires a positive integer chunk size', () => {
    expect(() => new ChunkedBackend({ baseUrl: 'https://chunked.test', chunkSize: 0 })).toThrow(
      ZipvaultValidationError
    );
  });
});
