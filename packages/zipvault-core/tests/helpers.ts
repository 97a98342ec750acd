import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type {
  AdapterTransferOptions,
  BackendAdapter,
  BackendVariant,
  FetchFn,
  FileSource,
  MetadataStore,
  RemoteReference,
  SyncItem,
} from '../src/index.js';

export const encoder = new TextEncoder();

export async function makeTempDir(prefix = 'zipvault-test-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const value of iterable) out.push(value);
  return out;
}

export function concatBytes(chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, c) => sum + c.byteLength, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return out;
}

export class MemorySource implements FileSource {
  constructor(readonly name: string, private readonly data: Uint8Array) {}

  get size(): number {
    return this.data.byteLength;
  }

  slice(start: number, end: number): MemorySource {
    return new MemorySource(this.name, this.data.subarray(start, end));
  }

  async read(): Promise<Uint8Array> {
    return this.data;
  }
}

export class MemoryStore implements MetadataStore {
  saves: SyncItem[][] = [];

  constructor(private items: SyncItem[] = []) {}

  async load(): Promise<SyncItem[]> {
    return structuredClone(this.items);
  }

  async save(items: SyncItem[]): Promise<void> {
    this.items = structuredClone(items);
    this.saves.push(this.items);
  }

  get latest(): SyncItem[] {
    return this.items;
  }
}

export type PutBehaviour = (source: FileSource, opts: AdapterTransferOptions, call: number) => Promise<void> | void;

/**
 * In-process backend. Keeps what it receives so it can be downloaded again.
 */
export class FakeAdapter implements BackendAdapter {
  readonly maxObjectBytes = Number.MAX_SAFE_INTEGER;
  readonly puts: string[] = [];
  readonly gets: string[] = [];
  readonly objects = new Map<string, Uint8Array>();

  constructor(
    readonly variant: BackendVariant,
    private readonly behaviour: PutBehaviour = () => undefined
  ) {}

  async put(source: FileSource, opts: AdapterTransferOptions = {}): Promise<RemoteReference> {
    this.puts.push(source.name);
    await this.behaviour(source, opts, this.puts.length);
    const data = await source.read();
    const objectId = `${this.variant}-${this.puts.length}`;
    this.objects.set(objectId, new Uint8Array(data));
    opts.onProgress?.(source.size, source.size);
    return { backend: this.variant, objectId, name: source.name, sizeBytes: source.size };
  }

  async *get(ref: RemoteReference): AsyncGenerator<Uint8Array> {
    this.gets.push(ref.objectId);
    yield this.objects.get(ref.objectId) ?? new Uint8Array(ref.sizeBytes);
  }
}

export interface RecordedCall {
  url: string;
  init?: RequestInit;
}

/** fetch() stand-in that answers from `handler` and records every call. */
export function fakeFetch(
  handler: (url: string, init: RequestInit | undefined, index: number) => Response | Promise<Response>
): { fetchFn: FetchFn; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchFn: FetchFn = async (url, init) => {
    calls.push({ url, init });
    return handler(url, init, calls.length - 1);
  };
  return { fetchFn, calls };
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

export function headerOf(call: RecordedCall | undefined, name: string): string | null {
  return new Headers(call?.init?.headers).get(name);
}

export function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}
