import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import path from 'node:path';
import { selectBackend, DEFAULT_BACKEND_POLICY } from '../backends/select.js';
import { DEFAULT_TRANSFER_WORKERS } from '../constants.js';
import {
  TransientNetworkError,
  ZipvaultAbortError,
  ZipvaultValidationError,
  errorKindOf,
  isAbortError,
  isRetryable,
} from '../errors.js';
import { NodeFileSource } from '../source/file-source.js';
import { reconcileItems } from '../store/reconcile.js';
import type {
  BackendAdapter,
  BackendPolicy,
  BackendSet,
  BackendVariant,
  FileSource,
  MetadataStore,
  ProgressEvent,
  RetryOptions,
  SleepFn,
  SyncItem,
  SyncItemError,
  TransferRequest,
  TransferUnit,
} from '../types.js';
import { computeBackoffDelay, resolveRetry, type ResolvedRetry } from '../utils/backoff.js';
import { sleep } from '../utils/network.js';
import { PathLockTable } from '../utils/path-lock.js';
import { downloadToFile } from './download.js';
import { WorkQueue } from './work-queue.js';

export interface TransferOrchestratorOptions {
  backends: BackendSet;
  policy?: BackendPolicy;
  store?: MetadataStore;
  /** Parallel transfers. */
  workers?: number;
  retry?: RetryOptions;
  /** Per-call timeout handed to the adapters; their own defaults apply when omitted. */
  timeoutMs?: number;
  sleep?: SleepFn;
  random?: () => number;
  /** Monotonic clock for progress timestamps. */
  now?: () => number;
  openSource?: (filePath: string, name: string) => Promise<FileSource>;
  onProgress?: (event: ProgressEvent) => void;
  onUnitSettled?: (unit: TransferUnit) => void;
  onItemChange?: (item: SyncItem) => void;
}

export interface FeedResult {
  scheduled: number;
  /** Set when the producer threw; units it scheduled before that still run. */
  error?: unknown;
}

export interface RunSummary {
  units: TransferUnit[];
  succeeded: number;
  failed: number;
  cancelled: number;
  wasCancelled: boolean;
  /** First failure to persist state, if any. */
  persistError?: unknown;
}

/**
 * Queue of transfer units drained by a bounded pool of workers.
 *
 * Each unit is routed by {@link selectBackend}, runs under a per-path lock,
 * and is retried with exponential backoff while its failures are retryable.
 * Upload outcomes are written to the MetadataStore one terminal state at a time.
 */
export class TransferOrchestrator {
  private readonly backends: BackendSet;
  private readonly policy: BackendPolicy;
  private readonly store?: MetadataStore;
  private readonly workers: number;
  private readonly retry: ResolvedRetry;
  private readonly timeoutMs?: number;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly openSource: (filePath: string, name: string) => Promise<FileSource>;
  private readonly opts: TransferOrchestratorOptions;

  private readonly queue = new WorkQueue<TransferUnit>((u) => `${u.direction}:${u.sourcePath}`);
  private readonly locks = new PathLockTable();
  private readonly items = new Map<string, SyncItem>();
  private controller = new AbortController();
  private running = false;
  private paused = false;
  private producers = 0;
  private settled: TransferUnit[] = [];
  private persistChain: Promise<void> = Promise.resolve();
  private persistError: unknown = undefined;

  constructor(opts: TransferOrchestratorOptions) {
    const workers = opts.workers ?? DEFAULT_TRANSFER_WORKERS;
    if (!Number.isInteger(workers) || workers < 1) {
      throw new ZipvaultValidationError('Transfer workers must be a positive integer.');
    }
    this.opts = opts;
    this.backends = opts.backends;
    this.policy = opts.policy ?? {
      ...DEFAULT_BACKEND_POLICY,
      simpleEnabled: opts.backends.simple !== undefined,
      chunkedEnabled: opts.backends.chunked !== undefined,
    };
    this.store = opts.store;
    this.workers = workers;
    this.retry = resolveRetry(opts.retry);
    this.timeoutMs = opts.timeoutMs;
    this.sleep = opts.sleep ?? sleep;
    this.random = opts.random ?? Math.random;
    this.now = opts.now ?? (() => performance.now());
    this.openSource = opts.openSource ?? ((filePath, name) => NodeFileSource.fromPath(filePath, name));
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  /** Units waiting for a worker. */
  get pending(): number {
    return this.queue.length;
  }

  /**
   * Load tracked items from the store. Items left mid-transfer by an earlier
   * process are reset to Pending so they are uploaded again.
   */
  async load(): Promise<SyncItem[]> {
    const loaded = this.store ? await this.store.load() : [];
    const { items, changed } = reconcileItems(loaded);
    this.items.clear();
    for (const item of items) this.items.set(item.sourcePath, item);
    if (changed > 0) this.persist();
    return this.snapshot();
  }

  getItems(): SyncItem[] {
    return this.snapshot();
  }

  getItem(sourcePath: string): SyncItem | undefined {
    const item = this.items.get(sourcePath);
    return item ? { ...item } : undefined;
  }

  /** Add or replace a tracked item and persist it. */
  track(item: SyncItem): void {
    this.items.set(item.sourcePath, { ...item });
    this.changed(item.sourcePath);
    this.persist();
  }

  /** Record a failure that happened outside a transfer, e.g. while archiving. */
  reportFailure(item: SyncItem, err: unknown, backend?: BackendVariant): void {
    this.track({ ...item, status: 'Failed', error: describeError(err, backend) });
  }

  /**
   * Enqueue a transfer and return its unit. Scheduling a path that is already
   * queued in the same direction returns the existing unit. An item whose
   * upload is in flight keeps its status until that upload settles.
   */
  schedule(request: TransferRequest): TransferUnit {
    return this.enqueue(request, this.controller.signal);
  }

  /**
   * Schedule everything a producer yields, concurrently with `run()`.
   * Workers keep waiting for more work until every producer has finished.
   * Never rejects; a producer failure is reported in the result.
   */
  async feed(source: AsyncIterable<TransferRequest>): Promise<FeedResult> {
    // A cancel stays in force for this producer even after run() has returned.
    const signal = this.controller.signal;
    this.producers++;
    let scheduled = 0;
    try {
      for await (const request of source) {
        this.enqueue(request, signal);
        if (signal.aborted) break;
        scheduled++;
      }
      return { scheduled };
    } catch (err) {
      return { scheduled, error: err };
    } finally {
      this.producers--;
      this.queue.wake();
    }
  }

  /**
   * Drain the queue with the worker pool. Resolves once the queue is empty and
   * no producer is attached, or once cancellation has settled every unit.
   */
  async run(): Promise<RunSummary> {
    if (this.running) throw new ZipvaultValidationError('The orchestrator is already running.');
    this.running = true;
    this.settled = [];
    const signal = this.controller.signal;

    try {
      await Promise.all(Array.from({ length: this.workers }, () => this.workerLoop(signal)));
      for (const unit of this.queue.drain()) this.rollback(unit);
      const persistError = await this.flush();

      const units = this.settled;
      return {
        units,
        succeeded: units.filter((u) => u.state === 'succeeded').length,
        failed: units.filter((u) => u.state === 'failed').length,
        cancelled: units.filter((u) => u.state === 'cancelled').length,
        wasCancelled: signal.aborted,
        persistError,
      };
    } finally {
      this.running = false;
      if (signal.aborted) this.controller = new AbortController();
    }
  }

  /**
   * Wait for queued store writes.
   * @returns The first write failure since the previous flush, if any.
   */
  async flush(): Promise<unknown> {
    await this.persistChain;
    const err = this.persistError;
    this.persistError = undefined;
    return err;
  }

  /**
   * Stop starting transfers. Queued units return to Pending at once; in-flight
   * units stop at their next safe checkpoint and also return to Pending, unless
   * they complete first.
   */
  cancel(reason = 'Transfer cancelled.'): void {
    if (this.isCancelled) return;
    this.controller.abort(new ZipvaultAbortError(reason));
    for (const unit of this.queue.drain()) this.rollback(unit);
    this.queue.wake();
  }

  /** Finish in-flight units but start no new ones until `resume()`. */
  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
    this.queue.wake();
  }

  private enqueue(request: TransferRequest, signal: AbortSignal): TransferUnit {
    const unit = this.createUnit(request);

    if (signal.aborted) {
      this.rollback(unit);
      return unit;
    }

    const { item: queued } = this.queue.push(unit);
    if (request.direction === 'upload' && !this.locks.isHeld(unit.sourcePath)) {
      this.setStatus(unit.sourcePath, 'Queued');
    }
    return queued;
  }

  private async workerLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      if (this.paused) {
        await this.queue.wait();
        continue;
      }
      const unit = this.queue.shift();
      if (!unit) {
        if (this.producers === 0) return;
        await this.queue.wait();
        continue;
      }
      await this.process(unit, signal);
    }
  }

  private async process(unit: TransferUnit, signal: AbortSignal): Promise<void> {
    const release = await this.locks.acquire(unit.sourcePath);
    try {
      if (signal.aborted) {
        this.rollback(unit);
        return;
      }

      let adapter: BackendAdapter;
      try {
        adapter = this.resolveAdapter(unit);
      } catch (err) {
        this.fail(unit, err);
        return;
      }

      unit.state = 'running';
      if (unit.direction === 'upload') this.setStatus(unit.sourcePath, 'Uploading');

      for (let attempt = 1; ; attempt++) {
        unit.attempts = attempt;
        try {
          await this.attempt(unit, adapter, signal);
          this.succeed(unit);
          return;
        } catch (err) {
          if (signal.aborted && isAbortError(err)) {
            this.rollback(unit);
            return;
          }
          if (!isRetryable(err) || attempt > this.retry.retries) {
            this.fail(unit, err);
            return;
          }
          const retryAfter = err instanceof TransientNetworkError ? err.retryAfterMs ?? 0 : 0;
          const delay = Math.max(retryAfter, computeBackoffDelay(attempt, this.retry, this.random));
          try {
            await this.sleep(delay, signal);
          } catch (sleepErr) {
            if (!signal.aborted) throw sleepErr;
            this.rollback(unit);
            return;
          }
        }
      }
    } finally {
      release();
    }
  }

  private resolveAdapter(unit: TransferUnit): BackendAdapter {
    const variant = unit.request.direction === 'download'
      ? unit.request.remote.backend
      : selectBackend(unit.sizeBytes, this.policy);
    const adapter = this.backends[variant];
    if (!adapter) {
      throw new ZipvaultValidationError(`The ${variant} backend is not configured.`);
    }
    unit.backend = variant;
    return adapter;
  }

  private async attempt(unit: TransferUnit, adapter: BackendAdapter, signal: AbortSignal): Promise<void> {
    const onProgress = (done: number, total: number): void => this.emitProgress(unit, done, total, false);
    const { request } = unit;

    if (request.direction === 'download') {
      await downloadToFile(adapter, request.remote, unit.sourcePath, { signal, timeoutMs: this.timeoutMs, onProgress });
      unit.remote = request.remote;
      return;
    }

    const name = request.subject.kind === 'part'
      ? request.subject.part.fileName
      : path.basename(request.subject.item.sourcePath);
    const source = await this.openSource(unit.sourcePath, name);
    unit.remote = await adapter.put(source, { signal, timeoutMs: this.timeoutMs, onProgress });
  }

  private createUnit(request: TransferRequest): TransferUnit {
    const base = {
      id: randomUUID(),
      request,
      direction: request.direction,
      bytesTransferred: 0,
      attempts: 0,
      state: 'queued' as const,
    };

    if (request.direction === 'download') {
      return { ...base, sourcePath: path.resolve(request.destPath), sizeBytes: request.remote.sizeBytes };
    }

    const { subject } = request;
    if (subject.kind === 'part') {
      const { part } = subject;
      const existing = this.items.get(part.path);
      this.items.set(part.path, {
        ...existing,
        sourcePath: part.path,
        kind: 'archive-part',
        sizeBytes: part.sizeBytes,
        modifiedAt: existing?.modifiedAt ?? Date.now(),
        status: existing?.status ?? 'Pending',
        jobId: part.jobId,
        partIndex: part.index,
      });
      return { ...base, sourcePath: part.path, sizeBytes: part.sizeBytes };
    }

    const { item } = subject;
    const existing = this.items.get(item.sourcePath);
    this.items.set(
      item.sourcePath,
      existing && this.locks.isHeld(item.sourcePath) ? { ...existing, ...item, status: existing.status } : { ...existing, ...item }
    );
    return { ...base, sourcePath: item.sourcePath, sizeBytes: item.sizeBytes };
  }

  private succeed(unit: TransferUnit): void {
    unit.state = 'succeeded';
    unit.error = undefined;
    this.emitProgress(unit, unit.sizeBytes, unit.sizeBytes, true);

    if (unit.direction === 'upload' && unit.remote) {
      this.updateItem(unit.sourcePath, {
        status: 'Uploaded',
        remote: unit.remote,
        uploadedAt: new Date().toISOString(),
      });
    }
    this.settle(unit);
  }

  private fail(unit: TransferUnit, err: unknown): void {
    unit.state = 'failed';
    unit.error = describeError(err, unit.backend);
    if (unit.direction === 'upload') {
      this.updateItem(unit.sourcePath, { status: 'Failed', error: unit.error });
    }
    this.settle(unit);
  }

  private rollback(unit: TransferUnit): void {
    unit.state = 'cancelled';
    if (unit.direction === 'upload') this.updateItem(unit.sourcePath, { status: 'Pending' });
    this.settle(unit);
  }

  private settle(unit: TransferUnit): void {
    this.settled.push(unit);
    if (unit.direction === 'upload') this.persist();
    this.opts.onUnitSettled?.(unit);
  }

  private emitProgress(unit: TransferUnit, done: number, total: number, final: boolean): void {
    const bytesTotal = Math.max(total, unit.sizeBytes);
    // Retries restart the adapter at zero; reported progress never goes backwards.
    unit.bytesTransferred = Math.max(unit.bytesTransferred, Math.min(done, bytesTotal));
    this.opts.onProgress?.({
      unitId: unit.id,
      direction: unit.direction,
      sourcePath: unit.sourcePath,
      backend: unit.backend,
      bytesDone: unit.bytesTransferred,
      bytesTotal,
      timestamp: this.now(),
      done: final,
    });
  }

  private setStatus(sourcePath: string, status: SyncItem['status']): void {
    this.updateItem(sourcePath, { status });
  }

  private updateItem(sourcePath: string, patch: Partial<SyncItem>): void {
    const item = this.items.get(sourcePath);
    if (!item) return;
    Object.assign(item, patch);
    if (item.status !== 'Failed') delete item.error;
    this.changed(sourcePath);
  }

  private changed(sourcePath: string): void {
    const item = this.items.get(sourcePath);
    if (item) this.opts.onItemChange?.({ ...item });
  }

  private persist(): void {
    const store = this.store;
    if (!store) return;
    this.persistChain = this.persistChain
      .then(() => store.save(this.snapshot()))
      .catch((err: unknown) => {
        if (this.persistError === undefined) this.persistError = err;
      });
  }

  private snapshot(): SyncItem[] {
    return [...this.items.values()].map((item) => structuredClone(item));
  }
}

function describeError(err: unknown, backend?: BackendVariant): SyncItemError {
  const message = err instanceof Error ? err.message : String(err);
  return backend ? { kind: errorKindOf(err), message, backend } : { kind: errorKindOf(err), message };
}
