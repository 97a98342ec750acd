import { createReadStream, createWriteStream } from 'node:fs';
import { mkdir, rename, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { Writable } from 'node:stream';
import {
  DEFAULT_ARCHIVE_CEILING_BYTES,
  DEFAULT_COMPRESSION_LEVEL,
  MAX_ZIP_ENTRY_BYTES,
} from '../constants.js';
import {
  ZipvaultAbortError,
  ZipvaultError,
  ZipvaultIOError,
  ZipvaultValidationError,
  classifyFsError,
} from '../errors.js';
import type { ArchiveEntry, ArchivePart } from '../types.js';
import { SizedWriter } from '../utils/sized-writer.js';
import { StreamingZipWriter } from '../zip/stream-zip.js';
import { formatPartName, planContainers, type PlannedContainer, type SourceFile } from './planner.js';
import { walkSourceTree } from './walk.js';

export interface ArchiveProgress {
  jobId: string;
  /** Source bytes processed (packed or given up on). */
  bytesDone: number;
  bytesTotal: number;
  partsSealed: number;
  /** Containers in the plan; rebuilt containers can make the final count differ. */
  partsPlanned: number;
  /** Name of the part most recently sealed. */
  currentPart?: string;
}

export interface ArchiverOptions {
  /** Each run writes its parts to `{outputRoot}/{jobId}`. */
  outputRoot: string;
  /** Containers built in parallel. Defaults to the available parallelism. */
  workers?: number;
  /** Deflate level 1-9, or 0 to store entries. */
  compressionLevel?: number;
  createJobId?: () => string;
  /** Source of a file's bytes. Replaced in tests to simulate failing reads. */
  openReadStream?: (file: SourceFile) => AsyncIterable<Uint8Array>;
  /** Destination of a container being built. Replaced in tests to simulate a full disk. */
  openWriteStream?: (tempPath: string) => Writable;
}

export interface PackOptions {
  signal?: AbortSignal;
  /** Called once per run, before anything is written. */
  onStart?: (info: { jobId: string; outputDir: string; files: number; bytesTotal: number }) => void;
  onProgress?: (progress: ArchiveProgress) => void;
  /** A file was left out of the run (unreadable or too large). The run continues. */
  onEntryError?: (file: SourceFile, error: ZipvaultError) => void;
}

/**
 * Folder to size-capped ZIP parts.
 *
 * Files are planned into containers up front from conservative size estimates,
 * so containers can be built in parallel while parts are still emitted in order.
 * A read failure discards the container and rebuilds it from the remaining files;
 * a full destination disk ends the run.
 */
export class Archiver {
  private readonly outputRoot: string;
  private readonly workers: number;
  private readonly level: number;
  private readonly createJobId: () => string;
  private readonly openReadStream: (file: SourceFile) => AsyncIterable<Uint8Array>;
  private readonly openWriteStream: (tempPath: string) => Writable;

  constructor(opts: ArchiverOptions) {
    const level = opts.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL;
    if (!Number.isInteger(level) || level < 0 || level > 9) {
      throw new ZipvaultValidationError('Compression level must be an integer between 0 and 9.');
    }
    const workers = opts.workers ?? os.availableParallelism();
    if (!Number.isInteger(workers) || workers < 1) {
      throw new ZipvaultValidationError('Archiver workers must be a positive integer.');
    }
    this.outputRoot = path.resolve(opts.outputRoot);
    this.workers = workers;
    this.level = level;
    this.createJobId = opts.createJobId ?? (() => createJobId());
    this.openReadStream = opts.openReadStream ?? ((file) => createReadStream(file.absolutePath, { highWaterMark: 1024 * 1024 }));
    this.openWriteStream = opts.openWriteStream ?? ((tempPath) => createWriteStream(tempPath, { flags: 'wx' }));
  }

  /**
   * Lazily pack `sourceDir`. Every iteration of the returned sequence is a new run
   * with its own job id and output directory.
   */
  pack(
    sourceDir: string,
    ceilingBytes: number = DEFAULT_ARCHIVE_CEILING_BYTES,
    baseName = 'Backup',
    opts: PackOptions = {}
  ): AsyncIterable<ArchivePart> {
    if (!Number.isFinite(ceilingBytes) || ceilingBytes <= 0) {
      throw new ZipvaultValidationError('Archive ceiling must be a positive number of bytes.');
    }
    if (!baseName || /[\\/]/.test(baseName)) {
      throw new ZipvaultValidationError('Archive base name must be non-empty and contain no path separators.');
    }
    return {
      [Symbol.asyncIterator]: () => this.run(path.resolve(sourceDir), ceilingBytes, baseName, opts),
    };
  }

  private async *run(
    sourceDir: string,
    ceilingBytes: number,
    baseName: string,
    opts: PackOptions
  ): AsyncGenerator<ArchivePart> {
    const { signal } = opts;
    if (signal?.aborted) throw new ZipvaultAbortError();

    const jobId = this.createJobId();
    const outputDir = path.join(this.outputRoot, jobId);
    const files = await walkSourceTree(sourceDir);
    const plan = planContainers(files, ceilingBytes, this.level);
    const bytesTotal = files.reduce((sum, f) => sum + f.sizeBytes, 0);

    try {
      await mkdir(outputDir, { recursive: true });
    } catch (err) {
      throw classifyFsError(err, outputDir);
    }
    opts.onStart?.({ jobId, outputDir, files: files.length, bytesTotal });

    const progress: ArchiveProgress = {
      jobId,
      bytesDone: 0,
      bytesTotal,
      partsSealed: 0,
      partsPlanned: plan.containers.length,
    };
    const settled = new Set<string>();
    const settle = (file: SourceFile): void => {
      if (settled.has(file.relativePath)) return;
      settled.add(file.relativePath);
      progress.bytesDone += file.sizeBytes;
      opts.onProgress?.({ ...progress });
    };
    const reportEntryError = (file: SourceFile, error: ZipvaultError): void => {
      opts.onEntryError?.(file, error);
      settle(file);
    };

    for (const { file, error } of plan.rejected) reportEntryError(file, error);

    const internal = new AbortController();
    const onAbort = (): void => internal.abort(signal?.reason ?? new ZipvaultAbortError());
    signal?.addEventListener('abort', onAbort, { once: true });

    const ctx: BuildContext = {
      outputDir,
      baseName,
      ceilingBytes,
      signal: internal.signal,
      fatal: null,
      fail: (error) => {
        if (ctx.fatal) return;
        ctx.fatal = error;
        internal.abort(error);
      },
      onFileDone: settle,
      onEntryError: reportEntryError,
    };

    const tasks: Promise<BuildOutcome>[] = [];
    const launchUpTo = (limit: number): void => {
      while (tasks.length < Math.min(limit, plan.containers.length)) {
        const slot = tasks.length;
        tasks.push(this.buildContainer(plan.containers[slot], slot, ctx));
      }
    };

    let emitted = 0;
    let nextIndex = 1;
    try {
      for (let slot = 0; slot < plan.containers.length; slot++) {
        launchUpTo(slot + this.workers);
        const outcome = await tasks[slot];
        emitted = slot + 1;
        if (outcome.kind === 'fatal') {
          ctx.fail(outcome.error);
          throw ctx.fatal;
        }
        if (outcome.kind === 'empty') continue;

        const fileName = formatPartName(baseName, nextIndex);
        const finalPath = path.join(outputDir, fileName);
        try {
          await rename(outcome.tempPath, finalPath);
        } catch (err) {
          await rm(outcome.tempPath, { force: true });
          throw classifyFsError(err, finalPath);
        }
        const part: ArchivePart = {
          index: nextIndex,
          jobId,
          fileName,
          path: finalPath,
          sizeBytes: outcome.sizeBytes,
          entries: outcome.entries,
          oversized: outcome.oversized,
        };
        nextIndex++;
        progress.partsSealed++;
        progress.currentPart = fileName;
        opts.onProgress?.({ ...progress });
        yield part;
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (emitted < tasks.length) {
        // Stop and discard containers the consumer will never see.
        if (!internal.signal.aborted) internal.abort(new ZipvaultAbortError('Archive run closed early.'));
        const leftovers = await Promise.all(tasks.slice(emitted));
        await Promise.all(
          leftovers.map((o) => (o.kind === 'sealed' ? rm(o.tempPath, { force: true }) : Promise.resolve()))
        );
      }
    }
  }

  /**
   * Build one planned container, dropping unreadable files and starting over with
   * the rest. Never rejects.
   */
  private async buildContainer(container: PlannedContainer, slot: number, ctx: BuildContext): Promise<BuildOutcome> {
    let files = container.files;
    for (let attempt = 0; files.length > 0; attempt++) {
      const tempPath = path.join(ctx.outputDir, `.${ctx.baseName}.build-${slot + 1}-${attempt}.partial`);
      try {
        const built = await this.writeContainer(files, tempPath, container.oversized, ctx);
        return { kind: 'sealed', tempPath, ...built, oversized: container.oversized };
      } catch (err) {
        await rm(tempPath, { force: true }).catch(() => undefined);
        if (err instanceof SourceReadFailure) {
          ctx.onEntryError(err.file, err.error);
          files = files.filter((f) => f !== err.file);
          continue;
        }
        const error = toFatal(err);
        ctx.fail(error);
        return { kind: 'fatal', error };
      }
    }
    return { kind: 'empty' };
  }

  private async writeContainer(
    files: SourceFile[],
    tempPath: string,
    oversized: boolean,
    ctx: BuildContext
  ): Promise<{ sizeBytes: number; entries: ArchiveEntry[] }> {
    throwIfAborted(ctx.signal);
    const capacity = oversized ? MAX_ZIP_ENTRY_BYTES : ctx.ceilingBytes;
    const writer = new SizedWriter(this.openWriteStream(tempPath), capacity, tempPath);
    const zip = new StreamingZipWriter((chunk) => writer.write(chunk), { level: this.level });
    const entries: ArchiveEntry[] = [];
    const finished: SourceFile[] = [];

    try {
      for (const file of files) {
        zip.startFile(file.relativePath, file.mtimeMs);
        const iterator = this.openReadStream(file)[Symbol.asyncIterator]();
        let read = 0;
        try {
          for (;;) {
            throwIfAborted(ctx.signal);
            let step: IteratorResult<Uint8Array>;
            try {
              step = await iterator.next();
            } catch (err) {
              throw new SourceReadFailure(file, classifyFsError(err, file.absolutePath));
            }
            if (step.done) break;
            read += step.value.byteLength;
            if (read > file.sizeBytes) {
              throw new SourceReadFailure(
                file,
                new ZipvaultIOError(`${file.relativePath} grew while it was being archived.`, {
                  path: file.absolutePath,
                  code: 'SOURCE_CHANGED',
                })
              );
            }
            zip.writeChunk(step.value);
            await zip.flush();
          }
        } finally {
          await iterator.return?.();
        }
        zip.endFile();
        await zip.flush();
        entries.push({ relativePath: file.relativePath, sizeBytes: read });
        finished.push(file);
      }
      await zip.finalize();
      await writer.close();
    } catch (err) {
      writer.destroy();
      throw err;
    }

    for (const file of finished) ctx.onFileDone(file);
    return { sizeBytes: writer.bytesWritten, entries };
  }
}

interface BuildContext {
  outputDir: string;
  baseName: string;
  ceilingBytes: number;
  signal: AbortSignal;
  /** First run-ending error; later failures are consequences of it. */
  fatal: unknown;
  /** Record a run-ending error and stop every other container. */
  fail: (error: unknown) => void;
  onFileDone: (file: SourceFile) => void;
  onEntryError: (file: SourceFile, error: ZipvaultError) => void;
}

type BuildOutcome =
  | { kind: 'sealed'; tempPath: string; sizeBytes: number; entries: ArchiveEntry[]; oversized: boolean }
  | { kind: 'empty' }
  | { kind: 'fatal'; error: unknown };

class SourceReadFailure extends Error {
  constructor(readonly file: SourceFile, readonly error: ZipvaultIOError) {
    super(error.message);
    this.name = 'SourceReadFailure';
  }
}

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) throw signal.reason ?? new ZipvaultAbortError();
}

function toFatal(err: unknown): unknown {
  if (err instanceof ZipvaultError) return err;
  if (err instanceof Error && 'code' in err) return classifyFsError(err, '<archive>');
  return err;
}

/**
 * `YYYYMMDD_HHMMSS_XXXXX` in local time with a random uppercase alphanumeric suffix.
 */
export function createJobId(now: Date = new Date(), random: () => number = Math.random): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  const alphabet = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
  let suffix = '';
  for (let i = 0; i < 5; i++) suffix += alphabet[Math.floor(random() * alphabet.length)];
  return `${stamp}_${suffix}`;
}
