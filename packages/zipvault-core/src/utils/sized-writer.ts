import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import { ZipvaultIOError, classifyFsError } from '../errors.js';

export class CapacityExceededError extends ZipvaultIOError {
  readonly capacity: number;
  readonly attempted: number;

  constructor(capacity: number, attempted: number, path?: string) {
    super(`Write of ${attempted} bytes would exceed the capacity of ${capacity} bytes.`, {
      code: 'CAPACITY_EXCEEDED',
      path,
      details: { capacity, attempted },
    });
    this.name = 'CapacityExceededError';
    this.capacity = capacity;
    this.attempted = attempted;
  }
}

/**
 * Byte sink over a Writable that counts what has been written and refuses any
 * write that would push the total past `capacity`.
 */
export class SizedWriter {
  readonly capacity: number;
  private readonly stream: Writable;
  private readonly path?: string;
  private written = 0;
  private failure: unknown = null;
  private waiters = new Set<(err: unknown) => void>();

  constructor(stream: Writable, capacity = Number.POSITIVE_INFINITY, path?: string) {
    this.stream = stream;
    this.capacity = capacity;
    this.path = path;
    stream.on('error', (err) => {
      this.failure = err;
      for (const notify of this.waiters) notify(err);
      this.waiters.clear();
    });
  }

  get bytesWritten(): number {
    return this.written;
  }

  get remaining(): number {
    return Math.max(0, this.capacity - this.written);
  }

  wouldExceed(bytes: number): boolean {
    return this.written + bytes > this.capacity;
  }

  /**
   * Write one chunk, waiting for the stream to drain when it asks for backpressure.
   * @throws {CapacityExceededError} If the chunk does not fit; nothing is written.
   */
  async write(chunk: Uint8Array): Promise<void> {
    this.throwIfFailed();
    if (this.stream.destroyed) {
      throw new ZipvaultIOError('Write after the stream was closed.', { path: this.path });
    }
    if (this.wouldExceed(chunk.byteLength)) {
      throw new CapacityExceededError(this.capacity, this.written + chunk.byteLength, this.path);
    }
    this.written += chunk.byteLength;
    if (this.stream.write(chunk)) return;

    await new Promise<void>((resolve, reject) => {
      const onError = (err: unknown): void => {
        this.stream.off('drain', onDrain);
        reject(this.wrap(err));
      };
      const onDrain = (): void => {
        this.waiters.delete(onError);
        resolve();
      };
      this.waiters.add(onError);
      this.stream.once('drain', onDrain);
    });
  }

  /** Flush and close the underlying stream. */
  async close(): Promise<void> {
    this.throwIfFailed();
    this.stream.end();
    try {
      await finished(this.stream);
    } catch (err) {
      throw this.wrap(err);
    }
  }

  /** Tear the stream down without flushing; used when a container is discarded. */
  destroy(): void {
    this.stream.destroy();
  }

  private throwIfFailed(): void {
    if (this.failure) throw this.wrap(this.failure);
  }

  private wrap(err: unknown): ZipvaultIOError {
    return classifyFsError(err, this.path ?? '<stream>');
  }
}
