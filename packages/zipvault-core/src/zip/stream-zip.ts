import { Zip, ZipDeflate, ZipPassThrough } from 'fflate';

export interface StreamingZipOptions {
  /** Deflate level 1-9; 0 stores entries uncompressed. */
  level?: number;
}

const DEFLATE_LEVELS = [1, 2, 3, 4, 5, 6, 7, 8, 9] as const;
type DeflateLevel = (typeof DEFLATE_LEVELS)[number];

const DOS_EPOCH = Date.UTC(1980, 0, 1, 12);
const DOS_LIMIT = Date.UTC(2099, 11, 31);

/**
 * Streaming ZIP writer that assembles files into a ZIP archive on the fly.
 * Entries are deflated with fflate (or stored when the level is 0) and handed to
 * `onData` in order; `flush()` waits until the consumer has taken everything.
 */
export class StreamingZipWriter {
  private zip: InstanceType<typeof Zip>;
  private currentFile: ZipDeflate | ZipPassThrough | null = null;
  private onData: (chunk: Uint8Array) => void | Promise<void>;
  private level: number;
  private finalized = false;
  private pendingWrites: Promise<void> = Promise.resolve();
  private failure: unknown = null;

  constructor(onData: (chunk: Uint8Array) => void | Promise<void>, opts: StreamingZipOptions = {}) {
    this.onData = onData;
    this.level = Math.max(0, Math.min(9, Math.round(opts.level ?? 6)));
    this.zip = new Zip((err, data) => {
      if (err) {
        this.failure = err;
        return;
      }
      // Queue data delivery to handle async consumers; the first failure stops delivery
      this.pendingWrites = this.pendingWrites
        .then(() => (this.failure ? undefined : this.onData(data)))
        .catch((writeErr: unknown) => {
          if (!this.failure) this.failure = writeErr;
        });
    });
  }

  /**
   * Begin a new file entry in the ZIP.
   * Must call endFile() before starting another file.
   * @param name - Filename within the ZIP archive.
   * @param mtimeMs - Modification time stored in the entry header.
   */
  startFile(name: string, mtimeMs?: number): void {
    if (this.currentFile) {
      throw new Error('Must call endFile() before starting a new file.');
    }
    if (this.finalized) {
      throw new Error('ZIP has already been finalized.');
    }
    const entry = this.level === 0
      ? new ZipPassThrough(name)
      : new ZipDeflate(name, { level: toDeflateLevel(this.level) });
    entry.mtime = clampDosTime(mtimeMs ?? DOS_EPOCH);
    this.zip.add(entry);
    this.currentFile = entry;
  }

  /**
   * Write a chunk of data to the current file entry.
   * @param data - The data chunk to write.
   */
  writeChunk(data: Uint8Array): void {
    if (!this.currentFile) {
      throw new Error('No file started. Call startFile() first.');
    }
    this.throwIfFailed();
    this.currentFile.push(data, false);
  }

  /**
   * End the current file entry.
   */
  endFile(): void {
    if (!this.currentFile) {
      throw new Error('No file to end.');
    }
    this.currentFile.push(new Uint8Array(0), true);
    this.currentFile = null;
    this.throwIfFailed();
  }

  /** Wait until every chunk produced so far has been accepted by the consumer. */
  async flush(): Promise<void> {
    await this.pendingWrites;
    this.throwIfFailed();
  }

  /**
   * Finalize the ZIP archive. Must be called after all files are written.
   * Waits for all pending async writes to complete before resolving.
   */
  async finalize(): Promise<void> {
    if (this.currentFile) {
      throw new Error('Cannot finalize with an open file. Call endFile() first.');
    }
    if (this.finalized) return;
    this.finalized = true;
    this.zip.end();
    // Wait for all queued onData callbacks to complete
    await this.flush();
  }

  private throwIfFailed(): void {
    if (this.failure) throw this.failure;
  }
}

function toDeflateLevel(level: number): DeflateLevel {
  return DEFLATE_LEVELS.find((l) => l === level) ?? 6;
}

function clampDosTime(ms: number): number {
  return Math.min(Math.max(ms, DOS_EPOCH), DOS_LIMIT);
}
